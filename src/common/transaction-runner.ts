import { Inject, Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { Mutex } from 'async-mutex';
import { DataSource, EntityManager } from 'typeorm';
import { Env } from '../config/env';
import { translateQueryError } from './query-error';

export const TRANSACTION_ISOLATION_LEVEL = 'TRANSACTION_ISOLATION_LEVEL';

export type IsolationLevel = Env['dbIsolationLevel'];

// these drivers hand every caller the same connection, so overlapping transactions would nest as savepoints
const SINGLE_CONNECTION_DRIVERS: ReadonlyArray<string> = ['sqlite', 'better-sqlite3'];

/**
 * One unit of work per call. On postgres the isolation level keeps concurrent
 * writers apart; on sqlite calls are queued so only one runs at a time.
 */
@Injectable()
export class TransactionRunner {
  private readonly mutex: Mutex | null;

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @Inject(TRANSACTION_ISOLATION_LEVEL) private readonly isolationLevel: IsolationLevel,
  ) {
    this.mutex = SINGLE_CONNECTION_DRIVERS.includes(dataSource.options.type) ? new Mutex() : null;
  }

  /**
   * Runs `work` in a transaction that commits only if it resolves. A
   * serialization failure is reported as a conflict on `conflictField`.
   */
  async run<T>(work: (manager: EntityManager) => Promise<T>, conflictField: string): Promise<T> {
    try {
      return await this.exclusive(() => this.dataSource.transaction(this.isolationLevel, work));
    } catch (err) {
      throw translateQueryError(err, conflictField);
    }
  }

  /** Reads outside a transaction, never while a sqlite write is half done. */
  async read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.exclusive(() => work(this.dataSource.manager));
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.mutex != null ? this.mutex.runExclusive(task) : task();
  }
}
