import { Global, Module } from '@nestjs/common';
import { env } from '../config/env';
import { TRANSACTION_ISOLATION_LEVEL, TransactionRunner } from './transaction-runner';

@Global()
@Module({
  providers: [
    TransactionRunner,
    {
      provide: TRANSACTION_ISOLATION_LEVEL,
      useValue: env.dbIsolationLevel,
    },
  ],
  exports: [TransactionRunner],
})
export class TransactionModule {}
