import { LogLevel } from '@nestjs/common';
import { Env } from './env';

const LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

/** Nest takes the list of enabled levels rather than a threshold. */
export function enabledLogLevels(threshold: Env['logLevel']): LogLevel[] {
  return LEVELS.slice(LEVELS.indexOf(threshold));
}
