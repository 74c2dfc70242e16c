import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  /** Supervision cycle the log entry belongs to. */
  cycle: number;
}

export const logContext = new AsyncLocalStorage<LogContext>();
