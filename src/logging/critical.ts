import type { Logger } from 'global-logger-factory';

/**
 * Marks an error entry as CRITICAL. The log formatter renders such entries with the
 * `CRITICAL` level instead of `ERROR`.
 */
export const CRITICAL_MARKER = 'CRITICAL: ';

export function logCritical(logger: Pick<Logger, 'error'>, message: string): void {
  logger.error(`${CRITICAL_MARKER}${message}`);
}
