import { execFile } from 'node:child_process';
import { getLoggerFor } from 'global-logger-factory';

export type AlertLevel = 'info' | 'critical';

/**
 * Operator-facing alert hook. Implementations must not throw.
 */
export interface Notifier {
  notify(level: AlertLevel, message: string): Promise<void>;
}

export class NoopNotifier implements Notifier {
  public async notify(): Promise<void> {
    // Alerts disabled.
  }
}

/**
 * Broadcasts alerts to every logged-in terminal through `wall`.
 */
export class WallNotifier implements Notifier {
  private readonly logger = getLoggerFor(this);

  public constructor(private readonly binary = 'wall') {}

  public notify(level: AlertLevel, message: string): Promise<void> {
    const text = level === 'critical' ? `CRITICAL: ${message}` : message;
    return new Promise((resolve) => {
      execFile(this.binary, [ text ], { timeout: 5_000 }, (error) => {
        if (error) {
          this.logger.debug(`wall broadcast failed: ${error.message}`);
        }
        resolve();
      });
    });
  }
}
