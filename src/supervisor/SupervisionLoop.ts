import { getLoggerFor } from 'global-logger-factory';
import { NoopNotifier, type AlertLevel, type Notifier } from '../alert/Notifier';
import type { ServiceDescriptor } from '../descriptor/ServiceDescriptor';
import { errorMessage } from '../errors';
import { logCritical } from '../logging/critical';
import { logContext } from '../logging/LogContext';
import type { HealthProber } from '../probe/HealthProber';
import { computeCompositeStatus } from '../probe/types';
import type { RecoveryAttempt, RecoveryController } from '../recovery/RecoveryController';
import { MAX_TIMER_MS, sleep } from '../util/timing';
import type { CycleResult, LoopState, LoopSummary, StateChangeHandler } from './types';

export interface SupervisionLoopOptions {
  descriptor: ServiceDescriptor;
  prober: HealthProber;
  recovery: RecoveryController;
  notifier?: Notifier;
  onStateChange?: StateChangeHandler;
}

/**
 * Single-threaded supervisor for one service: check, recover when needed, sleep, repeat.
 *
 * Exactly one probe or recovery is outstanding at any time. The loop never halts on a
 * failed recovery; it tries again on the next cycle until the abort signal fires.
 */
export class SupervisionLoop {
  private readonly logger = getLoggerFor(this);
  private readonly descriptor: ServiceDescriptor;
  private readonly prober: HealthProber;
  private readonly recovery: RecoveryController;
  private readonly notifier: Notifier;
  private readonly onStateChange?: StateChangeHandler;
  private state: LoopState = 'checking';
  private consecutiveFailures = 0;
  private alarmRaised = false;

  public constructor(options: SupervisionLoopOptions) {
    this.descriptor = options.descriptor;
    this.prober = options.prober;
    this.recovery = options.recovery;
    this.notifier = options.notifier ?? new NoopNotifier();
    this.onStateChange = options.onStateChange;
  }

  public getState(): LoopState {
    return this.state;
  }

  public getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  public async run(signal: AbortSignal): Promise<LoopSummary> {
    const { name, checkIntervalMs } = this.descriptor;
    const summary: LoopSummary = { cycles: 0, recoveries: 0, failedRecoveries: 0 };
    this.logger.info(`Starting health monitoring of ${name} (every ${checkIntervalMs}ms)`);

    while (!signal.aborted) {
      try {
        const cycle = summary.cycles + 1;
        const result = await logContext.run({ cycle }, () => this.runCycle(signal));
        summary.cycles++;
        if (result.recovery && result.recovery.outcome !== 'cancelled') {
          summary.recoveries++;
          if (result.recovery.outcome !== 'succeeded') {
            summary.failedRecoveries++;
          }
        }
      } catch (error: unknown) {
        summary.cycles++;
        this.logger.error(`Supervision cycle for ${name} failed unexpectedly: ${errorMessage(error)}`);
      }

      if (signal.aborted) {
        break;
      }
      this.transition('sleeping');
      if (!await sleep(this.nextDelayMs(), signal)) {
        break;
      }
    }

    this.transition('stopped');
    this.logger.info(`Health monitoring of ${name} stopped after ${summary.cycles} cycle(s)`);
    return summary;
  }

  /**
   * One `checking` step, followed by a `recovering` step when the service is not healthy.
   */
  public async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const { name } = this.descriptor;
    this.transition('checking');
    const status = computeCompositeStatus(await this.prober.probe(this.descriptor));

    if (status === 'healthy') {
      this.logger.info(`${name} health check passed`);
      this.resetFailures();
      return { status };
    }

    if (signal?.aborted) {
      this.logger.info(`${name} health check failed (${status}); shutdown requested, skipping restart`);
      return { status };
    }
    this.logger.warn(`${name} health check failed (${status}), attempting restart...`);

    this.transition('recovering');
    const recovery = await this.recovery.recover(this.descriptor, signal);
    await this.handleRecovery(recovery);
    return { status, recovery };
  }

  /**
   * Delay before the next check. Grows with consecutive failed recoveries when a backoff
   * multiplier above 1 is configured.
   */
  public nextDelayMs(): number {
    const { checkIntervalMs, backoffMultiplier, maxBackoffMs } = this.descriptor;
    if (backoffMultiplier <= 1 || this.consecutiveFailures === 0) {
      return checkIntervalMs;
    }
    const cap = Math.min(Math.max(checkIntervalMs, maxBackoffMs), MAX_TIMER_MS);
    return Math.min(Math.round(checkIntervalMs * backoffMultiplier ** this.consecutiveFailures), cap);
  }

  private async handleRecovery(attempt: RecoveryAttempt): Promise<void> {
    const { name, maxConsecutiveFailures } = this.descriptor;

    switch (attempt.outcome) {
      case 'succeeded':
        this.logger.info(`${name} service restored successfully`);
        this.resetFailures();
        await this.alert('info', `${name} was restarted at ${attempt.finishedAt}`);
        return;
      case 'cancelled':
        this.logger.info(`Recovery of ${name} cancelled by shutdown`);
        return;
      case 'timed-out':
      case 'runtime-error':
        break;
    }

    this.consecutiveFailures++;
    logCritical(this.logger, `Failed to restart ${name} (${attempt.outcome}): ${attempt.error ?? 'no detail'}`);
    await this.alert('critical', `${name} restart failed at ${attempt.finishedAt}`);

    if (maxConsecutiveFailures > 0 && this.consecutiveFailures >= maxConsecutiveFailures && !this.alarmRaised) {
      this.alarmRaised = true;
      const message = `${name} failed ${this.consecutiveFailures} consecutive recoveries; the dependency may be permanently broken`;
      logCritical(this.logger, message);
      await this.alert('critical', message);
    }
  }

  private resetFailures(): void {
    this.consecutiveFailures = 0;
    this.alarmRaised = false;
  }

  private async alert(level: AlertLevel, message: string): Promise<void> {
    try {
      await this.notifier.notify(level, message);
    } catch (error: unknown) {
      this.logger.warn(`Alert delivery failed: ${errorMessage(error)}`);
    }
  }

  private transition(next: LoopState): void {
    const previous = this.state;
    this.state = next;
    if (previous !== next) {
      this.onStateChange?.(next, previous);
    }
  }
}
