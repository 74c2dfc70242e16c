import { getLoggerFor } from 'global-logger-factory';
import type { ServiceDescriptor } from '../descriptor/ServiceDescriptor';
import { errorMessage, RecoveryRuntimeError, RecoveryTimedOutError } from '../errors';
import type { HealthProber } from '../probe/HealthProber';
import { computeCompositeStatus } from '../probe/types';
import type { ContainerRunSpec, ContainerRuntime } from '../runtime/types';
import { sleep } from '../util/timing';

export type RecoveryOutcome = 'succeeded' | 'timed-out' | 'runtime-error' | 'cancelled';

export interface RecoveryAttempt {
  service: string;
  startedAt: string;
  finishedAt: string;
  outcome: RecoveryOutcome;
  /** Readiness probes performed. 0 when the cycle ended before polling. */
  attemptsConsumed: number;
  /** Failure detail for `timed-out` and `runtime-error`. */
  error?: string;
}

export interface RecoveryControllerOptions {
  runtime: ContainerRuntime;
  prober: HealthProber;
}

/**
 * Performs one recovery cycle: stop → remove → recreate → readiness poll.
 *
 * Callers must not run two cycles for the same service at once; the supervision loop
 * guarantees this by never overlapping calls.
 */
export class RecoveryController {
  private readonly logger = getLoggerFor(this);
  private readonly runtime: ContainerRuntime;
  private readonly prober: HealthProber;

  public constructor(options: RecoveryControllerOptions) {
    this.runtime = options.runtime;
    this.prober = options.prober;
  }

  /**
   * Cancellation is honoured before the cycle starts and between readiness polls.
   * Teardown and recreate always run as a pair so the container is never left removed.
   */
  public async recover(descriptor: ServiceDescriptor, signal?: AbortSignal): Promise<RecoveryAttempt> {
    const startedAt = new Date().toISOString();
    const finish = (outcome: RecoveryOutcome, attemptsConsumed: number, error?: string): RecoveryAttempt => ({
      service: descriptor.name,
      startedAt,
      finishedAt: new Date().toISOString(),
      outcome,
      attemptsConsumed,
      ...(error === undefined ? {} : { error }),
    });

    if (signal?.aborted) {
      this.logger.info(`Recovery of ${descriptor.name} skipped: shutdown requested`);
      return finish('cancelled', 0);
    }

    this.logger.info(`Starting/restarting ${descriptor.name}...`);
    try {
      await this.recreate(descriptor);
    } catch (error: unknown) {
      const cause = errorMessage(error);
      this.logger.error(new RecoveryRuntimeError(descriptor.name, cause).message);
      return finish('runtime-error', 0, cause);
    }

    this.logger.info(`Waiting for ${descriptor.name} to become ready (${descriptor.readinessAttempts} x ${descriptor.pollIntervalMs}ms)...`);
    for (let attempt = 1; attempt <= descriptor.readinessAttempts; attempt++) {
      const health = await this.prober.probe(descriptor);
      if (computeCompositeStatus(health) === 'healthy') {
        this.logger.info(`${descriptor.name} is ready and accessible after ${attempt} check(s)`);
        return finish('succeeded', attempt);
      }
      if (attempt === descriptor.readinessAttempts) {
        break;
      }
      const slept = await sleep(descriptor.pollIntervalMs, signal);
      if (!slept) {
        this.logger.info(`Readiness wait for ${descriptor.name} interrupted by shutdown`);
        return finish('cancelled', attempt);
      }
    }

    const timedOut = new RecoveryTimedOutError(descriptor.name, descriptor.readinessAttempts);
    this.logger.error(timedOut.message);
    return finish('timed-out', descriptor.readinessAttempts, timedOut.message);
  }

  private async recreate(descriptor: ServiceDescriptor): Promise<void> {
    const existing = await this.runtime.inspect(descriptor.name);
    if (existing) {
      this.logger.info(`Stopping existing container ${descriptor.name} (${existing.status})...`);
      await this.runtime.stop(descriptor.name);
      this.logger.info(`Removing existing container ${descriptor.name}...`);
      await this.runtime.remove(descriptor.name);
    }

    this.logger.info(`Starting new container ${descriptor.name} from ${descriptor.image}...`);
    await this.runtime.run(toRunSpec(descriptor));
    this.logger.info(`Container ${descriptor.name} started`);
  }
}

export function toRunSpec(descriptor: ServiceDescriptor): ContainerRunSpec {
  return {
    name: descriptor.name,
    image: descriptor.image,
    ports: [ { hostPort: descriptor.port, containerPort: descriptor.containerPort } ],
    restartPolicy: descriptor.restartPolicy,
    flags: descriptor.runtimeFlags,
  };
}
