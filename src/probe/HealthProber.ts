import { getLoggerFor } from 'global-logger-factory';
import type { ServiceDescriptor } from '../descriptor/ServiceDescriptor';
import { errorMessage, RuntimeUnavailableError } from '../errors';
import type { ContainerRuntime, ContainerState, RuntimeHealthStatus } from '../runtime/types';
import { withTimeout } from '../util/timing';
import type { PortCheckResult, PortProbe } from './TcpPortProbe';
import { computeCompositeStatus, type CompositeStatus, type HealthSignal, type RuntimeHealth } from './types';

export interface HealthProberOptions {
  runtime: ContainerRuntime;
  portProbe: PortProbe;
}

export interface ProbeReport {
  signal: HealthSignal;
  status: CompositeStatus;
  /** `undefined` when the container does not exist or could not be inspected. */
  container?: ContainerState;
  port: PortCheckResult;
  runtimeHealthRaw?: RuntimeHealthStatus;
  /** One entry per failed sub-check. */
  errors: string[];
  checkedAt: string;
}

/**
 * Runs the three independent health checks against one service.
 *
 * Each sub-check is bounded by `descriptor.checkTimeoutMs`, so a probe takes at most three
 * times that. Failures of a sub-check only turn its own axis negative; probing never rejects.
 */
export class HealthProber {
  private readonly logger = getLoggerFor(this);
  private readonly runtime: ContainerRuntime;
  private readonly portProbe: PortProbe;

  public constructor(options: HealthProberOptions) {
    this.runtime = options.runtime;
    this.portProbe = options.portProbe;
  }

  public async probe(descriptor: ServiceDescriptor): Promise<HealthSignal> {
    const report = await this.inspect(descriptor);
    return report.signal;
  }

  public async inspect(descriptor: ServiceDescriptor): Promise<ProbeReport> {
    const { name, host, port, checkTimeoutMs } = descriptor;
    const errors: string[] = [];

    let container: ContainerState | undefined;
    try {
      container = await withTimeout('container inspect', checkTimeoutMs, () => this.runtime.inspect(name));
    } catch (error: unknown) {
      errors.push(`inspect: ${errorMessage(error)}`);
      this.reportFailure('inspect', error);
    }
    const containerRunning = container?.running === true;

    let portResult: PortCheckResult;
    try {
      portResult = await withTimeout('port check', checkTimeoutMs, () => this.portProbe.check(host, port, checkTimeoutMs));
    } catch (error: unknown) {
      portResult = { host, port, reachable: false, error: errorMessage(error) };
    }
    if (!portResult.reachable) {
      errors.push(`port ${host}:${port}: ${portResult.error ?? 'not reachable'}`);
    }

    let runtimeHealthRaw: RuntimeHealthStatus | undefined;
    let runtimeHealth: RuntimeHealth = 'unknown';
    if (containerRunning) {
      try {
        runtimeHealthRaw = await withTimeout('runtime health', checkTimeoutMs, () => this.runtime.health(name));
        runtimeHealth = mapRuntimeHealth(runtimeHealthRaw, descriptor.requireHealthcheck);
      } catch (error: unknown) {
        errors.push(`health: ${errorMessage(error)}`);
        this.reportFailure('health', error);
      }
    }

    const signal: HealthSignal = { containerRunning, portReachable: portResult.reachable, runtimeHealth };
    const status = computeCompositeStatus(signal);
    this.logger.debug(
      `Probe ${name}: running=${containerRunning} port=${portResult.reachable} health=${runtimeHealth} -> ${status}`,
    );

    return {
      signal,
      status,
      container,
      port: portResult,
      runtimeHealthRaw,
      errors,
      checkedAt: new Date().toISOString(),
    };
  }

  private reportFailure(check: string, error: unknown): void {
    if (error instanceof RuntimeUnavailableError) {
      this.logger.error(`Container runtime unavailable during ${check}: ${error.message}`);
    } else {
      this.logger.warn(`Health sub-check ${check} failed: ${errorMessage(error)}`);
    }
  }
}

export function mapRuntimeHealth(raw: RuntimeHealthStatus, requireHealthcheck: boolean): RuntimeHealth {
  switch (raw) {
    case 'healthy':
      return 'healthy';
    case 'unhealthy':
      return 'unhealthy';
    case 'starting':
      return 'unknown';
    case 'none':
      return requireHealthcheck ? 'unknown' : 'healthy';
  }
}
