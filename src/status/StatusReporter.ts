import fs from 'node:fs/promises';
import { getLoggerFor } from 'global-logger-factory';
import type { ServiceDescriptor } from '../descriptor/ServiceDescriptor';
import { errorMessage } from '../errors';
import type { HealthProber, ProbeReport } from '../probe/HealthProber';
import type { CompositeStatus } from '../probe/types';
import type { ContainerRuntime } from '../runtime/types';
import { withTimeout } from '../util/timing';

export interface StatusReporterOptions {
  runtime: ContainerRuntime;
  prober: HealthProber;
  /** The watchdog's own log file; its tail is included when it exists. */
  logFile?: string;
  logLines?: number;
}

export interface StatusDiagnostics {
  containerExists: boolean;
  probe: ProbeReport;
  containerLogs: string[];
  containerLogsError?: string;
  watchdogLog: string[];
}

export interface StatusReport {
  service: string;
  status: CompositeStatus;
  diagnostics: StatusDiagnostics;
}

/**
 * One-shot, read-only status query. Probes independently, so it is safe to call while a
 * supervision loop is running.
 */
export class StatusReporter {
  private readonly logger = getLoggerFor(this);
  private readonly runtime: ContainerRuntime;
  private readonly prober: HealthProber;
  private readonly logFile?: string;
  private readonly logLines: number;

  public constructor(options: StatusReporterOptions) {
    this.runtime = options.runtime;
    this.prober = options.prober;
    this.logFile = options.logFile;
    this.logLines = options.logLines ?? 10;
  }

  public async status(descriptor: ServiceDescriptor): Promise<StatusReport> {
    const probe = await this.prober.inspect(descriptor);
    const containerExists = probe.container !== undefined;

    let containerLogs: string[] = [];
    let containerLogsError: string | undefined;
    if (containerExists) {
      try {
        containerLogs = await withTimeout(
          'container logs',
          descriptor.checkTimeoutMs,
          () => this.runtime.logs(descriptor.name, this.logLines),
        );
      } catch (error: unknown) {
        containerLogsError = errorMessage(error);
        this.logger.debug(`Could not read logs of ${descriptor.name}: ${containerLogsError}`);
      }
    }

    return {
      service: descriptor.name,
      status: probe.status,
      diagnostics: {
        containerExists,
        probe,
        containerLogs,
        ...(containerLogsError === undefined ? {} : { containerLogsError }),
        watchdogLog: await this.readWatchdogLog(),
      },
    };
  }

  private async readWatchdogLog(): Promise<string[]> {
    if (!this.logFile) {
      return [];
    }
    try {
      const content = await fs.readFile(this.logFile, 'utf-8');
      return tail(content, this.logLines);
    } catch (error: unknown) {
      this.logger.debug(`Could not read ${this.logFile}: ${errorMessage(error)}`);
      return [];
    }
  }
}

export function tail(content: string, lines: number): string[] {
  return content
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .slice(-lines);
}

const STATUS_ICON: Record<CompositeStatus, string> = {
  healthy: '●',
  degraded: '◌',
  down: '○',
};

export function renderStatusReport(report: StatusReport): string {
  const { probe, containerExists, containerLogs, containerLogsError, watchdogLog } = report.diagnostics;
  const mark = (ok: boolean): string => (ok ? '✓' : '✗');
  const container = probe.container;
  const lines: string[] = [
    `=== ${report.service} status ===`,
    `${STATUS_ICON[report.status]} ${report.status}`,
    '',
    `${mark(probe.signal.containerRunning)} Container: ${
      containerExists && container ? `${container.status}${container.startedAt ? ` since ${container.startedAt}` : ''}` : 'not found'
    }`,
    `${mark(probe.port.reachable)} Port ${probe.port.host}:${probe.port.port}: ${
      probe.port.reachable ? `accessible (${probe.port.latencyMs ?? 0}ms)` : `not accessible${probe.port.error ? ` (${probe.port.error})` : ''}`
    }`,
    `${mark(probe.signal.runtimeHealth === 'healthy')} Runtime health: ${probe.signal.runtimeHealth}${
      probe.runtimeHealthRaw ? ` (${probe.runtimeHealthRaw})` : ''
    }`,
  ];

  if (probe.errors.length > 0) {
    lines.push('', 'Problems:');
    for (const error of probe.errors) {
      lines.push(`  - ${error}`);
    }
  }

  lines.push('', 'Recent container logs:');
  if (containerLogsError) {
    lines.push(`  (unavailable: ${containerLogsError})`);
  } else if (containerLogs.length === 0) {
    lines.push('  No logs available');
  } else {
    lines.push(...containerLogs.map((line) => `  ${line}`));
  }

  if (watchdogLog.length > 0) {
    lines.push('', 'Recent watchdog log:');
    lines.push(...watchdogLog.map((line) => `  ${line}`));
  }

  return lines.join('\n');
}
