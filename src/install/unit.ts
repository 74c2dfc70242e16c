import type { ServiceDescriptor } from '../descriptor/ServiceDescriptor';

export interface PersistedServiceUnit {
  unitName: string;
  contents: string;
}

export interface UnitOptions {
  unitName: string;
  description: string;
  execStart: readonly string[];
  workingDirectory: string;
  user?: string;
  restartSec?: number;
  /** systemd output target, e.g. `journal` or `append:/var/log/x.log`. */
  logTarget?: string;
}

export function unitNameFor(descriptor: ServiceDescriptor): string {
  return `${descriptor.name}-watchdog.service`;
}

/**
 * CLI flags that reproduce `descriptor` when passed back to `monitor`.
 */
export function descriptorToArgs(descriptor: ServiceDescriptor): string[] {
  const args = [
    '--name', descriptor.name,
    '--image', descriptor.image,
    '--host', descriptor.host,
    '--port', String(descriptor.port),
    '--container-port', String(descriptor.containerPort),
    '--restart-policy', descriptor.restartPolicy,
    '--ready-attempts', String(descriptor.readinessAttempts),
    '--poll-interval', String(descriptor.pollIntervalMs),
    '--check-interval', String(descriptor.checkIntervalMs),
    '--check-timeout', String(descriptor.checkTimeoutMs),
    '--command-timeout', String(descriptor.commandTimeoutMs),
    '--backoff-multiplier', String(descriptor.backoffMultiplier),
    '--max-backoff', String(descriptor.maxBackoffMs),
    '--max-failures', String(descriptor.maxConsecutiveFailures),
  ];
  if (descriptor.requireHealthcheck) {
    args.push('--require-healthcheck');
  }
  // `=` keeps values such as `--gpus` from being read as options.
  for (const flag of descriptor.runtimeFlags) {
    args.push(`--runtime-flag=${flag}`);
  }
  return args;
}

export function renderUnit(options: UnitOptions): PersistedServiceUnit {
  const logTarget = options.logTarget ?? 'journal';
  const lines = [
    '[Unit]',
    `Description=${options.description}`,
    'After=docker.service',
    'Requires=docker.service',
    '',
    '[Service]',
    'Type=simple',
    `User=${options.user ?? 'root'}`,
    `WorkingDirectory=${options.workingDirectory}`,
    `ExecStart=${options.execStart.map(quoteExecArg).join(' ')}`,
    'Restart=always',
    `RestartSec=${options.restartSec ?? 10}`,
    `StandardOutput=${logTarget}`,
    `StandardError=${logTarget}`,
    '',
    '[Install]',
    'WantedBy=multi-user.target',
    '',
  ];
  return { unitName: options.unitName, contents: lines.join('\n') };
}

const SAFE_ARG = /^[A-Za-z0-9_@+=:,./-]+$/u;

/**
 * Escapes one ExecStart word. systemd expands `%` specifiers and `$` variables
 * even inside quotes, so both are doubled.
 */
export function quoteExecArg(arg: string): string {
  const escaped = arg.replace(/%/gu, '%%').replace(/\$/gu, () => '$$');
  if (SAFE_ARG.test(arg)) {
    return escaped;
  }
  return `"${escaped.replace(/\\/gu, '\\\\').replace(/"/gu, '\\"')}"`;
}
