export {
  createServiceDescriptor,
  descriptorFromEnv,
  readinessBudgetMs,
  DEFAULT_DESCRIPTOR,
} from './descriptor/ServiceDescriptor';
export type { ServiceDescriptor, ServiceDescriptorInput } from './descriptor/ServiceDescriptor';

export * from './runtime';

export { TcpPortProbe } from './probe/TcpPortProbe';
export type { PortCheckResult, PortProbe } from './probe/TcpPortProbe';
export { HealthProber, mapRuntimeHealth } from './probe/HealthProber';
export type { HealthProberOptions, ProbeReport } from './probe/HealthProber';
export { computeCompositeStatus } from './probe/types';
export type { CompositeStatus, HealthSignal, RuntimeHealth } from './probe/types';

export { RecoveryController, toRunSpec } from './recovery/RecoveryController';
export type { RecoveryAttempt, RecoveryControllerOptions, RecoveryOutcome } from './recovery/RecoveryController';

export { SupervisionLoop } from './supervisor/SupervisionLoop';
export type { SupervisionLoopOptions } from './supervisor/SupervisionLoop';
export type { CycleResult, LoopState, LoopSummary, StateChangeHandler } from './supervisor/types';

export { Installer } from './install/Installer';
export type { InstallerOptions, InstallOptions, InstallResult } from './install/Installer';
export { SystemctlInitSystem, classifyInstallFailure } from './install/InitSystem';
export type { InitSystem, SystemctlInitSystemOptions } from './install/InitSystem';
export { descriptorToArgs, renderUnit, unitNameFor } from './install/unit';
export type { PersistedServiceUnit, UnitOptions } from './install/unit';

export { StatusReporter, renderStatusReport } from './status/StatusReporter';
export type { StatusDiagnostics, StatusReport, StatusReporterOptions } from './status/StatusReporter';

export { NoopNotifier, WallNotifier } from './alert/Notifier';
export type { AlertLevel, Notifier } from './alert/Notifier';

export { ConfigurableLoggerFactory, formatLogLine } from './logging/ConfigurableLoggerFactory';
export type { ConfigurableLoggerOptions } from './logging/ConfigurableLoggerFactory';

export {
  ConfigurationError,
  ContainerRuntimeError,
  InstallError,
  PermissionError,
  ProbeTimeoutError,
  RecoveryRuntimeError,
  RecoveryTimedOutError,
  RuntimeUnavailableError,
} from './errors';
