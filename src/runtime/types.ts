export interface ContainerState {
  name: string;
  /** Runtime status string, e.g. `running`, `exited`, `created`. */
  status: string;
  running: boolean;
  startedAt?: string;
  exitCode?: number;
}

/**
 * Health as reported by the runtime's own health check.
 * `none` means the image defines no health check.
 */
export type RuntimeHealthStatus = 'healthy' | 'unhealthy' | 'starting' | 'none';

export interface ContainerRunSpec {
  name: string;
  image: string;
  /** `hostPort` → `containerPort` */
  ports: Array<{ hostPort: number; containerPort: number }>;
  restartPolicy: string;
  flags: readonly string[];
}

/**
 * The narrow surface the watchdog needs from a container runtime.
 *
 * `stop` and `remove` are idempotent: a missing or already stopped container is not an error.
 * Implementations throw `RuntimeUnavailableError` when the runtime cannot be reached and
 * `ContainerRuntimeError` when a command runs but fails.
 */
export interface ContainerRuntime {
  inspect(name: string): Promise<ContainerState | undefined>;
  health(name: string): Promise<RuntimeHealthStatus>;
  run(spec: ContainerRunSpec): Promise<void>;
  stop(name: string): Promise<void>;
  remove(name: string): Promise<void>;
  logs(name: string, tail: number): Promise<string[]>;
}
