export type RuntimeHealth = 'healthy' | 'unhealthy' | 'unknown';

export interface HealthSignal {
  containerRunning: boolean;
  portReachable: boolean;
  runtimeHealth: RuntimeHealth;
}

export type CompositeStatus = 'healthy' | 'degraded' | 'down';

/**
 * `healthy` iff all three signals are positive, `down` iff the container is not running,
 * `degraded` otherwise.
 */
export function computeCompositeStatus(signal: HealthSignal): CompositeStatus {
  if (!signal.containerRunning) {
    return 'down';
  }
  if (signal.portReachable && signal.runtimeHealth === 'healthy') {
    return 'healthy';
  }
  return 'degraded';
}
