export { DockerCliRuntime, buildRunArgs } from './DockerCliRuntime';
export type { DockerCliRuntimeOptions } from './DockerCliRuntime';
export type { ContainerRunSpec, ContainerRuntime, ContainerState, RuntimeHealthStatus } from './types';
