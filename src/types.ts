/**
 * Host port published to a container port.
 * `hostPort` is undefined when the runtime picks an ephemeral port.
 */
export type PortMapping = {
  hostIp: string;
  hostPort?: number;
  containerPort: number;
  protocol: 'tcp' | 'udp';
}

/**
 * Host directory mounted into the container. `source` is absolute.
 */
export type BindVolumeMount = {
  type: 'bind';
  source: string;
  target: string;
  readOnly: boolean;
}

/**
 * Named volume (declared at the top level) or anonymous volume when `source` is undefined.
 */
export type NamedVolumeMount = {
  type: 'volume';
  source?: string;
  target: string;
  readOnly: boolean;
}

export type VolumeMount = BindVolumeMount | NamedVolumeMount

/**
 * Probe run inside the container to decide readiness.
 * A service is healthy after one successful probe, unhealthy after
 * `retries` consecutive failures (failures during `startPeriodMs` don't count).
 */
export type HealthCheck = {
  /** argv executed in the container */
  test: string[];
  intervalMs: number;
  timeoutMs: number;
  startPeriodMs: number;
  retries: number;
}

export type RestartMode = 'no' | 'always' | 'on-failure' | 'unless-stopped'

export type RestartPolicy = {
  mode: RestartMode;
  /** Only meaningful for `on-failure` */
  maxRetries?: number;
}

export type EnvFileRef = {
  /** Absolute path */
  path: string;
  required: boolean;
}

export type DependencyCondition = 'service_started' | 'service_healthy'

export type ServiceDependency = {
  service: string;
  /** Undefined means: healthy when the dependency declares a health check, started otherwise */
  condition?: DependencyCondition;
  /** When false, dependents still start if this dependency fails */
  required: boolean;
}

export type ServiceNetwork = {
  name: string;
  aliases: string[];
}

export type BuildSpec = {
  /** Absolute path of the build context */
  context: string;
  dockerfile?: string;
  args: Record<string, string>;
}

export type ServiceDefinition = {
  name: string;
  image?: string;
  build?: BuildSpec;
  containerName?: string;
  command?: string[];
  ports: PortMapping[];
  volumes: VolumeMount[];
  healthcheck?: HealthCheck;
  restart: RestartPolicy;
  envFiles: EnvFileRef[];
  environment: Record<string, string>;
  dependsOn: ServiceDependency[];
  networks: ServiceNetwork[];
  stopGracePeriodMs?: number;
}

export type NetworkDefinition = {
  name: string;
  driver: string;
  external: boolean;
}

export type VolumeDefinition = {
  name: string;
  driver: string;
  external: boolean;
}

/**
 * A parsed and validated descriptor. Immutable for the duration of a run.
 */
export type Stack = {
  /** Project name, prefixes every runtime resource */
  name: string;
  /** Directory containing the descriptor */
  root: string;
  /** Absolute path of the descriptor */
  file: string;
  services: ServiceDefinition[];
  networks: NetworkDefinition[];
  volumes: VolumeDefinition[];
}

export type RestartBackoff = {
  initialDelayMs: number;
  maxDelayMs: number;
  /** A container that stayed up this long resets the attempt counter */
  resetAfterMs: number;
}

/**
 * Project-level configuration read from `.berth.yml`.
 */
export type BerthConfig = {
  workdir?: string;
  stopGracePeriodMs?: number;
  restart?: Partial<RestartBackoff>;
}
