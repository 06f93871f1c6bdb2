/**
 * Published port of a container.
 */
export type PortBinding = {
  hostIp: string;
  /** Undefined lets the runtime pick an ephemeral port */
  hostPort?: number;
  containerPort: number;
  protocol: 'tcp' | 'udp';
}

/**
 * Mount of a host directory or a named/anonymous volume.
 */
export type MountBinding = {
  type: 'bind' | 'volume';
  /** Absolute host path (bind) or runtime volume name (volume); undefined for anonymous volumes */
  source?: string;
  target: string;
  readOnly: boolean;
}

/**
 * Attachment of a container to a network, with the DNS aliases it answers to.
 */
export type NetworkAttachment = {
  /** Runtime network name */
  network: string;
  aliases: string[];
}

/**
 * Request to create a network. Creating an existing network is a no-op.
 */
export type NetworkRequest = {
  name: string;
  driver: string;
  project: string;
}

/**
 * Request to create a named volume. Creating an existing volume is a no-op.
 */
export type VolumeRequest = {
  name: string;
  driver: string;
  project: string;
}

/**
 * Request to build an image from a context directory.
 */
export type BuildRequest = {
  /** Tag applied to the built image */
  tag: string;
  context: string;
  dockerfile?: string;
  args: Record<string, string>;
}

/**
 * Request to create (not start) a container.
 */
export type CreateContainerRequest = {
  /** Container name, unique on the host */
  name: string;
  project: string;
  service: string;
  image: string;
  /** Overrides the image's default command */
  command?: string[];
  env: Record<string, string>;
  ports: PortBinding[];
  mounts: MountBinding[];
  /** First entry is attached at creation, the others right after */
  networks: NetworkAttachment[];
  /**
   * Restart policy handed to the runtime itself. Only used when no
   * supervisor stays attached to the stack (detached mode).
   */
  restart: string;
}

/**
 * Outcome of a command executed inside a running container.
 */
export type ExecResult = {
  exitCode: number;
  output: string;
  timedOut: boolean;
}

/**
 * Container of a project as reported by the runtime.
 */
export type ContainerSummary = {
  name: string;
  service: string;
  /** Runtime state (`running`, `exited`, `restarting`, `created`, ...) */
  state: string;
  /** Human-readable status (`Up 2 minutes`, `Exited (1) 3 seconds ago`, ...) */
  status: string;
}
