import type {
  BuildRequest,
  ContainerSummary,
  CreateContainerRequest,
  ExecResult,
  NetworkRequest,
  VolumeRequest
} from './types.js'

/**
 * Log line from a container or a build.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface over a container runtime.
 *
 * Implementations:
 * - `DockerCliRuntime`: Uses Docker CLI
 * - `FakeRuntime` (tests): in-process stand-in
 *
 * Every resource is tagged with its project so that `down` and `ps`
 * can find it again from another process.
 */
export abstract class ContainerRuntime {
  /**
   * Verifies that the runtime is available and functional.
   * @throws If the runtime is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Create a network unless it already exists.
   * @returns true when the network was created by this call
   */
  abstract ensureNetwork(request: NetworkRequest): Promise<boolean>

  abstract removeNetwork(name: string): Promise<void>

  /**
   * Create a named volume unless it already exists.
   * @returns true when the volume was created by this call
   */
  abstract ensureVolume(request: VolumeRequest): Promise<boolean>

  abstract removeVolume(name: string): Promise<void>

  abstract imageExists(image: string): Promise<boolean>

  abstract buildImage(request: BuildRequest, onLogLine: OnLogLine): Promise<void>

  abstract createContainer(request: CreateContainerRequest): Promise<void>

  abstract startContainer(name: string): Promise<void>

  /**
   * Ask the container to terminate, then kill it once the grace period is over.
   * Stopping a missing or stopped container is a no-op.
   */
  abstract stopContainer(name: string, graceSec: number): Promise<void>

  /**
   * Force-remove a container and its anonymous volumes. Removing a missing container is a no-op.
   */
  abstract removeContainer(name: string): Promise<void>

  /**
   * Run a command inside a running container (health probes).
   */
  abstract exec(name: string, cmd: string[], timeoutMs: number): Promise<ExecResult>

  /**
   * Block until the container exits.
   * @returns The exit code, or undefined when `signal` aborted the wait
   */
  abstract wait(name: string, signal?: AbortSignal): Promise<number | undefined>

  /**
   * Stream container logs until the container stops (follow) or the current output is drained.
   */
  abstract logs(name: string, onLogLine: OnLogLine, options?: {follow?: boolean; signal?: AbortSignal}): Promise<void>

  /**
   * List the containers carrying the project label, running or not.
   */
  abstract listContainers(project: string): Promise<ContainerSummary[]>
}
