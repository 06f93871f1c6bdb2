import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {DescriptorLoader} from '../core/descriptor-loader.js'
import type {Reporter, StackEvent} from '../core/reporter.js'
import {DockerNotAvailableError} from '../errors.js'
import {ContainerRuntime, type OnLogLine} from '../engine/runtime.js'
import type {
  BuildRequest,
  ContainerSummary,
  CreateContainerRequest,
  ExecResult,
  NetworkRequest,
  VolumeRequest
} from '../engine/types.js'
import type {Stack} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'berth-test-'))
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

type RecordingReporter = {
  reporter: Reporter;
  events: StackEvent[];
  /** Resolves with the next emitted event matching `match` */
  next: (match: (event: StackEvent) => boolean) => Promise<StackEvent>;
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): RecordingReporter {
  const events: StackEvent[] = []
  let waiters: Array<{match: (event: StackEvent) => boolean; resolve: (event: StackEvent) => void}> = []
  const reporter: Reporter = {
    emit(event: StackEvent) {
      events.push(event)
      const matched = waiters.filter(waiter => waiter.match(event))
      waiters = waiters.filter(waiter => !matched.includes(waiter))
      for (const waiter of matched) {
        waiter.resolve(event)
      }
    }
  }

  return {
    reporter,
    events,
    async next(match) {
      return new Promise(resolve => {
        waiters.push({match, resolve})
      })
    }
  }
}

/** `service:state` for every SERVICE_STATE event, in emission order. */
export function stateTrail(events: StackEvent[]): string[] {
  return events.flatMap(event => event.event === 'SERVICE_STATE' ? [`${event.service}:${event.state}`] : [])
}

/**
 * Parse an inline descriptor as if it lived in `/srv/demo/compose.yaml`.
 */
export function parseStack(content: string, variables: Record<string, string> = {}): Stack {
  return new DescriptorLoader({projectName: 'demo'}).parse(content, '/srv/demo/compose.yaml', variables)
}

type FakeContainer = {
  request: CreateContainerRequest;
  running: boolean;
  exitCode?: number;
  waiters: Array<(exitCode: number | undefined) => void>;
}

/**
 * In-process stand-in for a container runtime. Records every call as
 * `method:target` in `calls`.
 */
export class FakeRuntime extends ContainerRuntime {
  readonly calls: string[] = []
  readonly networks = new Set<string>()
  readonly volumes = new Set<string>()
  readonly images = new Set<string>()
  readonly containers = new Map<string, FakeContainer>()
  /** Health probe outcomes per container, consumed in order; the last one repeats */
  readonly probes = new Map<string, boolean[]>()
  /** Containers whose start fails */
  readonly failingStarts = new Set<string>()
  /** Log lines replayed by `logs` */
  readonly logLines = new Map<string, string[]>()
  available = true

  async check(): Promise<void> {
    this.calls.push('check')
    if (!this.available) {
      throw new DockerNotAvailableError({cause: new Error('spawn docker ENOENT')})
    }
  }

  async ensureNetwork(request: NetworkRequest): Promise<boolean> {
    this.calls.push(`ensureNetwork:${request.name}`)
    if (this.networks.has(request.name)) {
      return false
    }

    this.networks.add(request.name)
    return true
  }

  async removeNetwork(name: string): Promise<void> {
    this.calls.push(`removeNetwork:${name}`)
    this.networks.delete(name)
  }

  async ensureVolume(request: VolumeRequest): Promise<boolean> {
    this.calls.push(`ensureVolume:${request.name}`)
    if (this.volumes.has(request.name)) {
      return false
    }

    this.volumes.add(request.name)
    return true
  }

  async removeVolume(name: string): Promise<void> {
    this.calls.push(`removeVolume:${name}`)
    this.volumes.delete(name)
  }

  async imageExists(image: string): Promise<boolean> {
    return this.images.has(image)
  }

  async buildImage(request: BuildRequest, onLogLine: OnLogLine): Promise<void> {
    this.calls.push(`buildImage:${request.tag}`)
    onLogLine({stream: 'stdout', line: `built ${request.tag}`})
    this.images.add(request.tag)
  }

  async createContainer(request: CreateContainerRequest): Promise<void> {
    this.calls.push(`createContainer:${request.name}`)
    if (this.containers.has(request.name)) {
      throw new Error(`Conflict. The container name "${request.name}" is already in use`)
    }

    this.containers.set(request.name, {request, running: false, waiters: []})
  }

  async startContainer(name: string): Promise<void> {
    this.calls.push(`startContainer:${name}`)
    const container = this.containers.get(name)
    if (!container) {
      throw new Error(`No such container: ${name}`)
    }

    if (this.failingStarts.has(name)) {
      throw new Error(`driver failed programming external connectivity on endpoint ${name}`)
    }

    container.running = true
    container.exitCode = undefined
  }

  async stopContainer(name: string, graceSec: number): Promise<void> {
    this.calls.push(`stopContainer:${name}:${graceSec}`)
    if (this.containers.get(name)?.running) {
      this.exit(name, 143)
    }
  }

  async removeContainer(name: string): Promise<void> {
    this.calls.push(`removeContainer:${name}`)
    const container = this.containers.get(name)
    if (!container) {
      return
    }

    this.containers.delete(name)
    for (const waiter of container.waiters.splice(0)) {
      waiter(undefined)
    }
  }

  async exec(name: string, cmd: string[], _timeoutMs: number): Promise<ExecResult> {
    this.calls.push(`exec:${name}:${cmd.join(' ')}`)
    const outcomes = this.probes.get(name) ?? [true]
    const ok = outcomes.length > 1 ? outcomes.shift() : outcomes[0]
    return {exitCode: ok ? 0 : 1, output: ok ? '' : 'connection refused', timedOut: false}
  }

  async wait(name: string, signal?: AbortSignal): Promise<number | undefined> {
    const container = this.containers.get(name)
    if (!container || signal?.aborted) {
      return undefined
    }

    if (!container.running) {
      return container.exitCode
    }

    return new Promise(resolve => {
      const onAbort = () => {
        resolve(undefined)
      }

      signal?.addEventListener('abort', onAbort, {once: true})
      container.waiters.push(exitCode => {
        signal?.removeEventListener('abort', onAbort)
        resolve(exitCode)
      })
    })
  }

  async logs(name: string, onLogLine: OnLogLine, options?: {follow?: boolean; signal?: AbortSignal}): Promise<void> {
    for (const line of this.logLines.get(name) ?? []) {
      onLogLine({stream: 'stdout', line})
    }

    if (options?.follow) {
      await this.wait(name, options.signal)
    }
  }

  async listContainers(project: string): Promise<ContainerSummary[]> {
    return [...this.containers.values()]
      .filter(container => container.request.project === project)
      .map(container => ({
        name: container.request.name,
        service: container.request.service,
        state: container.running ? 'running' : 'exited',
        status: container.running ? 'Up 1 second' : `Exited (${container.exitCode ?? 0})`
      }))
  }

  /** Simulate the container's main process exiting. */
  exit(name: string, exitCode: number): void {
    const container = this.containers.get(name)
    if (!container) {
      return
    }

    container.running = false
    container.exitCode = exitCode
    for (const waiter of container.waiters.splice(0)) {
      waiter(exitCode)
    }
  }

  /** Calls of one method, without the method prefix. */
  callsOf(method: string): string[] {
    return this.calls.filter(call => call.startsWith(`${method}:`)).map(call => call.slice(method.length + 1))
  }
}
