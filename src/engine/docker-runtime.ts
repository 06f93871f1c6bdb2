import process from 'node:process'
import {isAbsolute, join} from 'node:path'
import {execa, type Options} from 'execa'
import {z} from 'zod'
import {DockerNotAvailableError} from '../errors.js'
import {ContainerRuntime, type OnLogLine} from './runtime.js'
import type {
  BuildRequest,
  ContainerSummary,
  CreateContainerRequest,
  ExecResult,
  MountBinding,
  NetworkRequest,
  PortBinding,
  VolumeRequest
} from './types.js'

export const projectLabel = 'berth.project'
export const serviceLabel = 'berth.service'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept, so service credentials passed
 * with `-e` never mix with the host's own secrets.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

/** `-p` value: `host-ip:[host-port]:container-port/protocol`. */
export function formatPort(port: PortBinding): string {
  const hostIp = port.hostIp.includes(':') ? `[${port.hostIp}]` : port.hostIp
  return `${hostIp}:${port.hostPort ?? ''}:${port.containerPort}/${port.protocol}`
}

export function formatMount(mount: MountBinding): string[] {
  if (mount.source === undefined) {
    const options = ['type=volume', `dst=${mount.target}`]
    if (mount.readOnly) {
      options.push('readonly')
    }

    return ['--mount', options.join(',')]
  }

  return ['-v', `${mount.source}:${mount.target}:${mount.readOnly ? 'ro' : 'rw'}`]
}

/**
 * Build `docker create` arguments. Only the first network is attached here,
 * the runtime connects the others once the container exists.
 */
export function createArgs(request: CreateContainerRequest): string[] {
  const args = [
    'create',
    '--name',
    request.name,
    '--label',
    `${projectLabel}=${request.project}`,
    '--label',
    `${serviceLabel}=${request.service}`,
    '--restart',
    request.restart
  ]

  const [primary] = request.networks
  if (primary) {
    args.push('--network', primary.network)
    for (const alias of primary.aliases) {
      args.push('--network-alias', alias)
    }
  }

  for (const [key, value] of Object.entries(request.env)) {
    args.push('-e', `${key}=${value}`)
  }

  for (const port of request.ports) {
    args.push('-p', formatPort(port))
  }

  for (const mount of request.mounts) {
    args.push(...formatMount(mount))
  }

  args.push(request.image)
  if (request.command) {
    args.push(...request.command)
  }

  return args
}

export function buildArgs(request: BuildRequest): string[] {
  const args = ['build', '-t', request.tag]
  if (request.dockerfile) {
    args.push('-f', isAbsolute(request.dockerfile) ? request.dockerfile : join(request.context, request.dockerfile))
  }

  for (const [key, value] of Object.entries(request.args)) {
    args.push('--build-arg', `${key}=${value}`)
  }

  args.push(request.context)
  return args
}

const ContainerRowSchema = z.object({
  Names: z.string(),
  State: z.string(),
  Status: z.string(),
  Labels: z.string()
})

/**
 * Parse `docker ps --format '{{json .}}'` output. Lines that are not
 * container rows are ignored.
 */
export function parseContainerList(stdout: string): ContainerSummary[] {
  const containers: ContainerSummary[] = []
  for (const line of stdout.split('\n')) {
    if (!line.trim()) {
      continue
    }

    let json: unknown
    try {
      json = JSON.parse(line)
    } catch {
      continue
    }

    const row = ContainerRowSchema.safeParse(json)
    if (!row.success) {
      continue
    }

    const labels = new Map(row.data.Labels.split(',').map((label): [string, string] => {
      const separator = label.indexOf('=')
      return separator === -1 ? [label, ''] : [label.slice(0, separator), label.slice(separator + 1)]
    }))

    containers.push({
      name: row.data.Names,
      service: labels.get(serviceLabel) ?? '',
      state: row.data.State,
      status: row.data.Status
    })
  }

  return containers
}

export class DockerCliRuntime extends ContainerRuntime {
  private readonly env = dockerCliEnv()

  async check(): Promise<void> {
    try {
      await this.docker(['--version'])
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async ensureNetwork(request: NetworkRequest): Promise<boolean> {
    const inspect = await this.docker(['network', 'inspect', request.name], {reject: false})
    if (inspect.exitCode === 0) {
      return false
    }

    const created = await this.docker([
      'network', 'create', '--driver', request.driver, '--label', `${projectLabel}=${request.project}`, request.name
    ], {reject: false})

    if (created.exitCode === 0) {
      return true
    }

    // Lost a race with another `up` of the same project
    if (/already exists/i.test(String(created.stderr))) {
      return false
    }

    throw new Error(`Failed to create network ${request.name}: ${String(created.stderr)}`)
  }

  async removeNetwork(name: string): Promise<void> {
    await this.docker(['network', 'rm', name], {reject: false})
  }

  async ensureVolume(request: VolumeRequest): Promise<boolean> {
    const inspect = await this.docker(['volume', 'inspect', request.name], {reject: false})
    if (inspect.exitCode === 0) {
      return false
    }

    await this.docker([
      'volume', 'create', '--driver', request.driver, '--label', `${projectLabel}=${request.project}`, request.name
    ])
    return true
  }

  async removeVolume(name: string): Promise<void> {
    await this.docker(['volume', 'rm', name], {reject: false})
  }

  async imageExists(image: string): Promise<boolean> {
    const result = await this.docker(['image', 'inspect', image], {reject: false})
    return result.exitCode === 0
  }

  async buildImage(request: BuildRequest, onLogLine: OnLogLine): Promise<void> {
    const proc = execa('docker', buildArgs(request), {env: this.env, extendEnv: false})
    await this.streamLogs(proc, onLogLine)
    await proc
  }

  async createContainer(request: CreateContainerRequest): Promise<void> {
    await this.docker(createArgs(request))

    for (const attachment of request.networks.slice(1)) {
      const args = ['network', 'connect']
      for (const alias of attachment.aliases) {
        args.push('--alias', alias)
      }

      await this.docker([...args, attachment.network, request.name])
    }
  }

  async startContainer(name: string): Promise<void> {
    await this.docker(['start', name])
  }

  async stopContainer(name: string, graceSec: number): Promise<void> {
    await this.docker(['stop', '-t', String(graceSec), name], {reject: false})
  }

  async removeContainer(name: string): Promise<void> {
    await this.docker(['rm', '-f', '-v', name], {reject: false})
  }

  async exec(name: string, cmd: string[], timeoutMs: number): Promise<ExecResult> {
    const result = await execa('docker', ['exec', name, ...cmd], {
      env: this.env,
      extendEnv: false,
      reject: false,
      all: true,
      timeout: timeoutMs
    })

    return {
      exitCode: result.exitCode ?? 1,
      output: String(result.all ?? '').trim(),
      timedOut: result.timedOut
    }
  }

  async wait(name: string, signal?: AbortSignal): Promise<number | undefined> {
    const result = await this.docker(['wait', name], {reject: false, cancelSignal: signal})
    if (result.isCanceled || result.exitCode !== 0) {
      return undefined
    }

    const exitCode = Number.parseInt(String(result.stdout).trim(), 10)
    return Number.isNaN(exitCode) ? undefined : exitCode
  }

  async logs(name: string, onLogLine: OnLogLine, options?: {follow?: boolean; signal?: AbortSignal}): Promise<void> {
    const args = options?.follow ? ['logs', '-f', name] : ['logs', name]
    const proc = execa('docker', args, {
      env: this.env,
      extendEnv: false,
      reject: false,
      cancelSignal: options?.signal
    })

    try {
      await this.streamLogs(proc, onLogLine)
      await proc
    } catch (error) {
      if (options?.signal?.aborted) {
        return
      }

      throw error
    }
  }

  async listContainers(project: string): Promise<ContainerSummary[]> {
    const {stdout} = await this.docker([
      'ps', '-a', '--filter', `label=${projectLabel}=${project}`, '--format', '{{json .}}'
    ])
    return parseContainerList(String(stdout))
  }

  private async docker(args: string[], options?: Pick<Options, 'reject' | 'cancelSignal'>) {
    return execa('docker', args, {env: this.env, extendEnv: false, ...options})
  }

  /**
   * Stream stdout/stderr from a subprocess via iterables.
   */
  private async streamLogs(
    proc: ReturnType<typeof execa>,
    onLogLine: OnLogLine
  ): Promise<void> {
    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()

    await Promise.all([stdoutDone, stderrDone])
  }
}
