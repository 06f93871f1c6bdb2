import {randomUUID} from 'node:crypto'
import {
  BerthError,
  ProcessStartError,
  ServiceUnhealthyError,
  UnknownReferenceError,
  rootCause
} from '../errors.js'
import type {ContainerRuntime, LogLine, OnLogLine} from '../engine/runtime.js'
import type {CreateContainerRequest, MountBinding, NetworkAttachment} from '../engine/types.js'
import type {PortMapping, RestartBackoff, ServiceDefinition, Stack} from '../types.js'
import {defaultBackoff, runtimeRestartPolicy} from './backoff.js'
import {buildGraph, shutdownOrder, startupOrder, subgraph, validateGraph} from './dag.js'
import {resolveServiceEnvironment} from './env-file.js'
import {HealthProber} from './health.js'
import {prepareBindMounts, validatePorts} from './port-binder.js'
import type {JobContext, Reporter} from './reporter.js'
import {ServiceRegistry, type ServiceState} from './service-state.js'
import {StateManager} from './state.js'
import {RestartSupervisor} from './supervisor.js'
import {containerName, qualifiedName} from './utils.js'

const defaultStopGracePeriodMs = 10_000

export type OrchestratorOptions = {
  runtime: ContainerRuntime;
  reporter: Reporter;
  /** Directory holding `<project>/state.json`; nothing is persisted when undefined */
  workdir?: string;
  backoff?: Partial<RestartBackoff>;
  /** Grace period between SIGTERM and SIGKILL for services that declare none (default 10s) */
  stopGracePeriodMs?: number;
  jobId?: string;
}

export type UpOptions = {
  /** Services to start along with their dependencies (default: every service) */
  services?: string[];
  /**
   * Keep following logs and supervising restarts once the stack is up.
   * Without it the restart policy is handed to the runtime.
   */
  attach?: boolean;
  /** Rebuild images of services that have a build section */
  build?: boolean;
  /** Cancels startup: health polling stops and services not yet launched are left alone */
  signal?: AbortSignal;
}

export type DownOptions = {
  /** Remove named volumes too */
  volumes?: boolean;
  /** Overrides the grace period of every service */
  timeoutMs?: number;
}

export type ServiceReport = {
  service: string;
  state: ServiceState;
  container: string;
  ports: string[];
  restarts: number;
  /** Runtime status line (`Up 2 minutes`) when the container exists */
  status?: string;
  error?: {code: string; message: string};
  /** Required dependency that kept the service from starting */
  skippedBy?: string;
}

export type UpResult = {
  /** Every selected service is running */
  ok: boolean;
  services: ServiceReport[];
  /** Per-service failures, in the order they happened */
  errors: BerthError[];
}

type Gate = {
  promise: Promise<boolean>;
  settle: (ok: boolean) => void;
}

type ServiceGates = {
  /** Container started */
  started: Gate;
  /** Container started and, when it has a health check, healthy */
  ready: Gate;
}

type LaunchOptions = {
  attach: boolean;
  build: boolean;
  signal: AbortSignal;
  onStarted?: () => void;
}

function createGate(): Gate {
  let settle: (ok: boolean) => void = () => undefined
  const promise = new Promise<boolean>(resolve => {
    settle = resolve
  })

  return {promise, settle}
}

/** `ps` rendering of a port mapping: `127.0.0.1:9000->9000/tcp`. */
export function describePort(port: PortMapping): string {
  const host = port.hostIp.includes(':') ? `[${port.hostIp}]` : port.hostIp
  return `${host}:${port.hostPort ?? ''}->${port.containerPort}/${port.protocol}`
}

/**
 * State of a service that this process did not start, from what the last
 * `up`/`down` recorded and what the runtime reports now.
 */
export function resolveState(known: ServiceState, recorded: ServiceState | undefined, live: string | undefined): ServiceState {
  if (known !== 'defined') {
    return known
  }

  switch (live) {
    case undefined: {
      if (recorded === undefined || recorded === 'defined' || recorded === 'failed' || recorded === 'unhealthy') {
        return recorded ?? 'defined'
      }

      return 'stopped'
    }

    case 'running': {
      return recorded === 'unhealthy' || recorded === 'restarting' ? recorded : 'running'
    }

    case 'restarting': {
      return 'restarting'
    }

    case 'created': {
      return 'creating'
    }

    default: {
      return recorded === 'failed' ? 'failed' : 'stopped'
    }
  }
}

/**
 * Stands one stack up and down on a container runtime.
 *
 * Each orchestrator owns its own `ServiceRegistry`; several stacks can be
 * driven from the same process.
 *
 * ## Startup
 *
 * Every selected service runs as its own task. A task waits for its
 * dependencies (healthy when they declare a health check, started
 * otherwise or with `condition: service_started`), then recreates
 * its container. A failed required dependency skips its dependents;
 * independent services carry on, so partial startup is a reported outcome.
 */
export class Orchestrator {
  readonly registry: ServiceRegistry
  private readonly runtime: ContainerRuntime
  private readonly reporter: Reporter
  private readonly prober: HealthProber
  private readonly backoff: RestartBackoff
  private readonly jobId: string
  private lifecycle?: AbortController
  private readonly background = new Set<Promise<void>>()

  constructor(readonly stack: Stack, private readonly options: OrchestratorOptions) {
    this.runtime = options.runtime
    this.reporter = options.reporter
    this.prober = new HealthProber(this.runtime)
    this.backoff = {...defaultBackoff, ...options.backoff}
    this.jobId = options.jobId ?? randomUUID()
    this.registry = new ServiceRegistry((service, from, state) => {
      this.reporter.emit({...this.context, event: 'SERVICE_STATE', service, from, state})
    })

    for (const service of stack.services) {
      this.registry.register(service.name, containerName(stack.name, service))
    }
  }

  private get context(): JobContext {
    return {project: this.stack.name, jobId: this.jobId}
  }

  /**
   * Start the stack, or the given services and their dependencies.
   *
   * Graph and port validation happen before anything touches the runtime.
   * Per-service failures are reported in the result, not thrown.
   *
   * @throws {BerthError} On descriptor-level errors and when the runtime is unavailable
   */
  async up(options: UpOptions = {}): Promise<UpResult> {
    const startedAt = Date.now()
    const graph = buildGraph(this.stack.services)
    validateGraph(graph)

    const selected = options.services?.length
      ? subgraph(graph, options.services)
      : new Set(graph.keys())
    const order = startupOrder(graph).filter(name => selected.has(name))
    const services = order.map(name => this.service(name))
    validatePorts(services)

    await this.runtime.check()
    await this.stopSupervision()

    const lifecycle = new AbortController()
    this.lifecycle = lifecycle
    const cancel = () => {
      lifecycle.abort()
    }

    if (options.signal?.aborted) {
      cancel()
    }

    options.signal?.addEventListener('abort', cancel, {once: true})

    this.reporter.emit({...this.context, event: 'STACK_START', services: order})

    try {
      await this.ensureResources(services)

      const errors: BerthError[] = []
      const gates = new Map<string, ServiceGates>()
      for (const name of order) {
        gates.set(name, {started: createGate(), ready: createGate()})
      }

      await Promise.all(services.map(async service => this.startService(service, gates, errors, {
        attach: options.attach ?? false,
        build: options.build ?? false,
        signal: lifecycle.signal
      })))

      if (options.attach && !lifecycle.signal.aborted) {
        this.attach(services.filter(service => this.registry.state(service.name) === 'running'), lifecycle.signal)
      }

      await this.persist(order)

      const reports = order.map(name => this.report(name))
      const ok = reports.every(report => report.state === 'running' && !report.skippedBy)
      if (ok) {
        this.reporter.emit({...this.context, event: 'STACK_READY', durationMs: Date.now() - startedAt})
      } else {
        this.emitStackFailed(reports)
      }

      return {ok, services: reports, errors}
    } catch (error) {
      this.emitStackFailed(order.map(name => this.report(name)))
      throw error
    } finally {
      options.signal?.removeEventListener('abort', cancel)
    }
  }

  /** Log followers and restart watchers still running in attached mode. */
  get backgroundTasks(): number {
    return this.background.size
  }

  /**
   * Stop and remove every container of the project in reverse dependency
   * order, then its networks (and named volumes when asked).
   */
  async down(options: DownOptions = {}): Promise<void> {
    const startedAt = Date.now()
    await this.runtime.check()
    this.reporter.emit({...this.context, event: 'STACK_STOPPING'})
    await this.stopSupervision()

    const order = shutdownOrder(buildGraph(this.stack.services))
    const known = new Set<string>()
    for (const name of order) {
      const service = this.service(name)
      const container = containerName(this.stack.name, service)
      known.add(container)

      await this.runtime.stopContainer(container, graceSeconds(options.timeoutMs ?? service.stopGracePeriodMs ?? this.stopGracePeriodMs))
      await this.runtime.removeContainer(container)

      const state = this.registry.state(name)
      if (state !== 'defined' && state !== 'stopped') {
        this.registry.transition(name, 'stopped')
      }
    }

    // Containers of services since removed from the descriptor
    for (const stray of await this.runtime.listContainers(this.stack.name)) {
      if (!known.has(stray.name)) {
        await this.runtime.stopContainer(stray.name, graceSeconds(options.timeoutMs ?? this.stopGracePeriodMs))
        await this.runtime.removeContainer(stray.name)
      }
    }

    for (const network of this.stack.networks) {
      if (!network.external) {
        await this.runtime.removeNetwork(qualifiedName(this.stack.name, network.name, false))
      }
    }

    if (options.volumes) {
      for (const volume of this.stack.volumes) {
        if (!volume.external) {
          await this.runtime.removeVolume(qualifiedName(this.stack.name, volume.name, false))
        }
      }
    }

    await this.persist(order, 'stopped')
    this.reporter.emit({...this.context, event: 'STACK_STOPPED', durationMs: Date.now() - startedAt})
  }

  /**
   * Per-service state, merging what this process knows, the persisted
   * state of the last `up`/`down` and the runtime's container listing.
   */
  async ps(): Promise<ServiceReport[]> {
    await this.runtime.check()

    let persisted: StateManager | undefined
    if (this.options.workdir) {
      persisted = new StateManager(this.options.workdir, this.stack.name)
      await persisted.load()
    }

    const live = new Map((await this.runtime.listContainers(this.stack.name)).map(container => [container.name, container]))

    return startupOrder(buildGraph(this.stack.services)).map(name => {
      const report = this.report(name)
      const record = persisted?.get(name)
      const container = live.get(report.container)
      return {
        ...report,
        state: resolveState(report.state, record?.state, container?.state),
        status: container?.status,
        restarts: Math.max(report.restarts, record?.restarts ?? 0),
        error: report.error ?? record?.error
      }
    })
  }

  /**
   * Stream the output of a service's container.
   * @throws {UnknownReferenceError} When the service is not part of the stack
   */
  async logs(name: string, onLogLine: OnLogLine, options?: {follow?: boolean; signal?: AbortSignal}): Promise<void> {
    const service = this.service(name)
    await this.runtime.check()
    await this.runtime.logs(containerName(this.stack.name, service), onLogLine, options)
  }

  private get stopGracePeriodMs(): number {
    return this.options.stopGracePeriodMs ?? defaultStopGracePeriodMs
  }

  private service(name: string): ServiceDefinition {
    const service = this.stack.services.find(s => s.name === name)
    if (!service) {
      throw new UnknownReferenceError(undefined, 'service', name)
    }

    return service
  }

  private async startService(
    service: ServiceDefinition,
    gates: Map<string, ServiceGates>,
    errors: BerthError[],
    options: LaunchOptions
  ): Promise<void> {
    const own = gates.get(service.name)
    if (!own) {
      return
    }

    for (const dependency of service.dependsOn) {
      const gate = gates.get(dependency.service)
      if (!gate) {
        continue
      }

      const ok = await (dependency.condition === 'service_started' ? gate.started : gate.ready).promise
      if (!ok && dependency.required) {
        this.registry.skip(service.name, dependency.service)
        this.reporter.emit({...this.context, event: 'SERVICE_SKIPPED', service: service.name, reason: 'dependency', dependency: dependency.service})
        own.started.settle(false)
        own.ready.settle(false)
        return
      }
    }

    if (options.signal.aborted) {
      own.started.settle(false)
      own.ready.settle(false)
      return
    }

    try {
      const up = await this.launch(service, {
        ...options,
        onStarted() {
          own.started.settle(true)
        }
      })
      own.started.settle(up)
      own.ready.settle(up)
    } catch (error) {
      errors.push(this.recordFailure(service.name, error))
      own.started.settle(false)
      own.ready.settle(false)
    }
  }

  /**
   * Recreate and start a service's container, then wait for its health check.
   * @returns false when the lifecycle was aborted while waiting
   */
  private async launch(service: ServiceDefinition, options: LaunchOptions): Promise<boolean> {
    const {name} = service
    const container = containerName(this.stack.name, service)

    await this.runtime.removeContainer(container)
    const current = this.registry.state(name)
    if (current !== 'defined' && current !== 'stopped' && current !== 'restarting') {
      this.registry.transition(name, 'stopped')
    }

    this.registry.transition(name, 'creating')

    try {
      await prepareBindMounts([service])
      const env = await resolveServiceEnvironment(service)
      const image = await this.prepareImage(service, options.build)
      await this.runtime.createContainer(this.createRequest(service, image, env, options.attach))
      await this.runtime.startContainer(container)
    } catch (error) {
      throw error instanceof BerthError ? error : new ProcessStartError(name, {cause: error})
    }

    options.onStarted?.()

    if (service.healthcheck) {
      this.registry.transition(name, 'health-pending')
      const outcome = await this.prober.probe(container, service.healthcheck, options.signal)
      if (outcome.status === 'aborted') {
        return false
      }

      if (outcome.status === 'unhealthy') {
        this.registry.transition(name, 'unhealthy')
        throw new ServiceUnhealthyError(name, outcome.failures, {cause: new Error(outcome.output || 'health probe failed')})
      }

      this.registry.transition(name, 'healthy')
    }

    this.registry.transition(name, 'running')
    return true
  }

  private async prepareImage(service: ServiceDefinition, rebuild: boolean): Promise<string> {
    const image = service.image ?? `${this.stack.name}-${service.name}`
    if (service.build && (rebuild || !(await this.runtime.imageExists(image)))) {
      await this.runtime.buildImage({
        tag: image,
        context: service.build.context,
        dockerfile: service.build.dockerfile,
        args: service.build.args
      }, log => {
        this.emitLog(service.name, log)
      })
    }

    return image
  }

  private createRequest(service: ServiceDefinition, image: string, env: Record<string, string>, attach: boolean): CreateContainerRequest {
    const mounts = service.volumes.map((volume): MountBinding => {
      if (volume.type === 'volume' && volume.source !== undefined) {
        const definition = this.stack.volumes.find(v => v.name === volume.source)
        return {...volume, source: qualifiedName(this.stack.name, volume.source, definition?.external ?? false)}
      }

      return volume
    })

    const networks = service.networks.map((network): NetworkAttachment => {
      const definition = this.stack.networks.find(n => n.name === network.name)
      return {
        network: qualifiedName(this.stack.name, network.name, definition?.external ?? false),
        aliases: [...new Set([service.name, ...network.aliases])]
      }
    })

    return {
      name: containerName(this.stack.name, service),
      project: this.stack.name,
      service: service.name,
      image,
      command: service.command,
      env,
      ports: service.ports,
      mounts,
      networks,
      // Attached runs supervise restarts themselves
      restart: attach ? 'no' : runtimeRestartPolicy(service.restart)
    }
  }

  private async ensureResources(services: ServiceDefinition[]): Promise<void> {
    const networkNames = new Set(services.flatMap(service => service.networks.map(network => network.name)))
    for (const network of this.stack.networks) {
      if (!networkNames.has(network.name) || network.external) {
        continue
      }

      const name = qualifiedName(this.stack.name, network.name, false)
      const created = await this.runtime.ensureNetwork({name, driver: network.driver, project: this.stack.name})
      this.reporter.emit({...this.context, event: 'NETWORK_READY', network: name, created})
    }

    const volumeNames = new Set(services.flatMap(service => service.volumes.flatMap(volume =>
      volume.type === 'volume' && volume.source !== undefined ? [volume.source] : [])))
    for (const volume of this.stack.volumes) {
      if (!volumeNames.has(volume.name) || volume.external) {
        continue
      }

      const name = qualifiedName(this.stack.name, volume.name, false)
      const created = await this.runtime.ensureVolume({name, driver: volume.driver, project: this.stack.name})
      this.reporter.emit({...this.context, event: 'VOLUME_READY', volume: name, created})
    }
  }

  private attach(services: ServiceDefinition[], signal: AbortSignal): void {
    const supervisor = new RestartSupervisor({
      runtime: this.runtime,
      registry: this.registry,
      backoff: this.backoff,
      signal,
      onRestarting: notice => {
        this.reporter.emit({...this.context, event: 'SERVICE_RESTARTING', ...notice})
      }
    })

    for (const service of services) {
      this.track(this.followLogs(service, signal))
      this.track(this.supervise(supervisor, service, signal))
    }
  }

  private async supervise(supervisor: RestartSupervisor, service: ServiceDefinition, signal: AbortSignal): Promise<void> {
    try {
      await supervisor.watch({
        name: service.name,
        container: containerName(this.stack.name, service),
        policy: service.restart,
        relaunch: async () => this.relaunch(service, signal)
      })
    } catch (error) {
      if (!signal.aborted) {
        this.recordFailure(service.name, error)
      }
    }
  }

  private async relaunch(service: ServiceDefinition, signal: AbortSignal): Promise<boolean> {
    try {
      const up = await this.launch(service, {attach: true, build: false, signal})
      if (up) {
        this.track(this.followLogs(service, signal))
      }

      return up
    } catch (error) {
      if (signal.aborted) {
        return false
      }

      this.recordFailure(service.name, error)
      return false
    }
  }

  private async followLogs(service: ServiceDefinition, signal: AbortSignal): Promise<void> {
    try {
      await this.runtime.logs(containerName(this.stack.name, service), log => {
        this.emitLog(service.name, log)
      }, {follow: true, signal})
    } catch (error) {
      if (!signal.aborted) {
        this.emitLog(service.name, {stream: 'stderr', line: `log stream interrupted: ${rootCause(error)}`})
      }
    }
  }

  private async stopSupervision(): Promise<void> {
    this.lifecycle?.abort()
    this.lifecycle = undefined
    while (this.background.size > 0) {
      await Promise.all(this.background)
    }
  }

  private track(task: Promise<void>): void {
    const tracked = task.finally(() => {
      this.background.delete(tracked)
    })
    this.background.add(tracked)
  }

  private emitStackFailed(reports: ServiceReport[]): void {
    this.reporter.emit({
      ...this.context,
      event: 'STACK_FAILED',
      failed: reports.filter(report => report.error && !report.skippedBy).map(report => report.service),
      skipped: reports.filter(report => report.skippedBy).map(report => report.service)
    })
  }

  private emitLog(service: string, log: LogLine): void {
    this.reporter.emit({...this.context, event: 'SERVICE_LOG', service, stream: log.stream, line: log.line})
  }

  private recordFailure(name: string, error: unknown): BerthError {
    const failure = error instanceof BerthError ? error : new ProcessStartError(name, {cause: error})
    this.registry.fail(name, failure)
    this.reporter.emit({
      ...this.context,
      event: 'SERVICE_FAILED',
      service: name,
      code: failure.code,
      message: failure.message,
      cause: rootCause(failure)
    })
    return failure
  }

  private report(name: string): ServiceReport {
    const entry = this.registry.get(name)
    return {
      service: name,
      state: entry.state,
      container: entry.container,
      ports: this.service(name).ports.map(port => describePort(port)),
      restarts: entry.restarts,
      error: entry.error ? {code: entry.error.code, message: entry.error.message} : undefined,
      skippedBy: entry.skippedBy
    }
  }

  private async persist(names: string[], override?: ServiceState): Promise<void> {
    if (!this.options.workdir) {
      return
    }

    const state = new StateManager(this.options.workdir, this.stack.name)
    await state.load()
    for (const name of names) {
      const entry = this.registry.get(name)
      state.set(name, {
        state: override ?? entry.state,
        container: entry.container,
        restarts: entry.restarts,
        error: entry.error ? {code: entry.error.code, message: entry.error.message} : undefined
      })
    }

    await state.save()
  }
}

function graceSeconds(ms: number): number {
  return Math.max(0, Math.ceil(ms / 1000))
}
