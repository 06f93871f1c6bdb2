import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {basename, dirname, join, resolve} from 'node:path'
import {isMap, isScalar, isSeq, parseDocument} from 'yaml'
import type {ZodIssue} from 'zod'
import {DuplicateServiceError, MalformedDescriptorError, UnknownReferenceError} from '../errors.js'
import type {
  EnvFileRef,
  HealthCheck,
  NetworkDefinition,
  PortMapping,
  ServiceDefinition,
  ServiceDependency,
  ServiceNetwork,
  Stack,
  VolumeDefinition,
  VolumeMount
} from '../types.js'
import {buildGraph, validateGraph} from './dag.js'
import {DescriptorSchema, type RawDescriptor, type RawService} from './descriptor-schema.js'
import {loadOptionalEnvFile} from './env-file.js'
import {interpolateTree, type Variables} from './interpolate.js'
import {
  parseDuration,
  parseHealthTest,
  parsePortObject,
  parsePortSpec,
  parseRestartPolicy,
  parseVolumeObject,
  parseVolumeSpec,
  splitCommand
} from './short-syntax.js'
import {slugify} from './utils.js'

const serviceNamePattern = /^[a-zA-Z\d][\w.-]*$/

const defaultHealthCheck = {
  intervalMs: 30_000,
  timeoutMs: 30_000,
  startPeriodMs: 0,
  retries: 3
}

export type DescriptorLoaderOptions = {
  /** Variables for interpolation, overriding the `.env` file beside the descriptor (default: process.env) */
  environment?: Variables;
  /** Overrides the descriptor's `name` and the directory-derived default */
  projectName?: string;
}

/**
 * Turns a descriptor file into a validated `Stack`.
 * `parse` is pure; `load` only reads the descriptor and its `.env` file.
 */
export class DescriptorLoader {
  constructor(private readonly options: DescriptorLoaderOptions = {}) {}

  async load(filePath: string): Promise<Stack> {
    const file = resolve(filePath)
    const content = await readFile(file, 'utf8')
    const dotEnv = await loadOptionalEnvFile(join(dirname(file), '.env'))
    return this.parse(content, file, {...dotEnv, ...(this.options.environment ?? process.env)})
  }

  parse(content: string, filePath: string, variables: Variables = {}): Stack {
    const file = resolve(filePath)
    const root = dirname(file)
    const document = parseDocument(content, {uniqueKeys: false})

    if (document.errors.length > 0) {
      const [error] = document.errors
      throw new MalformedDescriptorError(`${basename(file)}: ${error.message}`, {cause: error})
    }

    checkDuplicateKeys(document.contents, [])

    const parsed: unknown = document.toJS()
    const raw = interpolateTree(withoutExtensions(parsed), variables)
    const result = DescriptorSchema.safeParse(raw)
    if (!result.success) {
      throw new MalformedDescriptorError(formatIssue(result.error.issues[0]), {cause: result.error})
    }

    return this.resolveStack(result.data, file, root, variables)
  }

  private resolveStack(input: RawDescriptor, file: string, root: string, variables: Variables): Stack {
    const name = slugify(this.options.projectName ?? input.name ?? basename(root))
    if (name.length === 0) {
      throw new MalformedDescriptorError(`Cannot derive a project name from '${this.options.projectName ?? input.name ?? root}'`)
    }

    const services = Object.entries(input.services).map(([serviceName, service]) =>
      resolveService(serviceName, service, root, variables))

    const networks: NetworkDefinition[] = Object.entries(input.networks ?? {}).map(([networkName, network]) => ({
      name: networkName,
      driver: network?.driver ?? 'bridge',
      external: network?.external ?? false
    }))

    if (!networks.some(n => n.name === 'default') && services.some(s => s.networks.some(n => n.name === 'default'))) {
      networks.push({name: 'default', driver: 'bridge', external: false})
    }

    const volumes: VolumeDefinition[] = Object.entries(input.volumes ?? {}).map(([volumeName, volume]) => ({
      name: volumeName,
      driver: volume?.driver ?? 'local',
      external: volume?.external ?? false
    }))

    validateContainerNames(services)
    validateResourceReferences(services, networks, volumes)
    validateGraph(buildGraph(services))
    validateHealthConditions(services)

    return {name, root, file, services, networks, volumes}
  }
}

function resolveService(name: string, service: RawService, root: string, variables: Variables): ServiceDefinition {
  const path = `services.${name}`
  if (!serviceNamePattern.test(name)) {
    throw new MalformedDescriptorError(`${path}: invalid service name '${name}'`)
  }

  return {
    name,
    image: service.image,
    build: resolveBuild(service.build, root, `${path}.build`),
    containerName: service.container_name,
    command: typeof service.command === 'string'
      ? splitCommand(service.command, `${path}.command`)
      : service.command,
    ports: (service.ports ?? []).map((port, i): PortMapping => typeof port === 'object'
      ? parsePortObject(port, `${path}.ports[${i}]`)
      : parsePortSpec(port, `${path}.ports[${i}]`)),
    volumes: (service.volumes ?? []).map((volume, i): VolumeMount => typeof volume === 'string'
      ? parseVolumeSpec(volume, root, `${path}.volumes[${i}]`)
      : parseVolumeObject(volume, root, `${path}.volumes[${i}]`)),
    healthcheck: resolveHealthCheck(service.healthcheck, `${path}.healthcheck`),
    restart: parseRestartPolicy(service.restart, `${path}.restart`),
    envFiles: resolveEnvFiles(service.env_file, root),
    environment: resolveKeyValues(service.environment, variables, `${path}.environment`),
    dependsOn: resolveDependencies(service.depends_on),
    networks: resolveNetworks(service.networks),
    stopGracePeriodMs: service.stop_grace_period === undefined
      ? undefined
      : parseDuration(service.stop_grace_period, `${path}.stop_grace_period`)
  }
}

function resolveBuild(build: RawService['build'], root: string, path: string): ServiceDefinition['build'] {
  if (build === undefined) {
    return undefined
  }

  if (typeof build === 'string') {
    return {context: resolve(root, build), args: {}}
  }

  return {
    context: resolve(root, build.context),
    dockerfile: build.dockerfile,
    args: resolveKeyValues(build.args, {}, `${path}.args`)
  }
}

function resolveHealthCheck(healthcheck: RawService['healthcheck'], path: string): HealthCheck | undefined {
  if (!healthcheck || healthcheck.disable) {
    return undefined
  }

  if (healthcheck.test === undefined) {
    throw new MalformedDescriptorError(`${path}: "test" is required`)
  }

  const test = parseHealthTest(healthcheck.test, `${path}.test`)
  if (!test) {
    return undefined
  }

  return {
    test,
    intervalMs: healthcheck.interval === undefined ? defaultHealthCheck.intervalMs : parseDuration(healthcheck.interval, `${path}.interval`),
    timeoutMs: healthcheck.timeout === undefined ? defaultHealthCheck.timeoutMs : parseDuration(healthcheck.timeout, `${path}.timeout`),
    startPeriodMs: healthcheck.start_period === undefined ? defaultHealthCheck.startPeriodMs : parseDuration(healthcheck.start_period, `${path}.start_period`),
    retries: healthcheck.retries ?? defaultHealthCheck.retries
  }
}

function resolveEnvFiles(envFile: RawService['env_file'], root: string): EnvFileRef[] {
  if (envFile === undefined) {
    return []
  }

  const entries = typeof envFile === 'string' ? [envFile] : envFile
  return entries.map(entry => typeof entry === 'string'
    ? {path: resolve(root, entry), required: true}
    : {path: resolve(root, entry.path), required: entry.required ?? true})
}

/**
 * `KEY=VALUE` lists or mappings. A bare `KEY` in list form takes its value
 * from the interpolation variables and is dropped when unset.
 */
function resolveKeyValues(
  values: string[] | Record<string, string | number | boolean | null> | undefined,
  variables: Variables,
  path: string
): Record<string, string> {
  const result: Record<string, string> = {}
  if (values === undefined) {
    return result
  }

  if (Array.isArray(values)) {
    for (const entry of values) {
      const separator = entry.indexOf('=')
      if (separator === 0) {
        throw new MalformedDescriptorError(`${path}: invalid entry '${entry}'`)
      }

      if (separator === -1) {
        const value = variables[entry]
        if (value !== undefined) {
          result[entry] = value
        }

        continue
      }

      result[entry.slice(0, separator)] = entry.slice(separator + 1)
    }

    return result
  }

  for (const [key, value] of Object.entries(values)) {
    result[key] = value === null ? '' : String(value)
  }

  return result
}

function resolveDependencies(dependsOn: RawService['depends_on']): ServiceDependency[] {
  if (dependsOn === undefined) {
    return []
  }

  if (Array.isArray(dependsOn)) {
    return dependsOn.map(service => ({service, required: true}))
  }

  return Object.entries(dependsOn).map(([service, options]) => ({
    service,
    condition: options.condition,
    required: options.required ?? true
  }))
}

function resolveNetworks(networks: RawService['networks']): ServiceNetwork[] {
  if (networks === undefined) {
    return [{name: 'default', aliases: []}]
  }

  if (Array.isArray(networks)) {
    return networks.map(name => ({name, aliases: []}))
  }

  return Object.entries(networks).map(([name, options]) => ({name, aliases: options?.aliases ?? []}))
}

function validateContainerNames(services: ServiceDefinition[]): void {
  const owners = new Map<string, string>()
  for (const service of services) {
    if (!service.containerName) {
      continue
    }

    const owner = owners.get(service.containerName)
    if (owner) {
      throw new DuplicateServiceError(service.name, `Container name '${service.containerName}' is used by both '${owner}' and '${service.name}'`)
    }

    owners.set(service.containerName, service.name)
  }
}

/** `condition: service_healthy` only makes sense on a dependency that declares a health check. */
function validateHealthConditions(services: ServiceDefinition[]): void {
  for (const service of services) {
    for (const dependency of service.dependsOn) {
      const target = services.find(s => s.name === dependency.service)
      if (dependency.condition === 'service_healthy' && !target?.healthcheck) {
        throw new MalformedDescriptorError(
          `services.${service.name}.depends_on.${dependency.service}: condition 'service_healthy' requires '${dependency.service}' to declare a health check`
        )
      }
    }
  }
}

function validateResourceReferences(services: ServiceDefinition[], networks: NetworkDefinition[], volumes: VolumeDefinition[]): void {
  const networkNames = new Set(networks.map(n => n.name))
  const volumeNames = new Set(volumes.map(v => v.name))

  for (const service of services) {
    for (const network of service.networks) {
      if (!networkNames.has(network.name)) {
        throw new UnknownReferenceError(service.name, 'network', network.name)
      }
    }

    for (const volume of service.volumes) {
      if (volume.type === 'volume' && volume.source !== undefined && !volumeNames.has(volume.source)) {
        throw new UnknownReferenceError(service.name, 'volume', volume.source)
      }
    }
  }
}

/**
 * Repeated keys are kept by the parser so that a service declared twice
 * is reported as such instead of silently overriding the first one.
 */
function checkDuplicateKeys(node: unknown, path: string[]): void {
  if (isSeq(node)) {
    for (const [i, item] of node.items.entries()) {
      checkDuplicateKeys(item, [...path, String(i)])
    }

    return
  }

  if (!isMap(node)) {
    return
  }

  const seen = new Set<string>()
  for (const pair of node.items) {
    const key = isScalar(pair.key) ? String(pair.key.value) : String(pair.key)
    if (seen.has(key)) {
      if (path.length === 1 && path[0] === 'services') {
        throw new DuplicateServiceError(key)
      }

      throw new MalformedDescriptorError(`${[...path, key].join('.')}: duplicate key '${key}'`)
    }

    seen.add(key)
    checkDuplicateKeys(pair.value, [...path, key])
  }
}

function withoutExtensions(document: unknown): unknown {
  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    return document
  }

  return Object.fromEntries(Object.entries(document).filter(([key]) => !key.startsWith('x-')))
}

function formatIssue(issue: ZodIssue): string {
  let path = ''
  for (const segment of issue.path) {
    path += typeof segment === 'number' ? `[${segment}]` : (path ? `.${segment}` : segment)
  }

  return `${path || 'descriptor'}: ${issue.message}`
}
