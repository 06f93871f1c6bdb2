import {homedir} from 'node:os'
import {join, resolve} from 'node:path'
import {MalformedDescriptorError} from '../errors.js'
import type {PortMapping, RestartPolicy, VolumeMount} from '../types.js'

/** Host interface used when a port mapping names none. */
export const loopbackHost = '127.0.0.1'

const durationUnits: Record<string, number> = {
  us: 0.001,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
}

/**
 * Parse a Go-style duration (`500ms`, `30s`, `1m30s`) into milliseconds.
 * Bare numbers are seconds.
 */
export function parseDuration(value: string | number, path: string): number {
  if (typeof value === 'number') {
    return Math.round(value * 1000)
  }

  const text = value.trim()
  if (text.length === 0) {
    throw new MalformedDescriptorError(`${path}: empty duration`)
  }

  const pattern = /(\d+(?:\.\d+)?)(us|ms|h|m|s)/y
  let total = 0
  let offset = 0
  while (offset < text.length) {
    pattern.lastIndex = offset
    const match = pattern.exec(text)
    if (!match) {
      throw new MalformedDescriptorError(`${path}: invalid duration '${value}'`)
    }

    total += Number(match[1]) * durationUnits[match[2]]
    offset = pattern.lastIndex
  }

  return Math.round(total)
}

function parsePortNumber(value: string, spec: string, path: string): number {
  if (value.includes('-')) {
    throw new MalformedDescriptorError(`${path}: port ranges are not supported ('${spec}')`)
  }

  if (!/^\d+$/.test(value)) {
    throw new MalformedDescriptorError(`${path}: invalid port '${value}' in '${spec}'`)
  }

  const port = Number(value)
  if (port < 1 || port > 65_535) {
    throw new MalformedDescriptorError(`${path}: port ${port} is out of range`)
  }

  return port
}

function parseProtocol(value: string, path: string): 'tcp' | 'udp' {
  if (value !== 'tcp' && value !== 'udp') {
    throw new MalformedDescriptorError(`${path}: unsupported protocol '${value}'`)
  }

  return value
}

/**
 * Parse `[host-ip:][host-port:]container-port[/protocol]`.
 * IPv6 host addresses are written in brackets: `[::1]:8080:80`.
 */
export function parsePortSpec(spec: string | number, path: string): PortMapping {
  if (typeof spec === 'number') {
    return {hostIp: loopbackHost, containerPort: parsePortNumber(String(spec), String(spec), path), protocol: 'tcp'}
  }

  const [body, protocol = 'tcp', ...extra] = spec.trim().split('/')
  if (extra.length > 0) {
    throw new MalformedDescriptorError(`${path}: invalid port mapping '${spec}'`)
  }

  let hostIp: string | undefined
  let rest = body
  if (body.startsWith('[')) {
    const end = body.indexOf(']:')
    if (end === -1) {
      throw new MalformedDescriptorError(`${path}: invalid IPv6 host in '${spec}'`)
    }

    hostIp = body.slice(1, end)
    rest = body.slice(end + 2)
  }

  const parts = rest.split(':')
  if (hostIp === undefined && parts.length === 3) {
    hostIp = parts.shift()
  }

  if (parts.length > 2) {
    throw new MalformedDescriptorError(`${path}: invalid port mapping '${spec}'`)
  }

  const containerPart = parts.length === 2 ? parts[1] : parts[0]
  const hostPart = parts.length === 2 ? parts[0] : ''

  return {
    hostIp: hostIp || loopbackHost,
    hostPort: hostPart ? parsePortNumber(hostPart, spec, path) : undefined,
    containerPort: parsePortNumber(containerPart, spec, path),
    protocol: parseProtocol(protocol, path)
  }
}

/** Long port syntax: `{target, published, host_ip, protocol}`. */
export function parsePortObject(
  port: {target: number; published?: string | number; host_ip?: string; protocol?: 'tcp' | 'udp'},
  path: string
): PortMapping {
  const spec = JSON.stringify(port)
  return {
    hostIp: port.host_ip ?? loopbackHost,
    hostPort: port.published === undefined ? undefined : parsePortNumber(String(port.published), spec, path),
    containerPort: parsePortNumber(String(port.target), spec, path),
    protocol: port.protocol ?? 'tcp'
  }
}

const volumeNamePattern = /^[a-zA-Z\d][\w.-]*$/

function isBindSource(source: string): boolean {
  return /^[.~/\\]/.test(source)
}

function resolveBindSource(source: string, root: string): string {
  const normalized = source.replaceAll('\\', '/')
  if (normalized === '~' || normalized.startsWith('~/')) {
    return join(homedir(), normalized.slice(1))
  }

  return resolve(root, normalized)
}

function assertTarget(target: string, spec: string, path: string): void {
  if (!target.startsWith('/')) {
    throw new MalformedDescriptorError(`${path}: container path in '${spec}' must be absolute`)
  }
}

function isAccessMode(value: string): boolean {
  return value.split(',').every(option => /^(ro|rw|z|Z|cached|delegated|consistent|nocopy)$/.test(option))
}

/**
 * Parse `[source:]target[:mode]`. Sources starting with `.`, `/` or `~` are
 * bind mounts resolved against `root`, anything else names a volume.
 */
export function parseVolumeSpec(spec: string, root: string, path: string): VolumeMount {
  const parts = spec.split(':')
  let source: string | undefined
  let target: string
  let mode = ''

  if (parts.length === 1) {
    target = parts[0]
  } else if (parts.length === 2 && isAccessMode(parts[1]) && parts[0].startsWith('/')) {
    [target, mode] = parts
  } else if (parts.length === 2) {
    [source, target] = parts
  } else if (parts.length === 3) {
    [source, target, mode] = parts
  } else {
    throw new MalformedDescriptorError(`${path}: invalid volume '${spec}'`)
  }

  assertTarget(target, spec, path)
  if (mode && !isAccessMode(mode)) {
    throw new MalformedDescriptorError(`${path}: invalid volume mode '${mode}'`)
  }

  const readOnly = mode.split(',').includes('ro')

  if (source === undefined || source.length === 0) {
    return {type: 'volume', target, readOnly}
  }

  if (isBindSource(source)) {
    return {type: 'bind', source: resolveBindSource(source, root), target, readOnly}
  }

  if (!volumeNamePattern.test(source)) {
    throw new MalformedDescriptorError(`${path}: invalid volume name '${source}'`)
  }

  return {type: 'volume', source, target, readOnly}
}

/** Long volume syntax: `{type, source, target, read_only}`. */
export function parseVolumeObject(
  volume: {type: 'bind' | 'volume'; source?: string; target: string; read_only?: boolean},
  root: string,
  path: string
): VolumeMount {
  assertTarget(volume.target, volume.target, path)
  const readOnly = volume.read_only ?? false

  if (volume.type === 'bind') {
    if (!volume.source) {
      throw new MalformedDescriptorError(`${path}: bind mount requires a source`)
    }

    return {type: 'bind', source: resolveBindSource(volume.source, root), target: volume.target, readOnly}
  }

  if (volume.source !== undefined && !volumeNamePattern.test(volume.source)) {
    throw new MalformedDescriptorError(`${path}: invalid volume name '${volume.source}'`)
  }

  return {type: 'volume', source: volume.source, target: volume.target, readOnly}
}

/**
 * Split a command line into argv, honouring single quotes, double quotes
 * and backslash escapes.
 */
export function splitCommand(command: string, path: string): string[] {
  const args: string[] = []
  let current = ''
  let quote: '"' | '\'' | undefined
  let inToken = false

  for (let i = 0; i < command.length; i++) {
    const char = command[i]

    if (quote === '\'') {
      if (char === '\'') {
        quote = undefined
      } else {
        current += char
      }

      continue
    }

    if (char === '\\' && i + 1 < command.length) {
      current += command[++i]
      inToken = true
      continue
    }

    if (quote === '"') {
      if (char === '"') {
        quote = undefined
      } else {
        current += char
      }

      continue
    }

    if (char === '"' || char === '\'') {
      quote = char
      inToken = true
    } else if (/\s/.test(char)) {
      if (inToken) {
        args.push(current)
        current = ''
        inToken = false
      }
    } else {
      current += char
      inToken = true
    }
  }

  if (quote) {
    throw new MalformedDescriptorError(`${path}: unterminated quote in '${command}'`)
  }

  if (inToken) {
    args.push(current)
  }

  return args
}

/** Parse `no`, `always`, `unless-stopped`, `on-failure` or `on-failure:N`. */
export function parseRestartPolicy(value: string | false | undefined, path: string): RestartPolicy {
  if (value === undefined || value === false || value === 'no') {
    return {mode: 'no'}
  }

  if (value === 'always' || value === 'unless-stopped' || value === 'on-failure') {
    return {mode: value}
  }

  const match = /^on-failure:(\d+)$/.exec(value)
  if (match) {
    return {mode: 'on-failure', maxRetries: Number(match[1])}
  }

  throw new MalformedDescriptorError(`${path}: invalid restart policy '${value}'`)
}

/**
 * Normalise a health check test into the argv run in the container.
 * Returns undefined for `NONE`.
 */
export function parseHealthTest(test: string | string[], path: string): string[] | undefined {
  if (typeof test === 'string') {
    if (test.trim().length === 0) {
      throw new MalformedDescriptorError(`${path}: empty health check test`)
    }

    return ['sh', '-c', test]
  }

  const [kind, ...args] = test
  switch (kind) {
    case 'NONE': {
      return undefined
    }

    case 'CMD': {
      if (args.length === 0) {
        throw new MalformedDescriptorError(`${path}: CMD requires a command`)
      }

      return args
    }

    case 'CMD-SHELL': {
      if (args.length === 0) {
        throw new MalformedDescriptorError(`${path}: CMD-SHELL requires a command`)
      }

      return ['sh', '-c', args.join(' ')]
    }

    default: {
      throw new MalformedDescriptorError(`${path}: health check test must start with NONE, CMD or CMD-SHELL`)
    }
  }
}
