import {access, mkdir} from 'node:fs/promises'
import {PortConflictError} from '../errors.js'
import type {PortMapping, ServiceDefinition} from '../types.js'

const wildcardAddresses = new Set(['0.0.0.0', '::'])

type Claim = {
  service: string;
  hostIp: string;
}

function formatBinding(hostIp: string, port: number, protocol: string): string {
  const host = hostIp.includes(':') ? `[${hostIp}]` : hostIp
  return `${host}:${port}/${protocol}`
}

/**
 * Tracks the host ports claimed by the services of one run.
 * A wildcard address conflicts with every address on the same port.
 */
export class PortBinder {
  private readonly claims = new Map<string, Claim[]>()

  /**
   * @throws {PortConflictError} When a host port is already claimed
   */
  claim(service: string, ports: PortMapping[]): void {
    for (const port of ports) {
      if (port.hostPort === undefined) {
        continue
      }

      const key = `${port.hostPort}/${port.protocol}`
      const existing = this.claims.get(key) ?? []
      const conflict = existing.find(claim =>
        claim.hostIp === port.hostIp
        || wildcardAddresses.has(claim.hostIp)
        || wildcardAddresses.has(port.hostIp))

      if (conflict) {
        throw new PortConflictError(formatBinding(port.hostIp, port.hostPort, port.protocol), [conflict.service, service])
      }

      existing.push({service, hostIp: port.hostIp})
      this.claims.set(key, existing)
    }
  }
}

/** Check that no two services of the run publish the same host port. */
export function validatePorts(services: ServiceDefinition[]): void {
  const binder = new PortBinder()
  for (const service of services) {
    binder.claim(service.name, service.ports)
  }
}

/**
 * Create missing bind-mount sources as directories.
 * @returns The paths that were created
 */
export async function prepareBindMounts(services: ServiceDefinition[]): Promise<string[]> {
  const created: string[] = []
  for (const service of services) {
    for (const volume of service.volumes) {
      if (volume.type !== 'bind' || created.includes(volume.source)) {
        continue
      }

      try {
        await access(volume.source)
      } catch (error: unknown) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          throw error
        }

        await mkdir(volume.source, {recursive: true})
        created.push(volume.source)
      }
    }
  }

  return created
}
