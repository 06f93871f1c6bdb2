import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {z} from 'zod'
import type {ServiceState} from './service-state.js'

const serviceStates = [
  'defined',
  'creating',
  'health-pending',
  'healthy',
  'unhealthy',
  'running',
  'stopped',
  'restarting',
  'failed'
] as const satisfies readonly ServiceState[]

const ServiceRecordSchema = z.object({
  state: z.enum(serviceStates),
  container: z.string(),
  restarts: z.number().int().nonnegative(),
  error: z.object({code: z.string(), message: z.string()}).optional(),
  updatedAt: z.string()
})

const StackStateSchema = z.object({
  project: z.string(),
  services: z.record(ServiceRecordSchema)
})

/**
 * Last known state of a service, as written by the process that ran `up` or `down`.
 */
export type ServiceRecord = z.infer<typeof ServiceRecordSchema>

export type StackState = z.infer<typeof StackStateSchema>

/**
 * Persists the stack state so that `ps` from another process can report it.
 * Stored as `<workdir>/<project>/state.json`.
 */
export class StateManager {
  private state: StackState
  private readonly dir: string

  constructor(workdir: string, private readonly project: string) {
    this.dir = join(workdir, project)
    this.state = {project, services: {}}
  }

  get path(): string {
    return join(this.dir, 'state.json')
  }

  /**
   * Loads the state file. A missing or unreadable file yields an empty state.
   */
  async load(): Promise<void> {
    let content: string
    try {
      content = await readFile(this.path, 'utf8')
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.state = {project: this.project, services: {}}
        return
      }

      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(content)
    } catch {
      json = undefined
    }

    const result = StackStateSchema.safeParse(json)
    this.state = result.success ? result.data : {project: this.project, services: {}}
  }

  async save(): Promise<void> {
    await mkdir(this.dir, {recursive: true})
    await writeFile(this.path, JSON.stringify(this.state, null, 2), 'utf8')
  }

  get(service: string): ServiceRecord | undefined {
    return this.state.services[service]
  }

  set(service: string, record: Omit<ServiceRecord, 'updatedAt'>): void {
    this.state.services[service] = {...record, updatedAt: new Date().toISOString()}
  }
}
