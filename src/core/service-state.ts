import type {BerthError} from '../errors.js'

export type ServiceState =
  | 'defined'
  | 'creating'
  | 'health-pending'
  | 'healthy'
  | 'unhealthy'
  | 'running'
  | 'stopped'
  | 'restarting'
  | 'failed'

/**
 * Allowed transitions per state.
 *
 * ```
 * defined → creating → (health-pending → healthy | unhealthy) → running → stopped | restarting
 * restarting → creating
 * creating → failed
 * failed | unhealthy → restarting (supervised)
 * any state but defined → stopped
 * stopped → creating (next `up`)
 * ```
 */
const transitions: Record<ServiceState, readonly ServiceState[]> = {
  defined: ['creating'],
  creating: ['health-pending', 'running', 'failed', 'stopped'],
  'health-pending': ['healthy', 'unhealthy', 'stopped'],
  healthy: ['running', 'stopped'],
  unhealthy: ['restarting', 'stopped'],
  running: ['restarting', 'stopped'],
  restarting: ['creating', 'stopped'],
  failed: ['restarting', 'stopped'],
  stopped: ['creating']
}

export function canTransition(from: ServiceState, to: ServiceState): boolean {
  return transitions[from].includes(to)
}

/**
 * Runtime view of one service of the stack.
 */
export type ServiceEntry = {
  name: string;
  container: string;
  state: ServiceState;
  /** Restarts performed by the supervisor since the registry was created */
  restarts: number;
  error?: BerthError;
  /** Required dependency that did not come up */
  skippedBy?: string;
}

export type TransitionListener = (service: string, from: ServiceState, to: ServiceState) => void

/**
 * In-memory state of the services of one stack. Owned by a single
 * orchestrator; nothing here is shared between stacks.
 */
export class ServiceRegistry {
  private readonly entries = new Map<string, ServiceEntry>()

  constructor(private readonly onTransition?: TransitionListener) {}

  register(name: string, container: string): void {
    if (!this.entries.has(name)) {
      this.entries.set(name, {name, container, state: 'defined', restarts: 0})
    }
  }

  get(name: string): ServiceEntry {
    return {...this.entry(name)}
  }

  state(name: string): ServiceState {
    return this.entry(name).state
  }

  /**
   * Move a service to a new state.
   * @throws When the state machine does not allow the transition
   */
  transition(name: string, to: ServiceState): void {
    const entry = this.entry(name)
    const from = entry.state
    if (!canTransition(from, to)) {
      throw new Error(`Invalid transition for service '${name}': ${from} -> ${to}`)
    }

    entry.state = to
    if (to === 'creating') {
      entry.error = undefined
      entry.skippedBy = undefined
    }

    this.onTransition?.(name, from, to)
  }

  /**
   * Record a failure. A service still being created moves to `failed`;
   * an unhealthy one keeps its state.
   */
  fail(name: string, error: BerthError): void {
    const entry = this.entry(name)
    entry.error = error
    if (entry.state === 'creating') {
      this.transition(name, 'failed')
    }
  }

  skip(name: string, dependency: string): void {
    const entry = this.entry(name)
    entry.skippedBy = dependency
  }

  recordRestart(name: string): number {
    const entry = this.entry(name)
    entry.restarts++
    return entry.restarts
  }

  private entry(name: string): ServiceEntry {
    const entry = this.entries.get(name)
    if (!entry) {
      throw new Error(`Service '${name}' is not registered`)
    }

    return entry
  }
}
