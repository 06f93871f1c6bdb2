import {setTimeout as sleep} from 'node:timers/promises'
import type {ContainerRuntime} from '../engine/runtime.js'
import type {RestartBackoff, RestartPolicy} from '../types.js'
import {defaultBackoff, restartDelay, shouldRestart} from './backoff.js'
import type {ServiceRegistry} from './service-state.js'

export type SupervisedService = {
  name: string;
  container: string;
  policy: RestartPolicy;
  /**
   * Recreate and start the container.
   * @returns false when the container did not come back up
   */
  relaunch: () => Promise<boolean>;
}

export type RestartNotice = {
  service: string;
  attempt: number;
  delayMs: number;
  exitCode?: number;
}

export type RestartSupervisorOptions = {
  runtime: ContainerRuntime;
  registry: ServiceRegistry;
  backoff?: RestartBackoff;
  /** Aborting ends every watch */
  signal: AbortSignal;
  onRestarting?: (notice: RestartNotice) => void;
}

/**
 * Watches running containers and applies their restart policy when they exit.
 *
 * Restarts wait a capped exponential backoff. The attempt counter resets
 * once a container stayed up for `resetAfterMs`, so a service that crashes
 * rarely always restarts quickly.
 */
export class RestartSupervisor {
  private readonly backoff: RestartBackoff

  constructor(private readonly options: RestartSupervisorOptions) {
    this.backoff = options.backoff ?? defaultBackoff
  }

  async watch(service: SupervisedService): Promise<void> {
    const {runtime, registry, signal} = this.options
    let attempt = 0
    let up = true

    while (!signal.aborted) {
      let exitCode: number | undefined
      if (up) {
        const upSince = Date.now()
        exitCode = await runtime.wait(service.container, signal)
        if (signal.aborted) {
          return
        }

        if (Date.now() - upSince >= this.backoff.resetAfterMs) {
          attempt = 0
        }
      }

      attempt++
      if (!shouldRestart(service.policy, exitCode, attempt)) {
        if (registry.state(service.name) === 'running') {
          registry.transition(service.name, 'stopped')
        }

        return
      }

      const delayMs = restartDelay(attempt, this.backoff)
      registry.transition(service.name, 'restarting')
      registry.recordRestart(service.name)
      this.options.onRestarting?.({service: service.name, attempt, delayMs, exitCode})

      try {
        await sleep(delayMs, undefined, {signal})
      } catch (error) {
        if (signal.aborted) {
          return
        }

        throw error
      }

      up = await service.relaunch()
    }
  }
}
