import {setTimeout as sleep} from 'node:timers/promises'
import type {ContainerRuntime} from '../engine/runtime.js'
import type {HealthCheck} from '../types.js'

export type HealthOutcome =
  | {status: 'healthy'; probes: number}
  | {status: 'unhealthy'; failures: number; output: string}
  | {status: 'aborted'}

/**
 * Polls a container's health probe until it succeeds once, or fails
 * `retries` times in a row outside the start period.
 */
export class HealthProber {
  constructor(private readonly runtime: ContainerRuntime) {}

  async probe(container: string, check: HealthCheck, signal?: AbortSignal): Promise<HealthOutcome> {
    const startedAt = Date.now()
    let probes = 0
    let failures = 0

    for (;;) {
      try {
        await sleep(check.intervalMs, undefined, {signal})
      } catch (error) {
        if (signal?.aborted) {
          return {status: 'aborted'}
        }

        throw error
      }

      probes++
      const {ok, output} = await this.runProbe(container, check)
      if (ok) {
        return {status: 'healthy', probes}
      }

      if (Date.now() - startedAt < check.startPeriodMs) {
        continue
      }

      failures++
      if (failures >= check.retries) {
        return {status: 'unhealthy', failures, output}
      }
    }
  }

  private async runProbe(container: string, check: HealthCheck): Promise<{ok: boolean; output: string}> {
    try {
      const result = await this.runtime.exec(container, check.test, check.timeoutMs)
      if (result.timedOut) {
        return {ok: false, output: `Health probe timed out after ${check.timeoutMs}ms`}
      }

      return {ok: result.exitCode === 0, output: result.output}
    } catch (error) {
      // Container gone or runtime error: counts as a failed probe
      return {ok: false, output: error instanceof Error ? error.message : String(error)}
    }
  }
}
