import type {RestartBackoff, RestartPolicy} from '../types.js'

export const defaultBackoff: RestartBackoff = {
  initialDelayMs: 100,
  maxDelayMs: 60_000,
  resetAfterMs: 10_000
}

/**
 * Delay before restart `attempt` (1-based): doubles from the initial delay,
 * capped at the maximum.
 */
export function restartDelay(attempt: number, backoff: RestartBackoff = defaultBackoff): number {
  const delay = backoff.initialDelayMs * (2 ** Math.max(0, attempt - 1))
  return Math.min(delay, backoff.maxDelayMs)
}

/**
 * Whether the supervisor restarts a container that exited with `exitCode`.
 * An undefined exit code (container gone) counts as a failure.
 */
export function shouldRestart(policy: RestartPolicy, exitCode: number | undefined, attempt: number): boolean {
  switch (policy.mode) {
    case 'no': {
      return false
    }

    case 'always':
    case 'unless-stopped': {
      return true
    }

    case 'on-failure': {
      return exitCode !== 0 && (policy.maxRetries === undefined || attempt <= policy.maxRetries)
    }
  }
}

/** Value of the runtime's own `--restart` flag for a policy. */
export function runtimeRestartPolicy(policy: RestartPolicy): string {
  if (policy.mode === 'on-failure' && policy.maxRetries !== undefined) {
    return `on-failure:${policy.maxRetries}`
  }

  return policy.mode
}
