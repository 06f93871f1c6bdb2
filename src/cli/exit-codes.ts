import {BerthError, type ErrorCode, rootCause} from '../errors.js'

const exitCodes: Record<ErrorCode, number> = {
  MALFORMED_DESCRIPTOR: 2,
  DUPLICATE_SERVICE: 3,
  UNKNOWN_REFERENCE: 4,
  DEPENDENCY_CYCLE: 5,
  PORT_CONFLICT: 6,
  SERVICE_UNHEALTHY: 7,
  PROCESS_START_FAILURE: 8,
  DOCKER_NOT_AVAILABLE: 9
}

/** Process exit code for an error; 1 for anything outside the taxonomy. */
export function exitCodeFor(error: unknown): number {
  return error instanceof BerthError ? exitCodes[error.code] : 1
}

/**
 * One-line failure report: service (when any), error kind, message and root cause.
 *
 * @example
 * ```
 * storage: SERVICE_UNHEALTHY: Service 'storage' is unhealthy after 3 failed health probes (connection refused)
 * ```
 */
export function formatFailure(error: unknown): string {
  if (!(error instanceof BerthError)) {
    return error instanceof Error ? error.message : String(error)
  }

  const prefix = error.service ? `${error.service}: ` : ''
  const cause = rootCause(error)
  const suffix = cause === error.message ? '' : ` (${cause})`
  return `${prefix}${error.code}: ${error.message}${suffix}`
}
