export type ErrorCode =
  | 'MALFORMED_DESCRIPTOR'
  | 'DUPLICATE_SERVICE'
  | 'UNKNOWN_REFERENCE'
  | 'DEPENDENCY_CYCLE'
  | 'PORT_CONFLICT'
  | 'SERVICE_UNHEALTHY'
  | 'PROCESS_START_FAILURE'
  | 'DOCKER_NOT_AVAILABLE'

type ErrorOptions = {
  cause?: unknown;
  service?: string;
}

export class BerthError extends Error {
  readonly service?: string

  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, {cause: options?.cause})
    this.name = 'BerthError'
    this.service = options?.service
  }

  get transient(): boolean {
    return false
  }
}

// -- Descriptor errors -------------------------------------------------------

export class DescriptorError extends BerthError {
  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options)
    this.name = 'DescriptorError'
  }
}

export class MalformedDescriptorError extends DescriptorError {
  constructor(message: string, options?: ErrorOptions) {
    super('MALFORMED_DESCRIPTOR', message, options)
    this.name = 'MalformedDescriptorError'
  }
}

export class DuplicateServiceError extends DescriptorError {
  constructor(service: string, detail?: string, options?: {cause?: unknown}) {
    super('DUPLICATE_SERVICE', detail ?? `Service '${service}' is defined more than once`, {...options, service})
    this.name = 'DuplicateServiceError'
  }
}

export type ReferenceKind = 'service' | 'network' | 'volume'

export class UnknownReferenceError extends DescriptorError {
  constructor(
    service: string | undefined,
    readonly kind: ReferenceKind,
    readonly reference: string,
    options?: {cause?: unknown}
  ) {
    const message = service
      ? `Service '${service}' references unknown ${kind} '${reference}'`
      : `Unknown ${kind} '${reference}'`
    super('UNKNOWN_REFERENCE', message, {...options, service})
    this.name = 'UnknownReferenceError'
  }
}

export class DependencyCycleError extends DescriptorError {
  constructor(readonly cycle: string[], options?: {cause?: unknown}) {
    super('DEPENDENCY_CYCLE', `Dependency cycle detected: ${cycle.join(' -> ')}`, {...options, service: cycle[0]})
    this.name = 'DependencyCycleError'
  }
}

export class PortConflictError extends DescriptorError {
  constructor(
    readonly binding: string,
    readonly services: [string, string],
    options?: {cause?: unknown}
  ) {
    super('PORT_CONFLICT', `Host port ${binding} requested by '${services[1]}' is already bound by '${services[0]}'`, {...options, service: services[1]})
    this.name = 'PortConflictError'
  }
}

// -- Lifecycle errors --------------------------------------------------------

export class LifecycleError extends BerthError {
  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options)
    this.name = 'LifecycleError'
  }
}

export class ServiceUnhealthyError extends LifecycleError {
  constructor(service: string, readonly failures: number, options?: {cause?: unknown}) {
    super('SERVICE_UNHEALTHY', `Service '${service}' is unhealthy after ${failures} failed health probe${failures > 1 ? 's' : ''}`, {...options, service})
    this.name = 'ServiceUnhealthyError'
  }
}

export class ProcessStartError extends LifecycleError {
  constructor(service: string, options?: {cause?: unknown}) {
    super('PROCESS_START_FAILURE', `Service '${service}' failed to start`, {...options, service})
    this.name = 'ProcessStartError'
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends BerthError {
  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

/** Message of the innermost error in a `cause` chain. */
export function rootCause(error: unknown): string {
  let current: unknown = error
  const seen = new Set<unknown>()
  while (current instanceof Error && current.cause !== undefined && !seen.has(current)) {
    seen.add(current)
    current = current.cause
  }

  if (current instanceof Error) {
    return current.message
  }

  return String(current)
}
