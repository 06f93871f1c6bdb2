/**
 * Library entry point.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {DescriptorLoader, DockerCliRuntime, ConsoleReporter, Orchestrator} from 'berth'
 *
 * const stack = await new DescriptorLoader().load('compose.yaml')
 * const orchestrator = new Orchestrator(stack, {
 *   runtime: new DockerCliRuntime(),
 *   reporter: new ConsoleReporter()
 * })
 *
 * const result = await orchestrator.up()
 * for (const service of result.services) {
 *   console.log(service.service, service.state)
 * }
 *
 * await orchestrator.down()
 * ```
 */

export {
  ContainerRuntime,
  DockerCliRuntime,
  type LogLine,
  type OnLogLine,
  type BuildRequest,
  type ContainerSummary,
  type CreateContainerRequest,
  type ExecResult,
  type MountBinding,
  type NetworkAttachment,
  type NetworkRequest,
  type PortBinding,
  type VolumeRequest
} from './engine/index.js'

export * from './core/index.js'

export type * from './types.js'

export {
  BerthError,
  DescriptorError,
  MalformedDescriptorError,
  DuplicateServiceError,
  UnknownReferenceError,
  DependencyCycleError,
  PortConflictError,
  LifecycleError,
  ServiceUnhealthyError,
  ProcessStartError,
  DockerError,
  DockerNotAvailableError,
  rootCause,
  type ErrorCode,
  type ReferenceKind
} from './errors.js'
