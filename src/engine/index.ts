export {ContainerRuntime, type LogLine, type OnLogLine} from './runtime.js'
export {DockerCliRuntime, createArgs, buildArgs, formatPort, formatMount, parseContainerList, projectLabel, serviceLabel} from './docker-runtime.js'
export type {
  BuildRequest,
  ContainerSummary,
  CreateContainerRequest,
  ExecResult,
  MountBinding,
  NetworkAttachment,
  NetworkRequest,
  PortBinding,
  VolumeRequest
} from './types.js'
