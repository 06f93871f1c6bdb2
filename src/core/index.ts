export {Orchestrator, describePort, resolveState} from './orchestrator.js'
export type {OrchestratorOptions, UpOptions, DownOptions, UpResult, ServiceReport} from './orchestrator.js'
export {DescriptorLoader} from './descriptor-loader.js'
export type {DescriptorLoaderOptions} from './descriptor-loader.js'
export {DescriptorSchema} from './descriptor-schema.js'
export {interpolate, interpolateTree} from './interpolate.js'
export type {Variables} from './interpolate.js'
export {loadEnvFile, loadOptionalEnvFile, resolveServiceEnvironment} from './env-file.js'
export {ServiceRegistry, canTransition} from './service-state.js'
export type {ServiceState, ServiceEntry, TransitionListener} from './service-state.js'
export {PortBinder, validatePorts, prepareBindMounts} from './port-binder.js'
export {HealthProber} from './health.js'
export type {HealthOutcome} from './health.js'
export {RestartSupervisor} from './supervisor.js'
export type {SupervisedService, RestartNotice} from './supervisor.js'
export {defaultBackoff, restartDelay, shouldRestart, runtimeRestartPolicy} from './backoff.js'
export {StateManager} from './state.js'
export type {ServiceRecord, StackState} from './state.js'
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  JobContext,
  StackEvent,
  StackStartEvent,
  NetworkReadyEvent,
  VolumeReadyEvent,
  ServiceStateEvent,
  ServiceSkippedEvent,
  ServiceFailedEvent,
  ServiceRestartingEvent,
  ServiceLogEvent,
  StackReadyEvent,
  StackFailedEvent,
  StackStoppingEvent,
  StackStoppedEvent
} from './reporter.js'
export {buildGraph, validateGraph, topologicalLevels, startupOrder, shutdownOrder, subgraph} from './dag.js'
export type {ServiceGraph} from './dag.js'
export {slugify, formatDuration, qualifiedName, containerName} from './utils.js'
