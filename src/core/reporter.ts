import pino from 'pino'
import type {ErrorCode} from '../errors.js'
import type {ServiceState} from './service-state.js'

/** Common fields identifying an orchestration session. */
export type JobContext = {
  project: string;
  jobId: string;
}

/**
 * Discriminated union of stack events.
 *
 * Lifecycle:
 * 1. STACK_START - Startup begins, services listed in startup order
 * 2. NETWORK_READY / VOLUME_READY - Shared resources ensured
 * 3. For each service:
 *    a. SERVICE_STATE - Every state machine transition
 *    b. SERVICE_SKIPPED - A required dependency did not come up
 *       OR SERVICE_FAILED - Creation, start or health check failed
 *    c. SERVICE_LOG - Container or build output line
 *    d. SERVICE_RESTARTING - Supervised container exited, restart scheduled
 * 4. STACK_READY - Every selected service is running
 *    OR STACK_FAILED - At least one service failed or was skipped
 * 5. STACK_STOPPING / STACK_STOPPED - `down`
 */
export type StackStartEvent = JobContext & {
  event: 'STACK_START';
  services: string[];
}

export type NetworkReadyEvent = JobContext & {
  event: 'NETWORK_READY';
  network: string;
  created: boolean;
}

export type VolumeReadyEvent = JobContext & {
  event: 'VOLUME_READY';
  volume: string;
  created: boolean;
}

export type ServiceStateEvent = JobContext & {
  event: 'SERVICE_STATE';
  service: string;
  from: ServiceState;
  state: ServiceState;
}

export type ServiceSkippedEvent = JobContext & {
  event: 'SERVICE_SKIPPED';
  service: string;
  reason: 'dependency';
  dependency: string;
}

export type ServiceFailedEvent = JobContext & {
  event: 'SERVICE_FAILED';
  service: string;
  code: ErrorCode;
  message: string;
  /** Innermost message of the error chain */
  cause: string;
}

export type ServiceRestartingEvent = JobContext & {
  event: 'SERVICE_RESTARTING';
  service: string;
  attempt: number;
  delayMs: number;
  exitCode?: number;
}

export type ServiceLogEvent = JobContext & {
  event: 'SERVICE_LOG';
  service: string;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type StackReadyEvent = JobContext & {
  event: 'STACK_READY';
  durationMs: number;
}

export type StackFailedEvent = JobContext & {
  event: 'STACK_FAILED';
  failed: string[];
  skipped: string[];
}

export type StackStoppingEvent = JobContext & {
  event: 'STACK_STOPPING';
}

export type StackStoppedEvent = JobContext & {
  event: 'STACK_STOPPED';
  durationMs: number;
}

export type StackEvent =
  | StackStartEvent
  | NetworkReadyEvent
  | VolumeReadyEvent
  | ServiceStateEvent
  | ServiceSkippedEvent
  | ServiceFailedEvent
  | ServiceRestartingEvent
  | ServiceLogEvent
  | StackReadyEvent
  | StackFailedEvent
  | StackStoppingEvent
  | StackStoppedEvent

/**
 * Interface for reporting stack events.
 */
export type Reporter = {
  emit(event: StackEvent): void;
  /** Release terminal resources (timers, live regions) */
  close?(): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: StackEvent): void {
    if (event.event === 'SERVICE_FAILED' || event.event === 'STACK_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }
}
