import pino, {type DestinationStream, type Logger} from 'pino'
import type {HealthState, InstructionKind} from '../types.js'

/** Reference to a build step for display and keying purposes. */
export type StepRef = {
  stage: string;
  index: number;
  kind: InstructionKind;
  /** Short human-readable summary of the instruction (e.g. `RUN pip install`). */
  summary: string;
}

/**
 * Discriminated union of build and supervision events.
 *
 * Build lifecycle:
 * 1. BUILD_START
 * 2. For each planned stage: STAGE_START, then per instruction
 *    STEP_CACHED (cache hit) OR STEP_STARTING followed by STEP_FINISHED / STEP_FAILED,
 *    then STAGE_FINISHED
 * 3. IMAGE_ASSEMBLED, BUILD_FINISHED
 *    OR BUILD_FAILED (no image is written)
 *
 * Supervision lifecycle:
 * PROCESS_STARTED, any number of STATE_CHANGED / PROBE_FAILED / RUNTIME_ERROR,
 * then PROCESS_EXITED
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  recipe: string;
  target: string;
  stages: string[];
}

export type StageStartEvent = {
  event: 'STAGE_START';
  stage: string;
  base: string;
}

export type StepCachedEvent = {
  event: 'STEP_CACHED';
  step: StepRef;
  fingerprint: string;
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  step: StepRef;
  fingerprint: string;
}

export type StepFinishedEvent = {
  event: 'STEP_FINISHED';
  step: StepRef;
  fingerprint: string;
  durationMs: number;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  step: StepRef;
  fingerprint: string;
  exitCode: number;
}

export type StageFinishedEvent = {
  event: 'STAGE_FINISHED';
  stage: string;
  snapshot: string;
  executed: number;
  cached: number;
}

export type ImageAssembledEvent = {
  event: 'IMAGE_ASSEMBLED';
  image: string;
  digest: string;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  image: string;
  digest: string;
  executed: number;
  cached: number;
  durationMs: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  code: string;
  message: string;
}

export type ProcessStartedEvent = {
  event: 'PROCESS_STARTED';
  image: string;
  command: string[];
  pid?: number;
}

export type StateChangedEvent = {
  event: 'STATE_CHANGED';
  image: string;
  from: HealthState;
  to: HealthState;
  at: number;
}

export type ProbeFailedEvent = {
  event: 'PROBE_FAILED';
  image: string;
  exitCode?: number;
  timedOut: boolean;
  consecutiveFailures: number;
}

export type RuntimeErrorEvent = {
  event: 'RUNTIME_ERROR';
  image: string;
  code: string;
  message: string;
}

export type ProcessExitedEvent = {
  event: 'PROCESS_EXITED';
  image: string;
  exitCode: number | null;
  signal?: string;
}

export type BuildEvent =
  | BuildStartEvent
  | StageStartEvent
  | StepCachedEvent
  | StepStartingEvent
  | StepFinishedEvent
  | StepFailedEvent
  | StageFinishedEvent
  | ImageAssembledEvent
  | BuildFinishedEvent
  | BuildFailedEvent

export type SupervisorEvent =
  | ProcessStartedEvent
  | StateChangedEvent
  | ProbeFailedEvent
  | RuntimeErrorEvent
  | ProcessExitedEvent

export type StratumEvent = BuildEvent | SupervisorEvent

/**
 * Interface for reporting build and supervision events.
 */
export type Reporter = {
  /** Reports state transitions */
  emit(event: StratumEvent): void;
  /** Reports process output; `source` is a step label or an image name */
  log(source: string, stream: 'stdout' | 'stderr', line: string): void;
}

/** Label used for a step's log lines. */
export function stepLabel(step: StepRef): string {
  return `${step.stage}#${step.index}`
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(options?: {level?: string; destination?: DestinationStream}) {
    const settings = {level: options?.level ?? 'info'}
    this.logger = options?.destination ? pino(settings, options.destination) : pino(settings)
  }

  emit(event: StratumEvent): void {
    if (event.event === 'BUILD_FAILED' || event.event === 'RUNTIME_ERROR') {
      this.logger.error(event)
    } else if (event.event === 'PROBE_FAILED') {
      this.logger.warn(event)
    } else {
      this.logger.info(event)
    }
  }

  log(source: string, stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({source, stream, line})
  }
}
