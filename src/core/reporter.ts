import pino, {type Logger} from 'pino'
import type {BuildPhase} from '../engine/types.js'

/** Identifies the build a lifecycle event is about. */
export type BuildRef = {
  namespace: string;
  name: string;
}

/**
 * Discriminated union of build lifecycle events.
 *
 * Lifecycle:
 * 1. BUILD_SUBMITTED - The build was created
 *    OR BUILD_EXISTS - A build of the same name was already there
 * 2. BUILD_RETRYING - The existing build failed for an infrastructure reason
 *    and is deleted and recreated (at most once)
 * 3. BUILD_POLL_FAILED - Reading the status failed; polling goes on
 * 4. BUILD_SUCCEEDED - The build completed
 *    OR BUILD_FAILED - The build ended in Failed, Cancelled or Error
 * 5. DIAGNOSTICS_FAILED - Logs or pod details could not be collected
 */
export type BuildSubmittedEvent = {
  event: 'BUILD_SUBMITTED';
  build: BuildRef;
}

export type BuildExistsEvent = {
  event: 'BUILD_EXISTS';
  build: BuildRef;
  phase?: BuildPhase;
}

export type BuildRetryingEvent = {
  event: 'BUILD_RETRYING';
  build: BuildRef;
  reason?: string;
}

export type BuildPollFailedEvent = {
  event: 'BUILD_POLL_FAILED';
  build: BuildRef;
  error: string;
}

export type BuildSucceededEvent = {
  event: 'BUILD_SUCCEEDED';
  build: BuildRef;
  durationMs: number;
  /** True when the build had already completed before this run observed it. */
  alreadyComplete: boolean;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  build: BuildRef;
  phase: BuildPhase;
  reason?: string;
  durationMs: number;
}

export type DiagnosticsFailedEvent = {
  event: 'DIAGNOSTICS_FAILED';
  build: BuildRef;
  what: 'build-log' | 'artifacts' | 'pod' | 'events';
  error: string;
}

export type BuildEvent =
  | BuildSubmittedEvent
  | BuildExistsEvent
  | BuildRetryingEvent
  | BuildPollFailedEvent
  | BuildSucceededEvent
  | BuildFailedEvent
  | DiagnosticsFailedEvent

/**
 * Interface for reporting build lifecycle events.
 */
export type Reporter = {
  emit(event: BuildEvent): void;
}

const warnings = new Set<BuildEvent['event']>(['BUILD_POLL_FAILED', 'DIAGNOSTICS_FAILED', 'BUILD_RETRYING'])

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(logger?: Logger) {
    this.logger = logger ?? pino({level: 'info'})
  }

  emit(event: BuildEvent): void {
    if (event.event === 'BUILD_FAILED') {
      this.logger.error(event)
    } else if (warnings.has(event.event)) {
      this.logger.warn(event)
    } else {
      this.logger.info(event)
    }
  }
}

/**
 * Delegates emit() to multiple reporters.
 */
export class CompositeReporter implements Reporter {
  private readonly reporters: Reporter[]

  constructor(...reporters: Reporter[]) {
    this.reporters = reporters
  }

  emit(event: BuildEvent): void {
    for (const reporter of this.reporters) {
      reporter.emit(event)
    }
  }
}
