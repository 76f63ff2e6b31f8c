import pino from 'pino'
import type {PipelineState} from './phases.js'

/** Reference to a phase for display and keying purposes. */
export type PhaseRef = {
  id: string;
  displayName: string;
}

/**
 * Discriminated union of provisioning events.
 *
 * Lifecycle:
 * 1. PIPELINE_START - Pipeline execution begins
 * 2. For each phase:
 *    a. PHASE_STARTING - Phase begins
 *    b. PHASE_LOG / PHASE_WARNING - Any number, while the phase runs
 *    c. PHASE_FINISHED - Phase reached its target state
 *       OR PHASE_FAILED - Phase failed (pipeline stops)
 * 3. PIPELINE_FINISHED - Target handed back (or dry run complete)
 *    OR PIPELINE_FAILED - Pipeline stopped on a fatal error
 */
export type PipelineStartEvent = {
  event: 'PIPELINE_START';
  workdir: string;
  phases: PhaseRef[];
  dryRun: boolean;
}

export type PhaseStartingEvent = {
  event: 'PHASE_STARTING';
  phase: PhaseRef;
}

export type PhaseFinishedEvent = {
  event: 'PHASE_FINISHED';
  phase: PhaseRef;
  state: PipelineState;
  durationMs: number;
}

export type PhaseLogEvent = {
  event: 'PHASE_LOG';
  phase: PhaseRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type PhaseWarningEvent = {
  event: 'PHASE_WARNING';
  phase: PhaseRef;
  message: string;
}

export type PhaseFailedEvent = {
  event: 'PHASE_FAILED';
  phase: PhaseRef;
  /** Retryable phases fail only once their own bounded retries are spent */
  failure: 'fatal' | 'retryable';
  code: string;
  message: string;
  /** Captured output of the failing process */
  log?: string;
}

export type PipelineFinishedEvent = {
  event: 'PIPELINE_FINISHED';
  state: PipelineState;
  durationMs: number;
  dryRun: boolean;
}

export type PipelineFailedEvent = {
  event: 'PIPELINE_FAILED';
  state: PipelineState;
  phase: PhaseRef;
}

export type PipelineEvent =
  | PipelineStartEvent
  | PhaseStartingEvent
  | PhaseFinishedEvent
  | PhaseLogEvent
  | PhaseWarningEvent
  | PhaseFailedEvent
  | PipelineFinishedEvent
  | PipelineFailedEvent

/**
 * Interface for reporting pipeline execution events.
 */
export type Reporter = {
  emit(event: PipelineEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for unattended runs and log collection.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'PHASE_WARNING': {
        this.logger.warn(event)
        break
      }

      case 'PHASE_FAILED':
      case 'PIPELINE_FAILED': {
        this.logger.error(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
