import pino, {type Logger} from 'pino'
import type {JobRef, SkipReason, StepRef} from '../types.js'

/**
 * Discriminated union of pipeline execution events.
 *
 * Lifecycle:
 * 1. PIPELINE_START - planning succeeded, jobs are about to run
 * 2. For each job (jobs interleave):
 *    a. JOB_STARTING, or JOB_SKIPPED when the job condition is false
 *    b. For each step: STEP_STARTING then STEP_FINISHED | STEP_FAILED,
 *       or STEP_SKIPPED (condition, cancellation, earlier failure),
 *       or STEP_WOULD_RUN in dry-run mode
 *    c. JOB_FINISHED | JOB_FAILED | JOB_CANCELLED
 * 3. PIPELINE_FINISHED when no job failed, PIPELINE_FAILED otherwise
 */
export type PipelineStartEvent = {
  event: 'PIPELINE_START';
  workflowId: string;
  workflowName: string;
  jobs: JobRef[];
}

export type JobStartingEvent = {
  event: 'JOB_STARTING';
  workflowId: string;
  job: JobRef;
  runsOn: string;
}

export type JobSkippedEvent = {
  event: 'JOB_SKIPPED';
  workflowId: string;
  job: JobRef;
}

export type JobFinishedEvent = {
  event: 'JOB_FINISHED';
  workflowId: string;
  job: JobRef;
  durationMs: number;
  skippedSteps: number;
}

export type JobFailedEvent = {
  event: 'JOB_FAILED';
  workflowId: string;
  job: JobRef;
  durationMs: number;
  error?: string;
}

export type JobCancelledEvent = {
  event: 'JOB_CANCELLED';
  workflowId: string;
  job: JobRef;
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  workflowId: string;
  job: JobRef;
  step: StepRef;
}

export type StepSkippedEvent = {
  event: 'STEP_SKIPPED';
  workflowId: string;
  job: JobRef;
  step: StepRef;
  reason: SkipReason;
}

export type StepWouldRunEvent = {
  event: 'STEP_WOULD_RUN';
  workflowId: string;
  job: JobRef;
  step: StepRef;
}

export type StepFinishedEvent = {
  event: 'STEP_FINISHED';
  workflowId: string;
  job: JobRef;
  step: StepRef;
  durationMs: number;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  workflowId: string;
  job: JobRef;
  step: StepRef;
  exitCode?: number;
  error?: string;
  /** True when the step is marked continue-on-error. */
  allowed: boolean;
}

export type StepLogEvent = {
  event: 'STEP_LOG';
  workflowId: string;
  job: JobRef;
  step: StepRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type PipelineFinishedEvent = {
  event: 'PIPELINE_FINISHED';
  workflowId: string;
  passed: number;
  skipped: number;
}

export type PipelineFailedEvent = {
  event: 'PIPELINE_FAILED';
  workflowId: string;
  failed: number;
  cancelled: number;
}

export type PipelineEvent =
  | PipelineStartEvent
  | JobStartingEvent
  | JobSkippedEvent
  | JobFinishedEvent
  | JobFailedEvent
  | JobCancelledEvent
  | StepStartingEvent
  | StepSkippedEvent
  | StepWouldRunEvent
  | StepFinishedEvent
  | StepFailedEvent
  | StepLogEvent
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
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(options?: {logger?: Logger}) {
    this.logger = options?.logger ?? pino({level: 'info'})
  }

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'STEP_FAILED':
      case 'JOB_FAILED':
      case 'PIPELINE_FAILED': {
        this.logger.error(event)
        break
      }

      case 'JOB_CANCELLED': {
        this.logger.warn(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
