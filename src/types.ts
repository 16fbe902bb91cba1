// ---------------------------------------------------------------------------
// Shared workflow domain types.
//
// Definition types describe the workflow file as written; resolved types are
// produced by the loader and the planner and consumed by the runners.
// ---------------------------------------------------------------------------

// -- Matrix -------------------------------------------------------------------

export type MatrixValue = string | number | boolean | MatrixValue[] | {[key: string]: MatrixValue}

/** Field name → value, as resolved for one job. */
export type MatrixFields = Record<string, MatrixValue>

/** The driving axis of a matrix: one job per value, in declared order. */
export type Dimension = {
  name: string;
  values: string[];
}

/**
 * Sparse field overlay ("include" entry).
 * Without `key` it applies to every job; with `key` only to the job whose
 * driving value equals it.
 */
export type OverrideRecord = {
  key?: string;
  fields: MatrixFields;
}

export type MatrixDefinition = {
  dimension: Dimension;
  include: OverrideRecord[];
  /** Declared global defaults, applied underneath every override record. */
  defaults?: MatrixFields;
}

// -- Steps --------------------------------------------------------------------

export type ShellName = 'bash' | 'sh' | 'pwsh'

export type RunAction = {
  kind: 'run';
  command: string;
  shell?: ShellName;
  workingDirectory?: string;
}

export type UsesAction = {
  kind: 'uses';
  /** Normalised action name (owner prefix and version suffix removed). */
  action: string;
  /** Action reference as written in the workflow (e.g. "actions/checkout@v2"). */
  ref: string;
  with?: Record<string, string>;
}

export type StepAction = RunAction | UsesAction

/**
 * Environment overlay: a map whose values may hold templates, or a single
 * template referencing a map-valued matrix field (e.g. "${{ matrix.custom_env }}").
 */
export type EnvSpec = Record<string, string> | string

export type Step = {
  id: string;
  /** Human-readable display name. Falls back to `id` when absent. */
  name?: string;
  /** Condition expression; the step is skipped when it evaluates to false. */
  if?: string;
  action: StepAction;
  env?: EnvSpec;
  /** When true the job continues even if this step fails. */
  allowFailure?: boolean;
  timeoutSec?: number;
}

// -- Jobs and workflows -------------------------------------------------------

export type Job = {
  id: string;
  name?: string;
  /** Execution environment label, may reference matrix fields. */
  runsOn: string;
  if?: string;
  env?: EnvSpec;
  matrix?: MatrixDefinition;
  steps: Step[];
  timeoutSec?: number;
}

export type Workflow = {
  id: string;
  name?: string;
  /** Workflow-level environment, layered over the host environment. */
  env?: Record<string, string>;
  jobs: Job[];
  /** Directory containing the workflow file. */
  root: string;
}

/**
 * Fully resolved description of one concrete job.
 * Every field of the job's schema has a value; `runsOn` and `env` are
 * already rendered against `fields`.
 */
export type JobSpec = {
  id: string;
  /** Key of the workflow job this spec was expanded from. */
  jobId: string;
  name: string;
  /** Driving dimension value, for matrix jobs. */
  matrixValue?: string;
  fields: MatrixFields;
  runsOn: string;
  env: Record<string, string>;
  if?: string;
  steps: Step[];
  timeoutSec?: number;
}

// -- Execution ----------------------------------------------------------------

export type OsFamily = 'linux' | 'macos' | 'windows'

/** The environment a job runs in, supplied by the caller. */
export type ExecutionContext = {
  os: OsFamily;
  arch: string;
  /** Working tree the job's commands run in. */
  workdir: string;
}

export type StepRef = {
  id: string;
  displayName: string;
}

export type JobRef = {
  id: string;
  displayName: string;
}

export type SkipReason = 'condition' | 'cancelled' | 'aborted'

export type StepOutcome = {
  step: StepRef;
  status: 'passed' | 'failed' | 'skipped';
  reason?: SkipReason;
  exitCode?: number;
  durationMs?: number;
  error?: string;
}

export type JobStatus = 'passed' | 'failed' | 'cancelled' | 'skipped'

export type JobResult = {
  job: JobRef;
  status: JobStatus;
  steps: StepOutcome[];
  skippedSteps: number;
  durationMs: number;
}

export type PipelineResult = {
  workflowId: string;
  status: 'passed' | 'failed' | 'cancelled';
  jobs: JobResult[];
  passed: number;
  failed: number;
  cancelled: number;
  skipped: number;
}

// -- Definition types (as written in the workflow file) -----------------------

export type StepDefinition = {
  id?: string;
  name?: string;
  if?: string;
  run?: string;
  uses?: string;
  with?: Record<string, unknown>;
  shell?: string;
  'working-directory'?: string;
  env?: Record<string, unknown> | string;
  'continue-on-error'?: boolean;
  'timeout-minutes'?: number;
}

export type MatrixBlockDefinition = {
  include?: Array<Record<string, unknown>>;
  [dimension: string]: unknown;
}

export type JobDefinition = {
  name?: string;
  'runs-on'?: string;
  if?: string;
  env?: Record<string, unknown> | string;
  'timeout-minutes'?: number;
  strategy?: {
    matrix?: MatrixBlockDefinition;
  };
  steps?: StepDefinition[];
}

export type WorkflowDefinition = {
  name?: string;
  env?: Record<string, unknown>;
  jobs?: Record<string, JobDefinition>;
}
