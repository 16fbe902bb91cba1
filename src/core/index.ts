// Facade
export {GridCi, type GridCiOptions} from './gridci.js'

// Workflow loading and planning
export {WorkflowLoader, parseWorkflowFile, normalizeActionName} from './workflow-loader.js'
export {planWorkflow, planJob} from './planner.js'
export {expandMatrix, matrixFieldSchema, type MatrixEntry} from './matrix.js'

// Expressions
export {parseCondition, evaluateCondition, conditionFields, isTruthy, type Condition, type Literal} from './condition.js'
export {renderTemplate, templateFields, resolveEnvSpec, formatValue} from './template.js'
export {composeEnv, hostEnv, loadEnvFile, type EnvMap} from './env.js'

// Execution
export {JobRunner, type JobRunOptions, type PlanOptions} from './job-runner.js'
export {StepExecutor, type StepExecutorOptions} from './step-executor.js'

// Reporting
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  PipelineEvent,
  PipelineStartEvent,
  JobStartingEvent,
  JobSkippedEvent,
  JobFinishedEvent,
  JobFailedEvent,
  JobCancelledEvent,
  StepStartingEvent,
  StepSkippedEvent,
  StepWouldRunEvent,
  StepFinishedEvent,
  StepFailedEvent,
  StepLogEvent,
  PipelineFinishedEvent,
  PipelineFailedEvent
} from './reporter.js'

export {slugify, formatDuration, withConcurrency} from './utils.js'
