import {cpus} from 'node:os'
import {resolve} from 'node:path'
import type {ActionRegistry} from '../actions/index.js'
import {defaultShell, type EnvironmentProvider, type ExecutionEnvironment} from '../engine/index.js'
import {ExecutionError, ValidationError} from '../errors.js'
import type {JobResult, JobSpec, PipelineResult, ShellName, Workflow} from '../types.js'
import {evaluateCondition} from './condition.js'
import {composeEnv, hostEnv, loadEnvFile, type EnvMap} from './env.js'
import {planWorkflow, withJobContext} from './planner.js'
import type {Reporter} from './reporter.js'
import {jobRef, StepExecutor} from './step-executor.js'
import {renderTemplate} from './template.js'
import {withConcurrency} from './utils.js'

export type PlanOptions = {
  /** Keep only these workflow jobs (by job id). */
  jobs?: string[];
  /** Keep only these driving values. Jobs without a matrix are not filtered. */
  matrix?: string[];
}

export type JobRunOptions = PlanOptions & {
  /** Max jobs in flight (default: CPU count). */
  concurrency?: number;
  /** Dotenv file layered between the host environment and the workflow env. */
  envFile?: string;
  /** Aborting cancels every job. */
  signal?: AbortSignal;
  /** Report what would run without invoking anything. */
  dryRun?: boolean;
}

type JobContext = {
  workflowId: string;
  baseEnv: EnvMap;
  dryRun?: boolean;
}

/**
 * Runs the concrete jobs of a workflow.
 *
 * ## Workflow
 *
 * 1. **Planning**: expands every job into job specs and checks conditions,
 *    templates and action inputs. Any ConfigurationError halts the run here,
 *    before a single job starts.
 * 2. **Execution**: job specs run independently through a bounded worker pool,
 *    each on its own execution environment. A failing job never stops its
 *    siblings.
 * 3. **Aggregation**: results are listed in plan order, whatever the
 *    completion order.
 *
 * ## Cancellation
 *
 * Each job gets an AbortController linked to the run-wide signal, so a single
 * job can be cancelled with `cancelJob()` while the others keep running.
 */
export class JobRunner {
  private readonly executor: StepExecutor
  private readonly running = new Map<string, AbortController>()

  constructor(
    private readonly provider: EnvironmentProvider,
    private readonly actions: ActionRegistry,
    private readonly reporter: Reporter
  ) {
    this.executor = new StepExecutor(actions, reporter)
  }

  plan(workflow: Workflow, options?: PlanOptions): JobSpec[] {
    const {jobs, matrix} = options ?? {}
    let specs = planWorkflow(workflow)

    if (jobs) {
      const known = new Set(workflow.jobs.map(job => job.id))
      for (const id of jobs) {
        if (!known.has(id)) {
          throw new ValidationError(`Unknown job: '${id}'. Available jobs: ${[...known].join(', ')}`)
        }
      }

      specs = specs.filter(spec => jobs.includes(spec.jobId))
    }

    if (matrix) {
      specs = specs.filter(spec => spec.matrixValue === undefined || matrix.includes(spec.matrixValue))
      if (!specs.some(spec => spec.matrixValue !== undefined)) {
        throw new ValidationError(`No matrix job matches: ${matrix.join(', ')}`)
      }
    }

    for (const spec of specs) {
      withJobContext(spec.id, () => {
        this.validateActions(spec)
      })
    }

    return specs
  }

  async run(workflow: Workflow, options?: JobRunOptions): Promise<PipelineResult> {
    const {concurrency, envFile, signal, dryRun} = options ?? {}
    const specs = this.plan(workflow, options)

    const fileEnv = envFile ? await loadEnvFile(resolve(envFile)) : undefined
    const baseEnv = composeEnv(hostEnv(), fileEnv, workflow.env)
    const workflowId = workflow.id

    this.reporter.emit({
      event: 'PIPELINE_START',
      workflowId,
      workflowName: workflow.name ?? workflow.id,
      jobs: specs.map(spec => jobRef(spec))
    })

    const context: JobContext = {workflowId, baseEnv, dryRun}
    const controllers = specs.map(spec => this.register(spec, signal))

    const settled = await withConcurrency(
      specs.map((spec, i) => async () => {
        try {
          return await this.runJob(spec, controllers[i].signal, context)
        } finally {
          controllers[i].dispose()
          this.running.delete(spec.id)
        }
      }),
      concurrency ?? cpus().length
    )

    const jobs = settled.map((result, i) => {
      if (result.status === 'fulfilled') {
        return result.value
      }

      return this.jobFailed(specs[i], context, result.reason, 0)
    })

    const count = (status: JobResult['status']) => jobs.filter(job => job.status === status).length
    const summary = {
      passed: count('passed'),
      failed: count('failed'),
      cancelled: count('cancelled'),
      skipped: count('skipped')
    }
    const status = summary.failed > 0 ? 'failed' : (summary.cancelled > 0 ? 'cancelled' : 'passed')

    if (status === 'passed') {
      this.reporter.emit({event: 'PIPELINE_FINISHED', workflowId, passed: summary.passed, skipped: summary.skipped})
    } else {
      this.reporter.emit({event: 'PIPELINE_FAILED', workflowId, failed: summary.failed, cancelled: summary.cancelled})
    }

    return {workflowId, status, jobs, ...summary}
  }

  /**
   * Cancels one job of the current run. A running job has its step interrupted
   * and its remaining steps skipped; a queued job never starts and reports all
   * its steps as skipped. Returns false if no such job is pending.
   */
  cancelJob(jobSpecId: string): boolean {
    const controller = this.running.get(jobSpecId)
    if (!controller) {
      return false
    }

    controller.abort()
    return true
  }

  /**
   * Creates the job's controller, linked to the run-wide signal, and makes the
   * job cancellable until it finishes.
   */
  private register(job: JobSpec, signal?: AbortSignal): {signal: AbortSignal; dispose: () => void} {
    const controller = new AbortController()
    const onAbort = () => {
      controller.abort()
    }

    if (signal?.aborted) {
      controller.abort()
    } else {
      signal?.addEventListener('abort', onAbort, {once: true})
    }

    this.running.set(job.id, controller)
    return {
      signal: controller.signal,
      dispose() {
        signal?.removeEventListener('abort', onAbort)
      }
    }
  }

  private validateActions(spec: JobSpec): void {
    for (const step of spec.steps) {
      if (step.action.kind !== 'uses') {
        continue
      }

      const action = this.actions.get(step.action.action)
      const inputs = Object.fromEntries(Object.entries(step.action.with ?? {}).map(([key, value]) => [key, renderTemplate(value, spec.fields)]))
      action.validate?.(inputs)
    }
  }

  private async runJob(job: JobSpec, signal: AbortSignal, context: JobContext): Promise<JobResult> {
    const {workflowId, baseEnv, dryRun} = context
    const ref = jobRef(job)

    if (job.if && !evaluateCondition(job.if, job.fields)) {
      this.reporter.emit({event: 'JOB_SKIPPED', workflowId, job: ref})
      return {job: ref, status: 'skipped', steps: [], skippedSteps: 0, durationMs: 0}
    }

    if (signal.aborted) {
      const result = this.executor.skipAll(job, 'cancelled', {workflowId, baseEnv})
      this.reporter.emit({event: 'JOB_CANCELLED', workflowId, job: ref})
      return result
    }

    this.reporter.emit({event: 'JOB_STARTING', workflowId, job: ref, runsOn: job.runsOn})

    if (dryRun) {
      const result = this.executor.preview(job, {workflowId, baseEnv})
      this.reporter.emit({event: 'JOB_FINISHED', workflowId, job: ref, durationMs: 0, skippedSteps: result.skippedSteps})
      return result
    }

    const startedAt = Date.now()
    let environment: ExecutionEnvironment
    try {
      environment = await this.provider.acquire(job)
    } catch (error) {
      return this.jobFailed(job, context, error, Date.now() - startedAt)
    }

    let outcome: {result: JobResult} | {error: unknown}
    try {
      await this.checkShells(job, environment)
      outcome = {result: await this.executor.run(job, environment, {workflowId, baseEnv, signal})}
    } catch (error) {
      outcome = {error}
    }

    const releaseError = await this.release(job, environment)

    if ('error' in outcome) {
      return this.jobFailed(job, context, outcome.error, Date.now() - startedAt)
    }

    if (releaseError) {
      const result: JobResult = {...outcome.result, status: 'failed'}
      this.reporter.emit({event: 'JOB_FAILED', workflowId, job: ref, durationMs: result.durationMs, error: releaseError.message})
      return result
    }

    this.reportJobResult(workflowId, job, outcome.result)
    return outcome.result
  }

  private async release(job: JobSpec, environment: ExecutionEnvironment): Promise<ExecutionError | undefined> {
    try {
      await environment.release?.()
      return undefined
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return new ExecutionError('RELEASE_FAILED', `Job ${job.id}: could not release its environment: ${message}`, {cause: error})
    }
  }

  private async checkShells(job: JobSpec, environment: ExecutionEnvironment): Promise<void> {
    const shells = new Set<ShellName>()
    for (const step of job.steps) {
      shells.add(step.action.kind === 'run' ? step.action.shell ?? defaultShell(environment.context.os) : defaultShell(environment.context.os))
    }

    for (const shell of shells) {
      await environment.runner.check(shell)
    }
  }

  private reportJobResult(workflowId: string, spec: JobSpec, result: JobResult): void {
    const {job, durationMs} = result
    switch (result.status) {
      case 'failed': {
        const allowed = new Set(spec.steps.filter(step => step.allowFailure).map(step => step.id))
        const failedStep = result.steps.find(step => step.status === 'failed' && !allowed.has(step.step.id))
        this.reporter.emit({event: 'JOB_FAILED', workflowId, job, durationMs, error: failedStep?.error})
        break
      }

      case 'cancelled': {
        this.reporter.emit({event: 'JOB_CANCELLED', workflowId, job})
        break
      }

      default: {
        this.reporter.emit({event: 'JOB_FINISHED', workflowId, job, durationMs, skippedSteps: result.skippedSteps})
      }
    }
  }

  private jobFailed(job: JobSpec, context: JobContext, error: unknown, durationMs: number): JobResult {
    const message = error instanceof Error ? error.message : String(error)
    this.reporter.emit({event: 'JOB_FAILED', workflowId: context.workflowId, job: jobRef(job), durationMs, error: message})
    return {job: jobRef(job), status: 'failed', steps: [], skippedSteps: 0, durationMs}
  }
}
