import {resolve} from 'node:path'
import type {ActionRegistry} from '../actions/index.js'
import {defaultShell, type ExecutionEnvironment, type OnLogLine} from '../engine/index.js'
import {ExecutionError, StepFailedError} from '../errors.js'
import type {JobRef, JobResult, JobSpec, SkipReason, Step, StepOutcome, StepRef} from '../types.js'
import {evaluateCondition} from './condition.js'
import {composeEnv, type EnvMap} from './env.js'
import type {Reporter} from './reporter.js'
import {renderTemplate, resolveEnvSpec} from './template.js'

export type StepExecutorOptions = {
  workflowId: string;
  /** Base environment (host < env file < workflow env). */
  baseEnv: EnvMap;
  /** Aborting cancels the running step and skips the remaining ones. */
  signal?: AbortSignal;
}

type JobRun = StepExecutorOptions & {
  job: JobSpec;
  jobRef: JobRef;
  signal: AbortSignal;
}

export function jobRef(job: JobSpec): JobRef {
  return {id: job.id, displayName: job.name}
}

export function stepRef(step: Step): StepRef {
  return {id: step.id, displayName: step.name ?? step.id}
}

/**
 * Executes the steps of one job, strictly in order, on one execution environment.
 *
 * - a step whose condition is false is skipped and never invoked
 * - the first failing step (unless continue-on-error) aborts the rest of the job
 * - aborting the signal cancels the running step and skips the remaining ones
 */
export class StepExecutor {
  constructor(
    private readonly actions: ActionRegistry,
    private readonly reporter: Reporter
  ) {}

  async run(job: JobSpec, environment: ExecutionEnvironment, options: StepExecutorOptions): Promise<JobResult> {
    const startedAt = Date.now()
    const run: JobRun = {...options, job, jobRef: jobRef(job), signal: options.signal ?? new AbortController().signal}
    const outcomes: StepOutcome[] = []
    let failed = false
    let cancelled = false

    for (const step of job.steps) {
      const ref = stepRef(step)

      if (cancelled || run.signal.aborted) {
        cancelled = true
        outcomes.push(this.skip(run, ref, 'cancelled'))
        continue
      }

      if (failed) {
        outcomes.push(this.skip(run, ref, 'aborted'))
        continue
      }

      if (step.if && !evaluateCondition(step.if, job.fields)) {
        outcomes.push(this.skip(run, ref, 'condition'))
        continue
      }

      const outcome = await this.executeStep(run, step, ref, environment)
      outcomes.push(outcome)

      if (outcome.reason === 'cancelled') {
        cancelled = true
      } else if (outcome.status === 'failed' && !step.allowFailure) {
        failed = true
      }
    }

    return {
      job: run.jobRef,
      status: failed ? 'failed' : (cancelled ? 'cancelled' : 'passed'),
      steps: outcomes,
      skippedSteps: outcomes.filter(outcome => outcome.status === 'skipped').length,
      durationMs: Date.now() - startedAt
    }
  }

  /**
   * Walks the steps without invoking anything, reporting which would run.
   */
  preview(job: JobSpec, options: StepExecutorOptions): JobResult {
    const run: JobRun = {...options, job, jobRef: jobRef(job), signal: options.signal ?? new AbortController().signal}
    const outcomes = job.steps.map(step => {
      const ref = stepRef(step)
      if (step.if && !evaluateCondition(step.if, job.fields)) {
        return this.skip(run, ref, 'condition')
      }

      this.reporter.emit({event: 'STEP_WOULD_RUN', workflowId: run.workflowId, job: run.jobRef, step: ref})
      return {step: ref, status: 'passed' as const}
    })

    return {
      job: run.jobRef,
      status: 'passed',
      steps: outcomes,
      skippedSteps: outcomes.filter(outcome => outcome.status === 'skipped').length,
      durationMs: 0
    }
  }

  /**
   * Records every step as skipped, for a job that never got to run.
   */
  skipAll(job: JobSpec, reason: SkipReason, options: StepExecutorOptions): JobResult {
    const run: JobRun = {...options, job, jobRef: jobRef(job), signal: options.signal ?? new AbortController().signal}
    const outcomes = job.steps.map(step => this.skip(run, stepRef(step), reason))
    return {
      job: run.jobRef,
      status: reason === 'cancelled' ? 'cancelled' : 'failed',
      steps: outcomes,
      skippedSteps: outcomes.length,
      durationMs: 0
    }
  }

  private skip(run: JobRun, ref: StepRef, reason: SkipReason): StepOutcome {
    this.reporter.emit({event: 'STEP_SKIPPED', workflowId: run.workflowId, job: run.jobRef, step: ref, reason})
    return {step: ref, status: 'skipped', reason}
  }

  private async executeStep(run: JobRun, step: Step, ref: StepRef, environment: ExecutionEnvironment): Promise<StepOutcome> {
    const {workflowId, jobRef: job, signal} = run
    const startedAt = Date.now()
    this.reporter.emit({event: 'STEP_STARTING', workflowId, job, step: ref})

    const onLogLine: OnLogLine = ({stream, line}) => {
      this.reporter.emit({event: 'STEP_LOG', workflowId, job, step: ref, stream, line})
    }

    let exitCode: number
    let error: string | undefined
    try {
      exitCode = await this.invoke(run, step, ref, environment, onLogLine)
    } catch (error_) {
      exitCode = 1
      error = error_ instanceof Error ? error_.message : String(error_)
    }

    const durationMs = Date.now() - startedAt

    if (signal.aborted) {
      this.reporter.emit({event: 'STEP_SKIPPED', workflowId, job, step: ref, reason: 'cancelled'})
      return {step: ref, status: 'skipped', reason: 'cancelled', durationMs}
    }

    if (exitCode === 0 && error === undefined) {
      this.reporter.emit({event: 'STEP_FINISHED', workflowId, job, step: ref, durationMs})
      return {step: ref, status: 'passed', exitCode, durationMs}
    }

    const message = error ?? new StepFailedError(step.id, exitCode).message
    this.reporter.emit({event: 'STEP_FAILED', workflowId, job, step: ref, exitCode, error: message, allowed: step.allowFailure ?? false})
    return {step: ref, status: 'failed', exitCode, durationMs, error: message}
  }

  private async invoke(run: JobRun, step: Step, ref: StepRef, environment: ExecutionEnvironment, onLogLine: OnLogLine): Promise<number> {
    const {job, signal} = run
    const {context, runner} = environment
    const env = composeEnv(run.baseEnv, job.env, resolveEnvSpec(step.env, job.fields))
    const timeoutSec = step.timeoutSec ?? job.timeoutSec

    if (step.action.kind === 'run') {
      const {command, shell, workingDirectory} = step.action
      const result = await runner.run({
        command: renderTemplate(command, job.fields),
        shell: shell ?? defaultShell(context.os),
        cwd: workingDirectory ? resolve(context.workdir, renderTemplate(workingDirectory, job.fields)) : context.workdir,
        env,
        timeoutSec,
        signal
      }, onLogLine)

      if (result.timedOut) {
        throw new ExecutionError('STEP_TIMEOUT', `Step ${step.id} timed out after ${timeoutSec}s`)
      }

      if (result.error) {
        throw new StepFailedError(step.id, result.exitCode, {cause: result.error})
      }

      return result.exitCode
    }

    const action = this.actions.get(step.action.action)
    const inputs = Object.fromEntries(Object.entries(step.action.with ?? {}).map(([key, value]) => [key, renderTemplate(value, job.fields)]))
    const result = await action.run({job, step: ref, context, runner, env, inputs, signal, timeoutSec, onLogLine})
    return result.exitCode
  }
}
