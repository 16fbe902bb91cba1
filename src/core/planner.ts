import {ConfigurationError, UnknownFieldError, ValidationError} from '../errors.js'
import type {EnvSpec, Job, JobSpec, MatrixFields, Workflow} from '../types.js'
import {conditionFields} from './condition.js'
import {expandMatrix, matrixFieldSchema, type MatrixEntry} from './matrix.js'
import {renderTemplate, resolveEnvSpec, templateFields} from './template.js'
import {slugify} from './utils.js'

/**
 * Expands every job of a workflow into concrete job specs.
 *
 * Matrix jobs yield one spec per driving value, other jobs exactly one.
 * Conditions and templates are checked against each job's field schema here,
 * so authoring mistakes surface before anything executes.
 */
export function planWorkflow(workflow: Workflow): JobSpec[] {
  const specs = workflow.jobs.flatMap(job => planJob(job))

  const seen = new Set<string>()
  for (const spec of specs) {
    if (seen.has(spec.id)) {
      throw new ValidationError(`Duplicate job id after matrix expansion: '${spec.id}'`)
    }

    seen.add(spec.id)
  }

  return specs
}

export function planJob(job: Job): JobSpec[] {
  const {matrix} = job
  const schema = new Set(matrix ? matrixFieldSchema(matrix) : [])
  const entries: Array<MatrixEntry | undefined> = matrix
    ? withJobContext(job.id, () => expandMatrix(matrix))
    : [undefined]

  return entries.map(entry => {
    const id = entry ? `${job.id}-${slugify(entry.value)}` : job.id
    const fields: MatrixFields = entry?.fields ?? {}
    withJobContext(id, () => {
      validateJob(id, job, schema, fields)
    })

    return {
      id,
      jobId: job.id,
      name: entry ? `${job.name ?? job.id} (${entry.value})` : job.name ?? job.id,
      matrixValue: entry?.value,
      fields,
      runsOn: renderTemplate(job.runsOn, fields),
      env: resolveEnvSpec(job.env, fields),
      if: job.if,
      steps: job.steps,
      timeoutSec: job.timeoutSec
    }
  })
}

function validateJob(jobSpecId: string, job: Job, schema: Set<string>, fields: MatrixFields): void {
  const conditions: string[] = []
  const templates: string[] = [job.runsOn]

  if (job.if) {
    conditions.push(job.if)
  }

  for (const step of job.steps) {
    if (step.if) {
      conditions.push(step.if)
    }

    if (step.action.kind === 'run') {
      templates.push(step.action.command)
      if (step.action.workingDirectory) {
        templates.push(step.action.workingDirectory)
      }
    } else {
      templates.push(...Object.values(step.action.with ?? {}))
    }

    templates.push(...envTemplates(step.env))
  }

  templates.push(...envTemplates(job.env))

  for (const condition of conditions) {
    for (const field of conditionFields(condition)) {
      assertKnownField(jobSpecId, field, schema)
    }
  }

  for (const template of templates) {
    for (const field of templateFields(template)) {
      assertKnownField(jobSpecId, field, schema)
    }
  }

  for (const env of [job.env, ...job.steps.map(step => step.env)]) {
    resolveEnvSpec(env, fields)
  }
}

/** Prefixes configuration errors with the job they were found in. */
export function withJobContext<T>(jobId: string, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    if (error instanceof ConfigurationError && !(error instanceof UnknownFieldError)) {
      throw new ConfigurationError(error.code, `Job ${jobId}: ${error.message}`, {cause: error})
    }

    throw error
  }
}

function envTemplates(env: EnvSpec | undefined): string[] {
  if (env === undefined) {
    return []
  }

  return typeof env === 'string' ? [env] : Object.values(env)
}

function assertKnownField(jobSpecId: string, field: string, schema: Set<string>): void {
  if (!schema.has(field)) {
    throw new UnknownFieldError(jobSpecId, field)
  }
}
