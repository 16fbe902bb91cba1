import {readFile} from 'node:fs/promises'
import {basename, dirname, extname, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import type {
  EnvSpec,
  Job,
  JobDefinition,
  MatrixBlockDefinition,
  MatrixDefinition,
  MatrixValue,
  OverrideRecord,
  ShellName,
  Step,
  StepAction,
  StepDefinition,
  Workflow
} from '../types.js'
import {slugify} from './utils.js'

const shells = new Set<string>(['bash', 'sh', 'pwsh'])

export class WorkflowLoader {
  async load(filePath: string): Promise<Workflow> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): Workflow {
    const input = parseWorkflowFile(content, filePath)
    if (!isRecord(input)) {
      throw new ValidationError('Invalid workflow: expected a mapping at the top level')
    }

    const name = optionalString(input.name, 'workflow name')
    const id = slugify(name ?? basename(filePath, extname(filePath)))

    if (!isRecord(input.jobs) || Object.keys(input.jobs).length === 0) {
      throw new ValidationError('Invalid workflow: jobs must be a non-empty mapping')
    }

    const jobs = Object.entries(input.jobs).map(([jobId, definition]) => this.resolveJob(jobId, definition))

    return {
      id,
      name,
      env: input.env === undefined ? undefined : stringMap(input.env, 'workflow env'),
      jobs,
      root: dirname(resolve(filePath))
    }
  }

  private resolveJob(jobId: string, definition: unknown): Job {
    this.validateIdentifier(jobId, 'job id')
    if (!isRecord(definition)) {
      throw new ValidationError(`Invalid job ${jobId}: expected a mapping`)
    }

    const job = definition as JobDefinition
    const runsOn = job['runs-on']
    if (typeof runsOn !== 'string' || runsOn === '') {
      throw new ValidationError(`Invalid job ${jobId}: runs-on is required`)
    }

    if (!Array.isArray(job.steps) || job.steps.length === 0) {
      throw new ValidationError(`Invalid job ${jobId}: steps must be a non-empty array`)
    }

    const steps = job.steps.map((step, index) => this.resolveStep(jobId, step, index))
    this.validateUniqueStepIds(jobId, steps)

    const matrixBlock = isRecord(job.strategy) ? job.strategy.matrix : undefined

    return {
      id: jobId,
      name: optionalString(job.name, `name of job ${jobId}`),
      runsOn,
      if: optionalString(job.if, `condition of job ${jobId}`),
      env: envSpec(job.env, `env of job ${jobId}`),
      matrix: matrixBlock === undefined ? undefined : this.resolveMatrix(jobId, matrixBlock),
      steps,
      timeoutSec: timeoutSec(job['timeout-minutes'], `job ${jobId}`)
    }
  }

  private resolveMatrix(jobId: string, block: unknown): MatrixDefinition {
    if (!isRecord(block)) {
      throw new ValidationError(`Invalid job ${jobId}: strategy.matrix must be a mapping`)
    }

    const matrix = block as MatrixBlockDefinition
    if ('exclude' in matrix) {
      throw new ValidationError(`Invalid job ${jobId}: matrix exclude entries are not supported`)
    }

    const dimensions = Object.keys(matrix).filter(key => key !== 'include')
    if (dimensions.length !== 1) {
      throw new ValidationError(`Invalid job ${jobId}: matrix must declare exactly one dimension besides include, found ${dimensions.length}`)
    }

    const [name] = dimensions
    const values = matrix[name]
    if (!Array.isArray(values)) {
      throw new ValidationError(`Invalid job ${jobId}: matrix dimension "${name}" must be an array`)
    }

    const include = matrix.include ?? []
    if (!Array.isArray(include)) {
      throw new ValidationError(`Invalid job ${jobId}: matrix include must be an array`)
    }

    return {
      dimension: {
        name,
        values: values.map(value => scalar(value, `value of matrix dimension "${name}" in job ${jobId}`))
      },
      include: include.map((entry, index) => this.resolveOverride(jobId, name, entry, index))
    }
  }

  private resolveOverride(jobId: string, dimension: string, entry: unknown, index: number): OverrideRecord {
    if (!isRecord(entry)) {
      throw new ValidationError(`Invalid job ${jobId}: matrix include entry #${index + 1} must be a mapping`)
    }

    const fields: Record<string, MatrixValue> = {}
    let key: string | undefined
    for (const [field, value] of Object.entries(entry)) {
      if (field === dimension) {
        key = scalar(value, `include entry #${index + 1} of job ${jobId}`)
        continue
      }

      fields[field] = matrixValue(value, `matrix.${field} in job ${jobId}`)
    }

    return key === undefined ? {fields} : {key, fields}
  }

  private resolveStep(jobId: string, definition: unknown, index: number): Step {
    if (!isRecord(definition)) {
      throw new ValidationError(`Invalid step #${index + 1} in job ${jobId}: expected a mapping`)
    }

    const step = definition as StepDefinition
    const hasRun = typeof step.run === 'string'
    const hasUses = typeof step.uses === 'string'
    if (hasRun === hasUses) {
      throw new ValidationError(`Invalid step #${index + 1} in job ${jobId}: exactly one of "run" or "uses" must be defined`)
    }

    const action = this.resolveAction(jobId, step, index)
    const name = optionalString(step.name, `name of step #${index + 1} in job ${jobId}`)
    const id = optionalString(step.id, `id of step #${index + 1} in job ${jobId}`)
      ?? (slugify(name ?? '') || (action.kind === 'uses' ? slugify(action.action) : '') || `step-${index + 1}`)

    this.validateIdentifier(id, `step id in job ${jobId}`)

    if (step['continue-on-error'] !== undefined && typeof step['continue-on-error'] !== 'boolean') {
      throw new ValidationError(`Invalid step ${id} in job ${jobId}: continue-on-error must be a boolean`)
    }

    return {
      id,
      name,
      if: optionalString(step.if, `condition of step ${id} in job ${jobId}`),
      action,
      env: envSpec(step.env, `env of step ${id} in job ${jobId}`),
      allowFailure: step['continue-on-error'],
      timeoutSec: timeoutSec(step['timeout-minutes'], `step ${id} in job ${jobId}`)
    }
  }

  private resolveAction(jobId: string, step: StepDefinition, index: number): StepAction {
    if (typeof step.uses === 'string') {
      return {
        kind: 'uses',
        action: normalizeActionName(step.uses),
        ref: step.uses,
        with: step.with === undefined ? undefined : stringMap(step.with, `with of step #${index + 1} in job ${jobId}`)
      }
    }

    let shell: ShellName | undefined
    if (step.shell !== undefined) {
      if (!isShellName(step.shell)) {
        throw new ValidationError(`Invalid step #${index + 1} in job ${jobId}: shell must be one of ${[...shells].join(', ')}`)
      }

      shell = step.shell
    }

    return {
      kind: 'run',
      command: step.run ?? '',
      shell,
      workingDirectory: optionalString(step['working-directory'], `working-directory of step #${index + 1} in job ${jobId}`)
    }
  }

  private validateIdentifier(id: string, context: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new ValidationError(`Invalid ${context}: '${id}' must contain only alphanumeric characters, underscore, and hyphen`)
    }
  }

  private validateUniqueStepIds(jobId: string, steps: Step[]): void {
    const seen = new Set<string>()
    for (const step of steps) {
      if (seen.has(step.id)) {
        throw new ValidationError(`Duplicate step id in job ${jobId}: '${step.id}'`)
      }

      seen.add(step.id)
    }
  }
}

export function parseWorkflowFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}

/** "actions/checkout@v2" → "checkout" */
export function normalizeActionName(ref: string): string {
  const withoutVersion = ref.split('@')[0]
  const segments = withoutVersion.split('/')
  return segments.at(-1) ?? withoutVersion
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isShellName(value: unknown): value is ShellName {
  return typeof value === 'string' && shells.has(value)
}

function optionalString(value: unknown, context: string): string | undefined {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid ${context}: expected a string`)
  }

  return value
}

function scalar(value: unknown, context: string): string {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }

  throw new ValidationError(`Invalid ${context}: expected a string, number or boolean`)
}

function matrixValue(value: unknown, context: string): MatrixValue {
  if (value === null || value === undefined) {
    return ''
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => matrixValue(item, `${context}[${index}]`))
  }

  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, matrixValue(item, `${context}.${key}`)]))
  }

  throw new ValidationError(`Invalid ${context}: unsupported value`)
}

function stringMap(value: unknown, context: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ValidationError(`Invalid ${context}: expected a mapping`)
  }

  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, scalar(item, `${context}.${key}`)]))
}

function envSpec(value: unknown, context: string): EnvSpec | undefined {
  if (value === undefined || typeof value === 'string') {
    return value
  }

  return stringMap(value, context)
}

function timeoutSec(minutes: unknown, context: string): number | undefined {
  if (minutes === undefined) {
    return undefined
  }

  if (typeof minutes !== 'number' || !Number.isFinite(minutes) || minutes <= 0) {
    throw new ValidationError(`Invalid timeout-minutes for ${context}: expected a positive number`)
  }

  return minutes * 60
}
