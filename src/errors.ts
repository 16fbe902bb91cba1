export class GridError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'GridError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Configuration errors ----------------------------------------------------

/**
 * Authoring mistake in the workflow definition.
 * Always raised before any job executes and halts the whole run.
 */
export class ConfigurationError extends GridError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigurationError'
  }
}

export class ValidationError extends ConfigurationError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class EmptyDimensionError extends ConfigurationError {
  constructor(readonly dimension: string, options?: {cause?: unknown}) {
    super('EMPTY_DIMENSION', `Matrix dimension "${dimension}" has no values`, options)
    this.name = 'EmptyDimensionError'
  }
}

export class DanglingOverrideError extends ConfigurationError {
  constructor(readonly dimension: string, readonly key: string, options?: {cause?: unknown}) {
    super('DANGLING_OVERRIDE', `Matrix include entry targets ${dimension} "${key}", which is not a declared value`, options)
    this.name = 'DanglingOverrideError'
  }
}

export class DuplicateMatrixValueError extends ConfigurationError {
  constructor(readonly dimension: string, readonly value: string, options?: {cause?: unknown}) {
    super('DUPLICATE_MATRIX_VALUE', `Matrix dimension "${dimension}" lists "${value}" more than once`, options)
    this.name = 'DuplicateMatrixValueError'
  }
}

export class UnknownFieldError extends ConfigurationError {
  constructor(readonly jobId: string, readonly field: string, options?: {cause?: unknown}) {
    super('UNKNOWN_FIELD', `Job ${jobId}: expression references unknown field "matrix.${field}"`, options)
    this.name = 'UnknownFieldError'
  }
}

export class InvalidConditionError extends ConfigurationError {
  constructor(readonly expression: string, reason: string, options?: {cause?: unknown}) {
    super('INVALID_CONDITION', `Invalid condition "${expression}": ${reason}`, options)
    this.name = 'InvalidConditionError'
  }
}

export class UnknownActionError extends ConfigurationError {
  constructor(readonly action: string, available: string[], options?: {cause?: unknown}) {
    super('UNKNOWN_ACTION', `Unknown action: "${action}". Available actions: ${available.join(', ')}`, options)
    this.name = 'UnknownActionError'
  }
}

export class MissingInputError extends ConfigurationError {
  constructor(readonly action: string, readonly input: string, options?: {cause?: unknown}) {
    super('MISSING_INPUT', `Action "${action}": "${input}" input is required`, options)
    this.name = 'MissingInputError'
  }
}

// -- Execution errors --------------------------------------------------------

export class ExecutionError extends GridError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ExecutionError'
  }
}

export class CommandNotAvailableError extends ExecutionError {
  constructor(readonly command: string, options?: {cause?: unknown}) {
    super('COMMAND_NOT_AVAILABLE', `Command "${command}" is not available on this host`, options)
    this.name = 'CommandNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

/**
 * An invoked step reported a non-zero or abnormal outcome.
 * Fails the enclosing job only; sibling jobs keep running.
 */
export class StepFailedError extends ExecutionError {
  constructor(
    readonly stepId: string,
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('STEP_FAILED', `Step ${stepId} failed with exit code ${exitCode}`, options)
    this.name = 'StepFailedError'
  }
}
