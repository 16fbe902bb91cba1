import {InvalidConditionError} from '../errors.js'
import type {MatrixFields, MatrixValue} from '../types.js'

export type Literal = string | number | boolean

/**
 * Parsed condition expression.
 *
 * The language is closed: a comparison of one matrix field against a literal,
 * the negation of a field, or a bare field reference tested for truthiness.
 */
export type Condition =
  | {kind: 'equals'; field: string; value: Literal}
  | {kind: 'not-equals'; field: string; value: Literal}
  | {kind: 'not'; field: string}
  | {kind: 'truthy'; field: string}

const field = String.raw`matrix\.([A-Za-z_][\w-]*)`
const comparisonPattern = new RegExp(String.raw`^${field}\s*(==|!=)\s*(.+)$`)
const negationPattern = new RegExp(String.raw`^!\s*${field}$`)
const referencePattern = new RegExp(`^${field}$`)
const numberPattern = /^-?\d+(?:\.\d+)?$/
const singleQuotedPattern = /^'((?:[^']|'')*)'$/
const doubleQuotedPattern = /^"([^"]*)"$/

/** Strips an optional `${{ ... }}` wrapper. */
export function unwrapExpression(expression: string): string {
  const trimmed = expression.trim()
  const wrapped = /^\$\{\{([\s\S]*)\}\}$/.exec(trimmed)
  return (wrapped ? wrapped[1] : trimmed).trim()
}

export function parseCondition(expression: string): Condition {
  const body = unwrapExpression(expression)
  if (body === '') {
    throw new InvalidConditionError(expression, 'expression is empty')
  }

  const negation = negationPattern.exec(body)
  if (negation) {
    return {kind: 'not', field: negation[1]}
  }

  const comparison = comparisonPattern.exec(body)
  if (comparison) {
    const [, name, operator, rawLiteral] = comparison
    const value = parseLiteral(rawLiteral.trim(), expression)
    return operator === '=='
      ? {kind: 'equals', field: name, value}
      : {kind: 'not-equals', field: name, value}
  }

  const reference = referencePattern.exec(body)
  if (reference) {
    return {kind: 'truthy', field: reference[1]}
  }

  throw new InvalidConditionError(expression, 'expected "matrix.<field>", "!matrix.<field>" or a comparison with a literal')
}

function parseLiteral(raw: string, expression: string): Literal {
  const singleQuoted = singleQuotedPattern.exec(raw)
  if (singleQuoted) {
    return singleQuoted[1].replaceAll('\'\'', '\'')
  }

  const doubleQuoted = doubleQuotedPattern.exec(raw)
  if (doubleQuoted) {
    return doubleQuoted[1]
  }

  if (raw === 'true' || raw === 'false') {
    return raw === 'true'
  }

  if (numberPattern.test(raw)) {
    return Number(raw)
  }

  throw new InvalidConditionError(expression, `unsupported literal ${raw}`)
}

/**
 * Evaluates a condition against a job's resolved fields.
 * Fields missing from the map read as the empty string.
 */
export function evaluateCondition(condition: Condition | string, fields: MatrixFields): boolean {
  const parsed = typeof condition === 'string' ? parseCondition(condition) : condition
  const actual = fields[parsed.field] ?? ''

  switch (parsed.kind) {
    case 'equals': {
      return looseEquals(actual, parsed.value)
    }

    case 'not-equals': {
      return !looseEquals(actual, parsed.value)
    }

    case 'not': {
      return !isTruthy(actual)
    }

    case 'truthy': {
      return isTruthy(actual)
    }
  }
}

/** Matrix fields a condition reads. */
export function conditionFields(condition: Condition | string): string[] {
  const parsed = typeof condition === 'string' ? parseCondition(condition) : condition
  return [parsed.field]
}

export function isTruthy(value: MatrixValue): boolean {
  return value !== '' && value !== false && value !== 0
}

function looseEquals(actual: MatrixValue, expected: Literal): boolean {
  if (typeof actual === 'object') {
    return false
  }

  if (typeof actual === typeof expected) {
    return actual === expected
  }

  return String(actual) === String(expected)
}
