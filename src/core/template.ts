import {ConfigurationError} from '../errors.js'
import type {EnvSpec, MatrixFields, MatrixValue} from '../types.js'

const templatePattern = /\$\{\{\s*(.*?)\s*\}\}/g
const fieldReferencePattern = /^matrix\.([A-Za-z_][\w-]*)$/

function fieldOf(expression: string, template: string): string {
  const match = fieldReferencePattern.exec(expression)
  if (!match) {
    throw new ConfigurationError('INVALID_TEMPLATE', `Invalid expression "\${{ ${expression} }}" in "${template}": only matrix.<field> references are supported`)
  }

  return match[1]
}

/** Lists the matrix fields a template references, in order of appearance. */
export function templateFields(template: string): string[] {
  return [...template.matchAll(templatePattern)].map(match => fieldOf(match[1], template))
}

/**
 * Replaces every `${{ matrix.<field> }}` reference with the field's value.
 * Strings are inserted as-is, other scalars via String(), objects as JSON.
 */
export function renderTemplate(template: string, fields: MatrixFields): string {
  return template.replaceAll(templatePattern, (_match, expression: string) => formatValue(fields[fieldOf(expression, template)] ?? ''))
}

export function formatValue(value: MatrixValue): string {
  if (typeof value === 'string') {
    return value
  }

  if (typeof value === 'object') {
    return JSON.stringify(value)
  }

  return String(value)
}

/**
 * Returns the field name when `template` is exactly one reference
 * (e.g. "${{ matrix.custom_env }}"), undefined otherwise.
 */
export function singleFieldReference(template: string): string | undefined {
  const trimmed = template.trim()
  const fields = templateFields(trimmed)
  if (fields.length !== 1) {
    return undefined
  }

  return trimmed.replace(templatePattern, '') === '' ? fields[0] : undefined
}

/**
 * Resolves an environment overlay against a job's fields.
 *
 * A map has each value rendered. A string must reference a single map-valued
 * field, whose entries become the overlay; an unset field yields no overlay.
 */
export function resolveEnvSpec(spec: EnvSpec | undefined, fields: MatrixFields): Record<string, string> {
  if (spec === undefined) {
    return {}
  }

  if (typeof spec !== 'string') {
    return Object.fromEntries(Object.entries(spec).map(([key, value]) => [key, renderTemplate(value, fields)]))
  }

  const name = singleFieldReference(spec)
  if (name === undefined) {
    throw new ConfigurationError('INVALID_TEMPLATE', `Environment "${spec}" must be a map or a single matrix field reference`)
  }

  const value = fields[name] ?? ''
  if (value === '') {
    return {}
  }

  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigurationError('INVALID_TEMPLATE', `Environment "${spec}" must reference a map-valued field, got ${formatValue(value)}`)
  }

  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, formatValue(entry)]))
}
