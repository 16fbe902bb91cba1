import {DanglingOverrideError, DuplicateMatrixValueError, EmptyDimensionError} from '../errors.js'
import type {MatrixDefinition, MatrixFields} from '../types.js'

export type MatrixEntry = {
  /** Driving dimension value this entry was expanded from. */
  value: string;
  fields: MatrixFields;
}

/**
 * Every field name a matrix can resolve: the driving dimension, the declared
 * defaults and any field named by an override record, in first-seen order.
 */
export function matrixFieldSchema(definition: MatrixDefinition): string[] {
  const names = new Set<string>([definition.dimension.name])
  for (const name of Object.keys(definition.defaults ?? {})) {
    names.add(name)
  }

  for (const record of definition.include) {
    for (const name of Object.keys(record.fields)) {
      names.add(name)
    }
  }

  return [...names]
}

/**
 * Expands a matrix into one field map per driving value, in declared order.
 *
 * Resolution for each value, later layers winning:
 * 1. every schema field set to the empty string
 * 2. declared defaults
 * 3. the driving field itself
 * 4. unkeyed include entries, in declaration order
 * 5. include entries keyed to this value, in declaration order
 */
export function expandMatrix(definition: MatrixDefinition): MatrixEntry[] {
  const {dimension, include} = definition
  if (dimension.values.length === 0) {
    throw new EmptyDimensionError(dimension.name)
  }

  const declared = new Set<string>()
  for (const value of dimension.values) {
    if (declared.has(value)) {
      throw new DuplicateMatrixValueError(dimension.name, value)
    }

    declared.add(value)
  }

  for (const record of include) {
    if (record.key !== undefined && !declared.has(record.key)) {
      throw new DanglingOverrideError(dimension.name, record.key)
    }
  }

  const schema = matrixFieldSchema(definition)
  const defaultRecords = include.filter(record => record.key === undefined)

  return dimension.values.map(value => {
    const fields: MatrixFields = {}
    for (const name of schema) {
      fields[name] = ''
    }

    applyOverlay(fields, definition.defaults ?? {})
    fields[dimension.name] = value

    for (const record of defaultRecords) {
      applyOverlay(fields, record.fields)
    }

    for (const record of include) {
      if (record.key === value) {
        applyOverlay(fields, record.fields)
      }
    }

    return {value, fields}
  })
}

function applyOverlay(target: MatrixFields, overlay: MatrixFields): void {
  for (const [name, value] of Object.entries(overlay)) {
    target[name] = structuredClone(value)
  }
}
