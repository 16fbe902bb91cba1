import test from 'ava'
import {DanglingOverrideError, DuplicateMatrixValueError, EmptyDimensionError} from '../../errors.js'
import type {MatrixDefinition, OverrideRecord} from '../../types.js'
import {expandMatrix, matrixFieldSchema} from '../matrix.js'

function matrix(values: string[], include: OverrideRecord[], defaults?: MatrixDefinition['defaults']): MatrixDefinition {
  return {dimension: {name: 'thing', values}, include, defaults}
}

test('keyed override wins over the default for its value only', t => {
  const entries = expandMatrix(matrix(['A', 'B', 'C'], [
    {fields: {build_only: false}},
    {key: 'B', fields: {build_only: true}}
  ]))

  t.deepEqual(entries.map(entry => entry.value), ['A', 'B', 'C'])
  t.deepEqual(entries.map(entry => entry.fields.build_only), [false, true, false])
})

test('a value without keyed override gets exactly the default fields', t => {
  const entries = expandMatrix(matrix(['A', 'B'], [
    {fields: {apt_packages: '', build_only: false}},
    {key: 'A', fields: {apt_packages: 'gcc-multilib', target: 'i686-unknown-linux-gnu'}}
  ]))

  t.deepEqual(entries[1].fields, {thing: 'B', apt_packages: '', build_only: false, target: ''})
})

test('a default field absent from the keyed override keeps its default', t => {
  const entries = expandMatrix(matrix(['A'], [
    {fields: {apt_packages: '', build_only: false}},
    {key: 'A', fields: {apt_packages: 'gcc-multilib'}}
  ]))

  t.deepEqual(entries[0].fields, {thing: 'A', apt_packages: 'gcc-multilib', build_only: false})
})

test('keyed overrides apply after defaults whatever their declaration order', t => {
  const keyedFirst = expandMatrix(matrix(['A', 'B'], [
    {key: 'A', fields: {build_only: true}},
    {fields: {build_only: false}}
  ]))
  const defaultsFirst = expandMatrix(matrix(['A', 'B'], [
    {fields: {build_only: false}},
    {key: 'A', fields: {build_only: true}}
  ]))

  t.deepEqual(keyedFirst, defaultsFirst)
  t.deepEqual(keyedFirst.map(entry => entry.value), ['A', 'B'])
})

test('later records of the same kind win', t => {
  const entries = expandMatrix(matrix(['A'], [
    {fields: {rust: 'stable'}},
    {fields: {rust: 'beta'}},
    {key: 'A', fields: {os: 'ubuntu-latest'}},
    {key: 'A', fields: {os: 'ubuntu-22.04'}}
  ]))

  t.is(entries[0].fields.rust, 'beta')
  t.is(entries[0].fields.os, 'ubuntu-22.04')
})

test('declared defaults sit underneath every include entry', t => {
  const entries = expandMatrix(matrix(['A', 'B'], [
    {key: 'B', fields: {rust: 'nightly'}}
  ], {rust: 'stable', os: 'ubuntu-latest'}))

  t.deepEqual(entries[0].fields, {thing: 'A', rust: 'stable', os: 'ubuntu-latest'})
  t.deepEqual(entries[1].fields, {thing: 'B', rust: 'nightly', os: 'ubuntu-latest'})
})

test('fields never set for a value resolve to empty string', t => {
  const entries = expandMatrix(matrix(['A', 'B'], [
    {key: 'A', fields: {target: 'i686-unknown-linux-gnu'}}
  ]))

  t.is(entries[1].fields.target, '')
})

test('map values are copied, not shared between jobs', t => {
  const entries = expandMatrix(matrix(['A', 'B'], [
    {fields: {custom_env: {}}}
  ]))

  t.deepEqual(entries[0].fields.custom_env, {})
  t.not(entries[0].fields.custom_env, entries[1].fields.custom_env)
})

test('matrixFieldSchema lists the dimension first, then fields in first-seen order', t => {
  t.deepEqual(matrixFieldSchema(matrix(['A'], [
    {fields: {apt_packages: ''}},
    {key: 'A', fields: {target: 'x', apt_packages: 'y'}}
  ], {rust: 'stable'})), ['thing', 'rust', 'apt_packages', 'target'])
})

// -- errors ------------------------------------------------------------------

test('empty dimension is rejected', t => {
  t.throws(() => expandMatrix(matrix([], [])), {instanceOf: EmptyDimensionError})
})

test('keyed override matching no value is rejected', t => {
  const error = t.throws(() => expandMatrix(matrix(['A'], [{key: 'Z', fields: {}}])), {instanceOf: DanglingOverrideError})
  t.is(error?.key, 'Z')
})

test('duplicate dimension value is rejected', t => {
  t.throws(() => expandMatrix(matrix(['A', 'A'], [])), {instanceOf: DuplicateMatrixValueError})
})
