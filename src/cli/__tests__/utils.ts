import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {createTmpDir} from '../../__tests__/helpers.js'
import {ConfigurationError, StepFailedError, ValidationError} from '../../errors.js'
import {
  collect,
  describeError,
  exitCodeFor,
  parseConcurrency,
  resolveWorkflowFile,
  splitList
} from '../utils.js'

test('splitList accepts repeated and comma-separated values', t => {
  t.deepEqual(splitList(['lint', 'test, build', ' ']), ['lint', 'test', 'build'])
  t.is(splitList(undefined), undefined)
})

test('collect appends to previous values', t => {
  t.deepEqual(collect('b', collect('a', undefined)), ['a', 'b'])
})

test('parseConcurrency accepts positive integers only', t => {
  t.is(parseConcurrency('4'), 4)
  for (const value of ['0', '-1', '1.5', 'many']) {
    const error = t.throws(() => parseConcurrency(value), {instanceOf: ConfigurationError})
    t.is(error?.message, `Invalid concurrency: "${value}" (expected a positive integer)`)
  }
})

test('exitCodeFor separates configuration errors from the rest', t => {
  t.is(exitCodeFor(new ValidationError('bad workflow')), 2)
  t.is(exitCodeFor(new StepFailedError('build', 1)), 1)
  t.is(exitCodeFor(new Error('boom')), 1)
})

test('describeError appends the error code', t => {
  t.is(describeError(new ValidationError('bad workflow')), 'bad workflow [VALIDATION_ERROR]')
  t.is(describeError(new Error('boom')), 'boom')
  t.is(describeError('plain'), 'plain')
})

test('resolveWorkflowFile returns an explicit file as is', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'custom.yml')
  await writeFile(file, 'jobs: {}\n', 'utf8')
  t.is(await resolveWorkflowFile(file), file)
})

test('resolveWorkflowFile prefers gridci.yml in a directory', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, '.github', 'workflows'), {recursive: true})
  await writeFile(join(dir, '.github', 'workflows', 'ci.yml'), 'jobs: {}\n', 'utf8')
  await writeFile(join(dir, 'gridci.yml'), 'jobs: {}\n', 'utf8')

  t.is(await resolveWorkflowFile(dir), join(dir, 'gridci.yml'))
})

test('resolveWorkflowFile falls back to the CI workflow', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, '.github', 'workflows'), {recursive: true})
  await writeFile(join(dir, '.github', 'workflows', 'ci.yml'), 'jobs: {}\n', 'utf8')

  t.is(await resolveWorkflowFile(dir), join(dir, '.github', 'workflows', 'ci.yml'))
})

test('resolveWorkflowFile fails on a directory without workflow', async t => {
  const dir = await createTmpDir()
  const error = await t.throwsAsync(resolveWorkflowFile(dir), {instanceOf: ConfigurationError})
  t.true(error?.message.startsWith(`No workflow file found in ${dir}.`))
})

test('resolveWorkflowFile fails on a missing path', async t => {
  const dir = await createTmpDir()
  const missing = join(dir, 'nope.yml')
  const error = await t.throwsAsync(resolveWorkflowFile(missing), {instanceOf: ConfigurationError})
  t.is(error?.message, `Path does not exist: ${missing}`)
})
