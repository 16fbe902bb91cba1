import {dirname, join} from 'node:path'
import {fileURLToPath} from 'node:url'
import test from 'ava'
import {stringify as yamlStringify} from 'yaml'
import {ConfigurationError, InvalidConditionError, UnknownFieldError, ValidationError} from '../../errors.js'
import {planWorkflow} from '../planner.js'
import {WorkflowLoader} from '../workflow-loader.js'

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), 'fixtures')
const loader = new WorkflowLoader()

function parse(definition: Record<string, unknown>) {
  return loader.parse(yamlStringify(definition), '/repo/gridci.yml')
}

function matrixJob(job: Record<string, unknown>) {
  return parse({
    jobs: {
      build: {
        'runs-on': 'ubuntu-latest',
        strategy: {matrix: {target: ['a', 'b']}},
        steps: [{run: 'echo ok'}],
        ...job
      }
    }
  })
}

// -- CI fixture --------------------------------------------------------------

test('expands the CI fixture into one lint job and one job per matrix value', async t => {
  const specs = planWorkflow(await loader.load(join(fixturesDir, 'ci.yml')))

  t.deepEqual(specs.map(spec => spec.id), ['lint', 'test-i686-linux', 'test-aarch64-linux', 'test-arm64-macos'])
  t.deepEqual(specs.map(spec => spec.name), ['Lint', 'Test (i686-linux)', 'Test (aarch64-linux)', 'Test (arm64-macos)'])
  t.deepEqual(specs.map(spec => spec.runsOn), ['ubuntu-latest', 'ubuntu-latest', 'ubuntu-latest', 'macos-latest'])
  t.deepEqual(specs.map(spec => spec.matrixValue), [undefined, 'i686-linux', 'aarch64-linux', 'arm64-macos'])
})

test('resolves every field of a matrix job', async t => {
  const specs = planWorkflow(await loader.load(join(fixturesDir, 'ci.yml')))

  t.deepEqual(specs[2].fields, {
    thing: 'aarch64-linux',
    apt_packages: 'crossbuild-essential-arm64',
    custom_env: {CC: 'aarch64-linux-gnu-gcc'},
    build_only: true,
    target: 'aarch64-unknown-linux-gnu',
    rust: 'stable',
    os: 'ubuntu-latest'
  })
  t.deepEqual(specs[3].fields, {
    thing: 'arm64-macos',
    apt_packages: '',
    custom_env: {},
    build_only: false,
    target: 'aarch64-apple-darwin',
    rust: 'beta',
    os: 'macos-latest'
  })
})

test('a job without matrix has no fields', async t => {
  const [lint] = planWorkflow(await loader.load(join(fixturesDir, 'ci.yml')))
  t.deepEqual(lint.fields, {})
  t.is(lint.jobId, 'lint')
  t.deepEqual(lint.env, {})
})

test('build-only policy: keyed override wins for its value only', t => {
  const specs = planWorkflow(parse({
    jobs: {
      test: {
        'runs-on': 'ubuntu-latest',
        strategy: {matrix: {thing: ['A', 'B', 'C'], include: [{build_only: false}, {thing: 'B', build_only: true}]}},
        steps: [{name: 'Run tests', if: '!matrix.build_only', run: 'make test'}]
      }
    }
  }))

  t.deepEqual(specs.map(spec => [spec.id, spec.fields.build_only]), [['test-a', false], ['test-b', true], ['test-c', false]])
})

test('renders job env against the job fields', t => {
  const specs = planWorkflow(matrixJob({env: {TARGET: '${{ matrix.target }}'}}))
  t.deepEqual(specs.map(spec => spec.env), [{TARGET: 'a'}, {TARGET: 'b'}])
})

test('keeps the job condition and timeout on every spec', t => {
  const specs = planWorkflow(matrixJob({if: 'matrix.target == \'b\'', 'timeout-minutes': 2}))
  t.deepEqual(specs.map(spec => [spec.if, spec.timeoutSec]), [['matrix.target == \'b\'', 120], ['matrix.target == \'b\'', 120]])
})

// -- configuration errors ----------------------------------------------------

test('a condition on an unknown field names the job and the field', t => {
  const error = t.throws(() => planWorkflow(matrixJob({steps: [{if: 'matrix.targt == \'a\'', run: 'echo ok'}]})), {instanceOf: UnknownFieldError})
  t.is(error?.message, 'Job build-a: expression references unknown field "matrix.targt"')
})

test('a template on an unknown field is rejected', t => {
  const error = t.throws(() => planWorkflow(matrixJob({steps: [{run: 'echo ${{ matrix.nope }}'}]})), {instanceOf: UnknownFieldError})
  t.is(error?.field, 'nope')
})

test('a job without matrix cannot reference matrix fields', t => {
  const error = t.throws(() => planWorkflow(parse({
    jobs: {build: {'runs-on': '${{ matrix.os }}', steps: [{run: 'echo ok'}]}}
  })), {instanceOf: UnknownFieldError})
  t.is(error?.message, 'Job build: expression references unknown field "matrix.os"')
})

test('a condition syntax error is reported with the job id', t => {
  const error = t.throws(() => planWorkflow(matrixJob({steps: [{if: 'matrix.target ~ 1', run: 'echo ok'}]})), {instanceOf: ConfigurationError})
  t.is(error?.code, 'INVALID_CONDITION')
  t.true(error?.message.startsWith('Job build-a: Invalid condition "matrix.target ~ 1"'))
})

test('a compound condition fails planning', t => {
  const error = t.throws(() => planWorkflow(matrixJob({steps: [{if: 'matrix.target == \'a\' || matrix.nope == \'b\'', run: 'echo ok'}]})), {instanceOf: ConfigurationError})
  t.is(error?.code, 'INVALID_CONDITION')
  t.true(error?.cause instanceof InvalidConditionError)
})

test('a dangling include entry is reported with the job id', t => {
  const error = t.throws(() => planWorkflow(parse({
    jobs: {
      build: {
        'runs-on': 'ubuntu-latest',
        strategy: {matrix: {target: ['a'], include: [{target: 'z', rust: 'beta'}]}},
        steps: [{run: 'echo ok'}]
      }
    }
  })), {instanceOf: ConfigurationError})
  t.is(error?.code, 'DANGLING_OVERRIDE')
  t.is(error?.message, 'Job build: Matrix include entry targets target "z", which is not a declared value')
})

test('an env reference to a scalar field is rejected', t => {
  const error = t.throws(() => planWorkflow(matrixJob({steps: [{run: 'echo ok', env: '${{ matrix.target }}'}]})), {instanceOf: ConfigurationError})
  t.is(error?.code, 'INVALID_TEMPLATE')
})

test('matrix values that slugify to the same id are rejected', t => {
  t.throws(() => planWorkflow(parse({
    jobs: {
      build: {'runs-on': 'ubuntu-latest', strategy: {matrix: {target: ['a b', 'a-b']}}, steps: [{run: 'echo ok'}]}
    }
  })), {instanceOf: ValidationError})
})
