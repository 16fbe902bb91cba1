import {setTimeout} from 'node:timers/promises'
import test from 'ava'
import {formatDuration, slugify, withConcurrency} from '../utils.js'

test('slugify lowercases and dashes free-form names', t => {
  t.is(slugify('Install toolchain'), 'install-toolchain')
  t.is(slugify('i686-linux'), 'i686-linux')
  t.is(slugify('Build (release)'), 'build-release')
})

test('slugify strips accents and collapses separators', t => {
  t.is(slugify('Vérifier  le   code'), 'verifier-le-code')
  t.is(slugify('--x86 / 64--'), 'x86-64')
})

test('formatDuration picks a unit by magnitude', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('withConcurrency keeps task order in results', async t => {
  const results = await withConcurrency([
    async () => {
      await setTimeout(20)
      return 'a'
    },
    async () => 'b',
    async () => {
      throw new Error('c failed')
    }
  ], 3)

  t.deepEqual(results.map(result => result.status), ['fulfilled', 'fulfilled', 'rejected'])
  t.deepEqual(results.flatMap(result => result.status === 'fulfilled' ? [result.value] : []), ['a', 'b'])
})

test('withConcurrency never exceeds the limit', async t => {
  let inFlight = 0
  let maxInFlight = 0
  const task = async () => {
    inFlight++
    maxInFlight = Math.max(maxInFlight, inFlight)
    await setTimeout(10)
    inFlight--
  }

  await withConcurrency(Array.from({length: 6}, () => task), 3)

  t.is(maxInFlight, 3)
})

test('withConcurrency handles an empty task list', async t => {
  t.deepEqual(await withConcurrency([], 4), [])
})
