import test from 'ava'
import {BackoffTimeoutError} from '../../errors.js'
import {errorMessage, exponentialBackoff, formatDuration, raceAbort, sleep} from '../utils.js'

test('formatDuration: picks a unit by magnitude', t => {
  t.is(formatDuration(0), '0ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(65_000), '1m 5s')
})

test('sleep: rejects with the signal reason when aborted', async t => {
  const controller = new AbortController()
  const reason = new Error('cancelled')
  setTimeout(() => {
    controller.abort(reason)
  }, 10)

  await t.throwsAsync(sleep(60_000, controller.signal), {is: reason})
})

test('sleep: rejects at once on an aborted signal', async t => {
  const reason = new Error('cancelled')
  await t.throwsAsync(sleep(60_000, AbortSignal.abort(reason)), {is: reason})
})

test('exponentialBackoff: stops as soon as the condition holds', async t => {
  let checks = 0
  await exponentialBackoff({durationMs: 1, factor: 2, steps: 10}, async () => {
    checks++
    return checks === 3
  })
  t.is(checks, 3)
})

test('exponentialBackoff: gives up after the last step', async t => {
  let checks = 0
  const error = await t.throwsAsync(exponentialBackoff({durationMs: 1, factor: 2, steps: 4}, async () => {
    checks++
    return false
  }), {instanceOf: BackoffTimeoutError})
  t.is(checks, 4)
  t.is(error?.message, 'timed out waiting for the condition')
})

test('exponentialBackoff: a condition error ends the wait', async t => {
  let checks = 0
  await t.throwsAsync(exponentialBackoff({durationMs: 1, factor: 2, steps: 10}, async () => {
    checks++
    throw new Error('forbidden')
  }), {message: 'forbidden'})
  t.is(checks, 1)
})

test('raceAbort: settles with the task', async t => {
  t.is(await raceAbort(Promise.resolve(42), new AbortController().signal), 42)
})

test('raceAbort: the abort wins over a pending task', async t => {
  const controller = new AbortController()
  const reason = new Error('cancelled')
  const pending = new Promise<number>(resolve => {
    setTimeout(() => {
      resolve(1)
    }, 200)
  })
  setTimeout(() => {
    controller.abort(reason)
  }, 10)

  await t.throwsAsync(raceAbort(pending, controller.signal), {is: reason})
})

test('errorMessage: reads errors and other values', t => {
  t.is(errorMessage(new Error('boom')), 'boom')
  t.is(errorMessage('plain'), 'plain')
})
