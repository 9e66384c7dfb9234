import { describe, it } from 'node:test'
import assert from 'node:assert/strict'

import { FixedIntervalPacer, type PacerClock } from '../pacer'

function fakeClock(advanceOnSleep = true) {
  const state = { t: 0, sleeps: [] as number[] }
  const clock: PacerClock = {
    now: () => state.t,
    sleep: async (ms) => {
      state.sleeps.push(ms)
      if (advanceOnSleep) state.t += ms
    },
  }
  return { state, clock }
}

describe('FixedIntervalPacer', () => {
  it('lets the first call through immediately', async () => {
    const { state, clock } = fakeClock()
    const pacer = new FixedIntervalPacer(100, clock)
    await pacer.acquire()
    assert.deepEqual(state.sleeps, [])
  })

  it('spaces back-to-back calls by the interval', async () => {
    const { state, clock } = fakeClock()
    const pacer = new FixedIntervalPacer(100, clock)
    await pacer.acquire()
    await pacer.acquire()
    await pacer.acquire()
    assert.deepEqual(state.sleeps, [100, 100])
    assert.equal(state.t, 200)
  })

  it('does not wait when the interval already elapsed', async () => {
    const { state, clock } = fakeClock()
    const pacer = new FixedIntervalPacer(100, clock)
    await pacer.acquire()
    state.t = 1000
    await pacer.acquire()
    assert.deepEqual(state.sleeps, [])
  })

  it('queues concurrent callers one interval apart', async () => {
    const { state, clock } = fakeClock(false)
    const pacer = new FixedIntervalPacer(100, clock)
    await Promise.all([pacer.acquire(), pacer.acquire(), pacer.acquire()])
    assert.deepEqual(state.sleeps, [100, 200])
  })
})
