import type { Clock } from '../../src/lib/clock'

export interface FakeClock extends Clock {
  /** Every sleep requested, in order. */
  sleeps: number[]
  advance(ms: number): void
}

/** Manual clock: sleep() resolves at once and moves time forward by the requested amount. */
export function createFakeClock(start = Date.parse('2025-03-10T00:00:00Z')): FakeClock {
  let now = start
  const sleeps: number[] = []
  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms)
      now += Math.max(0, ms)
    },
    advance: (ms: number) => {
      now += ms
    },
  }
}
