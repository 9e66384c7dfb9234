// lib/pacer.ts - Fixed-interval gate in front of every upstream call

export interface Pacer {
  acquire(): Promise<void>
}

export type PacerClock = {
  now: () => number
  sleep: (ms: number) => Promise<void>
}

export function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms))
}

const systemClock: PacerClock = { now: () => Date.now(), sleep: delay }

/**
 * Allows one call per `intervalMs`. The slot is reserved before sleeping,
 * so concurrent callers queue up instead of firing together.
 */
export class FixedIntervalPacer implements Pacer {
  private nextAt = 0

  constructor(
    private readonly intervalMs: number,
    private readonly clock: PacerClock = systemClock
  ) {}

  async acquire(): Promise<void> {
    const now = this.clock.now()
    const slot = Math.max(now, this.nextAt)
    this.nextAt = slot + this.intervalMs
    const wait = slot - now
    if (wait > 0) await this.clock.sleep(wait)
  }
}

export const noPacing: Pacer = {
  acquire: async () => {},
}
