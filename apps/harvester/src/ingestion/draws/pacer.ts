/**
 * Fixed-gap request pacing.
 *
 * Runs are sequential with one request in flight, so an in-process gap is
 * enough: every network call (retries included) waits until at least
 * `minDelayMs` has passed since the previous one started.
 */

export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
}

export class RequestPacer {
  private readonly minDelayMs: number
  private readonly clock: Clock
  private lastStartedAt: number | null = null

  constructor(minDelayMs: number, clock: Clock = systemClock) {
    this.minDelayMs = Math.max(0, minDelayMs)
    this.clock = clock
  }

  async acquire(): Promise<void> {
    if (this.lastStartedAt !== null) {
      const waitMs = this.lastStartedAt + this.minDelayMs - this.clock.now()
      if (waitMs > 0) {
        await this.clock.sleep(waitMs)
      }
    }
    this.lastStartedAt = this.clock.now()
  }
}
