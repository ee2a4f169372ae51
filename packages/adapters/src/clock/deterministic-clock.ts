import type { ClockPort } from '@tc-telemetry/domain';

/**
 * Fixed-step clock for repository tests: the first `now()` returns `epochMs`,
 * each later call `tickMs` after the previous one.
 */
export class DeterministicClock implements ClockPort {
  private nextMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1_000,
  ) {
    this.nextMs = epochMs;
  }

  now(): Date {
    const at = new Date(this.nextMs);
    this.nextMs += this.tickMs;
    return at;
  }
}

export const systemClock: ClockPort = {
  now: () => new Date(),
};
