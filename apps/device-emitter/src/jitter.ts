/** Uniform offset in [-span, span); successive calls continue one sequence. */
export type Jitter = (span: number) => number;

/**
 * mulberry32 over a 32-bit seed, scaled to a symmetric step.
 * The same seed replays the same walk.
 */
export function seededJitter(seed: number): Jitter {
  let state = seed >>> 0;
  return (span) => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const unit = ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
    return (unit * 2 - 1) * span;
  };
}
