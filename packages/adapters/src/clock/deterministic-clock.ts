import type { ClockPort, RandomSourcePort } from '@trackside/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Backs the emulator's random rules so a fixed seed replays the same telemetry.
 */
export class SeededRng implements RandomSourcePort {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}

/**
 * Stepping clock: each `now()` returns the next instant of `startMs`,
 * `startMs + stepMs`, ... so emulated frames and pipeline arrival times are
 * reproducible. A `stepMs` of 0 freezes time.
 */
export class DeterministicClock implements ClockPort {
  private nextMs: number;

  constructor(
    startMs: number,
    private readonly stepMs = 1_000,
  ) {
    this.nextMs = startMs;
  }

  now(): Date {
    const at = this.nextMs;
    this.nextMs += this.stepMs;
    return new Date(at);
  }
}

/** Wall-clock implementation for live mode. */
export const wallClock: ClockPort = {
  now: () => new Date(),
};
