import { performance } from "node:perf_hooks";

export interface Clock {
  /** Milliseconds on a monotonic timeline. Only differences are meaningful. */
  now(): number;
}

export class MonotonicClock implements Clock {
  now(): number {
    return performance.now();
  }
}

/**
 * Hand-driven clock for deterministic tests and replays. Time only moves
 * forward: negative or non-finite steps are ignored.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(startMs = 0) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): number {
    if (Number.isFinite(ms) && ms > 0) {
      this.current += ms;
    }
    return this.current;
  }

  set(ms: number): number {
    if (Number.isFinite(ms) && ms > this.current) {
      this.current = ms;
    }
    return this.current;
  }
}
