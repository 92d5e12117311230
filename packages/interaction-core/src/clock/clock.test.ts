import { describe, expect, it } from "vitest";

import { ManualClock, MonotonicClock } from "./clock";

describe("ManualClock", () => {
  it("advances by the given duration", () => {
    const clock = new ManualClock(100);
    expect(clock.advance(50)).toBe(150);
    expect(clock.now()).toBe(150);
  });

  it("never moves backwards", () => {
    const clock = new ManualClock(100);
    clock.advance(-20);
    clock.set(40);
    clock.advance(Number.NaN);
    expect(clock.now()).toBe(100);

    clock.set(250);
    expect(clock.now()).toBe(250);
  });
});

describe("MonotonicClock", () => {
  it("does not decrease between reads", () => {
    const clock = new MonotonicClock();
    const first = clock.now();
    const second = clock.now();
    expect(second).toBeGreaterThanOrEqual(first);
  });
});
