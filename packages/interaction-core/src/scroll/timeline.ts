import type { FlickableConfig } from "../gesture/config";
import type { Point } from "../types/geometry";

export type Easing = (t: number) => number;

export const easeOutCubic: Easing = (t) => 1 - Math.pow(1 - t, 3);

export type AnimationTimeline = {
  startOffset: Point;
  targetOffset: Point;
  startTimeMs: number;
  durationMs: number;
  easing: Easing;
};

export type TimelineSample = {
  offset: Point;
  done: boolean;
};

function lerp(from: number, to: number, progress: number): number {
  return from + (to - from) * progress;
}

export function sampleTimeline(timeline: AnimationTimeline, nowMs: number): TimelineSample {
  const elapsed = nowMs - timeline.startTimeMs;
  if (elapsed >= timeline.durationMs) {
    return { offset: timeline.targetOffset, done: true };
  }
  if (elapsed <= 0) {
    return { offset: timeline.startOffset, done: false };
  }

  const progress = timeline.easing(elapsed / timeline.durationMs);
  return {
    offset: {
      x: lerp(timeline.startOffset.x, timeline.targetOffset.x, progress),
      y: lerp(timeline.startOffset.y, timeline.targetOffset.y, progress)
    },
    done: false
  };
}

function travelAxis(velocity: number, scale: number, cap: number): number {
  const travel = velocity * scale;
  return Math.max(-cap, Math.min(cap, travel));
}

/** Distance a release at `velocity` (px/ms) carries the content, capped per axis. */
export function flickTravel(
  velocity: Point,
  config: Pick<FlickableConfig, "flickVelocityScale" | "maxFlickDistance">
): Point {
  return {
    x: travelAxis(velocity.x, config.flickVelocityScale, config.maxFlickDistance),
    y: travelAxis(velocity.y, config.flickVelocityScale, config.maxFlickDistance)
  };
}
