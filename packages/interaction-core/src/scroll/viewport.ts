import type { Point, Size } from "../types/geometry";

export type Viewport = {
  offset: Point;
  visibleSize: Size;
  contentSize: Size;
};

/** Valid offsets per axis. Offsets are zero or negative: content moves up/left. */
export type ScrollBounds = {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
};

export function scrollBounds(visibleSize: Size, contentSize: Size): ScrollBounds {
  return {
    minX: Math.min(0, visibleSize.width - contentSize.width),
    maxX: 0,
    minY: Math.min(0, visibleSize.height - contentSize.height),
    maxY: 0
  };
}

function clampAxis(value: number, min: number, max: number): number {
  const clamped = Math.min(max, Math.max(min, value));
  // normalise -0 so offsets compare cleanly
  return clamped === 0 ? 0 : clamped;
}

export function clampOffset(offset: Point, bounds: ScrollBounds): Point {
  return {
    x: clampAxis(offset.x, bounds.minX, bounds.maxX),
    y: clampAxis(offset.y, bounds.minY, bounds.maxY)
  };
}
