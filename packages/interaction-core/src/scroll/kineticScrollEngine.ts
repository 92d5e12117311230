import { Emitter } from "../core/emitter";
import { consoleLogger, createTaggedLogger, type Logger } from "../core/logger";
import type { FlickableConfig } from "../gesture/config";
import { addPoints, pointsEqual, type Point, type Size } from "../types/geometry";

import {
  easeOutCubic,
  flickTravel,
  sampleTimeline,
  type AnimationTimeline
} from "./timeline";
import { clampOffset, scrollBounds, type ScrollBounds, type Viewport } from "./viewport";

export type FlickStep = "idle" | "running" | "finished";

export type KineticScrollEngineOptions = {
  visibleSize: Size;
  contentSize: Size;
  config: FlickableConfig;
  logger?: Logger;
  /** Called after every offset change, for render invalidation. */
  onOffsetChanged?: () => void;
};

/**
 * Owns the viewport offset. Drag steps and wheel deltas are applied at once;
 * a release starts an ease-out timeline that only moves when `tick` samples it.
 */
export class KineticScrollEngine {
  /** Fires with the new offset after each step that actually moved it. */
  readonly flicked: Emitter<Point>;

  private offset: Point = { x: 0, y: 0 };
  private visibleSize: Size;
  private contentSize: Size;
  private bounds: ScrollBounds;
  private timeline: AnimationTimeline | undefined;
  private readonly config: FlickableConfig;
  private readonly logger: Logger;
  private readonly onOffsetChanged: (() => void) | undefined;

  constructor(options: KineticScrollEngineOptions) {
    this.config = options.config;
    this.visibleSize = { ...options.visibleSize };
    this.contentSize = { ...options.contentSize };
    this.bounds = scrollBounds(this.visibleSize, this.contentSize);
    const base = options.logger ?? consoleLogger;
    this.logger = createTaggedLogger("KineticScrollEngine", base, options.config.debug);
    this.flicked = new Emitter<Point>("flicked", base);
    this.onOffsetChanged = options.onOffsetChanged;
  }

  get currentOffset(): Point {
    return { ...this.offset };
  }

  get viewport(): Viewport {
    return {
      offset: { ...this.offset },
      visibleSize: { ...this.visibleSize },
      contentSize: { ...this.contentSize }
    };
  }

  get scrollBounds(): ScrollBounds {
    return { ...this.bounds };
  }

  get activeTimeline(): AnimationTimeline | undefined {
    return this.timeline;
  }

  get animating(): boolean {
    return this.timeline !== undefined;
  }

  setGeometry(visibleSize: Size, contentSize: Size): void {
    this.visibleSize = { ...visibleSize };
    this.contentSize = { ...contentSize };
    this.bounds = scrollBounds(this.visibleSize, this.contentSize);
    this.stop();
    this.apply(this.offset);
  }

  /** Programmatic scroll. Cancels any running flick. */
  setOffset(offset: Point): boolean {
    this.stop();
    return this.apply(offset);
  }

  /** Positions the content exactly at `offset` (clamped); used for 1:1 drag tracking. */
  dragTo(offset: Point): boolean {
    this.stop();
    return this.apply(offset);
  }

  /** Wheel input. Shift exchanges the horizontal and vertical roles of the delta. */
  scrollBy(deltaX: number, deltaY: number, shift: boolean): boolean {
    this.stop();
    const delta = shift ? { x: deltaY, y: deltaX } : { x: deltaX, y: deltaY };
    return this.apply(addPoints(this.offset, delta));
  }

  /**
   * Starts the deceleration after a release. Returns false when there is
   * nothing to animate: no velocity, or the content already sits at the
   * clamped target.
   */
  startFlick(velocity: Point, nowMs: number): boolean {
    this.stop();
    const target = clampOffset(addPoints(this.offset, flickTravel(velocity, this.config)), this.bounds);
    if (pointsEqual(target, this.offset)) {
      return false;
    }

    this.timeline = {
      startOffset: { ...this.offset },
      targetOffset: target,
      startTimeMs: nowMs,
      durationMs: this.config.flickDurationMs,
      easing: easeOutCubic
    };
    this.logger.debug("flick started", { velocity, target });
    return true;
  }

  /** Samples the running flick at `nowMs`. */
  tick(nowMs: number): FlickStep {
    const timeline = this.timeline;
    if (!timeline) {
      return "idle";
    }

    const sample = sampleTimeline(timeline, nowMs);
    if (sample.done) {
      this.timeline = undefined;
      this.logger.debug("flick finished", sample.offset);
    }
    this.apply(sample.offset);
    return sample.done ? "finished" : "running";
  }

  /** Drops the running flick; the offset stays at its last sampled value. */
  stop(): void {
    if (this.timeline) {
      this.logger.debug("flick stopped", this.offset);
      this.timeline = undefined;
    }
  }

  private apply(next: Point): boolean {
    const clamped = clampOffset(next, this.bounds);
    if (pointsEqual(clamped, this.offset)) {
      return false;
    }
    this.offset = clamped;
    this.onOffsetChanged?.();
    this.flicked.emit({ ...clamped });
    return true;
  }
}
