import { MonotonicClock, type Clock } from "./clock/clock";
import type { Emitter } from "./core/emitter";
import { consoleLogger, createTaggedLogger, type Logger } from "./core/logger";
import { resolveFlickableConfig, type FlickableConfig } from "./gesture/config";
import { GestureArbiter } from "./gesture/gestureArbiter";
import type { GestureState } from "./gesture/types";
import { InteractiveRegion, type RegionOptions } from "./region/interactiveRegion";
import { PointerEventRouter } from "./routing/pointerEventRouter";
import { KineticScrollEngine } from "./scroll/kineticScrollEngine";
import type { Viewport } from "./scroll/viewport";
import type { Point, Size } from "./types/geometry";
import type { PointerInputDTO } from "./types/pointer";

/** Fire-and-forget request for the host to repaint. */
export type RenderInvalidator = () => void;

export type FlickableOptions = {
  visibleSize: Size;
  contentSize: Size;
  config?: Partial<FlickableConfig>;
  clock?: Clock;
  logger?: Logger;
  invalidate?: RenderInvalidator;
  interactive?: boolean;
};

/**
 * A scrollable viewport with tap-sensitive regions in its content. Everything
 * runs synchronously on the caller's thread: `dispatch` for input, `tick`
 * once per frame to advance long presses and flicks against the clock.
 */
export class Flickable {
  readonly clock: Clock;
  readonly config: FlickableConfig;
  readonly flicked: Emitter<Point>;

  private readonly engine: KineticScrollEngine;
  private readonly arbiter: GestureArbiter;
  private readonly router: PointerEventRouter;
  private readonly logger: Logger;
  private readonly baseLogger: Logger;
  private readonly invalidate: RenderInvalidator;
  private nextRegionId = 1;

  constructor(options: FlickableOptions) {
    this.config = resolveFlickableConfig(options.config);
    this.clock = options.clock ?? new MonotonicClock();
    this.baseLogger = options.logger ?? consoleLogger;
    this.logger = createTaggedLogger("Flickable", this.baseLogger, this.config.debug);
    const invalidate = options.invalidate;
    this.invalidate = () => invalidate?.();

    this.engine = new KineticScrollEngine({
      visibleSize: options.visibleSize,
      contentSize: options.contentSize,
      config: this.config,
      logger: this.baseLogger,
      onOffsetChanged: this.invalidate
    });
    this.flicked = this.engine.flicked;

    this.arbiter = new GestureArbiter({
      engine: this.engine,
      config: this.config,
      logger: this.baseLogger
    });
    this.arbiter.interactive = options.interactive ?? true;

    this.router = new PointerEventRouter({
      clock: this.clock,
      arbiter: this.arbiter,
      engine: this.engine,
      logger: this.baseLogger,
      debug: this.config.debug
    });
  }

  get viewportX(): number {
    return this.engine.currentOffset.x;
  }

  get viewportY(): number {
    return this.engine.currentOffset.y;
  }

  get viewport(): Viewport {
    return this.engine.viewport;
  }

  get gestureState(): GestureState {
    return this.arbiter.state;
  }

  get animating(): boolean {
    return this.engine.animating;
  }

  get interactive(): boolean {
    return this.arbiter.interactive;
  }

  set interactive(value: boolean) {
    this.arbiter.interactive = value;
  }

  get regions(): readonly InteractiveRegion[] {
    return this.router.regions;
  }

  dispatch(input: PointerInputDTO): boolean {
    return this.router.dispatch(input);
  }

  tick(): void {
    this.arbiter.tick(this.clock.now());
  }

  /** Adds a region to the content, or inside `parent` when given. */
  addRegion(options: RegionOptions, parent?: InteractiveRegion): InteractiveRegion {
    const region = new InteractiveRegion(options, {
      id: options.id ?? `region-${this.nextRegionId++}`,
      clickConfig: this.config,
      logger: this.baseLogger,
      invalidate: this.invalidate
    });
    if (parent) {
      parent.addChild(region);
    } else {
      this.router.addRoot(region);
    }
    this.invalidate();
    return region;
  }

  removeRegion(region: InteractiveRegion): boolean {
    const removed = region.parent ? region.parent.removeChild(region) : this.router.removeRoot(region);
    if (!removed) {
      return false;
    }
    this.arbiter.forgetRegion(region);
    for (const node of region.walk()) {
      node.setHovered(false);
      node.dispose();
    }
    this.invalidate();
    return true;
  }

  /** Programmatic scroll (viewport-x / viewport-y). Cancels a running flick. */
  setOffset(x: number, y: number): void {
    this.engine.setOffset({ x, y });
    this.tick();
  }

  setGeometry(visibleSize: Size, contentSize: Size): void {
    this.engine.setGeometry(visibleSize, contentSize);
    this.tick();
  }

  dispose(): void {
    for (const root of [...this.router.regions]) {
      this.removeRegion(root);
    }
    this.logger.debug("disposed");
    this.engine.stop();
    this.flicked.clear();
  }
}
