import type { Clock } from "../clock/clock";
import { consoleLogger, createTaggedLogger, type Logger } from "../core/logger";
import type { GestureArbiter } from "../gesture/gestureArbiter";
import type { InteractiveRegion } from "../region/interactiveRegion";
import type { KineticScrollEngine } from "../scroll/kineticScrollEngine";
import { ORIGIN, rectContains, subtractPoints, type Point } from "../types/geometry";
import { pointerInputSchema, type PointerInputDTO, type TimedPointerInput } from "../types/pointer";

import { hitTestRegions, localPoint, type HitResult } from "./hitTest";

export type PointerEventRouterOptions = {
  clock: Clock;
  arbiter: GestureArbiter;
  engine: KineticScrollEngine;
  logger?: Logger;
  debug?: boolean;
};

/**
 * Entry point for host input. Validates each event, hit-tests it against the
 * region tree, hands it to the arbiter and then refreshes hover flags.
 */
export class PointerEventRouter {
  private readonly roots: InteractiveRegion[] = [];
  private readonly clock: Clock;
  private readonly arbiter: GestureArbiter;
  private readonly engine: KineticScrollEngine;
  private readonly logger: Logger;

  constructor(options: PointerEventRouterOptions) {
    this.clock = options.clock;
    this.arbiter = options.arbiter;
    this.engine = options.engine;
    this.logger = createTaggedLogger(
      "PointerEventRouter",
      options.logger ?? consoleLogger,
      options.debug ?? false
    );
  }

  get regions(): readonly InteractiveRegion[] {
    return this.roots;
  }

  addRoot(region: InteractiveRegion): void {
    this.roots.push(region);
  }

  removeRoot(region: InteractiveRegion): boolean {
    const index = this.roots.indexOf(region);
    if (index < 0) {
      return false;
    }
    this.roots.splice(index, 1);
    return true;
  }

  /**
   * Container point to content point under the current offset. Content outside
   * the visible container is clipped, so points beyond it hit nothing.
   */
  hitTest(position: Point): HitResult {
    const { offset, visibleSize } = this.engine.viewport;
    const contentPoint = subtractPoints(position, offset);
    if (!rectContains({ x: 0, y: 0, ...visibleSize }, position)) {
      return { contentPoint, path: [] };
    }
    return { contentPoint, path: hitTestRegions(this.roots, contentPoint) };
  }

  /**
   * Processes one event synchronously. Returns false when the event was
   * malformed and dropped.
   */
  dispatch(raw: PointerInputDTO): boolean {
    const parsed = pointerInputSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug("dropping malformed input", parsed.error.issues);
      return false;
    }
    const input: TimedPointerInput = {
      ...parsed.data,
      timestampMs: parsed.data.timestampMs ?? this.clock.now()
    };

    if (input.type === "POINTER_EXIT" || input.type === "POINTER_CANCEL") {
      this.arbiter.handle(input, { contentPoint: ORIGIN, path: [] });
      this.refreshHover([]);
      return true;
    }

    const hit = this.hitTest(input.position);

    if ((input.type === "POINTER_DOWN" || input.type === "POINTER_UP") && input.button !== "left") {
      this.logger.debug("ignoring", input.button, "button");
      this.refreshHover(hit.path, hit.contentPoint);
      return true;
    }

    if (input.type === "SCROLL" && this.offerScroll(input, hit)) {
      this.refreshHover(hit.path, hit.contentPoint);
      return true;
    }

    this.arbiter.handle(input, hit);

    // the offset may have moved under the pointer
    const after = this.hitTest(input.position);
    this.refreshHover(after.path, after.contentPoint);
    return true;
  }

  private offerScroll(input: Extract<TimedPointerInput, { type: "SCROLL" }>, hit: HitResult): boolean {
    for (let i = hit.path.length - 1; i >= 0; i -= 1) {
      const region = hit.path[i];
      if (!region?.onScroll) {
        continue;
      }
      const local = localPoint(region, hit.contentPoint);
      const result = region.onScroll({
        x: local.x,
        y: local.y,
        deltaX: input.deltaX,
        deltaY: input.deltaY,
        modifiers: input.modifiers
      });
      if (result === "accept") {
        this.logger.debug("scroll accepted by region", region.id);
        return true;
      }
    }
    return false;
  }

  private refreshHover(path: readonly InteractiveRegion[], contentPoint?: Point): void {
    const status = this.arbiter.state.status;
    const suppressed = status === "dragging" || status === "flicking";
    const hovered = new Set(suppressed ? [] : path);

    for (const root of this.roots) {
      for (const region of root.walk()) {
        const isHovered = hovered.has(region);
        region.setHovered(isHovered);
        if (isHovered && contentPoint) {
          region.setPointerPosition(localPoint(region, contentPoint));
        }
      }
    }
  }
}
