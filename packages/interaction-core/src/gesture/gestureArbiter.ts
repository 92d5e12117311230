import { assertNever } from "../core/assert";
import { consoleLogger, createTaggedLogger, type Logger } from "../core/logger";
import type { InteractiveRegion } from "../region/interactiveRegion";
import { localPoint, type HitResult } from "../routing/hitTest";
import type { KineticScrollEngine } from "../scroll/kineticScrollEngine";
import { addPoints, ORIGIN, type Point } from "../types/geometry";
import type { TimedPointerInput } from "../types/pointer";

import type { FlickableConfig } from "./config";
import { reduceGesture } from "./gestureMachine";
import type { GestureEffect, GestureEvent, GestureState } from "./types";

export type GestureArbiterOptions = {
  engine: KineticScrollEngine;
  config: FlickableConfig;
  logger?: Logger;
};

const noHit: HitResult = { contentPoint: ORIGIN, path: [] };

/**
 * Decides whether a press belongs to the container (drag, then flick) or to
 * the region under it (tap, double tap, long press). The container claims the
 * gesture only once the pointer travels past the drag threshold; the region
 * shows as pressed only once the press outlives the long-press threshold.
 *
 * Transitions live in `reduceGesture`; this class feeds it and carries out the
 * effects it returns.
 */
export class GestureArbiter {
  /** When false, presses still click but movement never scrolls the container. */
  interactive = true;

  private current: GestureState = { status: "idle" };
  private target: InteractiveRegion | undefined;
  private readonly engine: KineticScrollEngine;
  private readonly config: FlickableConfig;
  private readonly logger: Logger;

  constructor(options: GestureArbiterOptions) {
    this.engine = options.engine;
    this.config = options.config;
    this.logger = createTaggedLogger(
      "GestureArbiter",
      options.logger ?? consoleLogger,
      options.config.debug
    );
  }

  get state(): GestureState {
    return this.current;
  }

  /** The region the current press landed on, until it is released or claimed by a drag. */
  get pressTarget(): InteractiveRegion | undefined {
    return this.target;
  }

  handle(input: TimedPointerInput, hit: HitResult): void {
    const now = input.timestampMs;
    // bring long presses and a running flick up to the event's time first
    this.tick(now);

    switch (input.type) {
      case "POINTER_DOWN": {
        const status = this.current.status;
        if (status === "armed" || status === "dragging") {
          this.logger.debug("ignoring second press during", status);
          return;
        }
        const target = hit.path[hit.path.length - 1];
        this.run(
          {
            type: "PRESS",
            position: input.position,
            timestampMs: now,
            offset: this.engine.currentOffset,
            ...(target ? { targetId: target.id } : {})
          },
          hit,
          target
        );
        return;
      }
      case "POINTER_MOVE":
        this.run({ type: "MOVE", position: input.position, timestampMs: now }, hit);
        return;
      case "POINTER_UP":
        this.run({ type: "RELEASE", position: input.position, timestampMs: now }, hit);
        return;
      case "POINTER_CANCEL":
        this.run({ type: "CANCEL" }, hit);
        return;
      case "POINTER_EXIT":
        return;
      case "SCROLL":
        this.run(
          {
            type: "WHEEL",
            deltaX: input.deltaX,
            deltaY: input.deltaY,
            shift: input.modifiers.shift
          },
          hit
        );
        return;
      default:
        assertNever(input, "unhandled pointer input");
    }
  }

  /** Polled once per frame: commits long presses and advances a running flick. */
  tick(nowMs: number): void {
    this.run({ type: "TICK", timestampMs: nowMs }, noHit);

    if (this.current.status === "flicking" && this.engine.tick(nowMs) !== "running") {
      this.run({ type: "FLICK_END" }, noHit);
    }
  }

  /** Called when a region leaves the tree; a pending press on it is dropped. */
  forgetRegion(region: InteractiveRegion): void {
    if (!this.target) {
      return;
    }
    for (const node of region.walk()) {
      if (node === this.target) {
        this.releaseTarget("cancel");
        return;
      }
    }
  }

  private run(event: GestureEvent, hit: HitResult, pressed?: InteractiveRegion): void {
    const output = reduceGesture(this.current, event, {
      dragThreshold: this.config.dragThreshold,
      longPressMs: this.config.longPressMs,
      interactive: this.interactive
    });
    if (output.state.status !== this.current.status) {
      this.logger.debug(`${this.current.status} -> ${output.state.status}`);
    }
    this.current = output.state;

    for (const effect of output.effects) {
      this.perform(effect, hit, pressed);
    }
  }

  private perform(effect: GestureEffect, hit: HitResult, pressed?: InteractiveRegion): void {
    switch (effect.type) {
      case "PRESS_TARGET": {
        if (!pressed) {
          return;
        }
        this.target = pressed;
        const local = localPoint(pressed, hit.contentPoint);
        pressed.setPressedPosition(local);
        pressed.pointerEvent.emit({ kind: "down", x: local.x, y: local.y });
        return;
      }
      case "HOLD_TARGET": {
        const target = this.target;
        if (target && !target.enabled) {
          this.logger.debug("dropping press on disabled region", target.id);
          this.target = undefined;
          return;
        }
        target?.setPressed(true);
        return;
      }
      case "MOVE_TARGET": {
        const target = this.target;
        if (target?.pressed) {
          target.moved.emit(localPoint(target, hit.contentPoint));
        }
        return;
      }
      case "RELEASE_TARGET": {
        const target = this.target;
        if (!target) {
          return;
        }
        const local = localPoint(target, hit.contentPoint);
        const inside = hit.path.includes(target);
        this.releaseTarget("up", local);
        if (inside) {
          target.reportClick(local, effect.timestampMs);
        }
        return;
      }
      case "CANCEL_TARGET":
        this.releaseTarget("cancel");
        return;
      case "DRAG_BY":
        this.engine.dragTo(addPoints(this.engine.currentOffset, effect.delta));
        return;
      case "SCROLL_BY":
        this.engine.scrollBy(effect.deltaX, effect.deltaY, effect.shift);
        return;
      case "START_FLICK":
        if (!this.engine.startFlick(effect.velocity, effect.timestampMs)) {
          this.run({ type: "FLICK_END" }, noHit);
        }
        return;
      case "STOP_FLICK":
        this.engine.stop();
        return;
      default:
        assertNever(effect, "unhandled gesture effect");
    }
  }

  private releaseTarget(kind: "up" | "cancel", position?: Point): void {
    const target = this.target;
    if (!target) {
      return;
    }
    this.target = undefined;
    target.setPressed(false);
    const at = position ?? target.pointerPosition ?? target.pressedPosition ?? ORIGIN;
    target.pointerEvent.emit({ kind, x: at.x, y: at.y });
  }
}
