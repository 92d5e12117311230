import type { Point } from "../types/geometry";

export type PointerSample = {
  position: Point;
  timestampMs: number;
};

export type GestureState =
  | {
      status: "idle";
    }
  | {
      // pressed, not yet claimed by either the container or the region
      status: "armed";
      origin: Point;
      startTimeMs: number;
      startOffset: Point;
      targetId?: string;
      held: boolean;
    }
  | {
      status: "dragging";
      startOffset: Point;
      lastSample: PointerSample;
      previousSample: PointerSample;
      accumulatedOffset: Point;
    }
  | {
      status: "flicking";
      velocity: Point;
      animationStartMs: number;
    }
  | {
      status: "cancelled";
    };

export type GestureStatus = GestureState["status"];

/** Inputs to `reduceGesture`, already hit-tested and time-stamped. */
export type GestureEvent =
  | {
      type: "PRESS";
      position: Point;
      timestampMs: number;
      /** Container offset at the press, after any running flick was sampled. */
      offset: Point;
      targetId?: string;
    }
  | { type: "MOVE"; position: Point; timestampMs: number }
  | { type: "RELEASE"; position: Point; timestampMs: number }
  | { type: "CANCEL" }
  | { type: "WHEEL"; deltaX: number; deltaY: number; shift: boolean }
  | { type: "TICK"; timestampMs: number }
  | { type: "FLICK_END" };

/** Work the arbiter carries out on the engine and the press target after a transition. */
export type GestureEffect =
  | { type: "PRESS_TARGET" }
  | { type: "HOLD_TARGET" }
  | { type: "MOVE_TARGET" }
  | { type: "RELEASE_TARGET"; timestampMs: number }
  | { type: "CANCEL_TARGET" }
  | { type: "DRAG_BY"; delta: Point }
  | { type: "SCROLL_BY"; deltaX: number; deltaY: number; shift: boolean }
  | { type: "START_FLICK"; velocity: Point; timestampMs: number }
  | { type: "STOP_FLICK" };

export type GestureOutput = {
  state: GestureState;
  effects: GestureEffect[];
};

export type RegionState = {
  pressed: boolean;
  hovered: boolean;
  /** Last pointer position seen over the region, in region-local coordinates. */
  pointerPosition?: Point;
  /** Where the current or most recent press landed, in region-local coordinates. */
  pressedPosition?: Point;
};

export type ClickRecord = {
  lastReleaseTimeMs: number;
  lastReleasePosition: Point;
};

export type ClickCandidate = {
  position: Point;
  timestampMs: number;
};

export type ClickOutput = {
  record: ClickRecord;
  clicked: Point;
  doubleClicked?: Point;
};
