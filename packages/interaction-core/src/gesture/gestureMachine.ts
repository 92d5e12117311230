import { addPoints, distance, ORIGIN, subtractPoints, type Point } from "../types/geometry";

import type { FlickableConfig } from "./config";
import type {
  GestureEffect,
  GestureEvent,
  GestureOutput,
  GestureState,
  PointerSample
} from "./types";

export type GestureMachineConfig = Pick<FlickableConfig, "dragThreshold" | "longPressMs"> & {
  /** When false, presses still click but movement never starts a drag. */
  interactive: boolean;
};

const idleState: GestureState = { status: "idle" };

function unchanged(state: GestureState): GestureOutput {
  return { state, effects: [] };
}

function velocityBetween(from: PointerSample, to: PointerSample): Point {
  const dt = to.timestampMs - from.timestampMs;
  if (dt <= 0) {
    return ORIGIN;
  }
  return {
    x: (to.position.x - from.position.x) / dt,
    y: (to.position.y - from.position.y) / dt
  };
}

export function reduceGesture(
  state: GestureState,
  event: GestureEvent,
  config: GestureMachineConfig
): GestureOutput {
  if (event.type === "TICK") {
    if (state.status === "armed" && !state.held) {
      if (event.timestampMs - state.startTimeMs >= config.longPressMs) {
        return { state: { ...state, held: true }, effects: [{ type: "HOLD_TARGET" }] };
      }
    }
    return unchanged(state);
  }

  if (event.type === "PRESS") {
    if (state.status === "armed" || state.status === "dragging") {
      return unchanged(state);
    }
    const armed: GestureState = {
      status: "armed",
      origin: event.position,
      startTimeMs: event.timestampMs,
      startOffset: event.offset,
      held: false,
      ...(event.targetId !== undefined ? { targetId: event.targetId } : {})
    };
    const effects: GestureEffect[] = [];
    if (state.status === "flicking") {
      effects.push({ type: "STOP_FLICK" });
    }
    if (event.targetId !== undefined) {
      effects.push({ type: "PRESS_TARGET" });
    }
    return { state: armed, effects };
  }

  if (event.type === "MOVE") {
    if (state.status === "armed") {
      if (config.interactive && distance(event.position, state.origin) > config.dragThreshold) {
        const travel = subtractPoints(event.position, state.origin);
        return {
          state: {
            status: "dragging",
            startOffset: state.startOffset,
            previousSample: { position: state.origin, timestampMs: state.startTimeMs },
            lastSample: { position: event.position, timestampMs: event.timestampMs },
            accumulatedOffset: travel
          },
          effects: [{ type: "CANCEL_TARGET" }, { type: "DRAG_BY", delta: travel }]
        };
      }
      return state.held ? { state, effects: [{ type: "MOVE_TARGET" }] } : unchanged(state);
    }

    if (state.status === "dragging") {
      const delta = subtractPoints(event.position, state.lastSample.position);
      return {
        state: {
          ...state,
          previousSample: state.lastSample,
          lastSample: { position: event.position, timestampMs: event.timestampMs },
          accumulatedOffset: addPoints(state.accumulatedOffset, delta)
        },
        effects: [{ type: "DRAG_BY", delta }]
      };
    }
    return unchanged(state);
  }

  if (event.type === "RELEASE") {
    if (state.status === "armed") {
      return {
        state: idleState,
        effects: [{ type: "RELEASE_TARGET", timestampMs: event.timestampMs }]
      };
    }

    if (state.status === "dragging") {
      const release: PointerSample = { position: event.position, timestampMs: event.timestampMs };
      // a release stamped with the last move's time carries no new timing information
      const from =
        event.timestampMs > state.lastSample.timestampMs ? state.lastSample : state.previousSample;
      const velocity = velocityBetween(from, release);
      return {
        state: { status: "flicking", velocity, animationStartMs: event.timestampMs },
        effects: [
          { type: "DRAG_BY", delta: subtractPoints(event.position, state.lastSample.position) },
          { type: "START_FLICK", velocity, timestampMs: event.timestampMs }
        ]
      };
    }

    if (state.status === "cancelled") {
      return unchanged(idleState);
    }
    return unchanged(state);
  }

  if (event.type === "CANCEL") {
    if (state.status === "idle" || state.status === "cancelled") {
      return unchanged(state);
    }
    return {
      state: { status: "cancelled" },
      effects: [{ type: "CANCEL_TARGET" }, { type: "STOP_FLICK" }]
    };
  }

  if (event.type === "WHEEL") {
    const scroll: GestureEffect = {
      type: "SCROLL_BY",
      deltaX: event.deltaX,
      deltaY: event.deltaY,
      shift: event.shift
    };
    if (state.status === "flicking") {
      return { state: idleState, effects: [{ type: "STOP_FLICK" }, scroll] };
    }
    return { state, effects: [scroll] };
  }

  if (event.type === "FLICK_END") {
    return state.status === "flicking" ? unchanged(idleState) : unchanged(state);
  }

  return unchanged(state);
}
