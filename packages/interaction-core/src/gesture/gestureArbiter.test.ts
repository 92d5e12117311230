import { describe, expect, it, vi } from "vitest";

import { InteractiveRegion } from "../region/interactiveRegion";
import type { HitResult } from "../routing/hitTest";
import { KineticScrollEngine } from "../scroll/kineticScrollEngine";
import type { Point } from "../types/geometry";
import type { TimedPointerInput } from "../types/pointer";

import { DEFAULT_FLICKABLE_CONFIG } from "./config";
import { GestureArbiter } from "./gestureArbiter";

function setup() {
  const engine = new KineticScrollEngine({
    visibleSize: { width: 200, height: 200 },
    contentSize: { width: 1000, height: 1000 },
    config: DEFAULT_FLICKABLE_CONFIG
  });
  const arbiter = new GestureArbiter({ engine, config: DEFAULT_FLICKABLE_CONFIG });
  const region = new InteractiveRegion(
    { bounds: { x: 0, y: 0, width: 100, height: 100 } },
    { id: "tile", clickConfig: DEFAULT_FLICKABLE_CONFIG, invalidate: () => undefined }
  );
  return { engine, arbiter, region };
}

function onRegion(region: InteractiveRegion, contentPoint: Point): HitResult {
  return { contentPoint, path: [region] };
}

const nothing = (contentPoint: Point): HitResult => ({ contentPoint, path: [] });

function down(x: number, y: number, timestampMs: number): TimedPointerInput {
  return { type: "POINTER_DOWN", position: { x, y }, button: "left", timestampMs };
}

function move(x: number, y: number, timestampMs: number): TimedPointerInput {
  return { type: "POINTER_MOVE", position: { x, y }, timestampMs };
}

function up(x: number, y: number, timestampMs: number): TimedPointerInput {
  return { type: "POINTER_UP", position: { x, y }, button: "left", timestampMs };
}

describe("GestureArbiter", () => {
  it("arms on press without marking the region pressed", () => {
    const { arbiter, region } = setup();
    arbiter.handle(down(10, 20, 0), onRegion(region, { x: 10, y: 20 }));

    expect(arbiter.state).toEqual({
      status: "armed",
      origin: { x: 10, y: 20 },
      startTimeMs: 0,
      startOffset: { x: 0, y: 0 },
      held: false,
      targetId: "tile"
    });
    expect(region.pressed).toBe(false);
    expect(region.pressedPosition).toEqual({ x: 10, y: 20 });
  });

  it("stays armed for jitter below the drag threshold", () => {
    const { arbiter, engine, region } = setup();
    arbiter.handle(down(10, 20, 0), onRegion(region, { x: 10, y: 20 }));
    arbiter.handle(move(16, 20, 10), onRegion(region, { x: 16, y: 20 }));

    expect(arbiter.state.status).toBe("armed");
    expect(engine.currentOffset).toEqual({ x: 0, y: 0 });
  });

  it("commits the long press once the threshold is reached", () => {
    const { arbiter, region } = setup();
    arbiter.handle(down(10, 20, 0), onRegion(region, { x: 10, y: 20 }));

    arbiter.tick(299);
    expect(region.pressed).toBe(false);

    arbiter.tick(300);
    expect(region.pressed).toBe(true);
    expect(arbiter.state).toMatchObject({ status: "armed", held: true });
  });

  it("reports moves of a held region", () => {
    const { arbiter, region } = setup();
    const moved = vi.fn();
    region.moved.on(moved);

    arbiter.handle(down(10, 20, 0), onRegion(region, { x: 10, y: 20 }));
    arbiter.handle(move(11, 20, 100), onRegion(region, { x: 11, y: 20 }));
    arbiter.tick(400);
    arbiter.handle(move(12, 21, 450), onRegion(region, { x: 12, y: 21 }));

    expect(moved).toHaveBeenCalledTimes(1);
    expect(moved).toHaveBeenCalledWith({ x: 12, y: 21 });
  });

  it("hands the gesture to the container past the threshold", () => {
    const { arbiter, engine, region } = setup();
    const events = vi.fn();
    region.pointerEvent.on(events);

    arbiter.handle(down(50, 50, 0), onRegion(region, { x: 50, y: 50 }));
    arbiter.tick(300);
    arbiter.handle(move(50, 40, 320), onRegion(region, { x: 50, y: 40 }));

    expect(arbiter.state).toEqual({
      status: "dragging",
      startOffset: { x: 0, y: 0 },
      previousSample: { position: { x: 50, y: 50 }, timestampMs: 0 },
      lastSample: { position: { x: 50, y: 40 }, timestampMs: 320 },
      accumulatedOffset: { x: 0, y: -10 }
    });
    expect(engine.currentOffset).toEqual({ x: 0, y: -10 });
    expect(region.pressed).toBe(false);
    expect(arbiter.pressTarget).toBeUndefined();
    expect(events.mock.calls.map(([event]) => event.kind)).toEqual(["down", "cancel"]);
  });

  it("computes the release velocity from the last two samples", () => {
    const { arbiter, engine } = setup();
    arbiter.handle(down(150, 150, 0), nothing({ x: 150, y: 150 }));
    arbiter.handle(move(140, 150, 10), nothing({ x: 140, y: 150 }));
    arbiter.handle(move(120, 150, 20), nothing({ x: 130, y: 150 }));
    arbiter.handle(up(100, 150, 30), nothing({ x: 130, y: 150 }));

    expect(arbiter.state).toEqual({
      status: "flicking",
      velocity: { x: -2, y: 0 },
      animationStartMs: 30
    });
    expect(engine.currentOffset).toEqual({ x: -50, y: 0 });
    expect(engine.activeTimeline?.targetOffset).toEqual({ x: -650, y: 0 });
  });

  it("falls back to the previous sample when the release shares the last timestamp", () => {
    const { arbiter } = setup();
    arbiter.handle(down(150, 150, 0), nothing({ x: 150, y: 150 }));
    arbiter.handle(move(140, 150, 10), nothing({ x: 140, y: 150 }));
    arbiter.handle(move(120, 150, 20), nothing({ x: 130, y: 150 }));
    arbiter.handle(up(120, 150, 20), nothing({ x: 130, y: 150 }));

    expect(arbiter.state).toMatchObject({ status: "flicking", velocity: { x: -2, y: 0 } });
  });

  it("settles to idle when the release carries no velocity", () => {
    const { arbiter, engine } = setup();
    arbiter.handle(down(150, 150, 0), nothing({ x: 150, y: 150 }));
    arbiter.handle(move(150, 120, 10), nothing({ x: 150, y: 120 }));
    arbiter.handle(up(150, 120, 400), nothing({ x: 150, y: 150 }));

    expect(arbiter.state.status).toBe("idle");
    expect(engine.currentOffset).toEqual({ x: 0, y: -30 });
    expect(engine.animating).toBe(false);
  });

  it("returns to idle once the flick has run its course", () => {
    const { arbiter, engine } = setup();
    arbiter.handle(down(150, 150, 0), nothing({ x: 150, y: 150 }));
    arbiter.handle(move(140, 150, 10), nothing({ x: 140, y: 150 }));
    arbiter.handle(up(120, 150, 20), nothing({ x: 130, y: 150 }));

    arbiter.tick(270);
    expect(arbiter.state.status).toBe("flicking");
    arbiter.tick(520);
    expect(arbiter.state.status).toBe("idle");
    expect(engine.currentOffset).toEqual({ x: -630, y: 0 });
  });

  it("never drags when not interactive", () => {
    const { arbiter, engine, region } = setup();
    const clicked = vi.fn();
    region.clicked.on(clicked);
    arbiter.interactive = false;

    arbiter.handle(down(10, 10, 0), onRegion(region, { x: 10, y: 10 }));
    arbiter.handle(move(60, 60, 10), onRegion(region, { x: 60, y: 60 }));
    arbiter.handle(up(60, 60, 20), onRegion(region, { x: 60, y: 60 }));

    expect(engine.currentOffset).toEqual({ x: 0, y: 0 });
    expect(clicked).toHaveBeenCalledWith({ x: 60, y: 60 });
  });

  it("does not click when the release lands outside the region", () => {
    const { arbiter, region } = setup();
    const clicked = vi.fn();
    region.clicked.on(clicked);

    arbiter.handle(down(98, 10, 0), onRegion(region, { x: 98, y: 10 }));
    arbiter.handle(up(102, 10, 20), nothing({ x: 102, y: 10 }));

    expect(clicked).not.toHaveBeenCalled();
    expect(arbiter.state.status).toBe("idle");
  });

  it("ignores a release without a press", () => {
    const { arbiter, engine } = setup();
    arbiter.handle(up(10, 10, 0), nothing({ x: 10, y: 10 }));
    arbiter.handle(move(40, 40, 5), nothing({ x: 40, y: 40 }));

    expect(arbiter.state.status).toBe("idle");
    expect(engine.currentOffset).toEqual({ x: 0, y: 0 });
  });

  it("cancels a held press without clicking", () => {
    const { arbiter, region } = setup();
    const clicked = vi.fn();
    region.clicked.on(clicked);

    arbiter.handle(down(10, 10, 0), onRegion(region, { x: 10, y: 10 }));
    arbiter.tick(350);
    arbiter.handle({ type: "POINTER_CANCEL", timestampMs: 360 }, nothing({ x: 0, y: 0 }));

    expect(region.pressed).toBe(false);
    expect(arbiter.state.status).toBe("cancelled");

    arbiter.handle(up(10, 10, 370), onRegion(region, { x: 10, y: 10 }));
    expect(arbiter.state.status).toBe("idle");
    expect(clicked).not.toHaveBeenCalled();
  });

  it("samples a running flick at the wheel event's time before applying the delta", () => {
    const { arbiter, engine } = setup();
    arbiter.handle(down(150, 150, 0), nothing({ x: 150, y: 150 }));
    arbiter.handle(move(140, 150, 10), nothing({ x: 140, y: 150 }));
    arbiter.handle(up(120, 150, 20), nothing({ x: 130, y: 150 }));

    arbiter.handle(
      {
        type: "SCROLL",
        position: { x: 100, y: 100 },
        deltaX: 0,
        deltaY: -40,
        modifiers: { shift: false, control: false, alt: false, meta: false },
        timestampMs: 270
      },
      nothing({ x: 100, y: 100 })
    );

    expect(arbiter.state.status).toBe("idle");
    expect(engine.currentOffset).toEqual({ x: -555, y: -40 });
    arbiter.tick(600);
    expect(engine.currentOffset).toEqual({ x: -555, y: -40 });
  });

  it("does not hold a region that was disabled after the press", () => {
    const { arbiter, region } = setup();
    arbiter.handle(down(10, 10, 0), onRegion(region, { x: 10, y: 10 }));
    region.enabled = false;

    arbiter.tick(300);

    expect(region.pressed).toBe(false);
    expect(arbiter.pressTarget).toBeUndefined();
  });
});
