import { assert } from "../core/assert";
import { Emitter } from "../core/emitter";
import type { Logger } from "../core/logger";
import { ClickClassifier, type ClickConfig } from "../gesture/clickClassifier";
import type { RegionState } from "../gesture/types";
import { addPoints, type Point, type Rect } from "../types/geometry";
import type {
  RegionPointerEvent,
  RegionScrollEvent,
  ScrollEventResult
} from "../types/pointer";

export type RegionScrollHandler = (event: RegionScrollEvent) => ScrollEventResult;

export type RegionOptions = {
  id?: string;
  /** Position relative to the parent region, or to the content origin for top-level regions. */
  bounds: Rect;
  enabled?: boolean;
  onScroll?: RegionScrollHandler;
};

type RegionContext = {
  id: string;
  clickConfig: ClickConfig;
  logger?: Logger;
  invalidate: () => void;
};

/**
 * A tap-sensitive area inside the flickable content. Observers read the flags;
 * only the gesture arbiter and the router write them.
 */
export class InteractiveRegion {
  readonly id: string;
  bounds: Rect;
  onScroll: RegionScrollHandler | undefined;

  readonly clicked: Emitter<Point>;
  readonly doubleClicked: Emitter<Point>;
  /** Pointer moves while the region shows as pressed. */
  readonly moved: Emitter<Point>;
  readonly pointerEvent: Emitter<RegionPointerEvent>;

  private readonly classifier: ClickClassifier;
  private readonly state: RegionState = { pressed: false, hovered: false };
  private readonly children: InteractiveRegion[] = [];
  private parentRegion: InteractiveRegion | undefined;
  private isEnabled: boolean;
  private readonly invalidate: () => void;

  constructor(options: RegionOptions, context: RegionContext) {
    this.id = context.id;
    this.bounds = { ...options.bounds };
    this.isEnabled = options.enabled ?? true;
    this.onScroll = options.onScroll;
    this.invalidate = context.invalidate;
    this.classifier = new ClickClassifier(context.clickConfig, context.logger);
    this.clicked = this.classifier.clicked;
    this.doubleClicked = this.classifier.doubleClicked;
    this.moved = new Emitter<Point>(`${context.id}.moved`, context.logger);
    this.pointerEvent = new Emitter<RegionPointerEvent>(
      `${context.id}.pointerEvent`,
      context.logger
    );
  }

  get pressed(): boolean {
    return this.state.pressed;
  }

  get hovered(): boolean {
    return this.state.hovered;
  }

  get pointerPosition(): Point | undefined {
    return this.state.pointerPosition;
  }

  get pressedPosition(): Point | undefined {
    return this.state.pressedPosition;
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  set enabled(value: boolean) {
    if (value === this.isEnabled) {
      return;
    }
    this.isEnabled = value;
    if (!value) {
      this.classifier.reset();
      this.setPressed(false);
      this.setHovered(false);
    }
  }

  get parent(): InteractiveRegion | undefined {
    return this.parentRegion;
  }

  get childRegions(): readonly InteractiveRegion[] {
    return this.children;
  }

  addChild(child: InteractiveRegion): void {
    assert(child !== this, `region ${this.id} cannot contain itself`);
    assert(!child.parentRegion, `region ${child.id} already has a parent`);
    child.parentRegion = this;
    this.children.push(child);
  }

  removeChild(child: InteractiveRegion): boolean {
    const index = this.children.indexOf(child);
    if (index < 0) {
      return false;
    }
    this.children.splice(index, 1);
    child.parentRegion = undefined;
    return true;
  }

  /** Top-left corner in content coordinates. */
  contentOrigin(): Point {
    const own = { x: this.bounds.x, y: this.bounds.y };
    return this.parentRegion ? addPoints(this.parentRegion.contentOrigin(), own) : own;
  }

  /** This region and all of its descendants, depth first. */
  *walk(): Generator<InteractiveRegion> {
    yield this;
    for (const child of this.children) {
      yield* child.walk();
    }
  }

  setPressed(value: boolean): void {
    if (this.state.pressed !== value) {
      this.state.pressed = value;
      this.invalidate();
    }
  }

  setHovered(value: boolean): void {
    if (this.state.hovered !== value) {
      this.state.hovered = value;
      this.invalidate();
    }
  }

  setPointerPosition(position: Point): void {
    this.state.pointerPosition = position;
  }

  setPressedPosition(position: Point): void {
    this.state.pressedPosition = position;
  }

  reportClick(position: Point, timestampMs: number): void {
    this.classifier.classify({ position, timestampMs });
  }

  /** Drops every listener and the click record. */
  dispose(): void {
    this.classifier.reset();
    this.clicked.clear();
    this.doubleClicked.clear();
    this.moved.clear();
    this.pointerEvent.clear();
  }
}
