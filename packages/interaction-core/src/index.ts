export * from "./types/geometry";
export * from "./types/pointer";

export * from "./core/emitter";
export * from "./core/logger";

export * from "./clock/clock";

export * from "./gesture/config";
export * from "./gesture/types";
export * from "./gesture/clickClassifier";
export * from "./gesture/gestureMachine";
export * from "./gesture/gestureArbiter";

export * from "./scroll/viewport";
export * from "./scroll/timeline";
export * from "./scroll/kineticScrollEngine";

export * from "./region/interactiveRegion";
export * from "./routing/hitTest";
export * from "./routing/pointerEventRouter";

export * from "./flickable";
