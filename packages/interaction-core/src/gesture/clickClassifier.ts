import { Emitter } from "../core/emitter";
import type { Logger } from "../core/logger";
import { distance, type Point } from "../types/geometry";

import type { FlickableConfig } from "./config";
import type { ClickCandidate, ClickOutput, ClickRecord } from "./types";

export type ClickConfig = Pick<FlickableConfig, "doubleClickWindowMs" | "doubleClickDistance">;

export function classifyClick(
  record: ClickRecord | undefined,
  candidate: ClickCandidate,
  config: ClickConfig
): ClickOutput {
  const next: ClickRecord = {
    lastReleaseTimeMs: candidate.timestampMs,
    lastReleasePosition: candidate.position
  };

  if (!record) {
    return { record: next, clicked: candidate.position };
  }

  const gap = candidate.timestampMs - record.lastReleaseTimeMs;
  const drift = distance(candidate.position, record.lastReleasePosition);
  if (gap >= 0 && gap <= config.doubleClickWindowMs && drift <= config.doubleClickDistance) {
    return { record: next, clicked: candidate.position, doubleClicked: candidate.position };
  }

  return { record: next, clicked: candidate.position };
}

/** Per-region click bookkeeping. Emits `clicked` always, `doubleClicked` on a quick repeat. */
export class ClickClassifier {
  readonly clicked: Emitter<Point>;
  readonly doubleClicked: Emitter<Point>;

  private record: ClickRecord | undefined;

  constructor(
    private readonly config: ClickConfig,
    logger?: Logger
  ) {
    this.clicked = new Emitter<Point>("clicked", logger);
    this.doubleClicked = new Emitter<Point>("doubleClicked", logger);
  }

  get lastRecord(): ClickRecord | undefined {
    return this.record;
  }

  classify(candidate: ClickCandidate): ClickOutput {
    const output = classifyClick(this.record, candidate, this.config);
    this.record = output.record;
    this.clicked.emit(output.clicked);
    if (output.doubleClicked) {
      this.doubleClicked.emit(output.doubleClicked);
    }
    return output;
  }

  reset(): void {
    this.record = undefined;
  }
}
