import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { DEFAULT_FLICKABLE_CONFIG, resolveFlickableConfig } from "./config";

describe("resolveFlickableConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveFlickableConfig()).toEqual(DEFAULT_FLICKABLE_CONFIG);
  });

  it("merges overrides and ignores undefined entries", () => {
    const config = resolveFlickableConfig({ dragThreshold: 3, longPressMs: undefined });
    expect(config.dragThreshold).toBe(3);
    expect(config.longPressMs).toBe(300);
  });

  it("rejects non-finite and negative values", () => {
    expect(() => resolveFlickableConfig({ flickDurationMs: 0 })).toThrow(ZodError);
    expect(() => resolveFlickableConfig({ dragThreshold: -1 })).toThrow(ZodError);
    expect(() => resolveFlickableConfig({ maxFlickDistance: Number.POSITIVE_INFINITY })).toThrow(
      ZodError
    );
  });
});
