import { z } from "zod";

export type FlickableConfig = {
  /** Displacement from the press origin (px) that must be exceeded to start a drag. */
  dragThreshold: number;
  /** Hold time (ms) after which a still press commits the region's pressed flag. */
  longPressMs: number;
  /** Largest gap (ms) between two releases that still counts as a double-click. */
  doubleClickWindowMs: number;
  /** Largest drift (px) between two releases that still counts as a double-click. */
  doubleClickDistance: number;
  /** Release velocity (px/ms) times this factor gives the flick travel distance. */
  flickVelocityScale: number;
  /** Cap on the flick travel per axis (px). */
  maxFlickDistance: number;
  flickDurationMs: number;
  debug: boolean;
};

export const DEFAULT_FLICKABLE_CONFIG: FlickableConfig = {
  dragThreshold: 8,
  longPressMs: 300,
  doubleClickWindowMs: 500,
  doubleClickDistance: 5,
  flickVelocityScale: 300,
  maxFlickDistance: 2000,
  flickDurationMs: 500,
  debug: false
};

const finite = () => z.number().finite();

export const flickableConfigSchema = z
  .object({
    dragThreshold: finite().nonnegative(),
    longPressMs: finite().positive(),
    doubleClickWindowMs: finite().nonnegative(),
    doubleClickDistance: finite().nonnegative(),
    flickVelocityScale: finite().nonnegative(),
    maxFlickDistance: finite().nonnegative(),
    flickDurationMs: finite().positive(),
    debug: z.boolean()
  })
  .strict() satisfies z.ZodType<FlickableConfig>;

/** Merges overrides over the defaults. Throws a ZodError on an invalid value. */
export function resolveFlickableConfig(overrides: Partial<FlickableConfig> = {}): FlickableConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return flickableConfigSchema.parse({ ...DEFAULT_FLICKABLE_CONFIG, ...defined });
}
