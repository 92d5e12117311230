import { z } from "zod";

const pointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite()
});

const timestampSchema = z.number().finite().nonnegative().optional();

const buttonSchema = z.enum(["left", "right", "middle", "other"]).default("left");

const modifiersSchema = z
  .object({
    shift: z.boolean().default(false),
    control: z.boolean().default(false),
    alt: z.boolean().default(false),
    meta: z.boolean().default(false)
  })
  .default({});

export const pointerInputSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("POINTER_DOWN"),
    position: pointSchema,
    button: buttonSchema,
    timestampMs: timestampSchema
  }),
  z.object({
    type: z.literal("POINTER_MOVE"),
    position: pointSchema,
    timestampMs: timestampSchema
  }),
  z.object({
    type: z.literal("POINTER_UP"),
    position: pointSchema,
    button: buttonSchema,
    timestampMs: timestampSchema
  }),
  z.object({
    type: z.literal("POINTER_CANCEL"),
    timestampMs: timestampSchema
  }),
  z.object({
    type: z.literal("POINTER_EXIT"),
    timestampMs: timestampSchema
  }),
  z.object({
    type: z.literal("SCROLL"),
    position: pointSchema,
    deltaX: z.number().finite(),
    deltaY: z.number().finite(),
    modifiers: modifiersSchema,
    timestampMs: timestampSchema
  })
]);

/** What a host hands to the router. Optional fields fall back to defaults. */
export type PointerInputDTO = z.input<typeof pointerInputSchema>;

export type PointerInput = z.output<typeof pointerInputSchema>;

/** A validated input stamped with the time it is processed at. */
export type TimedPointerInput = PointerInput & { timestampMs: number };

export type PointerButton = z.output<typeof buttonSchema>;

export type KeyboardModifiers = z.output<typeof modifiersSchema>;

export type RegionPointerEventKind = "down" | "up" | "cancel";

export type RegionPointerEvent = {
  kind: RegionPointerEventKind;
  x: number;
  y: number;
};

/** Wheel/trackpad delta offered to a region before the container scrolls. */
export type RegionScrollEvent = {
  x: number;
  y: number;
  deltaX: number;
  deltaY: number;
  modifiers: KeyboardModifiers;
};

export type ScrollEventResult = "accept" | "reject";
