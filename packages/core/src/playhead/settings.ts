/**
 * Playback settings defaults and runtime parsing.
 *
 * Settings arrive from definition files and user calls as loosely typed
 * input; zod completes them with defaults and rejects values the playhead
 * arithmetic cannot take (negative speed, negative intermission, NaN).
 */

import { z } from "zod";
import type { PlaybackSettings } from "@playhead/schema";
import { PlaybackInputError } from "../errors.js";

/** Settings used whenever a state or entity does not provide its own. */
export const DEFAULT_PLAYBACK_SETTINGS: PlaybackSettings = {
  autoplay: true,
  direction: "normal",
  speed: 1,
  intermission: 0,
  looping: { type: "loop" },
  segments: { start: -Number.MAX_VALUE, end: Number.MAX_VALUE },
};

/** Speed multiplier. Reverse playback goes through `direction`, never a negative speed. */
export const speedSchema = z
  .number()
  .finite()
  .nonnegative()
  .describe("Speed multiplier. 0 freezes the playhead.");

/** Idle frames appended after each loop. */
export const intermissionSchema = z
  .number()
  .finite()
  .nonnegative()
  .describe("Idle frames appended after each loop.");

/** Frame to seek to. Out-of-range frames are clamped, NaN is rejected. */
export const seekFrameSchema = z.number().describe("Frame to seek to.");

export const loopBehaviorSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("doNotLoop") }).strict(),
  z.object({ type: z.literal("amount"), amount: z.number().int().nonnegative() }).strict(),
  z.object({ type: z.literal("loop") }).strict(),
]);

export const playbackSettingsSchema = z
  .object({
    autoplay: z.boolean().default(DEFAULT_PLAYBACK_SETTINGS.autoplay),
    direction: z.enum(["normal", "reverse"]).default(DEFAULT_PLAYBACK_SETTINGS.direction),
    speed: speedSchema.default(DEFAULT_PLAYBACK_SETTINGS.speed),
    intermission: intermissionSchema.default(DEFAULT_PLAYBACK_SETTINGS.intermission),
    looping: loopBehaviorSchema.default({ type: "loop" }),
    segments: z
      .object({ start: z.number(), end: z.number() })
      .strict()
      .default({ ...DEFAULT_PLAYBACK_SETTINGS.segments }),
  })
  .strict();

/**
 * Complete partial settings with defaults.
 *
 * @throws PlaybackInputError when a field is out of range or of the wrong type
 */
export function parsePlaybackSettings(input: unknown = {}): PlaybackSettings {
  return parseOrThrow(playbackSettingsSchema, input, "playback settings");
}

/**
 * Parse `input` with `schema`, converting zod issues into a PlaybackInputError.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new PlaybackInputError(`invalid ${what}: ${issues}`);
  }
  return result.data;
}
