/**
 * Load a LottiePlayer from a state-machine definition document.
 *
 * Documents follow state-machine.schema.json from @playhead/schema. Asset
 * names are resolved to handles through a callback, so decoding stays with
 * the host.
 */

import { z } from "zod";
import type { AssetHandle } from "../assets/types.js";
import { StateMachineValidationError } from "../errors.js";
import { playbackSettingsSchema } from "../playhead/settings.js";
import { AnimationState } from "./animation-state.js";
import { LottiePlayer } from "./lottie-player.js";

const stateId = z.string().min(1);

const transitionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("onAfter"), state: stateId, secs: z.number().finite().nonnegative() }).strict(),
  z.object({ type: z.literal("onComplete"), state: stateId }).strict(),
  z.object({ type: z.literal("onMouseEnter"), state: stateId }).strict(),
  z.object({ type: z.literal("onMouseClick"), state: stateId }).strict(),
  z.object({ type: z.literal("onMouseLeave"), state: stateId }).strict(),
  z.object({ type: z.literal("onShow"), state: stateId }).strict(),
]);

const themeSchema = z
  .object({
    id: z.string().optional(),
    colors: z.record(z.string()),
  })
  .strict();

const stateSchema = z
  .object({
    id: stateId,
    asset: z.string().min(1).optional(),
    theme: themeSchema.optional(),
    playbackSettings: playbackSettingsSchema.optional(),
    transitions: z.array(transitionSchema).default([]),
    resetPlayheadOnTransition: z.boolean().default(false),
    resetPlayheadOnStart: z.boolean().default(false),
  })
  .strict();

export const stateMachineDefinitionSchema = z
  .object({
    initialState: stateId,
    states: z.array(stateSchema).min(1),
  })
  .strict();

/** Resolves an asset name from a definition to a handle. */
export type AssetResolver = (name: string) => AssetHandle | undefined;

/**
 * Build a player from a definition document.
 *
 * @throws StateMachineValidationError listing every problem: malformed
 *   fields, duplicate state ids, unknown asset names, unknown transition targets
 */
export function loadStateMachine(document: unknown, resolveAsset: AssetResolver): LottiePlayer {
  const parsed = stateMachineDefinitionSchema.safeParse(document);
  if (!parsed.success) {
    throw new StateMachineValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }

  const errors: string[] = [];
  const seen = new Set<string>();
  const player = new LottiePlayer(parsed.data.initialState);

  for (const definition of parsed.data.states) {
    if (seen.has(definition.id)) {
      errors.push(`Duplicate state id '${definition.id}'.`);
      continue;
    }
    seen.add(definition.id);

    const state = new AnimationState(definition.id)
      .withResetPlayheadOnTransition(definition.resetPlayheadOnTransition)
      .withResetPlayheadOnStart(definition.resetPlayheadOnStart);

    if (definition.asset !== undefined) {
      const handle = resolveAsset(definition.asset);
      if (handle) {
        state.withAsset(handle);
      } else {
        errors.push(`State '${definition.id}' references unknown asset '${definition.asset}'.`);
      }
    }
    if (definition.theme) {
      state.withTheme(definition.theme);
    }
    if (definition.playbackSettings) {
      state.withPlaybackSettings(definition.playbackSettings);
    }
    for (const transition of definition.transitions) {
      state.withTransition(transition);
    }
    player.withState(state);
  }

  errors.push(...player.validate().errors);
  if (errors.length > 0) {
    throw new StateMachineValidationError(errors);
  }
  return player;
}
