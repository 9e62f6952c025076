/**
 * Error types raised by the engine.
 *
 * Unknown states and invalid transitions are authoring bugs and propagate
 * out of `tick()`. Missing assets or pointers are never errors: the
 * stages skip them.
 */

/** A state id was looked up that the player does not know. */
export class UnknownStateError extends Error {
  override readonly name = "UnknownStateError";

  constructor(readonly stateId: string) {
    super(`state not found: '${stateId}'`);
  }
}

/** A transition rule cannot be evaluated against the bound asset. */
export class InvalidTransitionError extends Error {
  override readonly name = "InvalidTransitionError";

  constructor(
    readonly stateId: string,
    message: string,
  ) {
    super(`invalid state: '${stateId}', ${message}`);
  }
}

/** A player failed load-time validation. */
export class StateMachineValidationError extends Error {
  override readonly name = "StateMachineValidationError";

  constructor(readonly errors: readonly string[]) {
    super(`invalid state machine:\n  ${errors.join("\n  ")}`);
  }
}

/** A playback request or settings document was rejected. */
export class PlaybackInputError extends Error {
  override readonly name = "PlaybackInputError";
}
