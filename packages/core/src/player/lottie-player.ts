/**
 * LottiePlayer: the state-machine controller attached to an entity.
 *
 * Owns the state graph, the current and pending state ids, the run status
 * and one-shot playback requests (seek, speed, intermission). Nothing here
 * touches an asset: requests are consumed by the engine's tick stages, in
 * order, at the start of the next tick.
 */

import type { AnimationTransition } from "@playhead/schema";
import { UnknownStateError } from "../errors.js";
import {
  intermissionSchema,
  parseOrThrow,
  seekFrameSchema,
  speedSchema,
} from "../playhead/settings.js";
import type { AnimationState } from "./animation-state.js";

/** Result of validating a player's state graph. */
export interface ValidationResult {
  /** Whether every check passed. */
  readonly valid: boolean;
  /** Human-readable problems found. */
  readonly errors: readonly string[];
}

/**
 * A player that mirrors dotLottie interactivity: named states bound to
 * assets, and transitions between them triggered by time, completion or
 * the pointer.
 *
 * @example
 * ```ts
 * const player = new LottiePlayer("idle")
 *   .withState(new AnimationState("idle").withTransition({ type: "onMouseEnter", state: "hover" }))
 *   .withState(new AnimationState("hover").withTransition({ type: "onMouseLeave", state: "idle" }));
 * ```
 */
export class LottiePlayer {
  readonly initialState: string;
  private current: string;
  private next: string | null;
  private readonly stateMap = new Map<string, AnimationState>();

  private pendingSeekFrame: number | null = null;
  private pendingIntermission: number | null = null;
  private pendingSpeed: number | null = null;

  private started = false;
  /** State machines keep running while paused. */
  private playing = false;
  /** Stopped players run neither transitions nor the playhead. */
  private stopped = false;

  constructor(initialState: string) {
    this.initialState = initialState;
    this.current = initialState;
    // The first tick commits the initial state like any other transition.
    this.next = initialState;
  }

  /** Register a state. A later state with the same id replaces the earlier one. */
  withState(state: AnimationState): this {
    this.stateMap.set(state.id, state);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get currentState(): string {
    return this.current;
  }

  /** The transition waiting to be committed, if any. */
  get nextState(): string | null {
    return this.next;
  }

  /**
   * The current state.
   *
   * @throws UnknownStateError if the current id is not registered
   */
  state(): AnimationState {
    return this.getState(this.current);
  }

  /** @throws UnknownStateError */
  getState(id: string): AnimationState {
    const state = this.stateMap.get(id);
    if (!state) {
      throw new UnknownStateError(id);
    }
    return state;
  }

  hasState(id: string): boolean {
    return this.stateMap.has(id);
  }

  /** All registered states, in no particular order. */
  states(): IterableIterator<AnimationState> {
    return this.stateMap.values();
  }

  isPlaying(): boolean {
    return this.playing;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /** Whether playback has begun since the last state entry. */
  isStarted(): boolean {
    return this.started;
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  /**
   * Request a transition, committed at the end of the next tick.
   *
   * @throws UnknownStateError if the state is not registered
   */
  transition(id: string): void {
    if (!this.stateMap.has(id)) {
      throw new UnknownStateError(id);
    }
    this.next = id;
  }

  /**
   * Go back to the initial state, seeking to the minimum frame of the
   * current loop. With an intermission the loop start is not a multiple of
   * the segment length, so the commit's loop collapse may leave the
   * playhead past frame 0.
   */
  reset(): void {
    this.next = this.initialState;
    this.seek(-Number.MAX_VALUE);
  }

  /** Seek to a frame within the current loop. */
  seek(frame: number): void {
    this.pendingSeekFrame = parseOrThrow(seekFrameSchema, frame, "seek frame");
  }

  /**
   * Change the idle frames between loops. Applies only to the current
   * playback, not to any registered state.
   */
  setIntermission(intermission: number): void {
    this.pendingIntermission = parseOrThrow(intermissionSchema, intermission, "intermission");
  }

  /**
   * Change the speed multiplier. Applies only to the current playback, not
   * to any registered state.
   *
   * @throws PlaybackInputError for a negative or non-finite speed
   */
  setSpeed(speed: number): void {
    this.pendingSpeed = parseOrThrow(speedSchema, speed, "speed");
  }

  togglePlay(): void {
    if (this.stopped || !this.playing) {
      this.play();
    } else {
      this.pause();
    }
  }

  play(): void {
    this.playing = true;
    this.stopped = false;
  }

  /** Pause the playhead. State machines keep running. */
  pause(): void {
    this.playing = false;
  }

  /** Stop the playhead and the state machine. */
  stop(): void {
    this.stopped = true;
  }

  // ---------------------------------------------------------------------------
  // Validation
  // ---------------------------------------------------------------------------

  /**
   * Check the state graph: the initial state and every transition target
   * must be registered, and delays must be usable.
   */
  validate(): ValidationResult {
    const errors: string[] = [];

    if (!this.stateMap.has(this.initialState)) {
      errors.push(`Initial state '${this.initialState}' is not registered.`);
    }

    for (const state of this.stateMap.values()) {
      state.transitions.forEach((transition: AnimationTransition, index) => {
        if (!this.stateMap.has(transition.state)) {
          errors.push(
            `State '${state.id}' transition ${index} (${transition.type}) targets unknown state '${transition.state}'.`,
          );
        }
        if (transition.type === "onAfter" && !(Number.isFinite(transition.secs) && transition.secs >= 0)) {
          errors.push(
            `State '${state.id}' transition ${index} (onAfter) has invalid secs: ${transition.secs}.`,
          );
        }
      });
    }

    return { valid: errors.length === 0, errors };
  }

  // ---------------------------------------------------------------------------
  // Tick-stage hooks (called by the engine)
  // ---------------------------------------------------------------------------

  /** @internal */
  takePendingIntermission(): number | null {
    const value = this.pendingIntermission;
    this.pendingIntermission = null;
    return value;
  }

  /** @internal */
  takePendingSeek(): number | null {
    const value = this.pendingSeekFrame;
    this.pendingSeekFrame = null;
    return value;
  }

  /** @internal */
  takePendingSpeed(): number | null {
    const value = this.pendingSpeed;
    this.pendingSpeed = null;
    return value;
  }

  /** @internal */
  takeNextState(): string | null {
    const value = this.next;
    this.next = null;
    return value;
  }

  /**
   * Arm a transition chosen by the state machine itself. Targets were
   * checked by `validate()`, so no lookup happens here.
   *
   * @internal
   */
  requestState(id: string): void {
    this.next = id;
  }

  /** Entering a state clears the run status. @internal */
  clearRunStatus(): void {
    this.started = false;
    this.playing = false;
  }

  /** Autoplay: start playing unless playback already began. @internal */
  autoplay(): void {
    if (!this.started) {
      this.playing = true;
    }
  }

  /** @internal */
  markStarted(): void {
    this.started = true;
  }

  /** @internal */
  commitState(id: string): void {
    this.current = id;
    this.next = null;
  }
}
