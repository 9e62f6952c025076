/**
 * AnimationEngine: the top-level facade that ties together the asset
 * store, the entities, the clock and the four tick stages.
 */

import type { PlaybackSettings, Theme } from "@playhead/schema";
import { AssetStore } from "../assets/asset-store.js";
import type { AssetHandle } from "../assets/types.js";
import type { CancelHandle, Clock } from "../clock/clock.js";
import { TimerClock } from "../clock/timer-clock.js";
import { StateMachineValidationError } from "../errors.js";
import type { LottiePlayer } from "../player/lottie-player.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { advancePlayheads, applyPlayerInputs, runTransitions, setState } from "./stages.js";
import type { StageContext } from "./stages.js";
import { NO_HIT_TESTER, NO_POINTER } from "./types.js";
import type { HitTester, PlayerEntity, PointerSource } from "./types.js";

/** Options for creating an AnimationEngine. */
export interface AnimationEngineOptions {
  /** Time source and frame scheduler. Defaults to a 60 fps TimerClock. */
  readonly clock?: Clock;
  /** Pointer state, sampled once per tick. Defaults to no pointer. */
  readonly pointer?: PointerSource;
  /** Pointer-inside test. Defaults to "never inside". */
  readonly hitTester?: HitTester;
  /** Defaults to console output tagged `[AnimationEngine]`. */
  readonly logger?: Logger;
}

/** Options for spawning an entity. */
export interface SpawnOptions {
  /** Unique entity id. Generated when omitted. */
  readonly id?: string;
  /** Asset bound until a state commit swaps it. */
  readonly asset: AssetHandle;
  /** State machine. Omit for an uncontrolled asset that just plays. */
  readonly player?: LottiePlayer;
  /** Settings until the first state commit. */
  readonly settings?: PlaybackSettings;
  readonly theme?: Theme;
}

/**
 * Runs state-machine players against a shared asset arena.
 *
 * @example
 * ```ts
 * const engine = new AnimationEngine({ clock, pointer, hitTester });
 * const handle = engine.assets.insert(createLottieAsset({ ... }));
 * engine.spawn({ asset: handle, player });
 *
 * engine.tick(1 / 60);   // drive it yourself
 * engine.start();        // or let the clock drive it
 * ```
 */
export class AnimationEngine {
  /** Every asset entities may bind. */
  readonly assets = new AssetStore();

  private readonly clock: Clock;
  private readonly pointer: PointerSource;
  private readonly hitTester: HitTester;
  private readonly logger: Logger;
  private readonly entityMap = new Map<string, PlayerEntity>();
  private entityCounter = 0;

  private frameHandle: CancelHandle | null = null;
  private lastTimestamp: number | null = null;
  private looping = false;

  constructor(options: AnimationEngineOptions = {}) {
    this.clock = options.clock ?? new TimerClock();
    this.pointer = options.pointer ?? NO_POINTER;
    this.hitTester = options.hitTester ?? NO_HIT_TESTER;
    this.logger = options.logger ?? createConsoleLogger("AnimationEngine");
  }

  // ---------------------------------------------------------------------------
  // Entities
  // ---------------------------------------------------------------------------

  /**
   * Add an entity.
   *
   * @throws StateMachineValidationError if the player's state graph is invalid
   * @throws Error if the id is already taken
   */
  spawn(options: SpawnOptions): PlayerEntity {
    if (options.player) {
      const result = options.player.validate();
      if (!result.valid) {
        throw new StateMachineValidationError(result.errors);
      }
    }

    const id = options.id ?? `entity-${++this.entityCounter}`;
    if (this.entityMap.has(id)) {
      throw new Error(`Entity already exists: ${id}`);
    }

    const entity: PlayerEntity = {
      id,
      asset: options.asset,
      player: options.player,
      settings: options.settings,
      theme: options.theme,
      hovered: false,
    };
    this.entityMap.set(id, entity);
    return entity;
  }

  /** Remove an entity. Returns whether it existed. */
  despawn(id: string): boolean {
    return this.entityMap.delete(id);
  }

  entity(id: string): PlayerEntity | undefined {
    return this.entityMap.get(id);
  }

  entities(): readonly PlayerEntity[] {
    return [...this.entityMap.values()];
  }

  // ---------------------------------------------------------------------------
  // Ticking
  // ---------------------------------------------------------------------------

  /**
   * Run the four stages once over every entity.
   *
   * @param dt - Seconds since the previous tick. Negative or non-finite is treated as 0.
   */
  tick(dt: number): void {
    const step = Number.isFinite(dt) && dt > 0 ? dt : 0;
    const context: StageContext = {
      entities: this.entities(),
      assets: this.assets,
      logger: this.logger,
    };
    const pointer = this.pointer.snapshot();
    const now = this.clock.now();

    applyPlayerInputs(context);
    advancePlayheads(context, step, now);
    runTransitions(context, pointer, this.hitTester, now);
    setState(context);
  }

  /** Drive `tick()` from the clock's frames until `stop()`. */
  start(): void {
    if (this.looping) return;
    this.looping = true;
    this.lastTimestamp = null;
    this.scheduleFrame();
  }

  /** Stop the frame loop. Entities are kept. */
  stop(): void {
    this.looping = false;
    this.lastTimestamp = null;
    if (this.frameHandle) {
      this.frameHandle.cancel();
      this.frameHandle = null;
    }
  }

  /** Whether the frame loop is running. */
  get running(): boolean {
    return this.looping;
  }

  /** Stop the frame loop and drop all entities. */
  dispose(): void {
    this.stop();
    this.entityMap.clear();
  }

  private scheduleFrame(): void {
    this.frameHandle = this.clock.requestFrame((timestamp) => {
      this.onFrame(timestamp);
    });
  }

  private onFrame(timestamp: number): void {
    this.frameHandle = null;
    const dt = this.lastTimestamp === null ? 0 : (timestamp - this.lastTimestamp) / 1000;
    this.lastTimestamp = timestamp;
    try {
      this.tick(dt);
    } catch (err) {
      this.stop();
      throw err;
    }
    if (this.looping) {
      this.scheduleFrame();
    }
  }
}
