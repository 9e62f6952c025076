import { describe, it, expect } from "vitest";
import { AnimationState } from "../src/player/animation-state.js";
import { LottiePlayer } from "../src/player/lottie-player.js";
import { PlaybackInputError, UnknownStateError } from "../src/errors.js";
import { DEFAULT_PLAYBACK_SETTINGS } from "../src/playhead/settings.js";
import { AssetStore } from "../src/assets/asset-store.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function hoverPlayer(): LottiePlayer {
  return new LottiePlayer("idle")
    .withState(new AnimationState("idle").withTransition({ type: "onMouseEnter", state: "hover" }))
    .withState(new AnimationState("hover").withTransition({ type: "onMouseLeave", state: "idle" }));
}

// ---------------------------------------------------------------------------
// Test suite
// ---------------------------------------------------------------------------

describe("AnimationState", () => {
  it("starts empty", () => {
    const state = new AnimationState("idle");

    expect(state.asset).toBeUndefined();
    expect(state.theme).toBeUndefined();
    expect(state.playbackSettings).toBeUndefined();
    expect(state.transitions).toEqual([]);
    expect(state.resetPlayheadOnTransition).toBe(false);
    expect(state.resetPlayheadOnStart).toBe(false);
  });

  it("builds with chained calls", () => {
    const handle = new AssetStore().reserve();
    const settings = { ...DEFAULT_PLAYBACK_SETTINGS, speed: 2 };
    const state = new AnimationState("hover")
      .withAsset(handle)
      .withTheme({ colors: { outline: "#ff0000" } })
      .withPlaybackSettings(settings)
      .withTransition({ type: "onMouseLeave", state: "idle" })
      .withTransition({ type: "onAfter", state: "idle", secs: 3 })
      .withResetPlayheadOnTransition(true)
      .withResetPlayheadOnStart(true);

    expect(state.asset).toBe(handle);
    expect(state.theme?.colors["outline"]).toBe("#ff0000");
    expect(state.playbackSettings).toBe(settings);
    expect(state.transitions.map((t) => t.type)).toEqual(["onMouseLeave", "onAfter"]);
    expect(state.resetPlayheadOnTransition).toBe(true);
    expect(state.resetPlayheadOnStart).toBe(true);
  });
});

describe("LottiePlayer", () => {
  describe("construction", () => {
    it("pre-arms a transition into the initial state", () => {
      const player = hoverPlayer();

      expect(player.initialState).toBe("idle");
      expect(player.currentState).toBe("idle");
      expect(player.nextState).toBe("idle");
    });

    it("starts neither playing nor stopped", () => {
      const player = hoverPlayer();

      expect(player.isPlaying()).toBe(false);
      expect(player.isStopped()).toBe(false);
      expect(player.isStarted()).toBe(false);
    });
  });

  describe("state lookup", () => {
    it("returns the current state", () => {
      expect(hoverPlayer().state().id).toBe("idle");
    });

    it("throws for an unregistered current state", () => {
      const player = new LottiePlayer("ghost");
      expect(() => player.state()).toThrow(UnknownStateError);
      expect(() => player.state()).toThrow("state not found: 'ghost'");
    });

    it("iterates over every state", () => {
      const ids = [...hoverPlayer().states()].map((s) => s.id).sort();
      expect(ids).toEqual(["hover", "idle"]);
    });

    it("exposes states for mutation", () => {
      const player = hoverPlayer();
      for (const state of player.states()) {
        state.resetPlayheadOnStart = true;
      }
      expect(player.getState("hover").resetPlayheadOnStart).toBe(true);
    });
  });

  describe("transition()", () => {
    it("arms the next state", () => {
      const player = hoverPlayer();
      player.transition("hover");
      expect(player.nextState).toBe("hover");
    });

    it("rejects unknown states", () => {
      const player = hoverPlayer();
      expect(() => player.transition("hovr")).toThrow(UnknownStateError);
      expect(player.nextState).toBe("idle");
    });
  });

  describe("reset()", () => {
    it("arms the initial state and seeks to the minimum frame", () => {
      const player = hoverPlayer();
      player.takeNextState();
      player.commitState("hover");

      player.reset();

      expect(player.takeNextState()).toBe("idle");
      expect(player.takePendingSeek()).toBe(-Number.MAX_VALUE);
    });
  });

  describe("pending requests", () => {
    it("are consumed once", () => {
      const player = hoverPlayer();
      player.seek(12);
      player.setSpeed(1.5);
      player.setIntermission(30);

      expect(player.takePendingIntermission()).toBe(30);
      expect(player.takePendingSeek()).toBe(12);
      expect(player.takePendingSpeed()).toBe(1.5);
      expect(player.takePendingIntermission()).toBeNull();
      expect(player.takePendingSeek()).toBeNull();
      expect(player.takePendingSpeed()).toBeNull();
    });

    it("keep the latest value", () => {
      const player = hoverPlayer();
      player.seek(12);
      player.seek(40);
      expect(player.takePendingSeek()).toBe(40);
    });

    it("reject a negative or non-finite speed", () => {
      const player = hoverPlayer();
      expect(() => player.setSpeed(-1)).toThrow(PlaybackInputError);
      expect(() => player.setSpeed(Infinity)).toThrow(PlaybackInputError);
      expect(player.takePendingSpeed()).toBeNull();
    });

    it("accept a zero speed", () => {
      const player = hoverPlayer();
      player.setSpeed(0);
      expect(player.takePendingSpeed()).toBe(0);
    });

    it("reject a negative intermission and a NaN seek", () => {
      const player = hoverPlayer();
      expect(() => player.setIntermission(-1)).toThrow(PlaybackInputError);
      expect(() => player.seek(NaN)).toThrow(PlaybackInputError);
    });
  });

  describe("status", () => {
    it("play() clears stopped", () => {
      const player = hoverPlayer();
      player.stop();
      player.play();

      expect(player.isPlaying()).toBe(true);
      expect(player.isStopped()).toBe(false);
    });

    it("pause() leaves the state machine running", () => {
      const player = hoverPlayer();
      player.play();
      player.pause();

      expect(player.isPlaying()).toBe(false);
      expect(player.isStopped()).toBe(false);
    });

    it("togglePlay() alternates between play and pause", () => {
      const player = hoverPlayer();

      player.togglePlay();
      expect(player.isPlaying()).toBe(true);

      player.togglePlay();
      expect(player.isPlaying()).toBe(false);
    });

    it("togglePlay() plays a stopped player", () => {
      const player = hoverPlayer();
      player.play();
      player.stop();

      player.togglePlay();

      expect(player.isStopped()).toBe(false);
      expect(player.isPlaying()).toBe(true);
    });

    it("autoplay() only arms a player that has not started", () => {
      const player = hoverPlayer();
      player.autoplay();
      expect(player.isPlaying()).toBe(true);

      player.markStarted();
      player.pause();
      player.autoplay();
      expect(player.isPlaying()).toBe(false);

      player.clearRunStatus();
      expect(player.isStarted()).toBe(false);
    });
  });

  describe("validate()", () => {
    it("accepts a closed state graph", () => {
      expect(hoverPlayer().validate()).toEqual({ valid: true, errors: [] });
    });

    it("reports an unregistered initial state", () => {
      const result = new LottiePlayer("idle").validate();
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(["Initial state 'idle' is not registered."]);
    });

    it("reports unknown transition targets", () => {
      const player = new LottiePlayer("idle").withState(
        new AnimationState("idle").withTransition({ type: "onMouseEnter", state: "hovr" }),
      );

      expect(player.validate().errors).toEqual([
        "State 'idle' transition 0 (onMouseEnter) targets unknown state 'hovr'.",
      ]);
    });

    it("reports unusable delays", () => {
      const player = new LottiePlayer("idle").withState(
        new AnimationState("idle").withTransition({ type: "onAfter", state: "idle", secs: -1 }),
      );

      expect(player.validate().errors).toEqual([
        "State 'idle' transition 0 (onAfter) has invalid secs: -1.",
      ]);
    });
  });
});
