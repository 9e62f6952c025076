/**
 * Integration test: definition file → loader → engine → stage collaborators
 *
 * Proves the full playhead pipeline works end-to-end:
 * 1. A state-machine definition file, checked against the JSON Schema
 * 2. loadStateMachine from @playhead/core builds the player
 * 3. PointerTracker and TransformHitTester from @playhead/stage feed the pointer
 * 4. AnimationEngine ticks the player through hover, click and completion
 *
 * No rendering involved: assertions read the playhead and state ids.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import * as THREE from "three";
import Ajv2020Module from "ajv/dist/2020.js";
import {
  AnimationEngine,
  TestClock,
  createLottieAsset,
  loadStateMachine,
  previousFloat,
  silentLogger,
} from "@playhead/core";
import type { AssetHandle, LottieAsset, LottiePlayer, PlayerEntity } from "@playhead/core";
import { PointerTracker, TransformHitTester, createViewCamera } from "@playhead/stage";

const __dirname = dirname(fileURLToPath(import.meta.url));
const Ajv2020 = Ajv2020Module.default;

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

const definition = readJson(resolve(__dirname, "fixtures/button.state-machine.json"));

describe("Integration: hover and click pipeline", () => {
  let engine: AnimationEngine;
  let pointer: PointerTracker;
  let player: LottiePlayer;
  let entity: PlayerEntity;
  let asset: LottieAsset;

  beforeEach(() => {
    const camera = createViewCamera({ width: 800, height: 600 });
    pointer = new PointerTracker(camera, 800, 600);
    const hitTester = new TransformHitTester();
    engine = new AnimationEngine({ clock: new TestClock(), pointer, hitTester, logger: silentLogger });

    // 60 frames at 30 fps, 100 × 50 units
    asset = createLottieAsset({ frameStart: 0, frameEnd: 60, frameRate: 30, width: 100, height: 50 });
    const handle: AssetHandle = engine.assets.insert(asset);

    player = loadStateMachine(definition, (name) => (name === "button" ? handle : undefined));
    entity = engine.spawn({ id: "button", asset: handle, player });
    hitTester.setWorldTransform("button", new THREE.Matrix4().makeTranslation(200, 100, 0));
  });

  it("the definition file satisfies the JSON Schema", () => {
    const schema = readJson(resolve(__dirname, "../../packages/schema/src/state-machine.schema.json"));
    if (typeof schema !== "object" || schema === null) {
      throw new Error("schema is not an object");
    }
    const validate = new Ajv2020({ allErrors: true }).compile(schema);

    expect(validate(definition)).toBe(true);
  });

  it("runs idle → hover → pressed → idle", () => {
    engine.tick(0);
    expect(player.currentState).toBe("idle");

    engine.tick(1);
    expect(asset.renderedFrames).toBe(30);

    // Pointer over the button: hover mirrors frame 30 of 60 for reverse playback
    pointer.moveTo({ x: 200, y: 100 });
    engine.tick(0);
    expect(player.currentState).toBe("hover");
    expect(entity.settings?.direction).toBe("reverse");
    expect(asset.renderedFrames).toBe(30);

    // Click: pressed restarts from 0 with its own theme
    pointer.press(0);
    engine.tick(0);
    expect(player.currentState).toBe("pressed");
    expect(asset.renderedFrames).toBe(0);
    expect(entity.theme?.colors["fill"]).toBe("#2255aa");

    // Not yet complete
    engine.tick(1);
    expect(player.currentState).toBe("pressed");

    // 60 frames played: onComplete returns to idle, collapsed to one loop
    engine.tick(1);
    expect(player.currentState).toBe("idle");
    expect(asset.renderedFrames).toBe(0);
    expect(entity.settings).toBeUndefined();
  });

  it("leaves hover when the pointer moves off", () => {
    engine.tick(0);
    pointer.moveTo({ x: 200, y: 100 });
    engine.tick(0);
    expect(player.currentState).toBe("hover");

    pointer.moveTo({ x: 0, y: 0 });
    engine.tick(0);
    expect(player.currentState).toBe("idle");
    // reverse → normal keeps the displayed frame
    expect(asset.renderedFrames).toBe(60 - previousFloat(60));
  });

  it("ignores the pointer while stopped", () => {
    engine.tick(0);
    player.stop();
    pointer.moveTo({ x: 200, y: 100 });
    engine.tick(1);

    expect(player.currentState).toBe("idle");
    expect(asset.renderedFrames).toBe(0);
  });
});
