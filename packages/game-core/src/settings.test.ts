import { readFileSync } from "node:fs";

import { describe, expect, it } from "vitest";

import { createGame } from "./engine.js";
import { loadSettings, toEngineConfig } from "./settings.js";

function readShippedSettings(): Record<string, unknown> {
  return JSON.parse(readFileSync(new URL("../../game-data/content/settings.json", import.meta.url), "utf8"));
}

describe("loadSettings", () => {
  it("accepts the shipped settings", () => {
    const settings = loadSettings(readShippedSettings());
    expect(settings.boardSize).toBe(4);
    expect(settings.initialTiles).toBe(2);
    expect(settings.fourProbability).toBe(0.1);
    expect(settings.targets).toEqual([2048, 4096, 8192]);
    expect(settings.defaultTarget).toBe(2048);
    expect(settings.storageKey).toBe("tm.bestScore.v1");
  });

  it("builds an engine config that createGame accepts", () => {
    const settings = loadSettings(readShippedSettings());
    const config = toEngineConfig(settings, 12, { bestScore: 300 });
    expect(config).toEqual({ seed: 12, target: 2048, bestScore: 300, size: 4, initialTiles: 2, fourProbability: 0.1 });
    expect(createGame(config).bestScore).toBe(300);
    expect(toEngineConfig(settings, 5, { target: 8192 })).toEqual({ seed: 5, target: 8192, size: 4, initialTiles: 2, fourProbability: 0.1 });
  });

  it("rejects schema violations", () => {
    expect(() => loadSettings({ ...readShippedSettings(), boardSize: 1 })).toThrow(/boardSize/);
    expect(() => loadSettings({ ...readShippedSettings(), targets: [1024] })).toThrow(/targets/);
    expect(() => loadSettings({ ...readShippedSettings(), theme: "dark" })).toThrow(/additional properties/);
    expect(() => loadSettings(null)).toThrow(/loadSettings/);
  });

  it("checks rules that span fields", () => {
    expect(() => loadSettings({ ...readShippedSettings(), targets: [4096], defaultTarget: 2048 })).toThrow(
      "loadSettings: defaultTarget must be one of targets"
    );
    expect(() => loadSettings({ ...readShippedSettings(), initialTiles: 17 })).toThrow(
      "loadSettings: initialTiles (17) exceeds the 4x4 board"
    );
  });
});
