import { readFileSync } from "node:fs";

import { GameError } from "@tilemerge/game-core";
import type { GameSnapshot } from "@tilemerge/game-core";
import { describe, expect, it } from "vitest";

import { describeAction, feedbackForError, formatEvent, statusText, translate } from "./format.js";
import type { StringsBundle } from "./format.js";

const strings: StringsBundle = JSON.parse(readFileSync(new URL("../../../packages/game-data/content/strings.en.json", import.meta.url), "utf8"));

function snapshot(overrides: Partial<GameSnapshot>): GameSnapshot {
  return { board: [[0, 0], [0, 0]], score: 0, bestScore: 0, moveCount: 0, status: "Ongoing", target: 2048, canUndo: false, ...overrides };
}

describe("translate", () => {
  it("fills placeholders and falls back to the key", () => {
    expect(translate({ greet: "Hi {name}, {missing}" }, "greet", { name: "Ada" })).toBe("Hi Ada, {missing}");
    expect(translate({}, "nope")).toBe("nope");
  });
});

describe("log formatting", () => {
  it("describes commands", () => {
    expect(describeAction({ type: "MOVE", direction: "left" })).toBe("Move left");
    expect(describeAction({ type: "NEW_GAME", target: 4096 })).toBe("New game (target 4096)");
    expect(describeAction({ type: "NEW_GAME" })).toBe("New game");
    expect(describeAction({ type: "RESET_BEST" })).toBe("Reset best score");
  });

  it("formats engine events", () => {
    expect(formatEvent({ type: "TILE_SPAWNED", row: 0, col: 3, value: 2 })).toBe("SPAWN 2 at (1,4)");
    expect(formatEvent({ type: "SCORE_CHANGED", delta: 8, score: 20 })).toBe("SCORE +8 → 20");
    expect(formatEvent({ type: "TILES_MERGED", merges: [{ row: 0, col: 0, value: 4 }, { row: 1, col: 0, value: 8 }] })).toBe("MERGED 4, 8");
    expect(formatEvent({ type: "BEST_SCORE_CHANGED", best: 0, reason: "reset" })).toBe("BEST reset → 0");
    expect(formatEvent({ type: "BEST_SCORE_CHANGED", best: 64, reason: "improved" })).toBe("BEST → 64");
  });
});

describe("status feedback", () => {
  it("reports the game status", () => {
    expect(statusText(snapshot({}), strings)).toBe("Use arrow keys or buttons to play.");
    expect(statusText(snapshot({ status: "Won", target: 4096 }), strings)).toBe("Reached target 4096!");
    expect(statusText(snapshot({ status: "Lost" }), strings)).toBe("No more moves. Game over.");
  });

  it("ignores illegal moves and explains the other rejections", () => {
    expect(feedbackForError(new GameError("IllegalMove", "x"), strings)).toBeNull();
    expect(feedbackForError(new GameError("NothingToUndo", "x"), strings)).toBe("Nothing to undo.");
    expect(feedbackForError(new GameError("InvalidOperation", "x"), strings)).toBe(
      "The game is over. Start a new game to keep playing."
    );
  });
});
