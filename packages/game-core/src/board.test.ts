import { describe, expect, it } from "vitest";

import {
  assertValidGrid,
  cellAt,
  countTiles,
  createEmptyGrid,
  emptyCells,
  hasEmptyCell,
  isFull,
  isValidTileValue,
  maxTile,
  restoreBoard,
  snapshotBoard,
  spawnRandomTile
} from "./board.js";
import { Xorshift32 } from "./rng/xorshift32.js";

const FULL = [
  [2, 4, 2, 4],
  [4, 2, 4, 2],
  [2, 4, 2, 4],
  [4, 2, 4, 2]
];

describe("board", () => {
  it("creates an empty square grid and rejects degenerate sizes", () => {
    expect(createEmptyGrid(3)).toEqual([
      [0, 0, 0],
      [0, 0, 0],
      [0, 0, 0]
    ]);
    expect(() => createEmptyGrid(1)).toThrow(RangeError);
    expect(() => createEmptyGrid(2.5)).toThrow(RangeError);
  });

  it("reads cells and rejects coordinates outside the board", () => {
    const g = createEmptyGrid(4);
    g[1]![2] = 8;
    expect(cellAt(g, 1, 2)).toBe(8);
    expect(() => cellAt(g, 4, 0)).toThrow(RangeError);
    expect(() => cellAt(g, 0, -1)).toThrow(RangeError);
  });

  it("reports emptiness", () => {
    const g = createEmptyGrid(2);
    expect(hasEmptyCell(g)).toBe(true);
    expect(isFull(g)).toBe(false);
    expect(hasEmptyCell(FULL)).toBe(false);
    expect(isFull(FULL)).toBe(true);
    expect(emptyCells([[2, 0], [0, 4]])).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 }
    ]);
    expect(maxTile(FULL)).toBe(4);
    expect(countTiles([[2, 0], [0, 4]])).toBe(2);
  });

  it("validates tile values", () => {
    expect(isValidTileValue(0)).toBe(true);
    expect(isValidTileValue(2)).toBe(true);
    expect(isValidTileValue(2048)).toBe(true);
    expect(isValidTileValue(1)).toBe(false);
    expect(isValidTileValue(6)).toBe(false);
    expect(isValidTileValue(-2)).toBe(false);
    expect(isValidTileValue(2 ** 31)).toBe(true);
    expect(isValidTileValue(3 * 2 ** 31)).toBe(false);
    expect(isValidTileValue(3 * 2 ** 32)).toBe(false);
    expect(() => assertValidGrid([[2, 3], [0, 0]])).toThrow("Invalid tile value 3 at (0, 1)");
    expect(() => assertValidGrid([[2, 0], [0]])).toThrow("Grid row 1 has length 1, expected 2");
  });

  it("spawns on a uniformly chosen empty cell using the seeded rng", () => {
    const g = createEmptyGrid(4);
    const placed = spawnRandomTile(g, new Xorshift32(1), 0);
    expect(placed).toEqual({ row: 0, col: 0, value: 2 });
    expect(g[0]![0]).toBe(2);
    expect(countTiles(g)).toBe(1);
  });

  it("spawns a 4 when the four-probability is certain", () => {
    const g = createEmptyGrid(4);
    expect(spawnRandomTile(g, new Xorshift32(99), 1)?.value).toBe(4);
  });

  it("fills the only empty cell", () => {
    const g = snapshotBoard(FULL);
    g[2]![1] = 0;
    expect(spawnRandomTile(g, new Xorshift32(5), 0)).toEqual({ row: 2, col: 1, value: 2 });
  });

  it("is a no-op on a full board", () => {
    const g = snapshotBoard(FULL);
    expect(spawnRandomTile(g, new Xorshift32(5))).toBeNull();
    expect(g).toEqual(FULL);
  });

  it("spawns mostly 2s with the default probability", () => {
    const rng = new Xorshift32(2024);
    let fours = 0;
    for (let i = 0; i < 1000; i += 1) {
      const placed = spawnRandomTile(createEmptyGrid(4), rng);
      if (placed?.value === 4) fours += 1;
    }
    expect(fours).toBeGreaterThan(50);
    expect(fours).toBeLessThan(150);
  });

  it("snapshots and restores by deep copy", () => {
    const g = snapshotBoard(FULL);
    const snap = snapshotBoard(g);
    g[0]![0] = 0;
    expect(snap[0]![0]).toBe(2);

    const restored = restoreBoard(snap);
    snap[1]![1] = 0;
    expect(restored).toEqual(FULL);
  });
});
