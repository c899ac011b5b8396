import type { Xorshift32 } from "./rng/xorshift32.js";
import type { Grid, TilePlacement } from "./types.js";

export const DEFAULT_BOARD_SIZE = 4;
export const DEFAULT_FOUR_PROBABILITY = 0.1;

export function createEmptyGrid(size: number): Grid {
  if (!Number.isInteger(size) || size < 2) throw new RangeError(`Board size must be an integer >= 2, got ${size}`);
  return Array.from({ length: size }, () => new Array<number>(size).fill(0));
}

export function isValidTileValue(value: number): boolean {
  if (value === 0) return true;
  return Number.isSafeInteger(value) && value >= 2 && Number.isInteger(Math.log2(value));
}

export function assertValidGrid(grid: Grid): void {
  const size = grid.length;
  if (size < 2) throw new Error("Grid must have at least 2 rows");
  grid.forEach((row, r) => {
    if (row.length !== size) throw new Error(`Grid row ${r} has length ${row.length}, expected ${size}`);
    row.forEach((v, c) => {
      if (!isValidTileValue(v)) throw new Error(`Invalid tile value ${v} at (${r}, ${c})`);
    });
  });
}

export function cellAt(grid: Grid, row: number, col: number): number {
  const value = grid[row]?.[col];
  if (value === undefined) throw new RangeError(`Cell (${row}, ${col}) is outside the ${grid.length}x${grid.length} board`);
  return value;
}

export function emptyCells(grid: Grid): Array<{ row: number; col: number }> {
  const out: Array<{ row: number; col: number }> = [];
  grid.forEach((cells, row) => {
    cells.forEach((v, col) => {
      if (v === 0) out.push({ row, col });
    });
  });
  return out;
}

export function hasEmptyCell(grid: Grid): boolean {
  return grid.some((row) => row.includes(0));
}

export function isFull(grid: Grid): boolean {
  return !hasEmptyCell(grid);
}

export function maxTile(grid: Grid): number {
  let max = 0;
  for (const row of grid) for (const v of row) if (v > max) max = v;
  return max;
}

export function countTiles(grid: Grid): number {
  let n = 0;
  for (const row of grid) for (const v of row) if (v !== 0) n += 1;
  return n;
}

/**
 * Places a 2 (or a 4 with `fourProbability`) on a uniformly chosen empty cell.
 * Mutates `grid`; returns null without touching it when the board is full.
 */
export function spawnRandomTile(grid: Grid, rng: Xorshift32, fourProbability = DEFAULT_FOUR_PROBABILITY): TilePlacement | null {
  const cells = emptyCells(grid);
  if (cells.length === 0) return null;
  const cell = cells[rng.nextIndex(cells.length)];
  if (!cell) return null;
  const value = rng.nextFloat() < fourProbability ? 4 : 2;
  const row = grid[cell.row];
  if (!row) return null;
  row[cell.col] = value;
  return { row: cell.row, col: cell.col, value };
}

export function snapshotBoard(grid: Grid): Grid {
  return grid.map((row) => [...row]);
}

export function restoreBoard(snapshot: Grid): Grid {
  return snapshot.map((row) => [...row]);
}

export function gridsEqual(a: Grid, b: Grid): boolean {
  if (a.length !== b.length) return false;
  return a.every((row, r) => {
    const other = b[r];
    return other !== undefined && row.length === other.length && row.every((v, c) => v === other[c]);
  });
}
