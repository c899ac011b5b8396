import { gridsEqual } from "./board.js";
import type { Direction, Grid, MoveResult, TilePlacement } from "./types.js";

export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

export type LineSlide = {
  line: number[];
  scoreDelta: number;
  // Indices (in the slid line) that received a merged tile.
  mergedAt: number[];
};

export function compressLine(line: readonly number[]): number[] {
  const out = line.filter((v) => v !== 0);
  while (out.length < line.length) out.push(0);
  return out;
}

/**
 * One left-to-right merge pass over a compressed line. A cell that merged
 * cannot merge again in the same pass, so [2,2,2,2] yields [4,0,4,0].
 */
export function mergeLine(line: readonly number[]): LineSlide {
  const out = [...line];
  const mergedAt: number[] = [];
  let scoreDelta = 0;
  for (let i = 0; i < out.length - 1; i += 1) {
    const v = out[i] ?? 0;
    if (v === 0 || v !== out[i + 1]) continue;
    if (mergedAt.includes(i)) continue;
    out[i] = v * 2;
    out[i + 1] = 0;
    scoreDelta += v * 2;
    mergedAt.push(i);
  }
  return { line: out, scoreDelta, mergedAt };
}

/** Slides a line toward index 0: compress, merge, compress. */
export function slideLine(line: readonly number[]): LineSlide {
  const merged = mergeLine(compressLine(line));
  const finalLine = compressLine(merged.line);

  // Merged cells keep their relative order, so the k-th merged source lands
  // at the position of the k-th non-zero cell it became after compression.
  const mergedAt: number[] = [];
  let cursor = 0;
  merged.line.forEach((v, i) => {
    if (v === 0) return;
    if (merged.mergedAt.includes(i)) mergedAt.push(cursor);
    cursor += 1;
  });

  return { line: finalLine, scoreDelta: merged.scoreDelta, mergedAt };
}

export function reverseRows(grid: Grid): Grid {
  return grid.map((row) => [...row].reverse());
}

export function transpose(grid: Grid): Grid {
  return grid.map((_, c) => grid.map((row) => row[c] ?? 0));
}

function toLeftFrame(grid: Grid, direction: Direction): Grid {
  switch (direction) {
    case "left":
      return grid.map((row) => [...row]);
    case "right":
      return reverseRows(grid);
    case "up":
      return transpose(grid);
    case "down":
      return reverseRows(transpose(grid));
  }
}

function fromLeftFrame(grid: Grid, direction: Direction): Grid {
  switch (direction) {
    case "left":
      return grid;
    case "right":
      return reverseRows(grid);
    case "up":
      return transpose(grid);
    case "down":
      return transpose(reverseRows(grid));
  }
}

function toBoardPosition(line: number, index: number, size: number, direction: Direction): { row: number; col: number } {
  switch (direction) {
    case "left":
      return { row: line, col: index };
    case "right":
      return { row: line, col: size - 1 - index };
    case "up":
      return { row: index, col: line };
    case "down":
      return { row: size - 1 - index, col: line };
  }
}

export function applyMove(grid: Grid, direction: Direction): MoveResult {
  const size = grid.length;
  const lines = toLeftFrame(grid, direction);
  const merges: TilePlacement[] = [];
  let scoreDelta = 0;

  const slid = lines.map((line, lineIndex) => {
    const res = slideLine(line);
    scoreDelta += res.scoreDelta;
    for (const ix of res.mergedAt) {
      const pos = toBoardPosition(lineIndex, ix, size, direction);
      merges.push({ ...pos, value: res.line[ix] ?? 0 });
    }
    return res.line;
  });

  const board = fromLeftFrame(slid, direction);
  return { board, scoreDelta, changed: !gridsEqual(board, grid), merges };
}

export function canMove(grid: Grid, direction: Direction): boolean {
  return applyMove(grid, direction).changed;
}

export function legalDirections(grid: Grid): Direction[] {
  return DIRECTIONS.filter((d) => canMove(grid, d));
}

export function hasAnyLegalMove(grid: Grid): boolean {
  return DIRECTIONS.some((d) => canMove(grid, d));
}
