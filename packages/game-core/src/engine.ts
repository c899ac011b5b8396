import {
  DEFAULT_BOARD_SIZE,
  DEFAULT_FOUR_PROBABILITY,
  assertValidGrid,
  createEmptyGrid,
  hasEmptyCell,
  maxTile,
  restoreBoard,
  snapshotBoard,
  spawnRandomTile
} from "./board.js";
import { GameError } from "./errors.js";
import { applyMove, hasAnyLegalMove, legalDirections } from "./moves.js";
import { Xorshift32 } from "./rng/xorshift32.js";
import type {
  BoardRules,
  EngineConfig,
  EngineResult,
  GameAction,
  GameEvent,
  GameSnapshot,
  GameState,
  GameStatus,
  Grid,
  TargetTile
} from "./types.js";

export const TARGET_TILES: readonly TargetTile[] = [2048, 4096, 8192];
export const DEFAULT_TARGET: TargetTile = 2048;
export const DEFAULT_INITIAL_TILES = 2;

export function isTargetTile(value: unknown): value is TargetTile {
  return value === 2048 || value === 4096 || value === 8192;
}

function assertTarget(value: unknown): asserts value is TargetTile {
  if (!isTargetTile(value)) throw new GameError("InvalidOperation", `Unsupported target tile: ${String(value)}`);
}

function cloneState(state: GameState): GameState {
  return structuredClone(state);
}

function withRng<T>(state: GameState, fn: (rng: Xorshift32) => T): T {
  const rng = new Xorshift32(state.rng.state);
  const out = fn(rng);
  state.rng.state = rng.state;
  return out;
}

export function computeStatus(grid: Grid, target: TargetTile): GameStatus {
  if (maxTile(grid) >= target) return "Won";
  if (!hasEmptyCell(grid) && !hasAnyLegalMove(grid)) return "Lost";
  return "Ongoing";
}

export function isTerminal(status: GameStatus): boolean {
  return status !== "Ongoing";
}

function resolveRules(config: EngineConfig): BoardRules {
  const size = config.size ?? DEFAULT_BOARD_SIZE;
  const initialTiles = config.initialTiles ?? DEFAULT_INITIAL_TILES;
  const fourProbability = config.fourProbability ?? DEFAULT_FOUR_PROBABILITY;
  if (!Number.isInteger(initialTiles) || initialTiles < 1 || initialTiles > size * size) {
    throw new RangeError(`initialTiles must be between 1 and ${size * size}, got ${initialTiles}`);
  }
  if (!(fourProbability >= 0 && fourProbability <= 1)) throw new RangeError(`fourProbability must be in [0, 1], got ${fourProbability}`);
  return { size, initialTiles, fourProbability };
}

function dealFreshBoard(state: GameState, events: GameEvent[]) {
  state.board = createEmptyGrid(state.rules.size);
  withRng(state, (rng) => {
    for (let i = 0; i < state.rules.initialTiles; i += 1) {
      const placed = spawnRandomTile(state.board, rng, state.rules.fourProbability);
      if (placed) events.push({ type: "TILE_SPAWNED", ...placed });
    }
  });
}

export function createGame(config: EngineConfig): GameState {
  const target = config.target ?? DEFAULT_TARGET;
  assertTarget(target);
  const bestScore = config.bestScore ?? 0;
  if (!Number.isInteger(bestScore) || bestScore < 0) throw new RangeError(`bestScore must be a non-negative integer, got ${bestScore}`);

  const rules = resolveRules(config);
  const state: GameState = {
    board: createEmptyGrid(rules.size),
    score: 0,
    bestScore,
    moveCount: 0,
    target,
    status: "Ongoing",
    undo: null,
    rng: { algo: "xorshift32", state: new Xorshift32(config.seed).state },
    rules
  };
  dealFreshBoard(state, []);
  return state;
}

/** Replaces the board of an existing game, e.g. to set up a position. Status is recomputed. */
export function withBoard(state: GameState, board: Grid): GameState {
  assertValidGrid(board);
  if (board.length !== state.rules.size) throw new Error(`Board must be ${state.rules.size}x${state.rules.size}`);
  const next = cloneState(state);
  next.board = snapshotBoard(board);
  next.status = computeStatus(next.board, next.target);
  return next;
}

export function getLegalActions(state: GameState): GameAction[] {
  const out: GameAction[] = [];
  if (state.status === "Ongoing") {
    for (const direction of legalDirections(state.board)) out.push({ type: "MOVE", direction });
    for (const target of TARGET_TILES) {
      if (target !== state.target) out.push({ type: "SET_TARGET", target });
    }
  }
  if (state.undo) out.push({ type: "UNDO" });
  out.push({ type: "NEW_GAME" });
  out.push({ type: "RESET_BEST" });
  return out;
}

export function toSnapshot(state: GameState): GameSnapshot {
  return {
    board: snapshotBoard(state.board),
    score: state.score,
    bestScore: state.bestScore,
    moveCount: state.moveCount,
    status: state.status,
    target: state.target,
    canUndo: state.undo !== null
  };
}

function setStatus(state: GameState, status: GameStatus, events: GameEvent[]) {
  if (state.status === status) return;
  state.status = status;
  events.push({ type: "STATUS_CHANGED", status });
}

export function applyAction(state: GameState, action: GameAction): EngineResult {
  const nextState = cloneState(state);
  const events: GameEvent[] = [];

  switch (action.type) {
    case "MOVE": {
      if (isTerminal(nextState.status)) {
        throw new GameError("InvalidOperation", `Cannot move: game is already ${nextState.status}`);
      }
      const pendingUndo = { board: snapshotBoard(nextState.board), score: nextState.score, moveCount: nextState.moveCount };
      const res = applyMove(nextState.board, action.direction);
      if (!res.changed) {
        // The caller keeps `state`, so the previous undo record survives untouched.
        throw new GameError("IllegalMove", `Moving ${action.direction} does not change the board`);
      }

      nextState.undo = pendingUndo;
      nextState.board = res.board;
      nextState.moveCount += 1;
      if (res.merges.length) events.push({ type: "TILES_MERGED", merges: res.merges });
      events.push({ type: "MOVED", direction: action.direction, moveCount: nextState.moveCount });
      if (res.scoreDelta > 0) {
        nextState.score += res.scoreDelta;
        events.push({ type: "SCORE_CHANGED", delta: res.scoreDelta, score: nextState.score });
      }

      const placed = withRng(nextState, (rng) => spawnRandomTile(nextState.board, rng, nextState.rules.fourProbability));
      if (placed) events.push({ type: "TILE_SPAWNED", ...placed });

      if (nextState.score > nextState.bestScore) {
        nextState.bestScore = nextState.score;
        events.push({ type: "BEST_SCORE_CHANGED", best: nextState.bestScore, reason: "improved" });
      }
      setStatus(nextState, computeStatus(nextState.board, nextState.target), events);
      return { nextState, events };
    }

    case "UNDO": {
      const snap = nextState.undo;
      if (!snap) throw new GameError("NothingToUndo", "No move to undo");
      nextState.board = restoreBoard(snap.board);
      nextState.score = snap.score;
      nextState.moveCount = snap.moveCount;
      nextState.undo = null;
      events.push({ type: "UNDONE", score: nextState.score, moveCount: nextState.moveCount });
      // Snapshots are only taken from Ongoing positions.
      setStatus(nextState, "Ongoing", events);
      return { nextState, events };
    }

    case "NEW_GAME": {
      const target = action.target ?? nextState.target;
      assertTarget(target);
      nextState.target = target;
      nextState.score = 0;
      nextState.moveCount = 0;
      nextState.undo = null;
      nextState.status = "Ongoing";
      events.push({ type: "GAME_STARTED", target });
      dealFreshBoard(nextState, events);
      return { nextState, events };
    }

    case "SET_TARGET": {
      assertTarget(action.target);
      if (isTerminal(nextState.status)) {
        throw new GameError("InvalidOperation", `Cannot change target: game is already ${nextState.status}`);
      }
      if (action.target === nextState.target) return { nextState, events };
      nextState.target = action.target;
      events.push({ type: "TARGET_CHANGED", target: action.target });
      setStatus(nextState, computeStatus(nextState.board, nextState.target), events);
      return { nextState, events };
    }

    case "RESET_BEST": {
      nextState.bestScore = 0;
      events.push({ type: "BEST_SCORE_CHANGED", best: 0, reason: "reset" });
      return { nextState, events };
    }

    default:
      throw new Error("Unknown action");
  }
}
