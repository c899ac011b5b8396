export { Xorshift32 } from "./rng/xorshift32.js";
export type {
  Direction,
  EngineConfig,
  EngineResult,
  GameAction,
  GameEvent,
  GameSnapshot,
  GameState,
  GameStatus,
  Grid,
  MoveResult,
  TargetTile,
  TilePlacement
} from "./types.js";
export { GameError, isGameError } from "./errors.js";
export type { GameErrorCode } from "./errors.js";
export {
  cellAt,
  countTiles,
  createEmptyGrid,
  emptyCells,
  hasEmptyCell,
  isFull,
  maxTile,
  restoreBoard,
  snapshotBoard,
  spawnRandomTile
} from "./board.js";
export { DIRECTIONS, applyMove, canMove, hasAnyLegalMove, legalDirections } from "./moves.js";
export {
  DEFAULT_TARGET,
  TARGET_TILES,
  applyAction,
  computeStatus,
  createGame,
  getLegalActions,
  isTargetTile,
  isTerminal,
  toSnapshot,
  withBoard
} from "./engine.js";
export { GameSession } from "./session.js";
export { createMemoryBestScoreGateway, createStorageBestScoreGateway, parseBestScoreRecord } from "./persistence.js";
export type { BestScoreGateway, KeyValueStorage } from "./persistence.js";
export { loadSettings, toEngineConfig } from "./settings.js";
export type { GameSettings } from "./settings.js";
