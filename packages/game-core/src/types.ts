export type Direction = "up" | "down" | "left" | "right";

export type TargetTile = 2048 | 4096 | 8192;
export type GameStatus = "Ongoing" | "Won" | "Lost";

// Row-major; 0 is an empty cell, anything else a power of two >= 2.
export type Grid = number[][];

export type TilePlacement = { row: number; col: number; value: number };

export type MoveResult = {
  board: Grid;
  scoreDelta: number;
  changed: boolean;
  merges: TilePlacement[];
};

export type UndoSnapshot = {
  board: Grid;
  score: number;
  moveCount: number;
};

export type RngState = { algo: "xorshift32"; state: number };

export type BoardRules = {
  size: number;
  initialTiles: number;
  fourProbability: number;
};

export type GameState = {
  board: Grid;
  score: number;
  bestScore: number;
  moveCount: number;
  target: TargetTile;
  status: GameStatus;
  undo: UndoSnapshot | null;
  rng: RngState;
  rules: BoardRules;
};

export type GameSnapshot = {
  readonly board: ReadonlyArray<ReadonlyArray<number>>;
  readonly score: number;
  readonly bestScore: number;
  readonly moveCount: number;
  readonly status: GameStatus;
  readonly target: TargetTile;
  readonly canUndo: boolean;
};

export type EngineConfig = {
  seed: number;
  target?: TargetTile;
  bestScore?: number;
  size?: number;
  initialTiles?: number;
  fourProbability?: number;
};

export type GameAction =
  | { type: "MOVE"; direction: Direction }
  | { type: "UNDO" }
  | { type: "NEW_GAME"; target?: TargetTile }
  | { type: "SET_TARGET"; target: TargetTile }
  | { type: "RESET_BEST" };

export type GameEvent =
  | { type: "GAME_STARTED"; target: TargetTile }
  | { type: "TILE_SPAWNED"; row: number; col: number; value: number }
  | { type: "TILES_MERGED"; merges: TilePlacement[] }
  | { type: "MOVED"; direction: Direction; moveCount: number }
  | { type: "SCORE_CHANGED"; delta: number; score: number }
  | { type: "BEST_SCORE_CHANGED"; best: number; reason: "improved" | "reset" }
  | { type: "STATUS_CHANGED"; status: GameStatus }
  | { type: "UNDONE"; score: number; moveCount: number }
  | { type: "TARGET_CHANGED"; target: TargetTile }
  | { type: "PERSISTENCE_UNAVAILABLE"; message: string };

export type EngineResult = { nextState: GameState; events: GameEvent[] };
