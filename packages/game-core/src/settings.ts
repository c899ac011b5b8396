import Ajv from "ajv/dist/2020.js";

import { isTargetTile } from "./engine.js";
import type { EngineConfig, TargetTile } from "./types.js";

export type GameSettings = {
  contentVersion: string;
  boardSize: number;
  initialTiles: number;
  fourProbability: number;
  targets: TargetTile[];
  defaultTarget: TargetTile;
  storageKey: string;
};

const targetSchema = { type: "integer", enum: [2048, 4096, 8192] };

const settingsSchema = {
  type: "object",
  properties: {
    contentVersion: { type: "string", minLength: 1 },
    boardSize: { type: "integer", minimum: 2, maximum: 8 },
    initialTiles: { type: "integer", minimum: 1 },
    fourProbability: { type: "number", minimum: 0, maximum: 1 },
    targets: { type: "array", items: targetSchema, minItems: 1, uniqueItems: true },
    defaultTarget: targetSchema,
    storageKey: { type: "string", minLength: 1 }
  },
  required: ["contentVersion", "boardSize", "initialTiles", "fourProbability", "targets", "defaultTarget", "storageKey"],
  additionalProperties: false
} as const;

const ajv = new Ajv({ allErrors: true });
const validateSettings = ajv.compile<GameSettings>(settingsSchema);

function assert(condition: unknown, message: string): asserts condition {
  if (!condition) throw new Error(message);
}

export function loadSettings(raw: unknown): GameSettings {
  if (!validateSettings(raw)) {
    throw new Error(`loadSettings: ${ajv.errorsText(validateSettings.errors, { dataVar: "settings" })}`);
  }
  assert(raw.targets.every(isTargetTile), "loadSettings: targets must be 2048, 4096 or 8192");
  assert(raw.targets.includes(raw.defaultTarget), "loadSettings: defaultTarget must be one of targets");
  assert(
    raw.initialTiles <= raw.boardSize * raw.boardSize,
    `loadSettings: initialTiles (${raw.initialTiles}) exceeds the ${raw.boardSize}x${raw.boardSize} board`
  );
  return { ...raw, targets: [...raw.targets] };
}

export function toEngineConfig(
  settings: GameSettings,
  seed: number,
  options: { bestScore?: number; target?: TargetTile } = {}
): EngineConfig {
  const config: EngineConfig = {
    seed,
    target: options.target ?? settings.defaultTarget,
    size: settings.boardSize,
    initialTiles: settings.initialTiles,
    fourProbability: settings.fourProbability
  };
  if (options.bestScore !== undefined) config.bestScore = options.bestScore;
  return config;
}
