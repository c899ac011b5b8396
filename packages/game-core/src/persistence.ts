import Ajv from "ajv/dist/2020.js";
import type { JSONSchemaType } from "ajv";

import { GameError } from "./errors.js";

/** Read/write access to the one global best score. Implementations never throw. */
export interface BestScoreGateway {
  loadBest(): number;
  saveBest(value: number): boolean;
}

/** The subset of the Web Storage API the gateway needs. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export type BestScoreRecord = { best: number };

export type StorageGatewayOptions = {
  key: string;
  onError?: (err: GameError) => void;
};

const bestScoreRecordSchema: JSONSchemaType<BestScoreRecord> = {
  type: "object",
  properties: {
    best: { type: "integer", minimum: 0, maximum: Number.MAX_SAFE_INTEGER }
  },
  required: ["best"],
  additionalProperties: true
};

const ajv = new Ajv({ allErrors: true });
const validateRecord = ajv.compile(bestScoreRecordSchema);

function isValidScore(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export type ParsedBestScore = { ok: true; record: BestScoreRecord } | { ok: false; reason: string };

export function parseBestScoreRecord(raw: string): ParsedBestScore {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  if (!validateRecord(parsed)) return { ok: false, reason: ajv.errorsText(validateRecord.errors) };
  return { ok: true, record: parsed };
}

export function createStorageBestScoreGateway(storage: KeyValueStorage, options: StorageGatewayOptions): BestScoreGateway {
  const report = (message: string, cause?: unknown) => {
    const detail = cause === undefined ? message : `${message}: ${cause instanceof Error ? cause.message : String(cause)}`;
    options.onError?.(new GameError("PersistenceUnavailable", detail));
  };

  return {
    loadBest() {
      let raw: string | null;
      try {
        raw = storage.getItem(options.key);
      } catch (err) {
        report(`Could not read best score from "${options.key}"`, err);
        return 0;
      }
      if (raw === null) return 0;
      const parsed = parseBestScoreRecord(raw);
      if (!parsed.ok) {
        report(`Stored best score under "${options.key}" is unreadable (${parsed.reason})`);
        return 0;
      }
      return parsed.record.best;
    },

    saveBest(value) {
      if (!isValidScore(value)) {
        report(`Refusing to store invalid best score ${value}`);
        return false;
      }
      const record: BestScoreRecord = { best: value };
      try {
        storage.setItem(options.key, JSON.stringify(record));
        return true;
      } catch (err) {
        report(`Could not write best score to "${options.key}"`, err);
        return false;
      }
    }
  };
}

export function createMemoryBestScoreGateway(initial = 0): BestScoreGateway & { readonly value: number } {
  let value = isValidScore(initial) ? initial : 0;
  return {
    get value() {
      return value;
    },
    loadBest() {
      return value;
    },
    saveBest(next) {
      if (!isValidScore(next)) return false;
      value = next;
      return true;
    }
  };
}
