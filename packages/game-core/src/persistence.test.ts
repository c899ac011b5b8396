import { describe, expect, it } from "vitest";

import type { GameError } from "./errors.js";
import { createMemoryBestScoreGateway, createStorageBestScoreGateway, parseBestScoreRecord } from "./persistence.js";
import type { KeyValueStorage } from "./persistence.js";

const KEY = "test.best";

class MapStorage implements KeyValueStorage {
  readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }
}

class BrokenStorage implements KeyValueStorage {
  getItem(): string | null {
    throw new Error("storage disabled");
  }

  setItem(): void {
    throw new Error("quota exceeded");
  }
}

describe("storage best-score gateway", () => {
  it("returns 0 when nothing is stored", () => {
    const gw = createStorageBestScoreGateway(new MapStorage(), { key: KEY });
    expect(gw.loadBest()).toBe(0);
  });

  it("round-trips the best score as a JSON record", () => {
    const storage = new MapStorage();
    const gw = createStorageBestScoreGateway(storage, { key: KEY });
    expect(gw.saveBest(1234)).toBe(true);
    expect(storage.items.get(KEY)).toBe('{"best":1234}');
    expect(gw.loadBest()).toBe(1234);
  });

  it("treats malformed records as missing and reports them", () => {
    const storage = new MapStorage();
    const errors: GameError[] = [];
    const gw = createStorageBestScoreGateway(storage, { key: KEY, onError: (e) => errors.push(e) });

    for (const raw of ["not json", '{"best":-5}', '{"best":12.5}', '{"score":10}', "[1,2]", '{"best":1e300}']) {
      storage.setItem(KEY, raw);
      expect(gw.loadBest()).toBe(0);
    }
    expect(errors).toHaveLength(6);
    expect(errors.every((e) => e.code === "PersistenceUnavailable")).toBe(true);
  });

  it("never throws when the storage itself fails", () => {
    const errors: GameError[] = [];
    const gw = createStorageBestScoreGateway(new BrokenStorage(), { key: KEY, onError: (e) => errors.push(e) });
    expect(gw.loadBest()).toBe(0);
    expect(gw.saveBest(10)).toBe(false);
    expect(errors.map((e) => e.message)).toEqual([
      'Could not read best score from "test.best": storage disabled',
      'Could not write best score to "test.best": quota exceeded'
    ]);
  });

  it("refuses to store invalid scores", () => {
    const storage = new MapStorage();
    const gw = createStorageBestScoreGateway(storage, { key: KEY });
    expect(gw.saveBest(-1)).toBe(false);
    expect(gw.saveBest(2.5)).toBe(false);
    expect(storage.items.size).toBe(0);
  });

  it("parses records with extra fields", () => {
    const parsed = parseBestScoreRecord('{"best":7,"savedAt":"2020-01-01"}');
    expect(parsed.ok).toBe(true);
    if (parsed.ok) expect(parsed.record.best).toBe(7);
    expect(parseBestScoreRecord("{").ok).toBe(false);
  });
});

describe("memory best-score gateway", () => {
  it("holds the value in process", () => {
    const gw = createMemoryBestScoreGateway(40);
    expect(gw.loadBest()).toBe(40);
    expect(gw.saveBest(90)).toBe(true);
    expect(gw.value).toBe(90);
    expect(gw.saveBest(-3)).toBe(false);
    expect(gw.loadBest()).toBe(90);
  });
});
