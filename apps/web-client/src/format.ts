import type { GameAction, GameError, GameEvent, GameSnapshot } from "@tilemerge/game-core";

export type StringsBundle = Record<string, string>;

export function translate(strings: StringsBundle, key: string, vars: Record<string, string | number> = {}): string {
  const template = strings[key];
  if (template === undefined) return key;
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const v = vars[name];
    return v === undefined ? match : String(v);
  });
}

export function describeAction(a: GameAction): string {
  switch (a.type) {
    case "MOVE":
      return `Move ${a.direction}`;
    case "UNDO":
      return "Undo";
    case "NEW_GAME":
      return a.target ? `New game (target ${a.target})` : "New game";
    case "SET_TARGET":
      return `Set target ${a.target}`;
    case "RESET_BEST":
      return "Reset best score";
  }
}

export function formatEvent(e: GameEvent): string {
  switch (e.type) {
    case "GAME_STARTED":
      return `GAME_STARTED target=${e.target}`;
    case "TILE_SPAWNED":
      return `SPAWN ${e.value} at (${e.row + 1},${e.col + 1})`;
    case "TILES_MERGED":
      return `MERGED ${e.merges.map((m) => m.value).join(", ")}`;
    case "MOVED":
      return `MOVED ${e.direction} #${e.moveCount}`;
    case "SCORE_CHANGED":
      return `SCORE +${e.delta} → ${e.score}`;
    case "BEST_SCORE_CHANGED":
      return e.reason === "reset" ? "BEST reset → 0" : `BEST → ${e.best}`;
    case "STATUS_CHANGED":
      return `STATUS → ${e.status}`;
    case "UNDONE":
      return `UNDONE → score ${e.score}, moves ${e.moveCount}`;
    case "TARGET_CHANGED":
      return `TARGET → ${e.target}`;
    case "PERSISTENCE_UNAVAILABLE":
      return `STORAGE ${e.message}`;
  }
}

export function statusText(snapshot: GameSnapshot, strings: StringsBundle): string {
  switch (snapshot.status) {
    case "Won":
      return translate(strings, "status.won", { target: snapshot.target });
    case "Lost":
      return translate(strings, "status.lost");
    case "Ongoing":
      return translate(strings, "status.ongoing");
  }
}

/** User-facing feedback for a rejected command; null means ignore it quietly. */
export function feedbackForError(err: GameError, strings: StringsBundle): string | null {
  switch (err.code) {
    case "IllegalMove":
      return null;
    case "NothingToUndo":
      return translate(strings, "status.nothingToUndo");
    case "InvalidOperation":
      return translate(strings, "status.gameOver");
    case "PersistenceUnavailable":
      return err.message;
  }
}
