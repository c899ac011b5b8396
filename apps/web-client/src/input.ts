import type { Direction, GameAction } from "@tilemerge/game-core";

export type KeyInput = { key: string; ctrlKey: boolean; metaKey: boolean; altKey: boolean };

const KEY_DIRECTIONS: Record<string, Direction> = {
  ArrowUp: "up",
  ArrowDown: "down",
  ArrowLeft: "left",
  ArrowRight: "right",
  w: "up",
  s: "down",
  a: "left",
  d: "right"
};

export function commandForKey(input: KeyInput): GameAction | null {
  if (input.altKey) return null;
  const key = input.key.length === 1 ? input.key.toLowerCase() : input.key;

  if (input.ctrlKey || input.metaKey) {
    return key === "z" ? { type: "UNDO" } : null;
  }

  const direction = KEY_DIRECTIONS[key];
  if (direction) return { type: "MOVE", direction };
  if (key === "u") return { type: "UNDO" };
  if (key === "n") return { type: "NEW_GAME" };
  return null;
}

export const ARROW_PAD: ReadonlyArray<{ id: string; direction: Direction; label: string }> = [
  { id: "arrowUpBtn", direction: "up", label: "↑" },
  { id: "arrowLeftBtn", direction: "left", label: "←" },
  { id: "arrowRightBtn", direction: "right", label: "→" },
  { id: "arrowDownBtn", direction: "down", label: "↓" }
];
