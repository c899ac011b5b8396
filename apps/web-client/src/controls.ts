import type { GameEvent, TargetTile, TilePlacement } from "@tilemerge/game-core";

/** Cells to flash after a command. A rejected command (`null`) clears the highlight. */
export function mergeHighlights(events: readonly GameEvent[] | null): TilePlacement[] {
  if (!events) return [];
  return events.flatMap((e) => (e.type === "TILES_MERGED" ? e.merges : []));
}

/**
 * Target picked while no game was running. It waits for the next New Game and is dropped once
 * that game starts or the running game's target is changed directly.
 */
export class PendingTarget {
  #value: TargetTile | null = null;

  get value(): TargetTile | null {
    return this.#value;
  }

  choose(target: TargetTile, current: TargetTile): void {
    this.#value = target === current ? null : target;
  }

  /** Applies to the new game; returns the target it should start with. */
  take(fallback: TargetTile): TargetTile {
    const target = this.#value ?? fallback;
    this.#value = null;
    return target;
  }

  clear(): void {
    this.#value = null;
  }

  /** What the target picker shows. */
  shown(current: TargetTile): TargetTile {
    return this.#value ?? current;
  }
}
