import { applyAction, createGame, getLegalActions, toSnapshot } from "./engine.js";
import type { BestScoreGateway } from "./persistence.js";
import type { EngineConfig, EngineResult, GameAction, GameEvent, GameSnapshot, GameState } from "./types.js";

/**
 * Owns the running game and its best-score store. The best score is read once
 * here and written back whenever the reducer reports a change to it; a failed
 * write keeps the value in memory and is reported as an event.
 */
export class GameSession {
  #state: GameState;
  readonly #gateway: BestScoreGateway;

  constructor(gateway: BestScoreGateway, config: Omit<EngineConfig, "bestScore">) {
    this.#gateway = gateway;
    this.#state = createGame({ ...config, bestScore: gateway.loadBest() });
  }

  get state(): GameState {
    return structuredClone(this.#state);
  }

  snapshot(): GameSnapshot {
    return toSnapshot(this.#state);
  }

  legalActions(): GameAction[] {
    return getLegalActions(this.#state);
  }

  /** Throws `GameError` for rejected commands; the session state is then unchanged. */
  dispatch(action: GameAction): EngineResult {
    const res = applyAction(this.#state, action);
    this.#state = res.nextState;

    const events: GameEvent[] = [...res.events];
    if (res.events.some((e) => e.type === "BEST_SCORE_CHANGED")) {
      const failure = this.#persist();
      if (failure) events.push(failure);
    }
    return { nextState: structuredClone(this.#state), events };
  }

  /** Final write on app exit. Returns whether the store accepted it. */
  shutdown(): boolean {
    return this.#persist() === null;
  }

  #persist(): GameEvent | null {
    const best = this.#state.bestScore;
    if (this.#gateway.saveBest(best)) return null;
    return { type: "PERSISTENCE_UNAVAILABLE", message: `Best score ${best} was not saved; keeping it for this session only` };
  }
}
