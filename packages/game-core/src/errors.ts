export type GameErrorCode = "IllegalMove" | "InvalidOperation" | "NothingToUndo" | "PersistenceUnavailable";

/**
 * Recoverable failure of a game command. The shell decides how to surface it;
 * none of these end the session.
 */
export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = "GameError";
    this.code = code;
  }
}

export function isGameError(err: unknown, code?: GameErrorCode): err is GameError {
  if (!(err instanceof GameError)) return false;
  return code === undefined || err.code === code;
}
