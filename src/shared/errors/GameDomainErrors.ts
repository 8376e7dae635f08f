/**
 * Game Domain Errors - Structured error types for the game domain
 *
 * Every failure the protocol reports back to a client is one of these. The
 * router turns them into `error{code, message}` envelopes addressed to the
 * sender only; the session is left untouched.
 *
 * Error Categories:
 * - **Routing Errors**: game not found, sender not seated in the game
 * - **Game State Errors**: game already completed
 * - **Move Errors**: not your turn, illegal move
 * - **Draw Errors**: responding when no offer is pending
 *
 * Usage:
 * ```typescript
 * throw new NotYourTurnError(gameId, 'white', 'black');
 *
 * if (isGameError(error)) {
 *   emitError(handle, error.code, error.message);
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum GameErrorCode {
  // Routing Errors
  GAME_NOT_FOUND = 'GAME_NOT_FOUND',
  PLAYER_NOT_IN_GAME = 'PLAYER_NOT_IN_GAME',

  // Game State Errors
  GAME_NOT_ACTIVE = 'GAME_NOT_ACTIVE',

  // Move Errors
  MOVE_INVALID = 'MOVE_INVALID',
  MOVE_NOT_YOUR_TURN = 'MOVE_NOT_YOUR_TURN',

  // Draw Errors
  DRAW_NOT_PENDING = 'DRAW_NOT_PENDING',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging (logged, never sent to clients)
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error for moves the rules engine rejects. The engine's message is passed
 * through unchanged.
 */
export class InvalidMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID, message, context);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

export class NotYourTurnError extends GameError {
  constructor(
    gameId: string,
    expectedColor: string,
    actualColor: string,
    context: Record<string, unknown> = {}
  ) {
    super(
      GameErrorCode.MOVE_NOT_YOUR_TURN,
      'Not your turn',
      { gameId, expectedColor, actualColor, ...context }
    );
    this.name = 'NotYourTurnError';
    Object.setPrototypeOf(this, NotYourTurnError.prototype);
  }
}

export class GameNotFoundError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_NOT_FOUND, 'Game not found', { gameId, ...context });
    this.name = 'GameNotFoundError';
    Object.setPrototypeOf(this, GameNotFoundError.prototype);
  }
}

/**
 * Error when the game has already completed.
 */
export class GameNotActiveError extends GameError {
  constructor(gameId: string, status: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.GAME_NOT_ACTIVE,
      `Game ${gameId} is not active (status: ${status})`,
      { gameId, status, ...context }
    );
    this.name = 'GameNotActiveError';
    Object.setPrototypeOf(this, GameNotActiveError.prototype);
  }
}

/**
 * Error when the sender is not seated in the referenced game.
 */
export class PlayerNotInSessionError extends GameError {
  constructor(gameId: string, player: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.PLAYER_NOT_IN_GAME,
      'Player not in this game',
      { gameId, player, ...context }
    );
    this.name = 'PlayerNotInSessionError';
    Object.setPrototypeOf(this, PlayerNotInSessionError.prototype);
  }
}

export class NoDrawPendingError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.DRAW_NOT_PENDING, 'No draw offer pending', { gameId, ...context });
    this.name = 'NoDrawPendingError';
    Object.setPrototypeOf(this, NoDrawPendingError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a GameError.
 */
export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
