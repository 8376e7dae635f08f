import type { GameResult } from '../../../shared/types/game';

/**
 * Immutable board position. `moves` is the full move list from the initial
 * position, which repetition rules depend on.
 */
export interface BoardPosition {
  readonly fen: string;
  readonly moves: readonly string[];
}

export type MoveApplication =
  | { ok: true; position: BoardPosition; san: string }
  | { ok: false; reason: string };

export interface PositionOutcome {
  isTerminal: boolean;
  result?: GameResult;
}

/**
 * Decides move legality, the resulting position and whether the game is
 * over. Implementations never mutate the position they are given.
 */
export interface RulesOracle {
  newGame(): BoardPosition;
  applyMove(position: BoardPosition, moveText: string): MoveApplication;
  outcome(position: BoardPosition): PositionOutcome;
  renderPosition(position: BoardPosition): string;
}
