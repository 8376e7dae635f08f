export type PlayerColor = 'white' | 'black';

export type GameStatus = 'active' | 'completed';

/**
 * Authenticated identity attached to a connection before any protocol
 * message is read. Immutable for the connection's lifetime.
 */
export interface Principal {
  id: string;
  displayName: string;
}

export interface ChatEntry {
  sender: string;
  text: string;
  timestamp: Date;
}

export type GameOutcome = 'white won' | 'black won' | 'draw';

export type GameWinner = PlayerColor | 'draw';

export type GameEndMethod =
  | 'checkmate'
  | 'resignation'
  | 'agreement'
  | 'stalemate'
  | 'insufficient material'
  | 'threefold repetition'
  | 'fifty-move rule';

export interface GameResult {
  outcome: GameOutcome;
  winner: GameWinner;
  method: GameEndMethod;
}

export interface ClockState {
  whiteSeconds: number;
  blackSeconds: number;
}

/**
 * Read-only projection replayed to a reconnecting player.
 */
export interface SessionSnapshot {
  position: string;
  turn: PlayerColor;
  whitePlayer: string;
  blackPlayer: string;
  whiteTime: number;
  blackTime: number;
}

export function oppositeColor(color: PlayerColor): PlayerColor {
  return color === 'white' ? 'black' : 'white';
}

export function decisiveResult(winner: PlayerColor, method: GameEndMethod): GameResult {
  return { outcome: `${winner} won`, winner, method };
}

export function drawResult(method: GameEndMethod): GameResult {
  return { outcome: 'draw', winner: 'draw', method };
}
