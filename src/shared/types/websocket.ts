/**
 * Wire contract for the chess relay protocol.
 *
 * Every frame in either direction is an envelope `{ type, payload }` carried
 * as the single argument of the Socket.IO `message` event. Inbound envelopes
 * are validated by `websocketSchemas.ts`; outbound envelopes are typed here.
 */

import type { GameErrorCode } from '../errors/GameDomainErrors';
import type { GameEndMethod, GameOutcome, GameWinner, PlayerColor, Principal } from './game';

export interface WaitingPayload {
  message: string;
}

export interface GameStartPayload {
  gameId: string;
  color: PlayerColor;
  /** Display name of the opponent */
  opponent: string;
}

export interface MovePayload {
  /** Move as accepted by the rules engine (SAN) */
  move: string;
  /** Rendered position after the move (FEN) */
  position: string;
  turn: PlayerColor;
}

export interface GameOverPayload {
  outcome: GameOutcome;
  method: GameEndMethod;
  winner: GameWinner;
}

export interface DrawOfferPayload {
  offeredBy: PlayerColor;
}

export interface DrawResponsePayload {
  accepted: boolean;
}

export interface TimeUpdatePayload {
  color: PlayerColor;
  timeLeft: number;
}

export interface ChatPayload {
  sender: string;
  message: string;
}

export interface GameStatePayload {
  position: string;
  turn: PlayerColor;
  whitePlayer: string;
  blackPlayer: string;
  whiteTime: number;
  blackTime: number;
}

export interface ErrorPayload {
  code: GameErrorCode;
  message: string;
}

export type PongPayload = Record<string, never>;

/**
 * Discriminated union of every envelope the server emits.
 */
export type ServerMessage =
  | { type: 'waiting'; payload: WaitingPayload }
  | { type: 'gameStart'; payload: GameStartPayload }
  | { type: 'move'; payload: MovePayload }
  | { type: 'gameOver'; payload: GameOverPayload }
  | { type: 'drawOffer'; payload: DrawOfferPayload }
  | { type: 'drawResponse'; payload: DrawResponsePayload }
  | { type: 'timeUpdate'; payload: TimeUpdatePayload }
  | { type: 'chat'; payload: ChatPayload }
  | { type: 'gameState'; payload: GameStatePayload }
  | { type: 'pong'; payload: PongPayload }
  | { type: 'error'; payload: ErrorPayload };

export type ServerMessageType = ServerMessage['type'];

/** Socket.IO event map, server → client */
export interface ServerToClientEvents {
  message: (envelope: ServerMessage) => void;
}

/** Socket.IO event map, client → server. Payloads are validated on arrival. */
export interface ClientToServerEvents {
  message: (envelope: unknown) => void;
}

export type InterServerEvents = Record<string, never>;

/** Per-socket data populated by the authentication middleware */
export interface SocketData {
  principal: Principal;
}
