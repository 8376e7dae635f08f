import type { Principal } from '../../shared/types/game';
import type { GameSessionManager } from '../game/GameSessionManager';
import type { ConnectionHandle, MessageNotifier } from '../websocket/ConnectionRegistry';
import { logger } from '../utils/logger';

interface WaitingEntry {
  principal: Principal;
  connection: ConnectionHandle;
  joinedAt: Date;
}

export type JoinResult =
  | { status: 'waiting' }
  | {
      status: 'matched';
      gameId: string;
      color: 'black';
      /** Display name of the White player */
      opponent: string;
      /** Connection of the White player, already notified */
      opponentConnection: ConnectionHandle;
    };

/**
 * Single-slot matchmaking: the first arrival waits, the next one is paired
 * with it as Black, whoever it is. A player who joins twice from two
 * connections is paired with themselves.
 *
 * `join` never awaits, so checking, clearing the slot and inserting the new
 * session form one uninterrupted step; two joins can neither both find the
 * slot empty nor both claim the same waiting player.
 */
export class MatchmakingService {
  private waiting: WaitingEntry | null = null;

  constructor(
    private readonly sessions: GameSessionManager,
    private readonly notifier: MessageNotifier
  ) {}

  public join(principal: Principal, connection: ConnectionHandle): JoinResult {
    const waiting = this.waiting;

    if (!waiting) {
      this.waiting = { principal, connection, joinedAt: new Date() };
      logger.info('User added to matchmaking queue', { userId: principal.id, connectionId: connection });
      return { status: 'waiting' };
    }

    this.waiting = null;
    const session = this.sessions.createSession(
      { principal: waiting.principal, connection: waiting.connection },
      { principal, connection }
    );

    this.notifier.send(waiting.connection, {
      type: 'gameStart',
      payload: { gameId: session.gameId, color: 'white', opponent: principal.displayName },
    });

    logger.info('Match created', {
      gameId: session.gameId,
      white: waiting.principal.id,
      black: principal.id,
      waitTimeMs: Date.now() - waiting.joinedAt.getTime(),
    });

    return {
      status: 'matched',
      gameId: session.gameId,
      color: 'black',
      opponent: waiting.principal.displayName,
      opponentConnection: waiting.connection,
    };
  }

  /**
   * Clear the slot if `connection` holds it. Returns true when it did.
   */
  public cancel(connection: ConnectionHandle): boolean {
    const waiting = this.waiting;
    if (!waiting || waiting.connection !== connection) {
      return false;
    }
    logger.info('User removed from matchmaking queue', {
      userId: waiting.principal.id,
      connectionId: connection,
    });
    this.waiting = null;
    return true;
  }

  public isWaiting(connection: ConnectionHandle): boolean {
    return this.waiting?.connection === connection;
  }

  public getWaitingCount(): number {
    return this.waiting ? 1 : 0;
  }
}
