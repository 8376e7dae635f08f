import type { Principal } from '../../shared/types/game';
import type { ServerMessage } from '../../shared/types/websocket';
import { decodeEnvelope, type ClientEnvelope } from '../../shared/validation/websocketSchemas';
import { GameErrorCode, GameNotFoundError, isGameError } from '../../shared/errors/GameDomainErrors';
import type { Delivery, GameSession } from '../game/GameSession';
import type { GameSessionManager } from '../game/GameSessionManager';
import type { MatchmakingService } from '../services/MatchmakingService';
import { logger, runWithContext } from '../utils/logger';
import type { ConnectionHandle, ConnectionRegistry } from './ConnectionRegistry';
import type { MessageTransport } from './Outbox';

export interface ProtocolRouterDeps {
  registry: ConnectionRegistry;
  matchmaking: MatchmakingService;
  sessions: GameSessionManager;
}

const WAITING_MESSAGE = 'Waiting for opponent...';

/**
 * Translates inbound envelopes into matchmaking and game session calls and
 * fans the results back out through the connection registry.
 *
 * Envelopes from one connection are handled strictly in arrival order.
 * Decode failures are logged and dropped; domain and routing failures go
 * back to the sender as `error` envelopes. The router itself never changes
 * session state.
 */
export class ProtocolRouter {
  private readonly registry: ConnectionRegistry;
  private readonly matchmaking: MatchmakingService;
  private readonly sessions: GameSessionManager;

  constructor(deps: ProtocolRouterDeps) {
    this.registry = deps.registry;
    this.matchmaking = deps.matchmaking;
    this.sessions = deps.sessions;
  }

  /**
   * Register an authenticated connection and return its handle.
   */
  public handleConnection(principal: Principal, transport: MessageTransport): ConnectionHandle {
    const handle = this.registry.allocateHandle();
    this.registry.register(handle, principal, transport);
    logger.info('Client connected', {
      connectionId: handle,
      userId: principal.id,
      displayName: principal.displayName,
    });
    return handle;
  }

  /**
   * Process one raw inbound frame. Resolves once the frame (and every frame
   * queued before it on the same connection) has been handled; never rejects.
   */
  public handleFrame(handle: ConnectionHandle, raw: unknown): Promise<void> {
    const principal = this.registry.principalOf(handle);
    if (!principal) {
      logger.warn('Dropping frame from unregistered connection', { connectionId: handle });
      return Promise.resolve();
    }

    return this.registry
      .runInbound(handle, () => this.processFrame(handle, principal, raw))
      .catch((error) => {
        logger.error('Inbound frame handling failed', {
          connectionId: handle,
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }

  /**
   * Transport teardown: forget the connection, give up its matchmaking slot
   * and clear it from every game it was bound to. Games keep running.
   */
  public async handleDisconnect(handle: ConnectionHandle, reason?: string): Promise<void> {
    const principal = this.registry.principalOf(handle);
    const gameIds = this.registry.unregister(handle);
    this.matchmaking.cancel(handle);

    for (const gameId of gameIds) {
      const session = this.sessions.getSession(gameId);
      if (!session) {
        continue;
      }
      const color = await session.unbindConnection(handle);
      if (color) {
        logger.info('Player disconnected from game', { gameId, color, connectionId: handle });
      }
    }

    logger.info('Client disconnected', {
      connectionId: handle,
      userId: principal?.id,
      reason,
    });
  }

  private async processFrame(handle: ConnectionHandle, principal: Principal, raw: unknown): Promise<void> {
    const decoded = decodeEnvelope(raw);
    if (!decoded.ok) {
      logger.warn('Dropping undecodable message', {
        connectionId: handle,
        userId: principal.id,
        type: decoded.type,
        reason: decoded.reason,
      });
      return;
    }

    const envelope = decoded.envelope;
    const context = {
      connectionId: handle,
      userId: principal.id,
      messageType: envelope.type,
      gameId: 'gameId' in envelope.payload ? String(envelope.payload.gameId) : undefined,
    };

    await runWithContext(context, async () => {
      try {
        await this.dispatch(handle, principal, envelope);
      } catch (error) {
        this.reportError(handle, envelope.type, error);
      }
    });
  }

  private async dispatch(handle: ConnectionHandle, principal: Principal, envelope: ClientEnvelope): Promise<void> {
    switch (envelope.type) {
      case 'join':
        this.handleJoin(handle, principal);
        return;

      case 'ping':
        this.registry.send(handle, { type: 'pong', payload: {} });
        return;

      case 'move': {
        const session = this.requireSession(envelope.payload.gameId);
        const color = session.colorOf(handle);
        this.fanOut(await session.move(color, envelope.payload.move));
        return;
      }

      case 'resign': {
        const session = this.requireSession(envelope.payload.gameId);
        this.fanOut(await session.resign(session.colorOf(handle)));
        return;
      }

      case 'draw_offer': {
        const session = this.requireSession(envelope.payload.gameId);
        this.fanOut(await session.offerDraw(session.colorOf(handle)));
        return;
      }

      case 'draw_response': {
        const session = this.requireSession(envelope.payload.gameId);
        // Only seated players may answer.
        session.colorOf(handle);
        this.fanOut(await session.respondDraw(envelope.payload.accept));
        return;
      }

      case 'time_update': {
        const session = this.requireSession(envelope.payload.gameId);
        const color = session.colorOf(handle);
        this.fanOut(await session.updateClock(color, envelope.payload.timeLeft));
        return;
      }

      case 'chat': {
        const session = this.requireSession(envelope.payload.gameId);
        session.colorOf(handle); // seated players only
        this.fanOut(await session.appendChat(principal.displayName, envelope.payload.message));
        return;
      }

      case 'reconnect': {
        const session = this.requireSession(envelope.payload.gameId);
        const { snapshot } = await session.bindConnection(principal.displayName, handle);
        if (!this.registry.has(handle)) {
          // Closed while waiting on the session; handleDisconnect never saw this seat.
          await session.unbindConnection(handle);
          logger.info('Dropped rebind for closed connection', { gameId: session.gameId, connectionId: handle });
          return;
        }
        this.registry.trackSession(handle, session.gameId);
        this.registry.send(handle, { type: 'gameState', payload: snapshot });
        return;
      }
    }
  }

  private handleJoin(handle: ConnectionHandle, principal: Principal): void {
    // A join queued behind a disconnect must not occupy the slot.
    if (!this.registry.has(handle)) {
      return;
    }
    const result = this.matchmaking.join(principal, handle);

    if (result.status === 'waiting') {
      this.registry.send(handle, { type: 'waiting', payload: { message: WAITING_MESSAGE } });
      return;
    }

    this.registry.trackSession(handle, result.gameId);
    this.registry.trackSession(result.opponentConnection, result.gameId);
    this.registry.send(handle, {
      type: 'gameStart',
      payload: { gameId: result.gameId, color: result.color, opponent: result.opponent },
    });
  }

  private requireSession(gameId: string): GameSession {
    const session = this.sessions.getSession(gameId);
    if (!session) {
      throw new GameNotFoundError(gameId);
    }
    return session;
  }

  private fanOut(deliveries: Delivery[]): void {
    for (const delivery of deliveries) {
      for (const handle of delivery.to) {
        this.registry.send(handle, delivery.message);
      }
    }
  }

  private reportError(handle: ConnectionHandle, messageType: string, error: unknown): void {
    let message: ServerMessage;

    if (isGameError(error)) {
      logger.info('Request rejected', {
        code: error.code,
        reason: error.message,
        messageType,
        context: error.context,
      });
      message = { type: 'error', payload: { code: error.code, message: error.message } };
    } else {
      logger.error('Unexpected error handling message', {
        messageType,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      message = {
        type: 'error',
        payload: { code: GameErrorCode.INTERNAL_ERROR, message: 'Internal server error' },
      };
    }

    this.registry.send(handle, message);
  }
}
