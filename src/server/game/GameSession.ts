import {
  oppositeColor,
  decisiveResult,
  drawResult,
  type ChatEntry,
  type ClockState,
  type GameResult,
  type GameStatus,
  type PlayerColor,
  type Principal,
  type SessionSnapshot,
} from '../../shared/types/game';
import type { ServerMessage } from '../../shared/types/websocket';
import {
  GameNotActiveError,
  InvalidMoveError,
  NoDrawPendingError,
  NotYourTurnError,
  PlayerNotInSessionError,
} from '../../shared/errors/GameDomainErrors';
import { AsyncLock } from '../utils/asyncLock';
import { logger } from '../utils/logger';
import type { ConnectionHandle } from '../websocket/ConnectionRegistry';
import type { BoardPosition, RulesOracle } from './rules/RulesOracle';

/**
 * A seat in the game. The connection is a lookup-only handle into the
 * connection registry and is null while the player is disconnected.
 */
export interface PlayerBinding {
  readonly principal: Principal;
  readonly color: PlayerColor;
  connection: ConnectionHandle | null;
}

/**
 * One outbound message and the connections it goes to.
 */
export interface Delivery {
  to: ConnectionHandle[];
  message: ServerMessage;
}

export interface GameCompletion {
  gameId: string;
  white: Principal;
  black: Principal;
  result: GameResult;
}

export type CompletionListener = (completion: GameCompletion) => Promise<unknown> | void;

export interface SeatAssignment {
  principal: Principal;
  connection: ConnectionHandle | null;
}

export interface GameSessionOptions {
  gameId: string;
  white: SeatAssignment;
  black: SeatAssignment;
  oracle: RulesOracle;
  initialClockSeconds: number;
  onCompleted?: CompletionListener;
  now?: () => Date;
}

export interface RebindResult {
  color: PlayerColor;
  snapshot: SessionSnapshot;
}

/**
 * GameSession is the state machine for one match:
 * - move relay and turn tracking against the rules oracle
 * - resignation and the draw offer/response handshake
 * - client-reported clocks and in-game chat
 * - connection rebinding for reconnecting players
 *
 * Every operation runs under the session's own lock. Mutating operations
 * return the deliveries the caller must fan out; they never write to a
 * connection themselves.
 */
export class GameSession {
  public readonly gameId: string;

  private readonly white: PlayerBinding;
  private readonly black: PlayerBinding;
  private readonly oracle: RulesOracle;
  private readonly lock = new AsyncLock();
  private readonly onCompleted: CompletionListener | undefined;
  private readonly now: () => Date;

  private position: BoardPosition;
  private currentTurn: PlayerColor = 'white';
  private drawOffered = false;
  private drawOfferedBy: PlayerColor | null = null;
  private clock: ClockState;
  private readonly chatLog: ChatEntry[] = [];
  private status: GameStatus = 'active';
  private result: GameResult | null = null;
  private completedAt: Date | null = null;

  constructor(options: GameSessionOptions) {
    this.gameId = options.gameId;
    this.oracle = options.oracle;
    this.onCompleted = options.onCompleted;
    this.now = options.now ?? (() => new Date());

    this.white = { principal: options.white.principal, color: 'white', connection: options.white.connection };
    this.black = { principal: options.black.principal, color: 'black', connection: options.black.connection };
    this.position = this.oracle.newGame();
    this.clock = {
      whiteSeconds: options.initialClockSeconds,
      blackSeconds: options.initialClockSeconds,
    };
  }

  // ---------------------------------------------------------------------------
  // Game operations
  // ---------------------------------------------------------------------------

  public move(color: PlayerColor, moveText: string): Promise<Delivery[]> {
    return this.lock.runExclusive(() => {
      this.assertActive();
      if (color !== this.currentTurn) {
        throw new NotYourTurnError(this.gameId, this.currentTurn, color);
      }

      const applied = this.oracle.applyMove(this.position, moveText);
      if (!applied.ok) {
        throw new InvalidMoveError(applied.reason, { gameId: this.gameId, move: moveText, color });
      }

      this.position = applied.position;
      this.currentTurn = oppositeColor(this.currentTurn);
      this.clearDrawOffer();

      const deliveries: Delivery[] = [
        this.toBoth({
          type: 'move',
          payload: {
            move: applied.san,
            position: this.oracle.renderPosition(this.position),
            turn: this.currentTurn,
          },
        }),
      ];

      const outcome = this.oracle.outcome(this.position);
      if (outcome.isTerminal && outcome.result) {
        deliveries.push(this.complete(outcome.result));
      }
      return deliveries;
    });
  }

  public resign(color: PlayerColor): Promise<Delivery[]> {
    return this.lock.runExclusive(() => {
      this.assertActive();
      return [this.complete(decisiveResult(oppositeColor(color), 'resignation'))];
    });
  }

  /**
   * Either player may offer at any time; repeating an offer is harmless.
   */
  public offerDraw(color: PlayerColor): Promise<Delivery[]> {
    return this.lock.runExclusive(() => {
      this.assertActive();
      this.drawOffered = true;
      this.drawOfferedBy = color;
      return [this.toColor(oppositeColor(color), { type: 'drawOffer', payload: { offeredBy: color } })];
    });
  }

  public respondDraw(accept: boolean): Promise<Delivery[]> {
    return this.lock.runExclusive(() => {
      this.assertActive();
      if (!this.drawOffered) {
        throw new NoDrawPendingError(this.gameId);
      }

      if (accept) {
        return [this.complete(drawResult('agreement'))];
      }

      this.clearDrawOffer();
      return [this.toBoth({ type: 'drawResponse', payload: { accepted: false } })];
    });
  }

  /**
   * Overwrites the stored remaining time for `color` with the client's
   * report. There is no server-side countdown.
   */
  public updateClock(color: PlayerColor, secondsRemaining: number): Promise<Delivery[]> {
    return this.lock.runExclusive(() => {
      this.assertActive();
      if (color === 'white') {
        this.clock = { ...this.clock, whiteSeconds: secondsRemaining };
      } else {
        this.clock = { ...this.clock, blackSeconds: secondsRemaining };
      }
      return [this.toBoth({ type: 'timeUpdate', payload: { color, timeLeft: secondsRemaining } })];
    });
  }

  public appendChat(sender: string, text: string): Promise<Delivery[]> {
    return this.lock.runExclusive(() => {
      this.assertActive();
      this.chatLog.push({ sender, text, timestamp: this.now() });
      return [this.toBoth({ type: 'chat', payload: { sender, message: text } })];
    });
  }

  // ---------------------------------------------------------------------------
  // Connection binding
  // ---------------------------------------------------------------------------

  /**
   * Reconnection path: attach `handle` to the seat whose player has
   * `displayName`, White checked first. Allowed on completed games so a
   * player can still fetch the final position.
   */
  public bindConnection(displayName: string, handle: ConnectionHandle): Promise<RebindResult> {
    return this.lock.runExclusive(() => {
      const binding = [this.white, this.black].find((b) => b.principal.displayName === displayName);
      if (!binding) {
        throw new PlayerNotInSessionError(this.gameId, displayName);
      }
      binding.connection = handle;
      logger.info('Player rebound to game', {
        gameId: this.gameId,
        color: binding.color,
        connectionId: handle,
      });
      return { color: binding.color, snapshot: this.snapshot() };
    });
  }

  /**
   * Transport teardown: clear any seat still pointing at `handle`. The game
   * stays as it is.
   */
  public unbindConnection(handle: ConnectionHandle): Promise<PlayerColor | null> {
    return this.lock.runExclusive(() => {
      for (const binding of [this.white, this.black]) {
        if (binding.connection === handle) {
          binding.connection = null;
          return binding.color;
        }
      }
      return null;
    });
  }

  /**
   * Color of the seat bound to `handle`.
   */
  public colorOf(handle: ConnectionHandle): PlayerColor {
    if (this.white.connection === handle) return 'white';
    if (this.black.connection === handle) return 'black';
    throw new PlayerNotInSessionError(this.gameId, handle);
  }

  // ---------------------------------------------------------------------------
  // Read-only views
  // ---------------------------------------------------------------------------

  public snapshot(): SessionSnapshot {
    return {
      position: this.oracle.renderPosition(this.position),
      turn: this.currentTurn,
      whitePlayer: this.white.principal.displayName,
      blackPlayer: this.black.principal.displayName,
      whiteTime: this.clock.whiteSeconds,
      blackTime: this.clock.blackSeconds,
    };
  }

  public getStatus(): GameStatus {
    return this.status;
  }

  public getResult(): GameResult | null {
    return this.result;
  }

  public isDrawOffered(): boolean {
    return this.drawOffered;
  }

  public getDrawOfferedBy(): PlayerColor | null {
    return this.drawOfferedBy;
  }

  public getCompletedAt(): Date | null {
    return this.completedAt;
  }

  public chatHistory(): readonly ChatEntry[] {
    return [...this.chatLog];
  }

  public getBinding(color: PlayerColor): Readonly<PlayerBinding> {
    return color === 'white' ? { ...this.white } : { ...this.black };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private assertActive(): void {
    if (this.status !== 'active') {
      throw new GameNotActiveError(this.gameId, this.status);
    }
  }

  private clearDrawOffer(): void {
    this.drawOffered = false;
    this.drawOfferedBy = null;
  }

  /**
   * One-way transition to completed. The completion listener runs after the
   * current operation returns and its failures are only logged.
   */
  private complete(result: GameResult): Delivery {
    this.status = 'completed';
    this.result = result;
    this.completedAt = this.now();
    this.clearDrawOffer();

    logger.info('Game completed', {
      gameId: this.gameId,
      outcome: result.outcome,
      method: result.method,
    });

    const listener = this.onCompleted;
    if (listener) {
      const completion: GameCompletion = {
        gameId: this.gameId,
        white: this.white.principal,
        black: this.black.principal,
        result,
      };
      Promise.resolve()
        .then(() => listener(completion))
        .catch((err) => {
          logger.error('Game completion listener failed', {
            gameId: this.gameId,
            error: err instanceof Error ? err.message : String(err),
          });
        });
    }

    return this.toBoth({
      type: 'gameOver',
      payload: { outcome: result.outcome, method: result.method, winner: result.winner },
    });
  }

  private toBoth(message: ServerMessage): Delivery {
    const to: ConnectionHandle[] = [];
    for (const binding of [this.white, this.black]) {
      if (binding.connection !== null) {
        to.push(binding.connection);
      }
    }
    return { to, message };
  }

  private toColor(color: PlayerColor, message: ServerMessage): Delivery {
    const binding = color === 'white' ? this.white : this.black;
    return { to: binding.connection !== null ? [binding.connection] : [], message };
  }
}
