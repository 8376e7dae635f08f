import { v4 as uuidv4 } from 'uuid';
import { GameSession, type CompletionListener, type SeatAssignment } from './GameSession';
import type { RulesOracle } from './rules/RulesOracle';
import { logger } from '../utils/logger';

export interface GameSessionManagerOptions {
  oracle: RulesOracle;
  initialClockSeconds: number;
  /** How long a completed game stays readable before it is swept */
  completedSessionTtlMs: number;
  onCompleted?: CompletionListener;
  now?: () => Date;
}

/**
 * Session store: game id → GameSession.
 *
 * Sessions are created by matchmaking and never removed while active.
 * Completed sessions stay readable for `completedSessionTtlMs` so late
 * reconnects still get the final position, then the sweeper drops them.
 */
export class GameSessionManager {
  private sessions: Map<string, GameSession> = new Map();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: GameSessionManagerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create and register a session with White to move. Synchronous, so the
   * caller can pair and insert without yielding.
   */
  public createSession(white: SeatAssignment, black: SeatAssignment): GameSession {
    const gameId = uuidv4();
    const session = new GameSession({
      gameId,
      white,
      black,
      oracle: this.options.oracle,
      initialClockSeconds: this.options.initialClockSeconds,
      onCompleted: this.options.onCompleted,
      now: this.now,
    });
    this.sessions.set(gameId, session);

    logger.info('Game session created', {
      gameId,
      white: white.principal.id,
      black: black.principal.id,
    });
    return session;
  }

  public getSession(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  /**
   * Only completed sessions can be removed.
   */
  public removeSession(gameId: string): boolean {
    const session = this.sessions.get(gameId);
    if (!session || session.getStatus() === 'active') {
      return false;
    }
    return this.sessions.delete(gameId);
  }

  public get size(): number {
    return this.sessions.size;
  }

  public getActiveSessionCount(): number {
    let active = 0;
    for (const session of this.sessions.values()) {
      if (session.getStatus() === 'active') {
        active += 1;
      }
    }
    return active;
  }

  /**
   * Drop completed sessions older than the retention TTL.
   * Returns the ids that were removed.
   */
  public sweepCompleted(): string[] {
    const cutoff = this.now().getTime() - this.options.completedSessionTtlMs;
    const removed: string[] = [];

    for (const [gameId, session] of this.sessions) {
      const completedAt = session.getCompletedAt();
      if (session.getStatus() === 'completed' && completedAt && completedAt.getTime() <= cutoff) {
        this.sessions.delete(gameId);
        removed.push(gameId);
      }
    }

    if (removed.length > 0) {
      logger.info('Swept completed game sessions', { count: removed.length, remaining: this.sessions.size });
    }
    return removed;
  }

  public startSweeper(intervalMs: number): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweepCompleted();
    }, intervalMs);
    // Do not keep the process alive just for sweeping.
    this.sweepTimer.unref();
  }

  public stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
