/**
 * GameSession Unit Tests
 *
 * Covers the per-game state machine directly:
 * - turn enforcement and move relay
 * - terminal positions from the rules engine
 * - draw handshake and resignation
 * - clocks, chat and connection binding
 * - lock linearization of concurrent operations
 */

import { GameSession, type GameCompletion } from '../../src/server/game/GameSession';
import { ChessRulesOracle } from '../../src/server/game/rules/ChessRulesOracle';
import { GameErrorCode, GameError } from '../../src/shared/errors/GameDomainErrors';
import { logger } from '../../src/server/utils/logger';

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

const alice = { id: 'user-alice', displayName: 'alice' };
const bob = { id: 'user-bob', displayName: 'bob' };

const flushMicrotasks = () => new Promise((resolve) => setImmediate(resolve));

async function expectGameError(promise: Promise<unknown>, code: GameErrorCode): Promise<void> {
  const error = await promise.then(
    () => undefined,
    (err: unknown) => err
  );
  expect(error).toBeInstanceOf(GameError);
  expect(error).toMatchObject({ code });
}

describe('GameSession', () => {
  let completions: GameCompletion[];
  let clock: number;
  let session: GameSession;

  const createSession = (onCompleted?: (completion: GameCompletion) => Promise<unknown> | void) =>
    new GameSession({
      gameId: 'game-1',
      white: { principal: alice, connection: 'conn-1' },
      black: { principal: bob, connection: 'conn-2' },
      oracle: new ChessRulesOracle(),
      initialClockSeconds: 300,
      onCompleted:
        onCompleted ??
        ((completion) => {
          completions.push(completion);
        }),
      now: () => new Date(clock),
    });

  beforeEach(() => {
    completions = [];
    clock = Date.parse('2026-01-01T00:00:00Z');
    session = createSession();
  });

  describe('initial state', () => {
    it('should start active with white to move and full clocks', () => {
      expect(session.getStatus()).toBe('active');
      expect(session.getResult()).toBeNull();
      expect(session.isDrawOffered()).toBe(false);
      expect(session.snapshot()).toEqual({
        position: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1',
        turn: 'white',
        whitePlayer: 'alice',
        blackPlayer: 'bob',
        whiteTime: 300,
        blackTime: 300,
      });
    });
  });

  describe('move', () => {
    it('should apply a legal move, flip the turn and address both players', async () => {
      const deliveries = await session.move('white', 'e4');

      expect(deliveries).toHaveLength(1);
      expect(deliveries[0].to).toEqual(['conn-1', 'conn-2']);
      expect(deliveries[0].message).toEqual({
        type: 'move',
        payload: {
          move: 'e4',
          position: session.snapshot().position,
          turn: 'black',
        },
      });
      expect(session.snapshot().turn).toBe('black');
    });

    it('should echo the normalized move text', async () => {
      const deliveries = await session.move('white', 'Nf3');

      expect(deliveries[0].message).toMatchObject({ type: 'move', payload: { move: 'Nf3' } });
    });

    it('should reject a move out of turn without changing state', async () => {
      const before = session.snapshot();

      await expectGameError(session.move('black', 'e5'), GameErrorCode.MOVE_NOT_YOUR_TURN);

      expect(session.snapshot()).toEqual(before);
    });

    it('should reject an illegal move without changing state', async () => {
      const before = session.snapshot();

      await expectGameError(session.move('white', 'e5'), GameErrorCode.MOVE_INVALID);

      expect(session.snapshot()).toEqual(before);
    });

    it('should clear a pending draw offer when a move is made', async () => {
      await session.offerDraw('black');
      expect(session.isDrawOffered()).toBe(true);

      await session.move('white', 'e4');

      expect(session.isDrawOffered()).toBe(false);
      expect(session.getDrawOfferedBy()).toBeNull();
    });

    it('should complete the game on checkmate and notify the completion listener', async () => {
      for (const [color, move] of [
        ['white', 'f3'],
        ['black', 'e5'],
        ['white', 'g4'],
      ] as const) {
        await session.move(color, move);
      }

      const deliveries = await session.move('black', 'Qh4#');

      expect(deliveries.map((delivery) => delivery.message.type)).toEqual(['move', 'gameOver']);
      expect(deliveries[1]).toEqual({
        to: ['conn-1', 'conn-2'],
        message: { type: 'gameOver', payload: { outcome: 'black won', method: 'checkmate', winner: 'black' } },
      });
      expect(session.getStatus()).toBe('completed');
      expect(session.getResult()).toEqual({ outcome: 'black won', method: 'checkmate', winner: 'black' });
      expect(session.getCompletedAt()).toEqual(new Date(clock));

      await flushMicrotasks();
      expect(completions).toEqual([
        {
          gameId: 'game-1',
          white: alice,
          black: bob,
          result: { outcome: 'black won', method: 'checkmate', winner: 'black' },
        },
      ]);
    });

    it('should end in a draw on threefold repetition', async () => {
      const shuffle = ['Nf3', 'Nf6', 'Ng1', 'Ng8', 'Nf3', 'Nf6', 'Ng1'];
      let color: 'white' | 'black' = 'white';
      for (const move of shuffle) {
        await session.move(color, move);
        color = color === 'white' ? 'black' : 'white';
      }
      expect(session.getStatus()).toBe('active');

      const deliveries = await session.move('black', 'Ng8');

      expect(deliveries[1].message).toEqual({
        type: 'gameOver',
        payload: { outcome: 'draw', method: 'threefold repetition', winner: 'draw' },
      });
      expect(session.getStatus()).toBe('completed');
    });
  });

  describe('completed games', () => {
    beforeEach(async () => {
      await session.resign('white');
    });

    it('should reject every state-changing operation', async () => {
      await expectGameError(session.move('white', 'e4'), GameErrorCode.GAME_NOT_ACTIVE);
      await expectGameError(session.resign('black'), GameErrorCode.GAME_NOT_ACTIVE);
      await expectGameError(session.offerDraw('black'), GameErrorCode.GAME_NOT_ACTIVE);
      await expectGameError(session.respondDraw(true), GameErrorCode.GAME_NOT_ACTIVE);
      await expectGameError(session.updateClock('white', 10), GameErrorCode.GAME_NOT_ACTIVE);
      await expectGameError(session.appendChat('alice', 'gg'), GameErrorCode.GAME_NOT_ACTIVE);
    });

    it('should keep the first result', async () => {
      await session.resign('black').catch(() => undefined);

      expect(session.getResult()).toEqual({ outcome: 'black won', method: 'resignation', winner: 'black' });
      await flushMicrotasks();
      expect(completions).toHaveLength(1);
    });

    it('should still allow a player to rebind and read the final position', async () => {
      const rebound = await session.bindConnection('alice', 'conn-9');

      expect(rebound.color).toBe('white');
      expect(rebound.snapshot.whitePlayer).toBe('alice');
    });
  });

  describe('draws', () => {
    it('should send the offer to the opponent only', async () => {
      const deliveries = await session.offerDraw('white');

      expect(deliveries).toEqual([{ to: ['conn-2'], message: { type: 'drawOffer', payload: { offeredBy: 'white' } } }]);
      expect(session.getDrawOfferedBy()).toBe('white');
    });

    it('should reject a response when nothing is offered', async () => {
      await expectGameError(session.respondDraw(true), GameErrorCode.DRAW_NOT_PENDING);
    });

    it('should clear the offer on decline and keep the game running', async () => {
      await session.offerDraw('white');

      const deliveries = await session.respondDraw(false);

      expect(deliveries).toEqual([
        { to: ['conn-1', 'conn-2'], message: { type: 'drawResponse', payload: { accepted: false } } },
      ]);
      expect(session.isDrawOffered()).toBe(false);
      expect(session.getStatus()).toBe('active');
    });

    it('should complete as a draw by agreement on accept', async () => {
      await session.offerDraw('black');

      const deliveries = await session.respondDraw(true);

      expect(deliveries).toEqual([
        {
          to: ['conn-1', 'conn-2'],
          message: { type: 'gameOver', payload: { outcome: 'draw', method: 'agreement', winner: 'draw' } },
        },
      ]);
      expect(session.getStatus()).toBe('completed');
    });
  });

  describe('clock and chat', () => {
    it('should store the reported time for the reporting color only', async () => {
      await session.updateClock('white', 250.5);

      expect(session.snapshot().whiteTime).toBe(250.5);
      expect(session.snapshot().blackTime).toBe(300);
    });

    it('should record chat history in order with timestamps', async () => {
      await session.appendChat('alice', 'hello');
      clock += 1000;
      await session.appendChat('bob', 'hi');

      expect(session.chatHistory()).toEqual([
        { sender: 'alice', text: 'hello', timestamp: new Date('2026-01-01T00:00:00Z') },
        { sender: 'bob', text: 'hi', timestamp: new Date('2026-01-01T00:00:01Z') },
      ]);
    });
  });

  describe('connection binding', () => {
    it('should resolve the color bound to a handle', () => {
      expect(session.colorOf('conn-1')).toBe('white');
      expect(session.colorOf('conn-2')).toBe('black');
      expect(() => session.colorOf('conn-3')).toThrow('Player not in this game');
    });

    it('should skip a disconnected player when addressing deliveries', async () => {
      expect(await session.unbindConnection('conn-1')).toBe('white');
      expect(await session.unbindConnection('conn-1')).toBeNull();

      const deliveries = await session.updateClock('black', 100);

      expect(deliveries[0].to).toEqual(['conn-2']);
      expect(session.getBinding('white').connection).toBeNull();
    });

    it('should rebind a seat by display name and return the current snapshot', async () => {
      await session.move('white', 'e4');
      await session.unbindConnection('conn-2');

      const rebound = await session.bindConnection('bob', 'conn-7');

      expect(rebound).toEqual({ color: 'black', snapshot: session.snapshot() });
      expect(session.colorOf('conn-7')).toBe('black');
    });

    it('should reject a rebind from someone not in the game', async () => {
      await expectGameError(session.bindConnection('mallory', 'conn-8'), GameErrorCode.PLAYER_NOT_IN_GAME);
    });
  });

  describe('concurrency', () => {
    it('should apply concurrent operations one at a time in call order', async () => {
      const results = await Promise.allSettled([
        session.move('white', 'e4'),
        session.move('white', 'd4'),
        session.move('black', 'e5'),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
      expect(session.snapshot().turn).toBe('white');
    });

    it('should log and survive a failing completion listener', async () => {
      session = createSession(() => Promise.reject(new Error('rating store offline')));

      await session.resign('black');
      await flushMicrotasks();

      expect(session.getStatus()).toBe('completed');
      expect(logger.error).toHaveBeenCalledWith('Game completion listener failed', {
        gameId: 'game-1',
        error: 'rating store offline',
      });
    });
  });
});
