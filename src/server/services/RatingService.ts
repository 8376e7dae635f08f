import { RATING_CONSTANTS, type RatingChange } from '../../shared/types/user';
import type { GameResult } from '../../shared/types/game';
import type { GameCompletion } from '../game/GameSession';
import type { UserRepository } from '../database/UserRepository';
import { AsyncLock } from '../utils/asyncLock';
import { logger } from '../utils/logger';

/**
 * Service for calculating and persisting player Elo ratings when a game
 * completes.
 *
 * Formula: newRating = oldRating + round(K * (actualScore - expectedScore))
 * Expected score: 1 / (1 + 10^((opponentRating - playerRating) / 400))
 *
 * Rating persistence is best effort: failures are logged and the game
 * result stands. Completions are applied one at a time, so a game always
 * reads ratings that include every earlier game's result.
 */
export class RatingService {
  private readonly lock = new AsyncLock();

  constructor(
    private readonly users: UserRepository,
    private readonly kFactor: number = RATING_CONSTANTS.K_FACTOR
  ) {}

  /**
   * Calculate expected score based on rating difference.
   *
   * @returns Expected score (probability of winning) between 0 and 1
   */
  static calculateExpectedScore(playerRating: number, opponentRating: number): number {
    return 1 / (1 + Math.pow(10, (opponentRating - playerRating) / 400));
  }

  /**
   * Rating change for one player.
   *
   * @param actualScore 1.0 = win, 0.5 = draw, 0.0 = loss
   */
  static calculateRatingDelta(
    playerRating: number,
    opponentRating: number,
    actualScore: number,
    kFactor: number = RATING_CONSTANTS.K_FACTOR
  ): number {
    const expected = this.calculateExpectedScore(playerRating, opponentRating);
    return Math.round(kFactor * (actualScore - expected));
  }

  /**
   * Score of each color for a finished game.
   */
  static scoresFor(result: GameResult): { white: number; black: number } {
    switch (result.winner) {
      case 'white':
        return { white: 1, black: 0 };
      case 'black':
        return { white: 0, black: 1 };
      case 'draw':
        return { white: 0.5, black: 0.5 };
    }
  }

  /**
   * Completion listener for game sessions. Never rejects.
   *
   * @returns The rating changes that were persisted, or an empty array when
   * the update could not be applied.
   */
  async onGameCompleted(completion: GameCompletion): Promise<RatingChange[]> {
    return this.lock.runExclusive(() => this.applyCompletion(completion));
  }

  private async applyCompletion(completion: GameCompletion): Promise<RatingChange[]> {
    const { gameId, white, black, result } = completion;

    try {
      const [whiteUser, blackUser] = await Promise.all([
        this.users.getById(white.id),
        this.users.getById(black.id),
      ]);

      if (!whiteUser || !blackUser) {
        logger.warn('Players not found for rating update', {
          gameId,
          whiteId: white.id,
          blackId: black.id,
          whiteFound: whiteUser !== null,
          blackFound: blackUser !== null,
        });
        return [];
      }

      const scores = RatingService.scoresFor(result);
      const whiteDelta = RatingService.calculateRatingDelta(
        whiteUser.rating,
        blackUser.rating,
        scores.white,
        this.kFactor
      );
      const blackDelta = RatingService.calculateRatingDelta(
        blackUser.rating,
        whiteUser.rating,
        scores.black,
        this.kFactor
      );

      const whiteAfter = await this.users.applyRatingDelta(whiteUser.id, whiteDelta);
      const blackAfter = await this.users.applyRatingDelta(blackUser.id, blackDelta);

      const changes: RatingChange[] = [
        {
          playerId: whiteUser.id,
          oldRating: whiteAfter.rating - whiteDelta,
          newRating: whiteAfter.rating,
          change: whiteDelta,
        },
        {
          playerId: blackUser.id,
          oldRating: blackAfter.rating - blackDelta,
          newRating: blackAfter.rating,
          change: blackDelta,
        },
      ];

      logger.info('Ratings updated', { gameId, outcome: result.outcome, changes });
      return changes;
    } catch (error) {
      logger.error('Failed to update ratings', {
        gameId,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}
