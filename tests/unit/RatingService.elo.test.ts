/**
 * Unit tests for RatingService Elo calculations
 *
 * Pure math, no repository involved.
 */

import { RatingService } from '../../src/server/services/RatingService';
import { RATING_CONSTANTS } from '../../src/shared/types/user';
import { decisiveResult, drawResult } from '../../src/shared/types/game';

describe('RatingService - Elo Calculations', () => {
  describe('calculateExpectedScore', () => {
    it('should return 0.5 for equal ratings', () => {
      expect(RatingService.calculateExpectedScore(1200, 1200)).toBeCloseTo(0.5, 4);
    });

    it('should return approximately 0.76 for 200 point advantage', () => {
      // 1 / (1 + 10^-0.5) ≈ 0.759
      expect(RatingService.calculateExpectedScore(1400, 1200)).toBeCloseTo(0.759, 2);
    });

    it('should return approximately 0.24 for 200 point disadvantage', () => {
      expect(RatingService.calculateExpectedScore(1000, 1200)).toBeCloseTo(0.24, 2);
    });

    it('should sum to 1 for opposite ratings', () => {
      const expectedA = RatingService.calculateExpectedScore(1400, 1200);
      const expectedB = RatingService.calculateExpectedScore(1200, 1400);
      expect(expectedA + expectedB).toBeCloseTo(1, 4);
    });
  });

  describe('calculateRatingDelta', () => {
    it('should use K = 32 by default', () => {
      expect(RATING_CONSTANTS.K_FACTOR).toBe(32);
    });

    it('should move equal ratings by 16 on a decisive game', () => {
      expect(RatingService.calculateRatingDelta(1200, 1200, 1)).toBe(16);
      expect(RatingService.calculateRatingDelta(1200, 1200, 0)).toBe(-16);
    });

    it('should leave equal ratings unchanged on a draw', () => {
      expect(RatingService.calculateRatingDelta(1500, 1500, 0.5)).toBe(0);
    });

    it('should give the favourite a small gain and the underdog a large one', () => {
      expect(RatingService.calculateRatingDelta(1400, 1200, 1)).toBe(8);
      expect(RatingService.calculateRatingDelta(1200, 1400, 0)).toBe(-8);
      expect(RatingService.calculateRatingDelta(1200, 1400, 1)).toBe(24);
      expect(RatingService.calculateRatingDelta(1400, 1200, 0)).toBe(-24);
    });

    it('should move the favourite down on a draw', () => {
      expect(RatingService.calculateRatingDelta(1400, 1200, 0.5)).toBe(-8);
      expect(RatingService.calculateRatingDelta(1200, 1400, 0.5)).toBe(8);
    });

    it('should scale with the K-factor', () => {
      expect(RatingService.calculateRatingDelta(1200, 1200, 1, 16)).toBe(8);
    });
  });

  describe('scoresFor', () => {
    it('should map each result to per-color scores', () => {
      expect(RatingService.scoresFor(decisiveResult('white', 'checkmate'))).toEqual({ white: 1, black: 0 });
      expect(RatingService.scoresFor(decisiveResult('black', 'resignation'))).toEqual({ white: 0, black: 1 });
      expect(RatingService.scoresFor(drawResult('stalemate'))).toEqual({ white: 0.5, black: 0.5 });
    });
  });
});
