import { describe, it, expect } from 'vitest';
import { currentThreshold, isEligible, nextPointRank, pointsNeeded, progressBar } from './eligibility';
import { createTestRankTable, rankByOrder } from '../../../test/fixtures/ranks.fixture';

describe('Eligibility Evaluator', () => {
  const ranks = createTestRankTable();

  describe('nextPointRank', () => {
    it('should return the next point-based rank', () => {
      expect(nextPointRank(ranks, 1)?.name).toBe('Private');
    });

    it('should skip admin-only ranks', () => {
      expect(nextPointRank(ranks, 4)?.name).toBe('Lieutenant');
      expect(nextPointRank(ranks, 5)?.name).toBe('Lieutenant');
    });

    it('should return null at the top', () => {
      expect(nextPointRank(ranks, 6)).toBeNull();
    });
  });

  describe('isEligible', () => {
    it('should return the next rank when the threshold is met', () => {
      expect(isEligible(ranks, { rankOrder: 3, points: 105 })?.order).toBe(4);
    });

    it('should return null below the threshold', () => {
      expect(isEligible(ranks, { rankOrder: 3, points: 99 })).toBeNull();
    });

    it('should accept an exact threshold', () => {
      expect(isEligible(ranks, { rankOrder: 1, points: 20 })?.name).toBe('Private');
    });
  });

  describe('pointsNeeded', () => {
    it('should never be negative', () => {
      expect(pointsNeeded({ points: 75 }, rankByOrder(4))).toBe(25);
      expect(pointsNeeded({ points: 120 }, rankByOrder(4))).toBe(0);
    });
  });

  describe('currentThreshold', () => {
    it('should use the highest point rank at or below the current order', () => {
      expect(currentThreshold(ranks, 3)).toBe(60);
      // Envoy is admin-only, so Sergeant's threshold applies
      expect(currentThreshold(ranks, 5)).toBe(100);
    });
  });

  describe('progressBar', () => {
    it('should render half progress', () => {
      expect(progressBar(80, 100, 60)).toBe('[█████░░░░░] 50%');
    });

    it('should clamp to the bar bounds', () => {
      expect(progressBar(10, 100, 60)).toBe('[░░░░░░░░░░] 0%');
      expect(progressBar(150, 100, 60)).toBe('[██████████] 100%');
    });

    it('should treat an empty span as complete', () => {
      expect(progressBar(0, 0)).toBe('[██████████] 100%');
    });
  });
});
