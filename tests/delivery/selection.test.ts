import { compareIdentity, eligibleProblems, selectProblem } from '../../src/delivery/selection';
import { makeProblem } from '../helpers/fakes';

describe('selection', () => {
  const catalog = [
    makeProblem('valid-parentheses', 'easy'),
    makeProblem('merge-intervals', 'medium'),
    makeProblem('two-sum', 'easy'),
    makeProblem('trapping-rain-water', 'hard')
  ];

  describe('compareIdentity', () => {
    it('should compare ordinally', () => {
      expect(compareIdentity('a', 'b')).toBe(-1);
      expect(compareIdentity('b', 'a')).toBe(1);
      expect(compareIdentity('a', 'a')).toBe(0);
      expect(compareIdentity('Z', 'a')).toBe(-1);
    });
  });

  describe('eligibleProblems', () => {
    it('should filter by difficulty and order by identity', () => {
      const eligible = eligibleProblems(catalog, new Set(), 'easy');
      expect(eligible.map(problem => problem.identity)).toEqual(['two-sum', 'valid-parentheses']);
    });

    it('should accept every difficulty for any', () => {
      const eligible = eligibleProblems(catalog, new Set(['two-sum']), 'any');
      expect(eligible.map(problem => problem.identity)).toEqual([
        'merge-intervals',
        'trapping-rain-water',
        'valid-parentheses'
      ]);
    });
  });

  describe('selectProblem', () => {
    it('should pick the lowest unseen identity', () => {
      expect(selectProblem(catalog, new Set(), 'easy')?.identity).toBe('two-sum');
      expect(selectProblem(catalog, new Set(['two-sum']), 'easy')?.identity).toBe('valid-parentheses');
    });

    it('should return null when every matching problem was delivered', () => {
      expect(selectProblem(catalog, new Set(['two-sum', 'valid-parentheses']), 'easy')).toBeNull();
      expect(selectProblem([], new Set(), 'any')).toBeNull();
    });

    it('should use the random source under the random policy', () => {
      const pick = selectProblem(catalog, new Set(), 'any', { policy: 'random', random: () => 0.5 });
      // candidates: merge-intervals, trapping-rain-water, two-sum, valid-parentheses
      expect(pick?.identity).toBe('two-sum');
    });

    it('should clamp a random value of 1 to the last candidate', () => {
      const pick = selectProblem(catalog, new Set(), 'easy', { policy: 'random', random: () => 1 });
      expect(pick?.identity).toBe('valid-parentheses');
    });

    it('should never pick a delivered problem under the random policy', () => {
      const delivered = new Set(['merge-intervals', 'two-sum', 'valid-parentheses']);
      for (const value of [0, 0.3, 0.6, 0.99]) {
        expect(selectProblem(catalog, delivered, 'any', { policy: 'random', random: () => value })?.identity)
          .toBe('trapping-rain-water');
      }
    });
  });
});
