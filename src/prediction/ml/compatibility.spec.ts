import { categorize, compatibilityScore, cosineSimilarity, topKByValue } from './compatibility';

describe('compatibility', () => {
  describe('cosineSimilarity', () => {
    it('is 1 for parallel vectors', () => {
      expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    });

    it('is -1 for opposite vectors', () => {
      expect(cosineSimilarity([1, 0], [-3, 0])).toBeCloseTo(-1, 10);
    });

    it('is 0 for orthogonal vectors', () => {
      expect(cosineSimilarity([1, 0], [0, 5])).toBe(0);
    });

    it('is 0 when either vector is zero', () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('rejects vectors of different length', () => {
      expect(() => cosineSimilarity([1, 2], [1])).toThrow('Vector length mismatch: 2 vs 1');
    });
  });

  describe('compatibilityScore', () => {
    it('maps similarity onto [0, 1]', () => {
      expect(compatibilityScore([1, 0], [1, 0])).toBeCloseTo(1, 10);
      expect(compatibilityScore([1, 0], [-1, 0])).toBeCloseTo(0, 10);
      expect(compatibilityScore([1, 0], [0, 1])).toBe(0.5);
    });

    it('scores a 60 degree angle at 0.75', () => {
      expect(compatibilityScore([1, 0], [0.5, Math.sqrt(3) / 2])).toBeCloseTo(0.75, 10);
    });
  });

  describe('categorize', () => {
    it.each([
      [1, 'Very Good'],
      [0.8, 'Very Good'],
      [0.79, 'Good'],
      [0.6, 'Good'],
      [0.5, 'Neutral'],
      [0.4, 'Neutral'],
      [0.39, 'Bad'],
      [0.2, 'Bad'],
      [0.19, 'Very Bad'],
      [0, 'Very Bad'],
    ])('places %p in %p', (score, category) => {
      expect(categorize(score)).toBe(category);
    });
  });

  describe('topKByValue', () => {
    const names = ['ring', 'necklace', 'bangle', 'earring', 'pendant'];

    it('orders names by descending value', () => {
      expect(topKByValue(names, [0.1, 0.9, 0.5, 0.7, 0.3], 3)).toEqual([
        'necklace',
        'earring',
        'bangle',
      ]);
    });

    it('returns every name when k exceeds the catalogue', () => {
      expect(topKByValue(names, [5, 4, 3, 2, 1], 10)).toEqual(names);
    });

    it('keeps catalogue order for ties', () => {
      expect(topKByValue(names, [1, 2, 2, 0, 2], 3)).toEqual(['necklace', 'bangle', 'pendant']);
    });

    it('rejects a value count that does not match the names', () => {
      expect(() => topKByValue(names, [1, 2], 2)).toThrow('Expected 5 values, got 2');
    });
  });
});
