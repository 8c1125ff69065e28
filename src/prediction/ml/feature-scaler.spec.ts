import { FeatureScaler, isNumberArray } from './feature-scaler';

describe('FeatureScaler', () => {
  const scaler = new FeatureScaler([1, 2, 3], [2, 4, 0.5]);

  it('standardises each feature', () => {
    expect(scaler.transform([3, 2, 4])).toEqual([1, 0, 2]);
  });

  it('treats a zero scale as one', () => {
    const flat = new FeatureScaler([1, 1], [0, 1]);

    expect(flat.transform([4, 4])).toEqual([3, 3]);
  });

  it('rejects input of the wrong width', () => {
    expect(() => scaler.transform([1, 2])).toThrow('Expected 3 features, got 2');
  });

  it('rejects mismatched parameters', () => {
    expect(() => new FeatureScaler([0, 0], [1])).toThrow(
      'Scaler mean has 2 features but scale has 1',
    );
  });

  describe('fromJSON', () => {
    it('reads mean and scale', () => {
      const parsed = FeatureScaler.fromJSON({ mean: [0.5, 1], scale: [1, 2] });

      expect(parsed.featureSize).toBe(2);
      expect(parsed.transform([1.5, 5])).toEqual([1, 2]);
    });

    it.each([null, 'scaler', { mean: [1] }, { mean: [1], scale: ['2'] }])(
      'rejects %p',
      (value) => {
        expect(() => FeatureScaler.fromJSON(value)).toThrow(/Scaler artifact must/);
      },
    );
  });
});

describe('isNumberArray', () => {
  it('accepts finite numbers only', () => {
    expect(isNumberArray([1, 2.5, -3])).toBe(true);
    expect(isNumberArray([1, Number.NaN])).toBe(false);
    expect(isNumberArray([1, '2'])).toBe(false);
    expect(isNumberArray('1,2')).toBe(false);
  });
});
