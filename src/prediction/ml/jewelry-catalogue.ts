import { isNumberArray } from './feature-scaler';

/**
 * Ordered jewelry names the recommender was trained against. Entry order matches
 * the recommender's output units, so it must be preserved.
 */
export class JewelryCatalogue {
  constructor(readonly names: readonly string[]) {}

  /**
   * Builds the catalogue from the pairwise-features artifact, a JSON object of
   * `name -> feature vector`. Entries whose vector is missing or not exactly
   * `featureSize` long are left out.
   */
  static fromPairwiseFeatures(value: unknown, featureSize: number): JewelryCatalogue {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new Error('Pairwise features artifact must be an object of name to vector');
    }
    const names = Object.entries(value)
      .filter(([, vector]) => isNumberArray(vector) && vector.length === featureSize)
      .map(([name]) => name);
    return new JewelryCatalogue(names);
  }

  get size(): number {
    return this.names.length;
  }
}
