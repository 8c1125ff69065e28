/**
 * Standard scaler fitted offline: `(x - mean) / scale` per feature.
 */
export class FeatureScaler {
  constructor(
    readonly mean: readonly number[],
    readonly scale: readonly number[],
  ) {
    if (mean.length !== scale.length) {
      throw new Error(`Scaler mean has ${mean.length} features but scale has ${scale.length}`);
    }
  }

  static fromJSON(value: unknown): FeatureScaler {
    if (typeof value !== 'object' || value === null) {
      throw new Error('Scaler artifact must be an object with mean and scale');
    }
    const mean: unknown = Reflect.get(value, 'mean');
    const scale: unknown = Reflect.get(value, 'scale');
    if (!isNumberArray(mean) || !isNumberArray(scale)) {
      throw new Error('Scaler artifact must hold numeric mean and scale arrays');
    }
    return new FeatureScaler(mean, scale);
  }

  get featureSize(): number {
    return this.mean.length;
  }

  transform(features: ArrayLike<number>): number[] {
    if (features.length !== this.featureSize) {
      throw new Error(`Expected ${this.featureSize} features, got ${features.length}`);
    }
    const scaled = new Array<number>(features.length);
    for (let i = 0; i < features.length; i++) {
      // zero-variance features were fitted with a unit scale
      const divisor = this.scale[i] === 0 ? 1 : this.scale[i];
      scaled[i] = (features[i] - this.mean[i]) / divisor;
    }
    return scaled;
  }
}

export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number' && Number.isFinite(item));
}
