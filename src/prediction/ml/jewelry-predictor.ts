import { Logger } from '@nestjs/common';
import * as tf from '@tensorflow/tfjs';
import { categorize, CompatibilityCategory, compatibilityScore, topKByValue } from './compatibility';
import { FeatureScaler } from './feature-scaler';
import { ImageDecoder } from './image-preprocessor';
import { JewelryCatalogue } from './jewelry-catalogue';

/**
 * The slice of `tf.LayersModel` inference needs.
 */
export interface InferenceModel {
  predict(input: tf.Tensor): tf.Tensor | tf.Tensor[];
}

export interface JewelryPredictorOptions {
  imageSize: number;
  topK: number;
}

export interface CompatibilityResult {
  score: number;
  category: CompatibilityCategory;
  recommendations: string[];
}

/**
 * Scores a face/jewelry pair and ranks catalogue items for the face.
 *
 * Both images go through the feature extractor and the scaler. The score is the
 * cosine similarity of the two scaled vectors mapped onto [0, 1]. The recommender
 * turns the scaled face vector into one value per catalogue item.
 */
export class JewelryPredictor {
  private readonly logger = new Logger(JewelryPredictor.name);

  constructor(
    private readonly featureExtractor: InferenceModel,
    private readonly recommender: InferenceModel,
    private readonly scaler: FeatureScaler,
    private readonly catalogue: JewelryCatalogue,
    private readonly decode: ImageDecoder,
    private readonly options: JewelryPredictorOptions,
  ) {}

  /**
   * Scaled feature vector for one image, or null when the image cannot be
   * decoded or the extractor output does not fit the scaler.
   */
  async extractFeatures(image: Buffer): Promise<number[] | null> {
    const size = this.options.imageSize;
    try {
      const pixels = await this.decode(image, size);
      const raw = tf.tidy(() =>
        firstOutput(this.featureExtractor.predict(tf.tensor4d(pixels, [1, size, size, 3]))).dataSync(),
      );
      return this.scaler.transform(raw);
    } catch (error) {
      this.logger.warn(
        `Feature extraction failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  /**
   * Returns null when either image yields no features. Recommender failures propagate.
   */
  async predictCompatibility(face: Buffer, jewelry: Buffer): Promise<CompatibilityResult | null> {
    const faceFeatures = await this.extractFeatures(face);
    const jewelryFeatures = await this.extractFeatures(jewelry);
    if (!faceFeatures || !jewelryFeatures) {
      return null;
    }

    const score = compatibilityScore(faceFeatures, jewelryFeatures);
    return {
      score,
      category: categorize(score),
      recommendations: this.recommend(faceFeatures),
    };
  }

  private recommend(faceFeatures: number[]): string[] {
    const values = tf.tidy(() =>
      firstOutput(this.recommender.predict(tf.tensor2d([faceFeatures]))).dataSync(),
    );
    if (values.length !== this.catalogue.size) {
      this.logger.warn(
        `Recommender produced ${values.length} values for ${this.catalogue.size} catalogue items`,
      );
      return [];
    }
    return topKByValue(this.catalogue.names, values, this.options.topK);
  }
}

function firstOutput(output: tf.Tensor | tf.Tensor[]): tf.Tensor {
  const tensor = Array.isArray(output) ? output[0] : output;
  if (!tensor) {
    throw new Error('Model produced no output');
  }
  return tensor;
}
