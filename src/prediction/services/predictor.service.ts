import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { loadLayersModel, readJsonFile } from '../ml/artifact-loader';
import { FeatureScaler } from '../ml/feature-scaler';
import { decodeImage } from '../ml/image-preprocessor';
import { JewelryCatalogue } from '../ml/jewelry-catalogue';
import { JewelryPredictor } from '../ml/jewelry-predictor';

/**
 * Owns the loaded model artifacts. Loading happens once at start; when that
 * fails the predictor stays unavailable and callers may ask for one more attempt.
 */
@Injectable()
export class PredictorService implements OnModuleInit {
  private readonly logger = new Logger(PredictorService.name);
  private predictor: JewelryPredictor | null = null;

  constructor(private configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  /**
   * The current predictor, reloading once if the previous attempt failed.
   */
  async getPredictor(): Promise<JewelryPredictor | null> {
    if (!this.predictor) {
      this.logger.warn('Predictor not loaded, retrying artifact load');
      await this.load();
    }
    return this.predictor;
  }

  private async load(): Promise<void> {
    const modelPath = this.configService.getOrThrow<string>('prediction.modelPath');
    const featureExtractorPath = this.configService.getOrThrow<string>(
      'prediction.featureExtractorPath',
    );
    const scalerPath = this.configService.getOrThrow<string>('prediction.scalerPath');
    const pairwisePath = this.configService.getOrThrow<string>('prediction.pairwiseFeaturesPath');
    const featureSize = this.configService.getOrThrow<number>('prediction.featureSize');

    try {
      const [recommender, featureExtractor, scalerJson, pairwiseJson] = await Promise.all([
        loadLayersModel(modelPath),
        loadLayersModel(featureExtractorPath),
        readJsonFile(scalerPath),
        readJsonFile(pairwisePath),
      ]);

      const scaler = FeatureScaler.fromJSON(scalerJson);
      if (scaler.featureSize !== featureSize) {
        throw new Error(
          `Scaler has ${scaler.featureSize} features, expected ${featureSize}`,
        );
      }
      const catalogue = JewelryCatalogue.fromPairwiseFeatures(pairwiseJson, featureSize);

      this.predictor = new JewelryPredictor(
        featureExtractor,
        recommender,
        scaler,
        catalogue,
        decodeImage,
        {
          imageSize: this.configService.getOrThrow<number>('prediction.imageSize'),
          topK: this.configService.getOrThrow<number>('prediction.topK'),
        },
      );
      this.logger.log(`Prediction artifacts loaded (${catalogue.size} catalogue items)`);
    } catch (error) {
      this.predictor = null;
      this.logger.error(
        `Failed to load prediction artifacts: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
