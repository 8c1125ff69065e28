import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isUUID } from 'class-validator';
import { Prediction } from './entities/prediction.entity';
import { CompatibilityResult } from './ml/jewelry-predictor';
import { PredictorService } from './services/predictor.service';
import { JewelryImageService } from './services/jewelry-image.service';
import { UserService } from '../auth/services/user.service';
import { MetricsService } from '../common/services/metrics.service';
import { AUTH_CONSTANTS } from '../auth/constants/auth.constants';
import { toHistoryEntry, toPredictionView } from './mappers/recommendation.mapper';
import {
  HistoryResponse,
  PredictionView,
  PredictResponse,
  PREDICTION_MESSAGES,
} from './types/prediction.types';

@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);

  constructor(
    @InjectRepository(Prediction)
    private predictionRepository: Repository<Prediction>,
    private predictorService: PredictorService,
    private jewelryImageService: JewelryImageService,
    private userService: UserService,
    private metricsService: MetricsService,
  ) {}

  /**
   * Scores a face/jewelry pair for the user and stores the result.
   */
  async predict(
    userId: string,
    face: Express.Multer.File | undefined,
    jewelry: Express.Multer.File | undefined,
  ): Promise<PredictResponse> {
    const user = await this.userService.findById(userId);
    if (!user) {
      throw new UnauthorizedException(AUTH_CONSTANTS.MESSAGES.INVALID_SESSION);
    }

    const predictor = await this.predictorService.getPredictor();
    if (!predictor) {
      this.metricsService.incrementPredictionsFailed('model_unavailable');
      throw new InternalServerErrorException(PREDICTION_MESSAGES.MODEL_NOT_LOADED);
    }

    if (!isImage(face) || !isImage(jewelry)) {
      throw new BadRequestException(PREDICTION_MESSAGES.INVALID_UPLOAD);
    }

    const startTime = Date.now();
    let result: CompatibilityResult | null;
    try {
      result = await predictor.predictCompatibility(face.buffer, jewelry.buffer);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Inference failed for user ${userId}: ${message}`);
      this.metricsService.incrementPredictionsFailed('inference');
      throw new InternalServerErrorException(
        `${PREDICTION_MESSAGES.PREDICTION_ERROR_PREFIX}${message}`,
      );
    }

    if (!result) {
      this.metricsService.incrementPredictionsFailed('feature_extraction');
      throw new InternalServerErrorException(PREDICTION_MESSAGES.PREDICTION_FAILED);
    }

    const prediction = await this.predictionRepository.save(
      this.predictionRepository.create({
        userId,
        mobileNo: user.mobileNo,
        score: result.score,
        category: result.category,
        recommendations: result.recommendations,
      }),
    );

    this.metricsService.incrementPredictions(result.category);
    this.metricsService.recordPredictionDuration((Date.now() - startTime) / 1000);
    this.logger.log(`Prediction ${prediction.id} stored (${result.category})`);

    return {
      prediction_id: prediction.id,
      score: result.score,
      category: result.category,
      recommendations: result.recommendations,
    };
  }

  async getPrediction(userId: string, predictionId: string): Promise<PredictionView> {
    const prediction = isUUID(predictionId)
      ? await this.predictionRepository.findOne({ where: { id: predictionId, userId } })
      : null;
    if (!prediction) {
      throw new NotFoundException(PREDICTION_MESSAGES.NOT_FOUND);
    }

    const urls = await this.jewelryImageService.resolveUrls(prediction.recommendations);
    return toPredictionView(prediction, urls);
  }

  /**
   * The user's predictions, newest first.
   */
  async getHistory(userId: string): Promise<HistoryResponse> {
    const predictions = await this.predictionRepository.find({
      where: { userId },
      order: { createdAt: 'DESC' },
    });
    if (predictions.length === 0) {
      return { message: PREDICTION_MESSAGES.NO_HISTORY, recommendations: [] };
    }

    const urls = await this.jewelryImageService.resolveUrls(
      predictions.flatMap((prediction) => prediction.recommendations),
    );
    return predictions.map((prediction) => toHistoryEntry(prediction, urls));
  }
}

function isImage(file: Express.Multer.File | undefined): file is Express.Multer.File {
  return file !== undefined && file.mimetype.startsWith('image/');
}
