import { CompatibilityCategory } from '../ml/compatibility';

export const PREDICTION_MESSAGES = {
  INVALID_UPLOAD: 'Uploaded files must be images',
  MODEL_NOT_LOADED: 'Model is not loaded properly',
  PREDICTION_FAILED: 'Prediction failed',
  PREDICTION_ERROR_PREFIX: 'Prediction error: ',
  NOT_FOUND: 'Prediction not found',
  NO_HISTORY: 'No predictions found',
} as const;

export interface PredictResponse {
  prediction_id: string;
  score: number;
  category: CompatibilityCategory;
  recommendations: string[];
}

export interface RecommendationView {
  name: string;
  url: string | null;
}

export interface PredictionView {
  id: string;
  mobileNo: string;
  score: number;
  category: string;
  recommendations: RecommendationView[];
  timestamp: string;
}

export type HistoryEntry = Omit<PredictionView, 'mobileNo'>;

export type HistoryResponse =
  | HistoryEntry[]
  | { message: typeof PREDICTION_MESSAGES.NO_HISTORY; recommendations: [] };

export interface UploadedImages {
  face?: Express.Multer.File[];
  jewelry?: Express.Multer.File[];
}
