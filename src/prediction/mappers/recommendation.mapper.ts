import { Prediction } from '../entities/prediction.entity';
import { HistoryEntry, PredictionView, RecommendationView } from '../types/prediction.types';

export function toRecommendationViews(
  names: readonly string[],
  urls: ReadonlyMap<string, string>,
): RecommendationView[] {
  return names.map((name) => ({ name, url: urls.get(name) ?? null }));
}

export function toPredictionView(
  prediction: Prediction,
  urls: ReadonlyMap<string, string>,
): PredictionView {
  return {
    id: prediction.id,
    mobileNo: prediction.mobileNo,
    score: prediction.score,
    category: prediction.category,
    recommendations: toRecommendationViews(prediction.recommendations, urls),
    timestamp: prediction.createdAt.toISOString(),
  };
}

export function toHistoryEntry(
  prediction: Prediction,
  urls: ReadonlyMap<string, string>,
): HistoryEntry {
  return {
    id: prediction.id,
    score: prediction.score,
    category: prediction.category,
    recommendations: toRecommendationViews(prediction.recommendations, urls),
    timestamp: prediction.createdAt.toISOString(),
  };
}
