import { Injectable } from '@nestjs/common';
import { Counter, Histogram } from 'prom-client';

export type OtpSendStatus = 'success' | 'failed';
export type PredictionFailureReason = 'model_unavailable' | 'feature_extraction' | 'inference';

/**
 * Prometheus counters for the OTP flow, sessions and predictions.
 * Registered on the prom-client default registry scraped at /metrics.
 */
@Injectable()
export class MetricsService {
  private readonly otpSentCounter = new Counter({
    name: 'auth_otp_sent_total',
    help: 'Total number of OTP codes sent',
    labelNames: ['status'],
  });

  private readonly otpVerifiedCounter = new Counter({
    name: 'auth_otp_verified_total',
    help: 'Total number of successful OTP verifications',
  });

  private readonly otpFailedCounter = new Counter({
    name: 'auth_otp_failed_total',
    help: 'Total number of failed OTP verifications',
    labelNames: ['reason'],
  });

  private readonly registrationsCounter = new Counter({
    name: 'auth_registrations_total',
    help: 'Total number of registered users',
  });

  private readonly loginsCounter = new Counter({
    name: 'auth_logins_total',
    help: 'Total number of login attempts',
    labelNames: ['result'],
  });

  private readonly sessionValidationFailedCounter = new Counter({
    name: 'auth_session_validation_failed_total',
    help: 'Total number of failed session validations',
    labelNames: ['reason'],
  });

  private readonly sessionsCleanedCounter = new Counter({
    name: 'auth_sessions_cleaned_total',
    help: 'Total number of expired sessions cleaned up',
  });

  private readonly predictionsCounter = new Counter({
    name: 'predictions_total',
    help: 'Total number of compatibility predictions served',
    labelNames: ['category'],
  });

  private readonly predictionsFailedCounter = new Counter({
    name: 'predictions_failed_total',
    help: 'Total number of failed compatibility predictions',
    labelNames: ['reason'],
  });

  private readonly predictionDuration = new Histogram({
    name: 'prediction_duration_seconds',
    help: 'Duration of a compatibility prediction including feature extraction',
    buckets: [0.1, 0.25, 0.5, 1, 2, 5],
  });

  incrementOtpSent(status: OtpSendStatus): void {
    this.otpSentCounter.inc({ status });
  }

  incrementOtpVerified(): void {
    this.otpVerifiedCounter.inc();
  }

  incrementOtpFailed(reason: string): void {
    this.otpFailedCounter.inc({ reason });
  }

  incrementRegistrations(): void {
    this.registrationsCounter.inc();
  }

  incrementLogins(result: 'success' | 'failed'): void {
    this.loginsCounter.inc({ result });
  }

  incrementSessionValidationFailed(reason: string): void {
    this.sessionValidationFailedCounter.inc({ reason });
  }

  incrementSessionsCleaned(count: number): void {
    this.sessionsCleanedCounter.inc(count);
  }

  incrementPredictions(category: string): void {
    this.predictionsCounter.inc({ category });
  }

  incrementPredictionsFailed(reason: PredictionFailureReason): void {
    this.predictionsFailedCounter.inc({ reason });
  }

  recordPredictionDuration(durationSeconds: number): void {
    this.predictionDuration.observe(durationSeconds);
  }
}
