import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync } from 'fs';

export interface ConfigValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Checks configuration at bootstrap. Database and Redis problems are fatal,
 * SMS and model artifact problems are reported as warnings.
 */
@Injectable()
export class ConfigValidationService {
  private readonly logger = new Logger(ConfigValidationService.name);

  constructor(private configService: ConfigService) {}

  validate(): ConfigValidationResult {
    this.logger.log('Validating configuration...');
    const result: ConfigValidationResult = { errors: [], warnings: [] };

    this.validateDatabase(result);
    this.validateRedis(result);
    this.validateSms(result);
    this.validateAuth(result);
    this.validatePrediction(result);

    if (result.errors.length > 0) {
      this.logger.error('Configuration validation failed:');
      result.errors.forEach((error) => this.logger.error(`  - ${error}`));
      throw new Error('Configuration validation failed. Fix the above errors and restart.');
    }

    if (result.warnings.length > 0) {
      this.logger.warn('Configuration warnings:');
      result.warnings.forEach((warning) => this.logger.warn(`  - ${warning}`));
    }

    this.logger.log('Configuration validation passed');
    return result;
  }

  private validateDatabase({ errors, warnings }: ConfigValidationResult): void {
    if (!this.configService.get<string>('database.host')) {
      errors.push('DATABASE_HOST is required but missing');
    }
    if (!isValidPort(this.configService.get<number>('database.port'))) {
      errors.push('DATABASE_PORT must be a valid port number (1-65535)');
    }
    if (!this.configService.get<string>('database.username')) {
      errors.push('DATABASE_USERNAME is required but missing');
    }
    if (!this.configService.get<string>('database.database')) {
      errors.push('DATABASE_NAME is required but missing');
    }
    if (!process.env.DATABASE_PASSWORD) {
      warnings.push('DATABASE_PASSWORD is not set (using default "postgres")');
    }

    const poolSize = this.configService.get<number>('database.poolSize');
    if (poolSize !== undefined && (poolSize < 1 || poolSize > 100)) {
      errors.push('DATABASE_POOL_SIZE must be between 1 and 100');
    }
  }

  private validateRedis({ errors, warnings }: ConfigValidationResult): void {
    if (!this.configService.get<string>('redis.host')) {
      errors.push('REDIS_HOST is required but missing');
    }
    if (!isValidPort(this.configService.get<number>('redis.port'))) {
      errors.push('REDIS_PORT must be a valid port number (1-65535)');
    }
    if (!this.configService.get<string>('redis.password')) {
      warnings.push('REDIS_PASSWORD is not set (authentication disabled)');
    }
  }

  private validateSms({ warnings }: ConfigValidationResult): void {
    if (this.configService.get<boolean>('sms.sandbox')) {
      this.logger.log('SMS sandbox mode: OTP codes are logged, not delivered');
      return;
    }
    const missing = [
      ['twilio.accountSid', 'TWILIO_ACCOUNT_SID'],
      ['twilio.authToken', 'TWILIO_AUTH_TOKEN'],
      ['twilio.phoneNumber', 'TWILIO_PHONE_NUMBER'],
    ]
      .filter(([key]) => !this.configService.get<string>(key))
      .map(([, env]) => env);
    if (missing.length > 0) {
      warnings.push(`${missing.join(', ')} missing. OTP delivery will fail until they are set.`);
    }
  }

  private validateAuth({ warnings }: ConfigValidationResult): void {
    const otpTtl = this.configService.get<number>('auth.otp.expirySeconds');
    if (otpTtl !== undefined && (otpTtl < 30 || otpTtl > 3600)) {
      warnings.push('OTP_EXPIRY_SECONDS should be between 30 and 3600 seconds');
    }

    const maxVerifyAttempts = this.configService.get<number>('auth.otp.maxVerifyAttempts');
    if (maxVerifyAttempts !== undefined && (maxVerifyAttempts < 3 || maxVerifyAttempts > 10)) {
      warnings.push('MAX_OTP_VERIFY_ATTEMPTS should be between 3 and 10');
    }
  }

  private validatePrediction({ warnings }: ConfigValidationResult): void {
    const paths: Array<[string, string]> = [
      ['prediction.modelPath', 'MODEL_PATH'],
      ['prediction.featureExtractorPath', 'FEATURE_EXTRACTOR_PATH'],
      ['prediction.scalerPath', 'SCALER_PATH'],
      ['prediction.pairwiseFeaturesPath', 'PAIRWISE_FEATURES_PATH'],
    ];
    for (const [key, env] of paths) {
      const path = this.configService.get<string>(key);
      if (!path) {
        warnings.push(`${env} is not set. Predictions are unavailable.`);
      } else if (!existsSync(path)) {
        warnings.push(`${env} points to a missing file (${path}). Predictions are unavailable.`);
      }
    }
  }
}

function isValidPort(port: number | undefined): boolean {
  return port !== undefined && Number.isInteger(port) && port >= 1 && port <= 65535;
}
