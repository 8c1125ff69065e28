import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { join } from 'path';
import { ConfigValidationService } from './config-validation.service';

describe('ConfigValidationService', () => {
  const baseConfig: Record<string, unknown> = {
    'database.host': 'localhost',
    'database.port': 5432,
    'database.username': 'postgres',
    'database.database': 'jewelify',
    'database.poolSize': 10,
    'redis.host': 'localhost',
    'redis.port': 6379,
    'redis.password': 'test-secret',
    'sms.sandbox': true,
    'auth.otp.expirySeconds': 600,
    'auth.otp.maxVerifyAttempts': 5,
    'prediction.modelPath': __filename,
    'prediction.featureExtractorPath': __filename,
    'prediction.scalerPath': __filename,
    'prediction.pairwiseFeaturesPath': __filename,
  };

  const createService = (overrides: Record<string, unknown> = {}): ConfigValidationService => {
    const values: Record<string, unknown> = { ...baseConfig, ...overrides };
    const configService = { get: jest.fn((key: string) => values[key]) };
    return new ConfigValidationService(configService as unknown as ConfigService);
  };

  const originalPassword = process.env.DATABASE_PASSWORD;

  beforeEach(() => {
    process.env.DATABASE_PASSWORD = 'test-secret';
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    if (originalPassword === undefined) {
      delete process.env.DATABASE_PASSWORD;
    } else {
      process.env.DATABASE_PASSWORD = originalPassword;
    }
    jest.restoreAllMocks();
  });

  it('passes a complete sandbox configuration', () => {
    expect(createService().validate()).toEqual({ errors: [], warnings: [] });
  });

  it('fails on an invalid database port', () => {
    expect(() => createService({ 'database.port': 70000 }).validate()).toThrow(
      'Configuration validation failed',
    );
  });

  it('fails on a missing Redis host', () => {
    expect(() => createService({ 'redis.host': '' }).validate()).toThrow(
      'Configuration validation failed',
    );
  });

  it('warns about missing Twilio credentials outside sandbox mode', () => {
    const result = createService({
      'sms.sandbox': false,
      'twilio.accountSid': 'AC-test',
    }).validate();

    expect(result.warnings).toEqual([
      'TWILIO_AUTH_TOKEN, TWILIO_PHONE_NUMBER missing. OTP delivery will fail until they are set.',
    ]);
  });

  it('warns about an artifact path that points nowhere', () => {
    const missing = join(__dirname, 'no-such-scaler.json');
    const result = createService({ 'prediction.scalerPath': missing }).validate();

    expect(result.warnings).toEqual([
      `SCALER_PATH points to a missing file (${missing}). Predictions are unavailable.`,
    ]);
  });

  it('warns about a missing model artifact path', () => {
    const result = createService({ 'prediction.scalerPath': '' }).validate();

    expect(result.warnings).toEqual(['SCALER_PATH is not set. Predictions are unavailable.']);
  });
});
