import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { BadRequestException, InternalServerErrorException } from '@nestjs/common';
import { OtpService, OtpRecord, isOtpRecord } from './otp.service';
import { RedisService } from '../redis/redis.service';
import { SmsService } from '../sms/sms.service';
import { SmsConfigurationError, SmsDeliveryError } from '../sms/sms.errors';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { TooManyRequestsException } from '../common/exceptions/too-many-requests.exception';
import { InMemoryRedisService } from '../../test/helpers/in-memory-redis.service';

describe('OtpService', () => {
  let service: OtpService;
  let redis: InMemoryRedisService;
  let smsService: { sendOtpSms: jest.Mock; isSandbox: boolean };
  let auditLogger: Record<string, jest.Mock>;
  let metricsService: Record<string, jest.Mock>;

  const mobileNo = '+919876543210';
  const client = { ip: '10.0.0.1', userAgent: 'jest' };

  const config: Record<string, unknown> = {
    'auth.otp.length': 6,
    'auth.otp.expirySeconds': 600,
    'auth.otp.sendCooldownSeconds': 60,
    'auth.otp.maxVerifyAttempts': 3,
    'auth.otp.verifyWindowSeconds': 600,
    'auth.otp.verifiedTtlSeconds': 900,
  };

  const storeOtp = async (code: string, expiresAt = Date.now() + 600_000): Promise<void> => {
    const record: OtpRecord = { code, expiresAt };
    await redis.setJson(`otp:mobile:${mobileNo}`, 600, record);
  };

  beforeEach(async () => {
    redis = new InMemoryRedisService();
    smsService = { sendOtpSms: jest.fn().mockResolvedValue(undefined), isSandbox: false };
    auditLogger = {
      logOtpSent: jest.fn(),
      logOtpSendFailed: jest.fn(),
      logOtpVerified: jest.fn(),
      logOtpVerificationFailed: jest.fn(),
      logRateLimitExceeded: jest.fn(),
    };
    metricsService = {
      incrementOtpSent: jest.fn(),
      incrementOtpVerified: jest.fn(),
      incrementOtpFailed: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OtpService,
        { provide: RedisService, useValue: redis },
        { provide: SmsService, useValue: smsService },
        { provide: AuditLoggerService, useValue: auditLogger },
        { provide: MetricsService, useValue: metricsService },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => config[key]),
            getOrThrow: jest.fn((key: string) => config[key]),
          },
        },
      ],
    }).compile();

    service = module.get<OtpService>(OtpService);
    jest.useFakeTimers({ now: new Date('2026-03-01T10:00:00Z') });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('sendOtp', () => {
    it('sends a six digit code and stores it with its expiry', async () => {
      await expect(service.sendOtp(mobileNo, client)).resolves.toEqual({});

      const [to, code] = smsService.sendOtpSms.mock.calls[0];
      expect(to).toBe(mobileNo);
      expect(code).toMatch(/^\d{6}$/);

      const record = await redis.getJson(`otp:mobile:${mobileNo}`, isOtpRecord);
      expect(record).toEqual({
        code,
        expiresAt: new Date('2026-03-01T10:10:00Z').getTime(),
        ip: '10.0.0.1',
        userAgent: 'jest',
      });
      expect(auditLogger.logOtpSent).toHaveBeenCalledWith(mobileNo, '10.0.0.1', 'jest');
      expect(metricsService.incrementOtpSent).toHaveBeenCalledWith('success');
    });

    it('returns the code in sandbox mode', async () => {
      smsService.isSandbox = true;

      const result = await service.sendOtp(mobileNo, client);

      expect(result.otp).toBe(smsService.sendOtpSms.mock.calls[0][1]);
    });

    it('enforces the resend cooldown', async () => {
      await service.sendOtp(mobileNo, client);

      await expect(service.sendOtp(mobileNo, client)).rejects.toThrow(TooManyRequestsException);
      expect(smsService.sendOtpSms).toHaveBeenCalledTimes(1);
    });

    it('replaces the previous code once the cooldown has passed', async () => {
      await service.sendOtp(mobileNo, client);
      const first = smsService.sendOtpSms.mock.calls[0][1];

      jest.advanceTimersByTime(61_000);
      await service.sendOtp(mobileNo, client);
      const second = smsService.sendOtpSms.mock.calls[1][1];

      const record = await redis.getJson(`otp:mobile:${mobileNo}`, isOtpRecord);
      expect(record?.code).toBe(second);
      expect(typeof first).toBe('string');
    });

    it('surfaces provider failures as 500 with the provider message', async () => {
      smsService.sendOtpSms.mockRejectedValue(new SmsDeliveryError('Invalid To number'));

      const failure = service.sendOtp(mobileNo, client);

      await expect(failure).rejects.toBeInstanceOf(InternalServerErrorException);
      await expect(failure).rejects.toThrow('Failed to send OTP: Invalid To number');
      expect(redis.has(`otp:mobile:${mobileNo}`)).toBe(false);
      expect(redis.has(`otp:send:cooldown:${mobileNo}`)).toBe(false);
      expect(metricsService.incrementOtpSent).toHaveBeenCalledWith('failed');
    });

    it('reports missing provider configuration', async () => {
      smsService.sendOtpSms.mockRejectedValue(new SmsConfigurationError());

      await expect(service.sendOtp(mobileNo, client)).rejects.toThrow(
        new InternalServerErrorException('Twilio configuration error'),
      );
    });
  });

  describe('verifyOtp', () => {
    it('consumes a matching code and marks the number verified', async () => {
      await storeOtp('123456');

      await expect(service.verifyOtp(mobileNo, '123456', client)).resolves.toBeUndefined();

      expect(redis.has(`otp:mobile:${mobileNo}`)).toBe(false);
      expect(await redis.get(`otp:verified:${mobileNo}`)).toBe('1');
      expect(metricsService.incrementOtpVerified).toHaveBeenCalled();
    });

    it('rejects when no code is pending', async () => {
      await expect(service.verifyOtp(mobileNo, '123456', client)).rejects.toThrow(
        new BadRequestException('OTP not found or expired'),
      );
    });

    it('rejects and deletes an expired code', async () => {
      await storeOtp('123456', Date.now() - 1);

      await expect(service.verifyOtp(mobileNo, '123456', client)).rejects.toThrow(
        new BadRequestException('OTP has expired'),
      );
      expect(redis.has(`otp:mobile:${mobileNo}`)).toBe(false);
    });

    it('rejects a wrong code and keeps the pending one', async () => {
      await storeOtp('123456');

      await expect(service.verifyOtp(mobileNo, '654321', client)).rejects.toThrow(
        new BadRequestException('Invalid OTP'),
      );
      expect(redis.has(`otp:mobile:${mobileNo}`)).toBe(true);
      expect(metricsService.incrementOtpFailed).toHaveBeenCalledWith('invalid_code');
    });

    it('treats a code past its TTL as missing', async () => {
      await storeOtp('123456');

      jest.advanceTimersByTime(601_000);

      await expect(service.verifyOtp(mobileNo, '123456', client)).rejects.toThrow(
        'OTP not found or expired',
      );
    });

    it('locks the number after too many attempts', async () => {
      await storeOtp('123456');

      for (let i = 0; i < 3; i++) {
        await expect(service.verifyOtp(mobileNo, '000000', client)).rejects.toThrow(
          BadRequestException,
        );
      }

      await expect(service.verifyOtp(mobileNo, '123456', client)).rejects.toThrow(
        TooManyRequestsException,
      );
      expect(auditLogger.logRateLimitExceeded).toHaveBeenCalledWith(
        'otp_verify_attempts',
        '10.0.0.1',
        mobileNo,
      );
    });

    it('resets the attempt counter after a success', async () => {
      await storeOtp('123456');
      await expect(service.verifyOtp(mobileNo, '000000', client)).rejects.toThrow('Invalid OTP');

      await service.verifyOtp(mobileNo, '123456', client);

      expect(redis.has(`otp:verify:attempts:${mobileNo}`)).toBe(false);
    });
  });

  describe('consumeVerification', () => {
    it('accepts and consumes the verified marker', async () => {
      await redis.setex(`otp:verified:${mobileNo}`, 900, '1');

      await service.consumeVerification(mobileNo, '999999', client);

      expect(redis.has(`otp:verified:${mobileNo}`)).toBe(false);
    });

    it('falls back to checking the pending code', async () => {
      await storeOtp('123456');

      await service.consumeVerification(mobileNo, '123456', client);

      expect(redis.has(`otp:mobile:${mobileNo}`)).toBe(false);
      expect(redis.has(`otp:verified:${mobileNo}`)).toBe(false);
    });

    it('rejects an unverified number with a wrong code', async () => {
      await storeOtp('123456');

      await expect(service.consumeVerification(mobileNo, '111111', client)).rejects.toThrow(
        'Invalid OTP',
      );
    });
  });
});
