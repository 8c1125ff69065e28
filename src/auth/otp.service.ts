import { Injectable, BadRequestException, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { RedisService } from '../redis/redis.service';
import { SmsService } from '../sms/sms.service';
import { SmsConfigurationError } from '../sms/sms.errors';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { TooManyRequestsException } from '../common/exceptions/too-many-requests.exception';
import { AUTH_CONSTANTS } from './constants/auth.constants';
import { ClientInfo } from './services/session.service';

export interface OtpRecord {
  code: string;
  /** epoch milliseconds */
  expiresAt: number;
  ip?: string;
  userAgent?: string;
}

export function isOtpRecord(value: unknown): value is OtpRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'code') === 'string' &&
    typeof Reflect.get(value, 'expiresAt') === 'number'
  );
}

const { REDIS_KEYS, MESSAGES } = AUTH_CONSTANTS;

/**
 * OTP lifecycle: generated and delivered on send, replaced on resend,
 * consumed on a successful check, invalidated on expiry.
 */
@Injectable()
export class OtpService {
  constructor(
    private redisService: RedisService,
    private smsService: SmsService,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  /**
   * Delivers a fresh code and only then stores it, so a failed delivery leaves
   * no usable OTP and no cooldown behind.
   *
   * @returns the code itself in sandbox mode
   */
  async sendOtp(mobileNo: string, client: ClientInfo): Promise<{ otp?: string }> {
    const expirySeconds = this.configService.getOrThrow<number>('auth.otp.expirySeconds');
    const cooldownSeconds = this.configService.getOrThrow<number>('auth.otp.sendCooldownSeconds');
    const cooldownKey = `${REDIS_KEYS.SEND_COOLDOWN}${mobileNo}`;

    if (await this.redisService.get(cooldownKey)) {
      this.auditLogger.logRateLimitExceeded('otp_cooldown', client.ip, mobileNo);
      throw new TooManyRequestsException(MESSAGES.OTP_COOLDOWN);
    }

    const code = this.generateOtpCode();
    await this.deliver(mobileNo, code, client);

    const record: OtpRecord = {
      code,
      expiresAt: Date.now() + expirySeconds * 1000,
      ip: client.ip,
      userAgent: client.userAgent,
    };
    await this.redisService.setJson(`${REDIS_KEYS.OTP}${mobileNo}`, expirySeconds, record);
    await this.redisService.setex(cooldownKey, cooldownSeconds, '1');

    this.auditLogger.logOtpSent(mobileNo, client.ip, client.userAgent);
    this.metricsService.incrementOtpSent('success');

    return this.smsService.isSandbox ? { otp: code } : {};
  }

  /**
   * Checks the code and leaves a verified marker that registration consumes.
   */
  async verifyOtp(mobileNo: string, code: string, client: ClientInfo): Promise<void> {
    await this.consumeOtp(mobileNo, code, client);

    const verifiedTtl = this.configService.getOrThrow<number>('auth.otp.verifiedTtlSeconds');
    await this.redisService.setex(`${REDIS_KEYS.VERIFIED}${mobileNo}`, verifiedTtl, '1');

    this.auditLogger.logOtpVerified(mobileNo, client.ip, client.userAgent);
    this.metricsService.incrementOtpVerified();
  }

  /**
   * Proof of ownership for registration: a verified marker from an earlier
   * verify-otp call, or else the pending code itself. Either is consumed.
   */
  async consumeVerification(mobileNo: string, code: string, client: ClientInfo): Promise<void> {
    const verifiedKey = `${REDIS_KEYS.VERIFIED}${mobileNo}`;
    if (await this.redisService.get(verifiedKey)) {
      await this.redisService.del(verifiedKey);
      return;
    }

    await this.consumeOtp(mobileNo, code, client);
    this.auditLogger.logOtpVerified(mobileNo, client.ip, client.userAgent);
    this.metricsService.incrementOtpVerified();
  }

  private async consumeOtp(mobileNo: string, code: string, client: ClientInfo): Promise<void> {
    const otpKey = `${REDIS_KEYS.OTP}${mobileNo}`;
    const attemptKey = `${REDIS_KEYS.VERIFY_ATTEMPTS}${mobileNo}`;

    await this.checkVerifyAttempts(attemptKey, mobileNo, client);

    const record = await this.redisService.getJson(otpKey, isOtpRecord);
    if (!record) {
      throw this.rejectVerification(mobileNo, 'not_found', MESSAGES.OTP_NOT_FOUND, client);
    }

    if (Date.now() > record.expiresAt) {
      await this.redisService.del(otpKey);
      throw this.rejectVerification(mobileNo, 'expired', MESSAGES.OTP_EXPIRED, client);
    }

    if (!this.codesMatch(record.code, code)) {
      throw this.rejectVerification(mobileNo, 'invalid_code', MESSAGES.OTP_INVALID, client);
    }

    await this.redisService.del(otpKey);
    await this.redisService.del(attemptKey);
  }

  private async checkVerifyAttempts(
    attemptKey: string,
    mobileNo: string,
    client: ClientInfo,
  ): Promise<void> {
    const maxAttempts = this.configService.getOrThrow<number>('auth.otp.maxVerifyAttempts');
    const windowSeconds = this.configService.getOrThrow<number>('auth.otp.verifyWindowSeconds');

    const attempts = await this.redisService.incr(attemptKey);
    if (attempts === 1) {
      await this.redisService.expire(attemptKey, windowSeconds);
    }

    if (attempts > maxAttempts) {
      this.auditLogger.logRateLimitExceeded('otp_verify_attempts', client.ip, mobileNo);
      this.metricsService.incrementOtpFailed('rate_limit_exceeded');
      throw new TooManyRequestsException(MESSAGES.OTP_TOO_MANY_ATTEMPTS);
    }
  }

  private rejectVerification(
    mobileNo: string,
    reason: string,
    message: string,
    client: ClientInfo,
  ): BadRequestException {
    this.auditLogger.logOtpVerificationFailed(mobileNo, message, client.ip);
    this.metricsService.incrementOtpFailed(reason);
    return new BadRequestException(message);
  }

  private async deliver(mobileNo: string, code: string, client: ClientInfo): Promise<void> {
    try {
      await this.smsService.sendOtpSms(mobileNo, code);
    } catch (error) {
      this.metricsService.incrementOtpSent('failed');
      if (error instanceof SmsConfigurationError) {
        this.auditLogger.logOtpSendFailed(mobileNo, error.message, client.ip);
        throw new InternalServerErrorException(MESSAGES.SMS_CONFIGURATION_ERROR);
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.auditLogger.logOtpSendFailed(mobileNo, reason, client.ip);
      throw new InternalServerErrorException(`${MESSAGES.SMS_SEND_FAILED_PREFIX}${reason}`);
    }
  }

  private codesMatch(expected: string, received: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(received);
    return a.length === b.length && crypto.timingSafeEqual(a, b);
  }

  private generateOtpCode(): string {
    const length = this.configService.getOrThrow<number>('auth.otp.length');
    const min = 10 ** (length - 1);
    return crypto.randomInt(min, 10 ** length).toString();
  }
}
