import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum AuditEventType {
  OTP_SENT = 'OTP_SENT',
  OTP_SEND_FAILED = 'OTP_SEND_FAILED',
  OTP_VERIFIED = 'OTP_VERIFIED',
  OTP_VERIFICATION_FAILED = 'OTP_VERIFICATION_FAILED',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  USER_REGISTERED = 'USER_REGISTERED',
  USER_LOGIN = 'USER_LOGIN',
  USER_LOGIN_FAILED = 'USER_LOGIN_FAILED',
  SESSION_CREATED = 'SESSION_CREATED',
  SESSION_VALIDATION_FAILED = 'SESSION_VALIDATION_FAILED',
  SESSION_DELETED = 'SESSION_DELETED',
}

export type AuditMetadata = Record<string, string | number | boolean | null | undefined>;

export interface AuditLogEntry {
  timestamp: Date;
  eventType: AuditEventType;
  userId?: string;
  mobileNo?: string;
  ipAddress?: string;
  userAgent?: string;
  metadata?: AuditMetadata;
  success: boolean;
  message?: string;
}

const SECURITY_EVENTS: ReadonlySet<AuditEventType> = new Set([
  AuditEventType.OTP_VERIFICATION_FAILED,
  AuditEventType.RATE_LIMIT_EXCEEDED,
  AuditEventType.USER_LOGIN_FAILED,
  AuditEventType.SESSION_VALIDATION_FAILED,
]);

/**
 * Structured log of authentication and security events.
 * Mobile numbers never appear in full.
 */
@Injectable()
export class AuditLoggerService {
  private readonly logger = new Logger(AuditLoggerService.name);
  private readonly isProduction: boolean;

  constructor(private configService: ConfigService) {
    this.isProduction = this.configService.get<string>('nodeEnv') === 'production';
  }

  log(entry: AuditLogEntry): void {
    const logData = {
      timestamp: entry.timestamp.toISOString(),
      eventType: entry.eventType,
      userId: entry.userId ?? 'N/A',
      mobileNo: maskMobileNumber(entry.mobileNo),
      ipAddress: entry.ipAddress,
      userAgent: entry.userAgent,
      success: entry.success,
      message: entry.message,
      metadata: entry.metadata,
    };

    if (this.isProduction) {
      this.logger.log(JSON.stringify(logData));
    } else {
      this.logger.log(`[AUDIT] ${entry.eventType}`, logData);
    }

    if (SECURITY_EVENTS.has(entry.eventType) && !entry.success) {
      this.logger.warn(`[SECURITY] ${entry.eventType} - ${entry.message ?? ''}`, logData);
    }
  }

  logOtpSent(mobileNo: string, ipAddress?: string, userAgent?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_SENT,
      mobileNo,
      ipAddress,
      userAgent,
      success: true,
      message: 'OTP sent successfully',
    });
  }

  logOtpSendFailed(mobileNo: string, reason: string, ipAddress?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_SEND_FAILED,
      mobileNo,
      ipAddress,
      success: false,
      message: reason,
    });
  }

  logOtpVerified(mobileNo: string, ipAddress?: string, userAgent?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_VERIFIED,
      mobileNo,
      ipAddress,
      userAgent,
      success: true,
      message: 'OTP verified successfully',
    });
  }

  logOtpVerificationFailed(mobileNo: string, reason: string, ipAddress?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_VERIFICATION_FAILED,
      mobileNo,
      ipAddress,
      success: false,
      message: reason,
    });
  }

  logRateLimitExceeded(limitType: string, ipAddress?: string, mobileNo?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RATE_LIMIT_EXCEEDED,
      mobileNo,
      ipAddress,
      success: false,
      message: `Rate limit exceeded: ${limitType}`,
      metadata: { limitType },
    });
  }

  logUserRegistered(userId: string, mobileNo: string, ipAddress?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.USER_REGISTERED,
      userId,
      mobileNo,
      ipAddress,
      success: true,
      message: 'New user registered',
    });
  }

  logLogin(userId: string, ipAddress?: string, userAgent?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.USER_LOGIN,
      userId,
      ipAddress,
      userAgent,
      success: true,
      message: 'User logged in',
    });
  }

  logLoginFailed(identifier: string, ipAddress?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.USER_LOGIN_FAILED,
      ipAddress,
      success: false,
      message: 'Incorrect credentials',
      metadata: { identifier: maskMobileNumber(identifier) },
    });
  }

  logSessionCreated(userId: string, sessionId: string, ipAddress?: string, userAgent?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.SESSION_CREATED,
      userId,
      ipAddress,
      userAgent,
      success: true,
      message: 'Session created',
      metadata: { sessionId },
    });
  }

  logSessionValidationFailed(reason: string, ipAddress?: string, userAgent?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.SESSION_VALIDATION_FAILED,
      ipAddress,
      userAgent,
      success: false,
      message: reason,
    });
  }

  logSessionDeleted(userId: string, sessionId: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.SESSION_DELETED,
      userId,
      success: true,
      message: 'Session deleted',
      metadata: { sessionId },
    });
  }
}

/**
 * Keeps the last four characters, e.g. `+919876543210` -> `*********3210`.
 */
export function maskMobileNumber(mobileNo?: string): string {
  if (!mobileNo) return 'N/A';
  if (mobileNo.length <= 4) return '****';
  return '*'.repeat(mobileNo.length - 4) + mobileNo.slice(-4);
}
