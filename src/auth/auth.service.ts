import { Injectable, BadRequestException, Logger } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { OtpService } from './otp.service';
import { UserService } from './services/user.service';
import { SessionService, ClientInfo } from './services/session.service';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { AuthenticatedUser } from './interfaces/authenticated-request.interface';
import { RegisterDto } from './dto/register.dto';
import { User } from './entities/user.entity';
import { AUTH_CONSTANTS } from './constants/auth.constants';

const { MESSAGES } = AUTH_CONSTANTS;

export interface RegisterResponse {
  id: string;
  username: string;
  mobileNo: string;
  created_at: string;
  access_token: string;
}

export interface LoginResponse {
  access_token: string;
  token_type: 'bearer';
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private otpService: OtpService,
    private userService: UserService,
    private sessionService: SessionService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  async checkUser(mobileNo: string): Promise<{ exists: boolean }> {
    return { exists: await this.userService.existsByMobileNo(mobileNo) };
  }

  async sendOtp(mobileNo: string, client: ClientInfo): Promise<{ message: string; otp?: string }> {
    const { otp } = await this.otpService.sendOtp(mobileNo, client);
    return otp ? { message: MESSAGES.OTP_SENT, otp } : { message: MESSAGES.OTP_SENT };
  }

  async verifyOtp(mobileNo: string, otp: string, client: ClientInfo): Promise<{ message: string }> {
    await this.otpService.verifyOtp(mobileNo, otp, client);
    return { message: MESSAGES.OTP_VERIFIED };
  }

  /**
   * Uniqueness is checked before the OTP is touched, so a rejected registration
   * does not burn the user's code.
   */
  async register(dto: RegisterDto, client: ClientInfo): Promise<RegisterResponse> {
    if (await this.userService.existsByUsername(dto.username)) {
      throw new BadRequestException(MESSAGES.USERNAME_TAKEN);
    }
    if (await this.userService.existsByMobileNo(dto.mobileNo)) {
      throw new BadRequestException(MESSAGES.MOBILE_TAKEN);
    }

    await this.otpService.consumeVerification(dto.mobileNo, dto.otp, client);

    const user = await this.createUser(dto);
    const { accessToken, session } = await this.sessionService.createSession(user.id, client);

    this.auditLogger.logUserRegistered(user.id, user.mobileNo, client.ip);
    this.auditLogger.logSessionCreated(user.id, session.id, client.ip, client.userAgent);
    this.metricsService.incrementRegistrations();

    return {
      id: user.id,
      username: user.username,
      mobileNo: user.mobileNo,
      created_at: user.createdAt.toISOString(),
      access_token: accessToken,
    };
  }

  async login(identifier: string, password: string, client: ClientInfo): Promise<LoginResponse> {
    const user = await this.userService.findByUsernameOrMobileNo(identifier);

    if (!user || !(await this.userService.verifyPassword(user, password))) {
      this.auditLogger.logLoginFailed(identifier, client.ip);
      this.metricsService.incrementLogins('failed');
      throw new BadRequestException(MESSAGES.BAD_CREDENTIALS);
    }

    await this.userService.updateLastLogin(user.id);
    const { accessToken, session } = await this.sessionService.createSession(user.id, client);

    this.auditLogger.logLogin(user.id, client.ip, client.userAgent);
    this.auditLogger.logSessionCreated(user.id, session.id, client.ip, client.userAgent);
    this.metricsService.incrementLogins('success');

    return { access_token: accessToken, token_type: 'bearer' };
  }

  async logout(user: AuthenticatedUser): Promise<{ message: string }> {
    if (await this.sessionService.revokeSession(user.userId, user.sessionId)) {
      this.auditLogger.logSessionDeleted(user.userId, user.sessionId);
    }
    return { message: MESSAGES.LOGGED_OUT };
  }

  async validateSession(token: string): Promise<AuthenticatedUser | null> {
    return await this.sessionService.resolveSession(token);
  }

  /**
   * A concurrent registration can pass the existence checks; the unique index
   * then decides, and its violation maps to the same 400.
   */
  private async createUser(dto: RegisterDto): Promise<User> {
    try {
      return await this.userService.createUser(dto);
    } catch (error) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint === undefined) {
        throw error;
      }
      this.logger.warn(`Registration lost a race on ${constraint}`);
      throw new BadRequestException(
        constraint === 'idx_users_username' ? MESSAGES.USERNAME_TAKEN : MESSAGES.MOBILE_TAKEN,
      );
    }
  }
}

function uniqueViolationConstraint(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) {
    return undefined;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === '23505'
  ) {
    return 'constraint' in driverError && typeof driverError.constraint === 'string'
      ? driverError.constraint
      : '';
  }
  return undefined;
}
