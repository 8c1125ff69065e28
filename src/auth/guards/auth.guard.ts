import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthService } from '../auth.service';
import { AuditLoggerService } from '../../common/services/audit-logger.service';
import { MetricsService } from '../../common/services/metrics.service';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import { AUTH_CONSTANTS } from '../constants/auth.constants';

/**
 * Resolves `Authorization: Bearer <token>` to the session owner and attaches
 * `{ userId, sessionId }` to `request.user`.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private authService: AuthService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const userAgent = request.headers['user-agent'];
    const token = this.extractTokenFromHeader(request);

    if (!token) {
      this.auditLogger.logSessionValidationFailed(
        'Missing or malformed authorization header',
        request.ip,
        userAgent,
      );
      this.metricsService.incrementSessionValidationFailed('missing_token');
      throw new UnauthorizedException(AUTH_CONSTANTS.MESSAGES.INVALID_SESSION);
    }

    const user = await this.authService.validateSession(token);
    if (!user) {
      this.auditLogger.logSessionValidationFailed('Invalid or expired token', request.ip, userAgent);
      this.metricsService.incrementSessionValidationFailed('invalid_token');
      throw new UnauthorizedException(AUTH_CONSTANTS.MESSAGES.INVALID_SESSION);
    }

    request.user = user;
    return true;
  }

  private extractTokenFromHeader(request: AuthenticatedRequest): string | undefined {
    const [type, token] = request.headers.authorization?.split(' ') ?? [];
    return type === 'Bearer' && token ? token : undefined;
  }
}
