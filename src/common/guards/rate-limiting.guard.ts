import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { RedisService } from '../../redis/redis.service';
import { AuditLoggerService } from '../services/audit-logger.service';
import { TooManyRequestsException } from '../exceptions/too-many-requests.exception';

/**
 * Fixed-window request limit per client IP and route.
 */
@Injectable()
export class RateLimitingGuard implements CanActivate {
  constructor(
    private redisService: RedisService,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const ip = request.ip ?? 'unknown';
    const route = request.path;
    const key = `rate_limit:${route}:${ip}`;

    const windowSeconds = this.configService.getOrThrow<number>('rateLimit.windowSeconds');
    const maxRequests = this.configService.getOrThrow<number>('rateLimit.maxRequests');

    const requests = await this.redisService.incr(key);
    if (requests === 1) {
      await this.redisService.expire(key, windowSeconds);
    }

    if (requests > maxRequests) {
      this.auditLogger.logRateLimitExceeded(route, ip);
      throw new TooManyRequestsException('RATE_LIMIT_EXCEEDED');
    }

    return true;
  }
}
