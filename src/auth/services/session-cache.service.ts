import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RedisService } from '../../redis/redis.service';

export interface CachedSession {
  sessionId: string;
  userId: string;
  expiresAt: string;
}

function isCachedSession(value: unknown): value is CachedSession {
  return (
    typeof value === 'object' &&
    value !== null &&
    ['sessionId', 'userId', 'expiresAt'].every((field) => typeof Reflect.get(value, field) === 'string')
  );
}

/**
 * Redis cache of sessions keyed by token hash.
 */
@Injectable()
export class SessionCacheService {
  constructor(
    private redisService: RedisService,
    private configService: ConfigService,
  ) {}

  async cacheSession(tokenHash: string, session: CachedSession, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      return;
    }
    await this.redisService.setJson(this.key(tokenHash), ttlSeconds, session);
  }

  async getCachedSession(tokenHash: string): Promise<CachedSession | null> {
    return await this.redisService.getJson(this.key(tokenHash), isCachedSession);
  }

  async invalidateSession(tokenHash: string): Promise<void> {
    await this.redisService.del(this.key(tokenHash));
  }

  private key(tokenHash: string): string {
    const cachePrefix =
      this.configService.get<string>('auth.session.cachePrefix') ?? 'session:token:';
    return `${cachePrefix}${tokenHash}`;
  }
}
