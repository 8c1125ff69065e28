import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Repository } from 'typeorm';
import { Session } from '../entities/session.entity';
import { TokenService } from './token.service';
import { SessionCacheService } from './session-cache.service';
import { AuthenticatedUser } from '../interfaces/authenticated-request.interface';

export interface ClientInfo {
  ip?: string;
  userAgent?: string;
}

export interface IssuedSession {
  accessToken: string;
  session: Session;
}

/**
 * Issues, resolves and revokes bearer sessions. Resolution reads the Redis cache
 * first and falls back to the `sessions` table on a miss.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    @InjectRepository(Session)
    private sessionRepository: Repository<Session>,
    private tokenService: TokenService,
    private sessionCacheService: SessionCacheService,
    private configService: ConfigService,
  ) {}

  async createSession(userId: string, client: ClientInfo): Promise<IssuedSession> {
    const ttlSeconds = this.configService.getOrThrow<number>('auth.session.ttlSeconds');
    const { token, hash } = this.tokenService.generateToken();

    const session = await this.sessionRepository.save(
      this.sessionRepository.create({
        userId,
        tokenHash: hash,
        userAgent: client.userAgent ?? null,
        ipAddress: client.ip ?? null,
        expiresAt: new Date(Date.now() + ttlSeconds * 1000),
      }),
    );

    await this.sessionCacheService.cacheSession(
      hash,
      { sessionId: session.id, userId, expiresAt: session.expiresAt.toISOString() },
      ttlSeconds,
    );

    return { accessToken: token, session };
  }

  /**
   * @returns the session owner, or null for a malformed, unknown or expired token
   */
  async resolveSession(token: string): Promise<AuthenticatedUser | null> {
    if (!this.tokenService.validateTokenFormat(token)) {
      return null;
    }
    const tokenHash = this.tokenService.hashToken(token);

    const cached = await this.sessionCacheService.getCachedSession(tokenHash);
    if (cached) {
      if (new Date(cached.expiresAt).getTime() > Date.now()) {
        return { userId: cached.userId, sessionId: cached.sessionId };
      }
      await this.sessionCacheService.invalidateSession(tokenHash);
      return null;
    }

    const session = await this.sessionRepository.findOne({ where: { tokenHash } });
    if (!session || session.expiresAt.getTime() <= Date.now()) {
      return null;
    }

    const remainingSeconds = Math.floor((session.expiresAt.getTime() - Date.now()) / 1000);
    await this.sessionCacheService.cacheSession(
      tokenHash,
      { sessionId: session.id, userId: session.userId, expiresAt: session.expiresAt.toISOString() },
      remainingSeconds,
    );
    this.logger.debug(`Session ${session.id} re-cached after cache miss`);

    return { userId: session.userId, sessionId: session.id };
  }

  /**
   * @returns false when the session does not exist or belongs to another user
   */
  async revokeSession(userId: string, sessionId: string): Promise<boolean> {
    const session = await this.sessionRepository.findOne({ where: { id: sessionId, userId } });
    if (!session) {
      return false;
    }
    await this.sessionRepository.delete({ id: sessionId, userId });
    await this.sessionCacheService.invalidateSession(session.tokenHash);
    return true;
  }
}
