import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, LessThan } from 'typeorm';
import { Session } from '../entities/session.entity';
import { MetricsService } from '../../common/services/metrics.service';

/**
 * Purges expired sessions once a day. Cached copies expire on their own TTL.
 */
@Injectable()
export class SessionCleanupService {
  private readonly logger = new Logger(SessionCleanupService.name);

  constructor(
    @InjectRepository(Session)
    private sessionRepository: Repository<Session>,
    private metricsService: MetricsService,
  ) {}

  @Cron(CronExpression.EVERY_DAY_AT_2AM, { name: 'session-cleanup' })
  async handleSessionCleanup(): Promise<void> {
    this.logger.log('Starting scheduled session cleanup...');
    try {
      await this.cleanupExpiredSessions();
    } catch (error) {
      this.logger.warn('Scheduled session cleanup did not complete, next run retries');
    }
  }

  /**
   * @returns number of sessions deleted
   */
  async cleanupExpiredSessions(): Promise<number> {
    const startTime = Date.now();

    try {
      const result = await this.sessionRepository.delete({ expiresAt: LessThan(new Date()) });
      const count = result.affected ?? 0;
      const duration = (Date.now() - startTime) / 1000;

      if (count === 0) {
        this.logger.log('No expired sessions to clean up');
        return 0;
      }

      this.logger.log(`Cleaned up ${count} expired sessions in ${duration.toFixed(2)}s`);
      this.metricsService.incrementSessionsCleaned(count);
      return count;
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      const stack = error instanceof Error ? error.stack : String(error);
      this.logger.error(`Session cleanup failed after ${duration.toFixed(2)}s`, stack);
      throw error;
    }
  }
}
