import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import axios from 'axios';
import { setTimeout as sleep } from 'timers/promises';

const INTERVAL_NAME = 'keep-alive';

/**
 * Pings `keepAlive.url` on a fixed interval so free-tier hosts do not idle the
 * instance. Disabled when no URL is configured.
 */
@Injectable()
export class KeepAliveService implements OnApplicationBootstrap {
  private readonly logger = new Logger(KeepAliveService.name);
  private readonly url?: string;
  private readonly intervalMs: number;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private inFlight = false;

  constructor(
    private configService: ConfigService,
    private schedulerRegistry: SchedulerRegistry,
  ) {
    this.url = this.configService.get<string>('keepAlive.url') || undefined;
    this.intervalMs = this.configService.getOrThrow<number>('keepAlive.intervalSeconds') * 1000;
    this.retryAttempts = Math.max(1, this.configService.getOrThrow<number>('keepAlive.retryAttempts'));
    this.retryDelayMs = this.configService.getOrThrow<number>('keepAlive.retryDelaySeconds') * 1000;
    this.timeoutMs = this.configService.getOrThrow<number>('keepAlive.timeoutSeconds') * 1000;
  }

  onApplicationBootstrap(): void {
    if (!this.url) {
      this.logger.log('KEEP_ALIVE_URL not set, keep-alive disabled');
      return;
    }

    const interval = setInterval(() => void this.runCycle(), this.intervalMs);
    this.schedulerRegistry.addInterval(INTERVAL_NAME, interval);
    this.logger.log(`Keep-alive pinging ${this.url} every ${this.intervalMs / 1000}s`);
    void this.runCycle();
  }

  /**
   * One ping cycle with retries. Resolves to whether any attempt got HTTP 200.
   */
  async ping(): Promise<boolean> {
    if (!this.url) {
      return false;
    }

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        const response = await axios.get(this.url, {
          timeout: this.timeoutMs,
          validateStatus: () => true,
        });
        if (response.status === 200) {
          this.logger.log(`Keep-alive ping successful to ${this.url}`);
          return true;
        }
        this.logger.warn(
          `Keep-alive ping failed with status ${response.status} (attempt ${attempt}/${this.retryAttempts})`,
        );
      } catch (error) {
        this.logger.error(
          `Keep-alive ping error: ${error instanceof Error ? error.message : String(error)} (attempt ${attempt}/${this.retryAttempts})`,
        );
      }

      if (attempt < this.retryAttempts) {
        await sleep(this.retryDelayMs);
      }
    }

    this.logger.error(
      `Keep-alive ping failed after ${this.retryAttempts} attempts, next try in ${this.intervalMs / 1000}s`,
    );
    return false;
  }

  private async runCycle(): Promise<void> {
    if (this.inFlight) {
      return;
    }
    this.inFlight = true;
    try {
      await this.ping();
    } finally {
      this.inFlight = false;
    }
  }
}
