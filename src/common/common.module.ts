import { Global, Module } from '@nestjs/common';
import { RateLimitingGuard } from './guards/rate-limiting.guard';
import { MetricsGuard } from './guards/metrics.guard';
import { AuditLoggerService } from './services/audit-logger.service';
import { MetricsService } from './services/metrics.service';
import { ConfigValidationService } from './config/config-validation.service';

@Global()
@Module({
  providers: [
    RateLimitingGuard,
    MetricsGuard,
    AuditLoggerService,
    MetricsService,
    ConfigValidationService,
  ],
  exports: [
    RateLimitingGuard,
    MetricsGuard,
    AuditLoggerService,
    MetricsService,
    ConfigValidationService,
  ],
})
export class CommonModule {}
