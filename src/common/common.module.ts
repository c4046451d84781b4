import { Module } from '@nestjs/common';
import { ThrottlerModule } from '@nestjs/throttler';
import { CustomLoggerService } from './services/logger.service';
import { MetricsService } from './services/metrics.service';
import { ClockService } from './services/clock.service';
import { MetricsController } from './controllers/metrics.controller';
import { LoggingInterceptor } from './interceptors/logging.interceptor';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        name: 'default',
        ttl: 60000, // 1 minute
        limit: 200, // 200 requests per minute
      },
    ]),
  ],
  controllers: [MetricsController],
  providers: [
    {
      provide: CustomLoggerService,
      useClass: CustomLoggerService,
    },
    MetricsService,
    ClockService,
    LoggingInterceptor,
  ],
  exports: [
    CustomLoggerService,
    MetricsService,
    ClockService,
    LoggingInterceptor,
    ThrottlerModule,
  ],
})
export class CommonModule {}
