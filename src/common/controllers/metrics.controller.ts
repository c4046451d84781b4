import { Controller, Get, Header, HttpCode, HttpStatus } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { MetricsService } from '../services/metrics.service';
import { CustomLoggerService } from '../services/logger.service';
import { Public } from '../decorators/public.decorator';

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  service: string;
  uptime: number;
  checks: {
    memory: { status: 'pass' | 'fail'; usage_percent: number };
  };
}

@Controller()
@Public()
@SkipThrottle()
export class MetricsController {
  private readonly logger = new CustomLoggerService();

  constructor(private readonly metricsService: MetricsService) {
    this.logger.setContext('MetricsController');
  }

  @Get('metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  @HttpCode(HttpStatus.OK)
  async getMetrics(): Promise<string> {
    const metrics = await this.metricsService.getMetrics();

    this.logger.debug('Metrics endpoint accessed', {
      metricsSize: metrics.length,
    });

    return metrics;
  }

  @Get('health')
  @HttpCode(HttpStatus.OK)
  getHealth(): HealthResponse {
    const healthMetrics = this.metricsService.getHealthMetrics();
    const { heapUsed, heapTotal } = healthMetrics.memory;
    const memoryUsagePercent = (heapUsed / heapTotal) * 100;
    const healthy = memoryUsagePercent <= 90;

    return {
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: healthMetrics.timestamp,
      service: 'parking-booking-api',
      uptime: healthMetrics.uptime,
      checks: {
        memory: {
          status: healthy ? 'pass' : 'fail',
          usage_percent: Math.round(memoryUsagePercent * 100) / 100,
        },
      },
    };
  }
}
