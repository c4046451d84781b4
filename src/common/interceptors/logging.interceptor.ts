import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { CustomLoggerService } from '../services/logger.service';
import { MetricsService } from '../services/metrics.service';
import type { AuthenticatedUser } from '../interfaces/jwt-payload.interface';

interface RequestWithUser extends FastifyRequest {
  user?: AuthenticatedUser;
  requestId?: string;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new CustomLoggerService();

  constructor(private readonly metricsService: MetricsService) {
    this.logger.setContext('HTTP');
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RequestWithUser>();
    const response = context.switchToHttp().getResponse<FastifyReply>();
    const startTime = Date.now();

    const method = request.method;
    const url = request.url;
    const route = request.routeOptions.url ?? url;
    const ip = request.ip;
    const requestId = request.requestId;
    const user = request.user;
    const userAgent = request.headers['user-agent'] ?? 'unknown';
    const body: unknown = request.body;

    this.logger.logRequest({
      requestId,
      method,
      url,
      ip,
      userAgent,
      userId: user?.id,
      role: user?.role,
      body: this.shouldLogBody(method, url, body) ? body : undefined,
    });

    this.metricsService.incrementHttpRequestsInFlight();

    return next.handle().pipe(
      tap((data) => {
        const responseTime = Date.now() - startTime;
        const statusCode = response.statusCode;

        this.logger.logResponse({
          requestId,
          method,
          url,
          statusCode,
          responseTime,
          userId: user?.id,
          role: user?.role,
          ip,
          userAgent,
          responseSize: this.getResponseSize(data),
        });
        this.recordMetrics(method, route, statusCode, responseTime, user?.role);

        if (responseTime > 1000) {
          this.logger.logPerformance(`${method} ${url}`, responseTime, {
            requestId,
            userId: user?.id,
            statusCode,
          });
        }
      }),
      catchError((error: unknown) => {
        const responseTime = Date.now() - startTime;
        const statusCode = error instanceof HttpException ? error.getStatus() : 500;

        this.logger.logResponse({
          requestId,
          method,
          url,
          statusCode,
          responseTime,
          userId: user?.id,
          role: user?.role,
          ip,
          userAgent,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
        this.recordMetrics(method, route, statusCode, responseTime, user?.role);

        // Re-thrown so the exception filter shapes the response
        throw error;
      }),
    );
  }

  private recordMetrics(
    method: string,
    route: string,
    statusCode: number,
    responseTime: number,
    role?: string,
  ): void {
    this.metricsService.decrementHttpRequestsInFlight();
    this.metricsService.incrementHttpRequests(method, route, statusCode, role);
    this.metricsService.recordHttpRequestDuration(method, route, statusCode, responseTime);
  }

  private shouldLogBody(method: string, url: string, body: unknown): boolean {
    // Credentials travel in these bodies
    const sensitiveEndpoints = [
      '/api/login',
      '/api/admin-login',
      '/api/register',
    ];

    if (sensitiveEndpoints.some(endpoint => url.startsWith(endpoint))) {
      return false;
    }

    if (method === 'GET' || body === undefined) {
      return false;
    }

    return JSON.stringify(body).length <= 1024;
  }

  private getResponseSize(data: unknown): number {
    if (data === undefined || data === null) return 0;
    try {
      return JSON.stringify(data).length;
    } catch {
      return 0;
    }
  }
}
