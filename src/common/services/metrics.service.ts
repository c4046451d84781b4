import { Injectable } from '@nestjs/common';
import { Registry, collectDefaultMetrics, Counter, Histogram, Gauge } from 'prom-client';

@Injectable()
export class MetricsService {
  private readonly registry = new Registry();
  private readonly httpRequestsTotal: Counter<string>;
  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestsInFlight: Gauge<string>;
  private readonly businessEventsTotal: Counter<string>;
  private readonly authenticationAttemptsTotal: Counter<string>;
  private readonly slotsBookedTotal: Counter<string>;

  constructor() {
    if (process.env.NODE_ENV !== 'test') {
      collectDefaultMetrics({ register: this.registry });
    }

    this.httpRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code', 'user_role'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 3, 5],
      registers: [this.registry],
    });

    this.httpRequestsInFlight = new Gauge({
      name: 'http_requests_in_flight',
      help: 'Number of HTTP requests currently being processed',
      registers: [this.registry],
    });

    this.businessEventsTotal = new Counter({
      name: 'business_events_total',
      help: 'Total number of business events',
      labelNames: ['event_type', 'status'],
      registers: [this.registry],
    });

    this.authenticationAttemptsTotal = new Counter({
      name: 'authentication_attempts_total',
      help: 'Total number of authentication attempts',
      labelNames: ['method', 'status'],
      registers: [this.registry],
    });

    this.slotsBookedTotal = new Counter({
      name: 'parking_slots_booked_total',
      help: 'Total number of parking slots booked since start-up',
      labelNames: ['category'],
      registers: [this.registry],
    });
  }

  incrementHttpRequests(method: string, route: string, statusCode: number, userRole?: string): void {
    this.httpRequestsTotal
      .labels(method, route, statusCode.toString(), userRole || 'anonymous')
      .inc();
  }

  recordHttpRequestDuration(method: string, route: string, statusCode: number, duration: number): void {
    this.httpRequestDuration
      .labels(method, route, statusCode.toString())
      .observe(duration / 1000);
  }

  incrementHttpRequestsInFlight(): void {
    this.httpRequestsInFlight.inc();
  }

  decrementHttpRequestsInFlight(): void {
    this.httpRequestsInFlight.dec();
  }

  incrementBusinessEvent(eventType: string, status: 'success' | 'failure' = 'success'): void {
    this.businessEventsTotal.labels(eventType, status).inc();
  }

  incrementAuthenticationAttempts(method: string, status: 'success' | 'failure'): void {
    this.authenticationAttemptsTotal.labels(method, status).inc();
  }

  incrementSlotsBooked(category: string, count: number): void {
    this.slotsBookedTotal.labels(category).inc(count);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getHealthMetrics(): { uptime: number; memory: NodeJS.MemoryUsage; timestamp: string } {
    return {
      uptime: process.uptime(),
      memory: process.memoryUsage(),
      timestamp: new Date().toISOString(),
    };
  }
}
