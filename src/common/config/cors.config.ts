import type { FastifyCorsOptions } from '@fastify/cors';
import { CustomLoggerService } from '../services/logger.service';

const LOCAL_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:3000',
  'http://127.0.0.1:5173',
];

export class CorsConfig {
  private static logger = (() => {
    const logger = new CustomLoggerService();
    logger.setContext('CORS');
    return logger;
  })();

  static getAllowedOrigins(env: NodeJS.ProcessEnv = process.env): string[] {
    const configured = env.CORS_ALLOWED_ORIGINS?.split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0) ?? [];

    if (env.NODE_ENV === 'production') {
      return configured;
    }

    return [...LOCAL_ORIGINS, ...configured];
  }

  static getCorsOptions(): FastifyCorsOptions {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const allowedOrigins = this.getAllowedOrigins();

    this.logger.log('CORS configured with origins', {
      environment: process.env.NODE_ENV,
      allowedOrigins,
    });

    return {
      origin: (origin, callback) => {
        // Same-origin pages and non-browser clients send no Origin header
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }

        if (isDevelopment && (origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:'))) {
          callback(null, true);
          return;
        }

        this.logger.logSecurityEvent('CORS_ORIGIN_BLOCKED', {
          origin,
          environment: process.env.NODE_ENV,
        });

        callback(new Error(`Origin ${origin} not allowed by CORS policy`), false);
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: [
        'Content-Type',
        'Accept',
        'Authorization',
        'X-Request-Id',
      ],
      exposedHeaders: [
        'X-Request-Id',
        'X-RateLimit-Limit',
        'X-RateLimit-Remaining',
        'X-RateLimit-Reset',
      ],
      credentials: true,
      maxAge: 86400, // 24 hours
    };
  }

  static validateCorsConfig(): void {
    const isProduction = process.env.NODE_ENV === 'production';

    if (isProduction && !process.env.CORS_ALLOWED_ORIGINS) {
      throw new Error('CORS_ALLOWED_ORIGINS environment variable is required in production');
    }

    if (isProduction) {
      const origins = this.getAllowedOrigins();
      const hasInsecureOrigins = origins.some(origin => origin.startsWith('http://'));

      if (hasInsecureOrigins) {
        this.logger.warn('Insecure HTTP origins detected in production CORS configuration', {
          origins,
        });
      }
    }
  }
}
