import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { AppModule } from './app.module';
import { CustomLoggerService } from './common/services/logger.service';
import { CorsConfig } from './common/config/cors.config';

async function bootstrap() {
  const logger = new CustomLoggerService();
  logger.setContext('Bootstrap');

  try {
    CorsConfig.validateCorsConfig();

    const nestLogger = new CustomLoggerService();
    nestLogger.setContext('NestApplication');
    const app = await NestFactory.create<NestFastifyApplication>(
      AppModule,
      new FastifyAdapter(),
      { logger: nestLogger },
    );

    // Closes the database pool through OnApplicationShutdown
    app.enableShutdownHooks();

    await app.register(helmet, {
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          objectSrc: ["'none'"],
          frameSrc: ["'none'"],
        },
      },
      hsts: {
        maxAge: 31536000,
        includeSubDomains: true,
      },
    });

    await app.register(cors, CorsConfig.getCorsOptions());

    const port = process.env.PORT ?? 3000;
    await app.listen(port, '0.0.0.0');

    logger.log('Application started successfully', {
      port,
      environment: process.env.NODE_ENV,
      storageDriver: process.env.STORAGE_DRIVER ?? 'memory',
      nodeVersion: process.version,
    });

    const baseUrl = `http://localhost:${port}`;
    logger.log('Important endpoints', {
      status: `${baseUrl}/api/parking-status`,
      health: `${baseUrl}/health`,
      metrics: `${baseUrl}/metrics`,
    });
  } catch (error) {
    logger.logError(error instanceof Error ? error : new Error(String(error)), {
      context: 'bootstrap',
    });
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  const logger = new CustomLoggerService();
  logger.setContext('UnhandledRejection');
  const reasonStr = reason instanceof Error ? reason.message : String(reason);
  logger.logError(new Error(`Unhandled Rejection: ${reasonStr}`), {
    reason: reasonStr,
  });
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  const logger = new CustomLoggerService();
  logger.setContext('UncaughtException');
  logger.logError(error, {
    context: 'uncaughtException',
  });
  process.exit(1);
});

void bootstrap();
