import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ThrottlerException } from '@nestjs/throttler';
import { CustomLoggerService } from '../services/logger.service';
import { ERROR_CODES } from '../exceptions/domain.exceptions';
import type { AuthenticatedUser } from '../interfaces/jwt-payload.interface';

export interface ErrorResponse {
  code: string;
  message: string;
  details?: unknown;
  requestId: string;
  timestamp: string;
  path: string;
}

interface RequestWithUser extends FastifyRequest {
  user?: AuthenticatedUser;
  requestId?: string;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new CustomLoggerService();

  constructor() {
    this.logger.setContext('HttpExceptionFilter');
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<RequestWithUser>();

    const headerId = request.headers['x-request-id'];
    const requestId = request.requestId ?? (typeof headerId === 'string' ? headerId : 'unknown');
    const timestamp = new Date().toISOString();
    const path = request.url;

    let status: number;
    let code: string;
    let message: string;
    let details: unknown;

    if (exception instanceof ThrottlerException) {
      status = HttpStatus.TOO_MANY_REQUESTS;
      code = ERROR_CODES.RATE_LIMITED;
      message = exception.message || 'Rate limit exceeded';
      details = { retryAfter: '60 seconds' };
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const body = new Map(Object.entries(exceptionResponse));
        const bodyCode = body.get('code');
        const bodyMessage = body.get('message');

        code = typeof bodyCode === 'string' ? bodyCode : this.getErrorCode(status);
        if (Array.isArray(bodyMessage)) {
          code = ERROR_CODES.INVALID_INPUT;
          message = 'Validation failed';
          details = bodyMessage;
        } else {
          message = typeof bodyMessage === 'string' ? bodyMessage : exception.message;
          details = body.get('details');
        }
      } else {
        code = this.getErrorCode(status);
        message = String(exceptionResponse);
      }
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      code = ERROR_CODES.INTERNAL_ERROR;
      message = 'Internal server error';

      this.logger.logError(
        exception instanceof Error ? exception : new Error(String(exception)),
        {
          requestId,
          path,
          method: request.method,
          userId: request.user?.id,
          ip: request.ip,
          userAgent: request.headers['user-agent'],
        },
      );
    }

    const errorResponse: ErrorResponse = {
      code,
      message,
      details,
      requestId,
      timestamp,
      path,
    };

    if (status >= 500) {
      this.logger.error(`HTTP ${status} ${code}: ${message}`, undefined, {
        requestId,
        path,
        method: request.method,
        userId: request.user?.id,
      });
    } else if (status === 429) {
      this.logger.logSecurityEvent('RATE_LIMIT_RESPONSE', {
        requestId,
        path,
        method: request.method,
        userId: request.user?.id,
        ip: request.ip,
      });
    } else {
      this.logger.warn(`HTTP ${status} ${code}: ${message}`, {
        requestId,
        path,
        method: request.method,
        userId: request.user?.id,
      });
    }

    void response.status(status).send(errorResponse);
  }

  private getErrorCode(status: number): string {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ERROR_CODES.INVALID_INPUT;
      case HttpStatus.UNAUTHORIZED:
        return ERROR_CODES.UNAUTHORIZED;
      case HttpStatus.FORBIDDEN:
        return ERROR_CODES.FORBIDDEN;
      case HttpStatus.NOT_FOUND:
        return ERROR_CODES.NOT_FOUND;
      case HttpStatus.TOO_MANY_REQUESTS:
        return ERROR_CODES.RATE_LIMITED;
      case HttpStatus.INTERNAL_SERVER_ERROR:
        return ERROR_CODES.INTERNAL_ERROR;
      default:
        return 'UNKNOWN_ERROR';
    }
  }
}
