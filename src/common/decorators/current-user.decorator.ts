import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { AuthenticatedUser } from '../interfaces/jwt-payload.interface';
import { UnauthorizedAccessException } from '../exceptions/domain.exceptions';

type RequestWithUser = FastifyRequest & { user?: AuthenticatedUser };

export const CurrentUser = createParamDecorator(
    (_data: unknown, ctx: ExecutionContext): AuthenticatedUser => {
        const request = ctx.switchToHttp().getRequest<RequestWithUser>();
        if (!request.user) {
            throw new UnauthorizedAccessException();
        }
        return request.user;
    },
);
