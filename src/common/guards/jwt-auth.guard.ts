import { ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { AuthenticatedUser } from '../interfaces/jwt-payload.interface';
import { UnauthorizedAccessException } from '../exceptions/domain.exceptions';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
    constructor(private readonly reflector: Reflector) {
        super();
    }

    canActivate(context: ExecutionContext) {
        const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
            context.getHandler(),
            context.getClass(),
        ]);

        if (isPublic) {
            return true;
        }

        return super.canActivate(context);
    }

    handleRequest<TUser = AuthenticatedUser>(
        err: unknown,
        user: TUser | false | null | undefined,
        info?: unknown,
    ): TUser {
        if (err) {
            if (err instanceof Error) {
                throw err;
            }

            throw new UnauthorizedAccessException();
        }

        if (!user) {
            const message = info instanceof Error && info.message === 'jwt expired'
                ? 'Access token expired'
                : undefined;
            throw new UnauthorizedAccessException(message);
        }

        return user;
    }
}
