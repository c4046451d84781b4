import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { FastifyRequest } from 'fastify';
import { ROLES_KEY } from '../decorators/roles.decorator';
import type { UserRole } from '../constants/roles';
import type { AuthenticatedUser } from '../interfaces/jwt-payload.interface';
import { ForbiddenRoleException, UnauthorizedAccessException } from '../exceptions/domain.exceptions';
import { CustomLoggerService } from '../services/logger.service';

@Injectable()
export class RolesGuard implements CanActivate {
    private readonly logger = new CustomLoggerService();

    constructor(private readonly reflector: Reflector) {
        this.logger.setContext('RolesGuard');
    }

    canActivate(context: ExecutionContext): boolean {
        const requiredRoles = this.reflector.getAllAndOverride<UserRole[] | undefined>(ROLES_KEY, [
            context.getHandler(),
            context.getClass(),
        ]);

        if (!requiredRoles || requiredRoles.length === 0) {
            return true;
        }

        const request = context.switchToHttp().getRequest<FastifyRequest & { user?: AuthenticatedUser }>();
        const user = request.user;

        if (!user) {
            throw new UnauthorizedAccessException();
        }

        if (!requiredRoles.includes(user.role)) {
            this.logger.logSecurityEvent('role_denied', {
                userId: user.id,
                role: user.role,
                method: request.method,
                url: request.url,
            });
            throw new ForbiddenRoleException();
        }

        return true;
    }
}
