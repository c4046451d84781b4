import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { AuthenticatedUser, JwtPayload } from '../../common/interfaces/jwt-payload.interface';
import type { AuthConfig } from '../../common/config/auth.config';
import { UnauthorizedAccessException } from '../../common/exceptions/domain.exceptions';
import { UsersService } from '../../users/users.service';

@Injectable()
export class JwtAccessStrategy extends PassportStrategy(Strategy) {
    constructor(
        configService: ConfigService,
        private readonly usersService: UsersService,
    ) {
        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            secretOrKey: configService.getOrThrow<AuthConfig>('auth').jwtSecret,
            algorithms: ['HS256'],
        });
    }

    async validate(payload: JwtPayload): Promise<AuthenticatedUser> {
        if (payload.tokenType !== 'access') {
            throw new UnauthorizedAccessException('Invalid access token');
        }

        // Role comes from storage, not from the token
        const user = await this.usersService.findById(payload.sub);
        if (!user) {
            throw new UnauthorizedAccessException('Account no longer exists');
        }

        return {
            id: user.id,
            email: user.email,
            role: user.role,
            fullName: user.fullName,
        };
    }
}
