import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { PasswordHashService } from './services/password-hash.service';
import { UsersService } from '../users/users.service';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { ADMIN_ROLES } from '../common/constants/roles';
import type { AuthConfig } from '../common/config/auth.config';
import type { UserEntity } from '../users/entities/user.entity';
import type { JwtPayload } from '../common/interfaces/jwt-payload.interface';
import {
    DuplicateUserException,
    ForbiddenRoleException,
    InvalidCredentialsException,
} from '../common/exceptions/domain.exceptions';
import type {
    AccessToken,
    AuthResult,
    CheckAuthResult,
    RegisterResult,
    TokenContext,
} from './interfaces/auth-result.interface';
import type { RegisterDto } from './dto/register.dto';
import type { LoginDto } from './dto/login.dto';

@Injectable()
export class AuthService {
    constructor(
        private readonly usersService: UsersService,
        private readonly jwtService: JwtService,
        private readonly configService: ConfigService,
        private readonly passwordHashService: PasswordHashService,
        private readonly logger: CustomLoggerService,
        private readonly metrics: MetricsService,
    ) { }

    async register(dto: RegisterDto, context: TokenContext = {}): Promise<RegisterResult> {
        const existingUser = await this.usersService.findByEmail(dto.email);
        if (existingUser) {
            this.metrics.incrementAuthenticationAttempts('register', 'failure');
            this.logger.logSecurityEvent('registration_rejected', {
                email: dto.email,
                reason: 'duplicate_email',
                ip: context.ip ?? undefined,
            });
            throw new DuplicateUserException(dto.email);
        }

        const passwordHash = await this.passwordHashService.hashPassword(dto.password);

        const user = await this.usersService.createUser({
            email: dto.email,
            passwordHash,
            fullName: dto.fullName,
            phone: dto.phone,
            role: 'user',
        });

        this.metrics.incrementAuthenticationAttempts('register', 'success');
        this.logger.logSecurityEvent('user_registered', {
            userId: user.id,
            email: user.email,
            role: user.role,
            ip: context.ip ?? undefined,
            userAgent: context.userAgent ?? undefined,
        });

        const authResult = await this.issueAuthResult(user);
        return { ...authResult, userId: user.id };
    }

    async login(dto: LoginDto, context: TokenContext = {}): Promise<AuthResult> {
        const user = await this.verifyCredentials(dto, 'login', context);

        this.metrics.incrementAuthenticationAttempts('login', 'success');
        this.logger.logSecurityEvent('login_successful', {
            userId: user.id,
            email: user.email,
            role: user.role,
            ip: context.ip ?? undefined,
            userAgent: context.userAgent ?? undefined,
        });

        return this.issueAuthResult(user);
    }

    async adminLogin(dto: LoginDto, context: TokenContext = {}): Promise<AuthResult> {
        const user = await this.verifyCredentials(dto, 'admin_login', context);

        if (!ADMIN_ROLES.includes(user.role)) {
            this.metrics.incrementAuthenticationAttempts('admin_login', 'failure');
            this.logger.logSecurityEvent('admin_login_forbidden', {
                userId: user.id,
                role: user.role,
                ip: context.ip ?? undefined,
            });
            throw new ForbiddenRoleException('Admin access required');
        }

        this.metrics.incrementAuthenticationAttempts('admin_login', 'success');
        this.logger.logSecurityEvent('admin_login_successful', {
            userId: user.id,
            email: user.email,
            role: user.role,
            ip: context.ip ?? undefined,
            userAgent: context.userAgent ?? undefined,
        });

        return this.issueAuthResult(user);
    }

    /**
     * Report whether a bearer token is currently valid. Never throws for a bad token.
     */
    async checkAuth(token?: string | null): Promise<CheckAuthResult> {
        if (!token) {
            return { authenticated: false };
        }

        let payload: JwtPayload;
        try {
            payload = await this.jwtService.verifyAsync<JwtPayload>(token, {
                secret: this.getConfig().jwtSecret,
                algorithms: ['HS256'],
            });
        } catch (error) {
            this.logger.debug('Token rejected during auth check', {
                reason: error instanceof Error ? error.message : String(error),
            });
            return { authenticated: false };
        }

        if (payload.tokenType !== 'access') {
            return { authenticated: false };
        }

        const user = await this.usersService.findById(payload.sub);
        if (!user) {
            return { authenticated: false };
        }

        return { authenticated: true, user: this.usersService.toSafeUser(user) };
    }

    private async verifyCredentials(dto: LoginDto, method: string, context: TokenContext): Promise<UserEntity> {
        const user = await this.usersService.findByEmail(dto.email);
        const isPasswordValid = user
            ? await this.passwordHashService.comparePassword(dto.password, user.passwordHash)
            : false;

        if (!user || !isPasswordValid) {
            this.metrics.incrementAuthenticationAttempts(method, 'failure');
            this.logger.logSecurityEvent('login_failed', {
                email: dto.email,
                method,
                reason: user ? 'invalid_password' : 'unknown_email',
                ip: context.ip ?? undefined,
                userAgent: context.userAgent ?? undefined,
            });
            throw new InvalidCredentialsException();
        }

        return user;
    }

    private async issueAuthResult(user: UserEntity): Promise<AuthResult> {
        const tokens = await this.signAccessToken(user);
        return {
            success: true,
            user: this.usersService.toSafeUser(user),
            ...tokens,
        };
    }

    private async signAccessToken(user: UserEntity): Promise<AccessToken> {
        const accessTtl = this.getConfig().accessTokenTtlSeconds;

        const accessPayload: JwtPayload = {
            sub: user.id,
            email: user.email,
            role: user.role,
            fullName: user.fullName,
            tokenType: 'access',
        };

        const accessToken = await this.jwtService.signAsync(accessPayload, {
            expiresIn: `${accessTtl}s`,
        });

        return {
            accessToken,
            accessTokenExpiresAt: new Date(Date.now() + accessTtl * 1000).toISOString(),
        };
    }

    private getConfig(): AuthConfig {
        return this.configService.getOrThrow<AuthConfig>('auth');
    }
}
