import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { AuthService } from './auth.service';
import { PasswordHashService } from './services/password-hash.service';
import { AdminSeederService } from './services/admin-seeder.service';
import { UsersService } from '../users/users.service';
import { USER_REPOSITORY } from '../users/persistence/user.repository.interface';
import { InMemoryUserRepository } from '../users/persistence/in-memory-user.repository';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import type { AuthConfig } from '../common/config/auth.config';
import type { JwtPayload } from '../common/interfaces/jwt-payload.interface';
import {
    DuplicateUserException,
    ForbiddenRoleException,
    InvalidCredentialsException,
} from '../common/exceptions/domain.exceptions';

const config: AuthConfig = {
    jwtSecret: 'test-secret',
    accessTokenTtlSeconds: 3600,
    passwordHashAlgorithm: 'scrypt',
    bcryptSaltRounds: 4,
    admin: { email: 'admin@parking.test', password: 'AdminPass1', fullName: 'Parking Admin' },
};

describe('AuthService', () => {
    let service: AuthService;
    let usersService: UsersService;
    let jwtService: JwtService;
    let seeder: AdminSeederService;
    let passwordHashService: PasswordHashService;
    let logger: Record<'logSecurityEvent' | 'logBusinessEvent' | 'debug' | 'warn', jest.Mock>;
    let metrics: { incrementAuthenticationAttempts: jest.Mock };

    beforeEach(async () => {
        logger = { logSecurityEvent: jest.fn(), logBusinessEvent: jest.fn(), debug: jest.fn(), warn: jest.fn() };
        metrics = { incrementAuthenticationAttempts: jest.fn() };

        const module: TestingModule = await Test.createTestingModule({
            imports: [JwtModule.register({ secret: 'test-secret', signOptions: { algorithm: 'HS256' } })],
            providers: [
                AuthService,
                AdminSeederService,
                PasswordHashService,
                UsersService,
                { provide: USER_REPOSITORY, useValue: new InMemoryUserRepository() },
                { provide: ConfigService, useValue: { getOrThrow: jest.fn().mockReturnValue(config) } },
                { provide: CustomLoggerService, useValue: logger },
                { provide: MetricsService, useValue: metrics },
            ],
        }).compile();

        service = module.get<AuthService>(AuthService);
        usersService = module.get<UsersService>(UsersService);
        jwtService = module.get<JwtService>(JwtService);
        seeder = module.get<AdminSeederService>(AdminSeederService);
        passwordHashService = module.get<PasswordHashService>(PasswordHashService);
    });

    const register = () =>
        service.register({ email: 'driver@parking.test', password: 'Secret123', fullName: 'Dana Driver' });

    describe('register', () => {
        it('should create a user and sign them in', async () => {
            const result = await register();

            expect(result.success).toBe(true);
            expect(result.userId).toBe(result.user.id);
            expect(result.user).toMatchObject({ email: 'driver@parking.test', fullName: 'Dana Driver', role: 'user' });
            expect(result.user).not.toHaveProperty('passwordHash');

            const payload = await jwtService.verifyAsync<JwtPayload>(result.accessToken);
            expect(payload).toMatchObject({ sub: result.userId, role: 'user', tokenType: 'access' });
        });

        it('should refuse a second account with the same email in any case', async () => {
            await register();

            await expect(
                service.register({ email: 'Driver@Parking.TEST', password: 'Secret123' }),
            ).rejects.toBeInstanceOf(DuplicateUserException);
            expect(metrics.incrementAuthenticationAttempts).toHaveBeenLastCalledWith('register', 'failure');
        });

        it('should never log the password', async () => {
            await register();
            await expect(service.login({ email: 'driver@parking.test', password: 'Wrong1234' })).rejects.toThrow();

            expect(JSON.stringify(logger.logSecurityEvent.mock.calls)).not.toContain('Secret123');
            expect(JSON.stringify(logger.logSecurityEvent.mock.calls)).not.toContain('Wrong1234');
        });
    });

    describe('login', () => {
        it('should issue a token for valid credentials', async () => {
            const { userId } = await register();

            const result = await service.login({ email: 'driver@parking.test', password: 'Secret123' });

            expect(result.user.id).toBe(userId);
            expect(new Date(result.accessTokenExpiresAt).getTime()).toBeGreaterThan(Date.now());
            expect(metrics.incrementAuthenticationAttempts).toHaveBeenLastCalledWith('login', 'success');
        });

        it('should reject a wrong password and an unknown email alike', async () => {
            await register();

            await expect(
                service.login({ email: 'driver@parking.test', password: 'Secret124' }),
            ).rejects.toBeInstanceOf(InvalidCredentialsException);
            await expect(
                service.login({ email: 'nobody@parking.test', password: 'Secret123' }),
            ).rejects.toBeInstanceOf(InvalidCredentialsException);
        });
    });

    describe('adminLogin', () => {
        it('should refuse ordinary users', async () => {
            await register();

            await expect(
                service.adminLogin({ email: 'driver@parking.test', password: 'Secret123' }),
            ).rejects.toBeInstanceOf(ForbiddenRoleException);
        });

        it('should admit the seeded administrator', async () => {
            await expect(seeder.seedAdmin()).resolves.toBe(true);
            await expect(seeder.seedAdmin()).resolves.toBe(false);

            const result = await service.adminLogin({ email: 'admin@parking.test', password: 'AdminPass1' });
            expect(result.user.role).toBe('admin');
        });

        it('should admit staff', async () => {
            await usersService.createUser({
                email: 'staff@parking.test',
                passwordHash: await passwordHashService.hashPassword('StaffPass1'),
                role: 'staff',
            });

            const result = await service.adminLogin({ email: 'staff@parking.test', password: 'StaffPass1' });
            expect(result.user.role).toBe('staff');
        });
    });

    describe('checkAuth', () => {
        it('should report anonymous callers', async () => {
            await expect(service.checkAuth()).resolves.toEqual({ authenticated: false });
            await expect(service.checkAuth('not-a-token')).resolves.toEqual({ authenticated: false });
        });

        it('should reject tokens signed with another secret', async () => {
            const { userId } = await register();
            const forged = await jwtService.signAsync(
                { sub: userId, email: 'driver@parking.test', role: 'admin', tokenType: 'access' },
                { secret: 'other-secret' },
            );

            await expect(service.checkAuth(forged)).resolves.toEqual({ authenticated: false });
        });

        it('should resolve the user behind a valid token', async () => {
            const { accessToken, userId } = await register();

            const result = await service.checkAuth(accessToken);

            expect(result).toMatchObject({ authenticated: true, user: { id: userId, email: 'driver@parking.test' } });
        });
    });
});
