import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AuthConfig } from '../../common/config/auth.config';
import { CustomLoggerService } from '../../common/services/logger.service';
import { UsersService } from '../../users/users.service';
import { PasswordHashService } from './password-hash.service';

/**
 * Creates the configured administrator account on startup when it is missing.
 */
@Injectable()
export class AdminSeederService implements OnApplicationBootstrap {
    constructor(
        private readonly configService: ConfigService,
        private readonly usersService: UsersService,
        private readonly passwordHashService: PasswordHashService,
        private readonly logger: CustomLoggerService,
    ) { }

    async onApplicationBootstrap(): Promise<void> {
        await this.seedAdmin();
    }

    async seedAdmin(): Promise<boolean> {
        const { admin } = this.configService.getOrThrow<AuthConfig>('auth');
        if (!admin) {
            return false;
        }

        const existing = await this.usersService.findByEmail(admin.email);
        if (existing) {
            return false;
        }

        await this.usersService.createUser({
            email: admin.email,
            passwordHash: await this.passwordHashService.hashPassword(admin.password),
            fullName: admin.fullName,
            role: 'admin',
        });

        this.logger.logSecurityEvent('admin_seeded', { email: admin.email });
        return true;
    }
}
