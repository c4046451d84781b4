import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { scryptSync, randomBytes, timingSafeEqual } from 'crypto';
import { SCRYPT_KEY_LENGTH } from '../constants/auth.constants';
import type { AuthConfig } from '../../common/config/auth.config';
import { CustomLoggerService } from '../../common/services/logger.service';

@Injectable()
export class PasswordHashService {
    constructor(
        private readonly configService: ConfigService,
        private readonly logger: CustomLoggerService,
    ) { }

    /**
     * Hash a password with the configured algorithm (scrypt by default)
     */
    async hashPassword(password: string): Promise<string> {
        const { passwordHashAlgorithm, bcryptSaltRounds } = this.getConfig();

        if (passwordHashAlgorithm === 'bcrypt') {
            return bcrypt.hash(password, bcryptSaltRounds);
        }

        const salt = randomBytes(16);
        const derivedKey = scryptSync(password, salt, SCRYPT_KEY_LENGTH);
        return `${salt.toString('hex')}:${derivedKey.toString('hex')}`;
    }

    /**
     * Compare a password with a hash of either format
     */
    async comparePassword(password: string, hash: string): Promise<boolean> {
        if (this.isBcryptHash(hash)) {
            return bcrypt.compare(password, hash);
        }

        if (this.isScryptHash(hash)) {
            const [saltHex, keyHex] = hash.split(':');
            const salt = Buffer.from(saltHex, 'hex');
            const originalKey = Buffer.from(keyHex, 'hex');
            if (originalKey.length !== SCRYPT_KEY_LENGTH) {
                return false;
            }
            const derivedKey = scryptSync(password, salt, SCRYPT_KEY_LENGTH);
            return timingSafeEqual(originalKey, derivedKey);
        }

        this.logger.warn('Unknown password hash format', { hashPrefix: hash.slice(0, 4) });
        return false;
    }

    private isBcryptHash(hash: string): boolean {
        return hash.startsWith('$2');
    }

    /** salt:key, both hex */
    private isScryptHash(hash: string): boolean {
        const parts = hash.split(':');
        return parts.length === 2 && parts.every((part) => /^[0-9a-f]+$/i.test(part));
    }

    private getConfig(): AuthConfig {
        return this.configService.getOrThrow<AuthConfig>('auth');
    }
}
