import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { CustomLoggerService } from '../common/services/logger.service';
import type { UserRole } from '../common/constants/roles';
import { UserEntity, SafeUser } from './entities/user.entity';
import { IUserRepository, USER_REPOSITORY } from './persistence/user.repository.interface';

@Injectable()
export class UsersService {
    constructor(
        @Inject(USER_REPOSITORY) private readonly users: IUserRepository,
        private readonly logger: CustomLoggerService,
    ) { }

    async findByEmail(email: string): Promise<UserEntity | null> {
        return this.users.findByEmail(UsersService.normalizeEmail(email));
    }

    async findById(id: string): Promise<UserEntity | null> {
        return this.users.findById(id);
    }

    async createUser(params: {
        email: string;
        passwordHash: string;
        fullName?: string | null;
        phone?: string | null;
        role: UserRole;
    }): Promise<UserEntity> {
        const user = await this.users.create({
            id: randomUUID(),
            email: UsersService.normalizeEmail(params.email),
            passwordHash: params.passwordHash,
            fullName: params.fullName ?? null,
            phone: params.phone ?? null,
            role: params.role,
        });

        this.logger.logBusinessEvent('user_created', {
            userId: user.id,
            email: user.email,
            role: user.role,
        });

        return user;
    }

    toSafeUser(user: UserEntity): SafeUser {
        const { passwordHash: _passwordHash, ...safeUser } = user;
        return safeUser;
    }

    static normalizeEmail(email: string): string {
        return email.trim().toLowerCase();
    }
}
