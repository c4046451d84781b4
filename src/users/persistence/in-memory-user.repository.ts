import { DuplicateUserException } from '../../common/exceptions/domain.exceptions';
import type { NewUser, UserEntity } from '../entities/user.entity';
import type { IUserRepository } from './user.repository.interface';

export class InMemoryUserRepository implements IUserRepository {
    private readonly usersById = new Map<string, UserEntity>();
    private readonly idsByEmail = new Map<string, string>();

    async findByEmail(email: string): Promise<UserEntity | null> {
        const id = this.idsByEmail.get(email);
        return id ? this.findById(id) : null;
    }

    async findById(id: string): Promise<UserEntity | null> {
        const user = this.usersById.get(id);
        return user ? { ...user } : null;
    }

    async create(user: NewUser): Promise<UserEntity> {
        if (this.idsByEmail.has(user.email)) {
            throw new DuplicateUserException(user.email);
        }

        const entity: UserEntity = { ...user, createdAt: new Date() };
        this.usersById.set(entity.id, entity);
        this.idsByEmail.set(entity.email, entity.id);
        return { ...entity };
    }
}
