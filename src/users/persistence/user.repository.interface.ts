import type { NewUser, UserEntity } from '../entities/user.entity';

export const USER_REPOSITORY = Symbol('USER_REPOSITORY');

export interface IUserRepository {
    findByEmail(email: string): Promise<UserEntity | null>;
    findById(id: string): Promise<UserEntity | null>;
    /** Throws `DuplicateUserException` when the email is taken. */
    create(user: NewUser): Promise<UserEntity>;
}
