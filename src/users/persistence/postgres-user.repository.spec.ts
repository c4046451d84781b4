import { DatabaseError } from 'pg';
import { PostgresUserRepository } from './postgres-user.repository';
import { DuplicateUserException, StorageFailureException } from '../../common/exceptions/domain.exceptions';
import type { NewUser } from '../entities/user.entity';

const createdAt = new Date('2024-06-15T12:00:00Z');

const userRow = (role = 'user') => ({
    id: 'user-1',
    email: 'driver@parking.test',
    password_hash: 'salt:hash',
    full_name: 'Test Driver',
    phone: null,
    role,
    created_at: createdAt,
});

const newUser: NewUser = {
    id: 'user-1',
    email: 'driver@parking.test',
    passwordHash: 'salt:hash',
    fullName: 'Test Driver',
    phone: null,
    role: 'user',
};

describe('PostgresUserRepository', () => {
    let db: { query: jest.Mock; transaction: jest.Mock };
    let repository: PostgresUserRepository;

    beforeEach(() => {
        db = { query: jest.fn(), transaction: jest.fn() };
        repository = new PostgresUserRepository(db);
    });

    it('should map a stored row to a user entity', async () => {
        db.query.mockResolvedValueOnce({ rows: [userRow('staff')], rowCount: 1 });

        await expect(repository.findByEmail('driver@parking.test')).resolves.toEqual({
            id: 'user-1',
            email: 'driver@parking.test',
            passwordHash: 'salt:hash',
            fullName: 'Test Driver',
            phone: null,
            role: 'staff',
            createdAt,
        });
        expect(db.query).toHaveBeenCalledWith(expect.stringContaining('WHERE email = $1'), ['driver@parking.test']);
    });

    it('should return null for a missing user', async () => {
        db.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

        await expect(repository.findById('missing')).resolves.toBeNull();
    });

    it('should reject a stored role it does not know', async () => {
        db.query.mockResolvedValueOnce({ rows: [userRow('superuser')], rowCount: 1 });

        await expect(repository.findById('user-1')).rejects.toThrow(StorageFailureException);
    });

    it('should insert the user and return the stored row', async () => {
        db.query.mockResolvedValueOnce({ rows: [userRow()], rowCount: 1 });

        await expect(repository.create(newUser)).resolves.toMatchObject({ id: 'user-1', role: 'user', createdAt });
        expect(db.query).toHaveBeenCalledWith(
            expect.stringContaining('INSERT INTO users'),
            ['user-1', 'driver@parking.test', 'salt:hash', 'Test Driver', null, 'user'],
        );
    });

    it('should map a unique violation to a duplicate user error', async () => {
        const violation = new DatabaseError('duplicate key value violates unique constraint', 0, 'error');
        violation.code = '23505';
        db.query.mockRejectedValueOnce(violation);

        const attempt = repository.create(newUser);

        await expect(attempt).rejects.toBeInstanceOf(DuplicateUserException);
        await expect(attempt).rejects.toThrow('An account with email driver@parking.test already exists');
    });

    it('should pass other database errors through', async () => {
        const failure = new DatabaseError('connection terminated', 0, 'error');
        failure.code = '57P01';
        db.query.mockRejectedValueOnce(failure);

        await expect(repository.create(newUser)).rejects.toBe(failure);
    });
});
