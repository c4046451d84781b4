import { DatabaseError, QueryResultRow } from 'pg';
import type { DatabaseExecutor } from '../../database/database.client';
import { isUserRole } from '../../common/constants/roles';
import { DuplicateUserException, StorageFailureException } from '../../common/exceptions/domain.exceptions';
import type { NewUser, UserEntity } from '../entities/user.entity';
import type { IUserRepository } from './user.repository.interface';

interface UserRow extends QueryResultRow {
    id: string;
    email: string;
    password_hash: string;
    full_name: string | null;
    phone: string | null;
    role: string;
    created_at: Date;
}

const UNIQUE_VIOLATION = '23505';

export class PostgresUserRepository implements IUserRepository {
    constructor(private readonly db: DatabaseExecutor) { }

    async findByEmail(email: string): Promise<UserEntity | null> {
        const result = await this.db.query<UserRow>(
            `SELECT id, email, password_hash, full_name, phone, role, created_at
            FROM users WHERE email = $1`,
            [email],
        );

        const [row] = result.rows;
        return row ? this.mapRowToEntity(row) : null;
    }

    async findById(id: string): Promise<UserEntity | null> {
        const result = await this.db.query<UserRow>(
            `SELECT id, email, password_hash, full_name, phone, role, created_at
            FROM users WHERE id = $1`,
            [id],
        );

        const [row] = result.rows;
        return row ? this.mapRowToEntity(row) : null;
    }

    async create(user: NewUser): Promise<UserEntity> {
        try {
            const result = await this.db.query<UserRow>(
                `INSERT INTO users (id, email, password_hash, full_name, phone, role)
                VALUES ($1, $2, $3, $4, $5, $6)
                RETURNING id, email, password_hash, full_name, phone, role, created_at`,
                [user.id, user.email, user.passwordHash, user.fullName, user.phone, user.role],
            );
            const [row] = result.rows;
            if (!row) {
                throw new StorageFailureException('User insert returned no row');
            }
            return this.mapRowToEntity(row);
        } catch (error) {
            if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
                throw new DuplicateUserException(user.email);
            }
            throw error;
        }
    }

    private mapRowToEntity(row: UserRow): UserEntity {
        if (!isUserRole(row.role)) {
            throw new StorageFailureException(`Unknown role in storage: ${row.role}`);
        }

        return {
            id: row.id,
            email: row.email,
            passwordHash: row.password_hash,
            fullName: row.full_name,
            phone: row.phone,
            role: row.role,
            createdAt: row.created_at,
        };
    }
}
