import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { DATABASE_CLIENT } from '../database/database.module';
import { DatabaseClient } from '../database/database.client';
import { UsersService } from './users.service';
import { IUserRepository, USER_REPOSITORY } from './persistence/user.repository.interface';
import { InMemoryUserRepository } from './persistence/in-memory-user.repository';
import { PostgresUserRepository } from './persistence/postgres-user.repository';

@Module({
  imports: [CommonModule],
  providers: [
    {
      provide: USER_REPOSITORY,
      inject: [DATABASE_CLIENT],
      useFactory: (db: DatabaseClient | null): IUserRepository =>
        db ? new PostgresUserRepository(db) : new InMemoryUserRepository(),
    },
    UsersService,
  ],
  exports: [UsersService],
})
export class UsersModule {}
