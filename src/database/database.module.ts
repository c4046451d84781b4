import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseClient } from './database.client';
import { DatabaseSettings, toPoolConfig } from './database.config';
import type { ParkingConfig } from '../common/config/parking.config';

export const DATABASE_CLIENT = Symbol('DATABASE_CLIENT');

/**
 * Resolves to a connected client when STORAGE_DRIVER is "postgres" and to
 * null for the in-memory driver.
 */
@Global()
@Module({
  providers: [
    {
      provide: DATABASE_CLIENT,
      inject: [ConfigService],
      useFactory: async (configService: ConfigService): Promise<DatabaseClient | null> => {
        const { storageDriver } = configService.getOrThrow<ParkingConfig>('parking');
        if (storageDriver !== 'postgres') {
          return null;
        }

        const settings = configService.getOrThrow<DatabaseSettings>('database');
        const client = await DatabaseClient.initialize(toPoolConfig(settings));
        await client.applySchema();
        return client;
      },
    },
  ],
  exports: [DATABASE_CLIENT],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(DATABASE_CLIENT) private readonly db: DatabaseClient | null) { }

  async onApplicationShutdown(): Promise<void> {
    await this.db?.disconnect();
  }
}
