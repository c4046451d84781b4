import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { DATABASE_CLIENT } from '../database/database.module';
import { DatabaseClient } from '../database/database.client';
import { PARKING_STORE, ParkingStore } from './persistence/parking-store.interface';
import { InMemoryParkingStore } from './persistence/in-memory-parking.store';
import { PostgresParkingStore } from './persistence/postgres-parking.store';
import { SlotInventoryService } from './slot-inventory.service';
import { ParkingController } from './parking.controller';

@Module({
  imports: [CommonModule],
  controllers: [ParkingController],
  providers: [
    {
      provide: PARKING_STORE,
      inject: [DATABASE_CLIENT],
      useFactory: async (db: DatabaseClient | null): Promise<ParkingStore> => {
        const store = db ? new PostgresParkingStore(db) : new InMemoryParkingStore();
        await store.initialize();
        return store;
      },
    },
    SlotInventoryService,
  ],
  exports: [PARKING_STORE, SlotInventoryService],
})
export class ParkingModule {}
