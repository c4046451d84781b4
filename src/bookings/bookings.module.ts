import { Module } from '@nestjs/common';
import { BookingsService } from './bookings.service';
import { BookingsController } from './bookings.controller';
import { ParkingModule } from '../parking/parking.module';
import { CommonModule } from '../common/common.module';

@Module({
  imports: [CommonModule, ParkingModule],
  controllers: [BookingsController],
  providers: [BookingsService],
  exports: [BookingsService],
})
export class BookingsModule { }
