import { Controller, Get } from '@nestjs/common';
import { Public } from '../common/decorators/public.decorator';
import { ClockService } from '../common/services/clock.service';
import { FeePolicy } from './policies/fee.policy';
import { ParkingStatusResponse, SlotInventoryService } from './slot-inventory.service';

export interface TimeInfoResponse {
  current_hour: number;
  current_time: string;
  is_night_time: boolean;
  night_surcharge_applies: boolean;
}

@Controller('api')
@Public()
export class ParkingController {
  constructor(
    private readonly slotInventory: SlotInventoryService,
    private readonly clock: ClockService,
  ) { }

  @Get('parking-status')
  async getParkingStatus(): Promise<ParkingStatusResponse> {
    return this.slotInventory.getParkingStatus();
  }

  @Get('time-info')
  getTimeInfo(): TimeInfoResponse {
    const now = this.clock.now();
    const isNightTime = FeePolicy.isNightTime(now);
    const hh = now.getHours().toString().padStart(2, '0');
    const mm = now.getMinutes().toString().padStart(2, '0');

    return {
      current_hour: now.getHours(),
      current_time: `${hh}:${mm}`,
      is_night_time: isNightTime,
      night_surcharge_applies: isNightTime,
    };
  }
}
