import { Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import type { ParkingCategory } from '../parking/constants/pricing.constants';
import { SlotInventoryService } from '../parking/slot-inventory.service';
import type { ResetResult } from '../parking/persistence/parking-store.interface';

export interface CategoryStats {
  booked: number;
  total: number;
  available: number;
}

export type BookingStats = Record<ParkingCategory, CategoryStats>;

@Injectable()
export class AdminService {
  constructor(
    private readonly inventory: SlotInventoryService,
    private readonly logger: CustomLoggerService,
    private readonly metrics: MetricsService,
  ) { }

  async getStats(): Promise<BookingStats> {
    const statuses = await this.inventory.getAllStatuses();
    const stats = (category: ParkingCategory): CategoryStats => {
      const status = statuses.find((entry) => entry.category === category);
      const total = status?.totalSlots ?? 0;
      const booked = status?.bookedSlots.length ?? 0;
      return { booked, total, available: total - booked };
    };

    return {
      vip: stats('vip'),
      executive: stats('executive'),
      normal: stats('normal'),
    };
  }

  /** Releases every slot and deletes every booking. Safe to repeat. */
  async resetAll(actorId: string): Promise<ResetResult> {
    const result = await this.inventory.reset();

    this.metrics.incrementBusinessEvent('bookings_reset', 'success');
    this.logger.logSecurityEvent('bookings_reset', {
      userId: actorId,
      releasedSlots: result.releasedSlots,
      deletedBookings: result.deletedBookings,
    });

    return result;
  }
}
