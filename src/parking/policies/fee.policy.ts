import {
  CATEGORY_DEFINITIONS,
  NIGHT_SURCHARGE,
  NIGHT_WINDOW,
  PLATFORM_FEE,
  ParkingCategory,
} from '../constants/pricing.constants';

export interface FeeBreakdown {
  baseAmount: number;
  platformFee: number;
  nightSurcharge: number;
  totalFees: number;
  grandTotal: number;
  isNightTime: boolean;
}

/**
 * Domain Policy: Booking Fees
 * Tiered base price plus a flat platform fee, plus a flat surcharge for
 * bookings made between midnight and 05:00 server local time.
 */
export class FeePolicy {
    static isNightTime(at: Date): boolean {
        const hour = at.getHours();
        return hour >= NIGHT_WINDOW.startHour && hour < NIGHT_WINDOW.endHour;
    }

    static forAmount(baseAmount: number, at: Date): FeeBreakdown {
        const isNightTime = FeePolicy.isNightTime(at);
        const platformFee = PLATFORM_FEE;
        const nightSurcharge = isNightTime ? NIGHT_SURCHARGE : 0;
        const totalFees = platformFee + nightSurcharge;

        return {
            baseAmount,
            platformFee,
            nightSurcharge,
            totalFees,
            grandTotal: baseAmount + totalFees,
            isNightTime,
        };
    }

    static forSlots(category: ParkingCategory, slotCount: number, at: Date): FeeBreakdown {
        return FeePolicy.forAmount(CATEGORY_DEFINITIONS[category].price * slotCount, at);
    }
}
