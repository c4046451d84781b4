import type { ParkingCategory } from '../../parking/constants/pricing.constants';

export type BookingStatus = 'active';

/**
 * A confirmed reservation of one or more slots of a single category.
 * Immutable once stored; removed only by a full reset.
 */
export interface BookingEntity {
    reference: string;
    userId: string;
    category: ParkingCategory;
    /** Slot identifiers in layout order. */
    slots: string[];
    baseAmount: number;
    platformFee: number;
    nightSurcharge: number;
    grandTotal: number;
    status: BookingStatus;
    bookedAt: Date;
}
