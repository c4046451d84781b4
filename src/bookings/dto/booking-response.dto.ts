import { CATEGORY_DEFINITIONS, ParkingCategory } from '../../parking/constants/pricing.constants';
import type { FeeBreakdown } from '../../parking/policies/fee.policy';
import type { BookingEntity, BookingStatus } from '../entities/booking.entity';

export interface FeeBreakdownResponse {
    base_amount: number;
    platform_fee: number;
    night_surcharge: number;
    total_fees: number;
    grand_total: number;
    is_night_time: boolean;
}

export interface BookedSlotResponse {
    slot_name: string;
    slot_type: ParkingCategory;
    price: number;
}

export interface BookingResponse {
    booking_reference: string;
    booking_time: string;
    category: ParkingCategory;
    slots: BookedSlotResponse[];
    base_amount: number;
    platform_fee: number;
    night_surcharge: number;
    grand_total: number;
    /** Alias of grand_total. */
    total_amount: number;
    status: BookingStatus;
}

export interface BookSlotsResponse {
    success: true;
    message: string;
    pricing: FeeBreakdownResponse;
    booked_slots: string[];
    booking_reference: string;
}

export function toFeeBreakdownResponse(fees: FeeBreakdown): FeeBreakdownResponse {
    return {
        base_amount: fees.baseAmount,
        platform_fee: fees.platformFee,
        night_surcharge: fees.nightSurcharge,
        total_fees: fees.totalFees,
        grand_total: fees.grandTotal,
        is_night_time: fees.isNightTime,
    };
}

export function toBookingResponse(booking: BookingEntity): BookingResponse {
    const price = CATEGORY_DEFINITIONS[booking.category].price;
    return {
        booking_reference: booking.reference,
        booking_time: booking.bookedAt.toISOString(),
        category: booking.category,
        slots: booking.slots.map((slotName) => ({
            slot_name: slotName,
            slot_type: booking.category,
            price,
        })),
        base_amount: booking.baseAmount,
        platform_fee: booking.platformFee,
        night_surcharge: booking.nightSurcharge,
        grand_total: booking.grandTotal,
        total_amount: booking.grandTotal,
        status: booking.status,
    };
}
