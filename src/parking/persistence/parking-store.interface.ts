import type { BookingEntity } from '../../bookings/entities/booking.entity';
import type { ParkingCategory } from '../constants/pricing.constants';
import type { SlotEntity } from '../entities/slot.entity';

export const PARKING_STORE = Symbol('PARKING_STORE');

export interface ResetResult {
    releasedSlots: number;
    deletedBookings: number;
}

/**
 * Operations that must observe and mutate the inventory atomically. Every
 * call happens inside {@link ParkingStore.transaction}; nothing is visible
 * to other callers until the transaction callback resolves.
 */
export interface InventoryTransaction {
    /**
     * Slots of `category` among `names`, with their booked flag as of this
     * transaction. Unknown names are left out. Locks the returned slots
     * until the transaction ends.
     */
    findSlotsForUpdate(category: ParkingCategory, names: readonly string[]): Promise<SlotEntity[]>;
    /** Throws `SlotUnavailableException` if any slot is already booked. */
    markBooked(names: readonly string[]): Promise<void>;
    referenceExists(reference: string): Promise<boolean>;
    insertBooking(booking: BookingEntity): Promise<void>;
    releaseAll(): Promise<ResetResult>;
}

export interface ParkingStore {
    /** Seeds the fixed slot inventory if it is missing. */
    initialize(): Promise<void>;
    /** All slots, grouped by category and in layout order. */
    listSlots(): Promise<SlotEntity[]>;
    /** Newest first. */
    findBookingsByUser(userId: string): Promise<BookingEntity[]>;
    findBookingByReference(reference: string): Promise<BookingEntity | null>;
    transaction<T>(work: (tx: InventoryTransaction) => Promise<T>): Promise<T>;
}
