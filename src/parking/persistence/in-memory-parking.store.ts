import type { BookingEntity } from '../../bookings/entities/booking.entity';
import { AsyncLock } from '../../common/utils/async-lock';
import { SlotUnavailableException } from '../../common/exceptions/domain.exceptions';
import {
    CATEGORY_DEFINITIONS,
    PARKING_CATEGORIES,
    ParkingCategory,
    buildSlotNames,
} from '../constants/pricing.constants';
import type { SlotEntity } from '../entities/slot.entity';
import type { InventoryTransaction, ParkingStore, ResetResult } from './parking-store.interface';

interface InMemoryState {
    slots: Map<string, SlotEntity>;
    bookings: BookingEntity[];
}

const copyBooking = (booking: BookingEntity): BookingEntity => ({
    ...booking,
    slots: [...booking.slots],
    bookedAt: new Date(booking.bookedAt.getTime()),
});

/**
 * Changes are staged and applied to the shared state in one synchronous
 * step by {@link commit}, so a rejected callback leaves the state untouched.
 */
class InMemoryInventoryTransaction implements InventoryTransaction {
    private readonly staged = new Set<string>();
    private readonly pendingBookings: BookingEntity[] = [];
    private released = false;

    constructor(private readonly state: InMemoryState) { }

    async findSlotsForUpdate(category: ParkingCategory, names: readonly string[]): Promise<SlotEntity[]> {
        const slots: SlotEntity[] = [];
        for (const name of names) {
            const slot = this.state.slots.get(name);
            if (slot && slot.category === category) {
                slots.push({ ...slot, isBooked: this.isBooked(slot) });
            }
        }
        return slots;
    }

    async markBooked(names: readonly string[]): Promise<void> {
        const unavailable = names.filter((name) => {
            const slot = this.state.slots.get(name);
            return !slot || this.isBooked(slot);
        });
        if (unavailable.length > 0) {
            throw new SlotUnavailableException(unavailable);
        }
        names.forEach((name) => this.staged.add(name));
    }

    async referenceExists(reference: string): Promise<boolean> {
        const committed = !this.released && this.state.bookings.some((booking) => booking.reference === reference);
        return committed || this.pendingBookings.some((booking) => booking.reference === reference);
    }

    async insertBooking(booking: BookingEntity): Promise<void> {
        this.pendingBookings.push(copyBooking(booking));
    }

    async releaseAll(): Promise<ResetResult> {
        let releasedSlots = 0;
        for (const slot of this.state.slots.values()) {
            if (this.isBooked(slot)) {
                releasedSlots++;
            }
        }
        const deletedBookings = (this.released ? 0 : this.state.bookings.length) + this.pendingBookings.length;

        this.released = true;
        this.staged.clear();
        this.pendingBookings.length = 0;

        return { releasedSlots, deletedBookings };
    }

    commit(): void {
        if (this.released) {
            for (const [name, slot] of this.state.slots) {
                this.state.slots.set(name, { ...slot, isBooked: false });
            }
            this.state.bookings = [];
        }
        for (const name of this.staged) {
            const slot = this.state.slots.get(name);
            if (slot) {
                this.state.slots.set(name, { ...slot, isBooked: true });
            }
        }
        this.state.bookings.push(...this.pendingBookings);
    }

    private isBooked(slot: SlotEntity): boolean {
        if (this.staged.has(slot.name)) {
            return true;
        }
        return this.released ? false : slot.isBooked;
    }
}

/**
 * Process-local store. Transactions run one at a time behind a single lock
 * covering the whole inventory; state is lost on restart.
 */
export class InMemoryParkingStore implements ParkingStore {
    private readonly state: InMemoryState = { slots: new Map(), bookings: [] };
    private readonly lock = new AsyncLock();

    constructor() {
        for (const category of PARKING_CATEGORIES) {
            const { price } = CATEGORY_DEFINITIONS[category];
            buildSlotNames(category).forEach((name, position) => {
                this.state.slots.set(name, { name, category, price, position, isBooked: false });
            });
        }
    }

    async initialize(): Promise<void> {
        // seeded in the constructor
    }

    async listSlots(): Promise<SlotEntity[]> {
        return [...this.state.slots.values()].map((slot) => ({ ...slot }));
    }

    async findBookingsByUser(userId: string): Promise<BookingEntity[]> {
        // reversed first so bookings made in the same millisecond stay newest first
        return [...this.state.bookings]
            .reverse()
            .filter((booking) => booking.userId === userId)
            .sort((a, b) => b.bookedAt.getTime() - a.bookedAt.getTime())
            .map(copyBooking);
    }

    async findBookingByReference(reference: string): Promise<BookingEntity | null> {
        const booking = this.state.bookings.find((candidate) => candidate.reference === reference);
        return booking ? copyBooking(booking) : null;
    }

    transaction<T>(work: (tx: InventoryTransaction) => Promise<T>): Promise<T> {
        return this.lock.runExclusive(async () => {
            const tx = new InMemoryInventoryTransaction(this.state);
            const result = await work(tx);
            tx.commit();
            return result;
        });
    }
}
