import { Inject, Injectable } from '@nestjs/common';
import { CustomLoggerService } from '../common/services/logger.service';
import { SlotUnavailableException } from '../common/exceptions/domain.exceptions';
import {
    CATEGORY_DEFINITIONS,
    PARKING_CATEGORIES,
    ParkingCategory,
    totalSlotCount,
} from './constants/pricing.constants';
import type { SlotEntity } from './entities/slot.entity';
import {
    InventoryTransaction,
    PARKING_STORE,
    ParkingStore,
    ResetResult,
} from './persistence/parking-store.interface';

export interface CategoryStatus {
    category: ParkingCategory;
    price: number;
    totalSlots: number;
    slots: string[];
    bookedSlots: string[];
}

export type ParkingStatusResponse = Record<ParkingCategory, {
    price: number;
    slots: string[];
    booked: string[];
}>;

@Injectable()
export class SlotInventoryService {
    constructor(
        @Inject(PARKING_STORE) private readonly store: ParkingStore,
        private readonly logger: CustomLoggerService,
    ) { }

    async getStatus(category: ParkingCategory): Promise<CategoryStatus> {
        const slots = (await this.store.listSlots()).filter((slot) => slot.category === category);
        return this.toCategoryStatus(category, slots);
    }

    async getAllStatuses(): Promise<CategoryStatus[]> {
        const slots = await this.store.listSlots();
        return PARKING_CATEGORIES.map((category) =>
            this.toCategoryStatus(category, slots.filter((slot) => slot.category === category)),
        );
    }

    async getParkingStatus(): Promise<ParkingStatusResponse> {
        const slots = await this.store.listSlots();
        const entry = (category: ParkingCategory) => {
            const status = this.toCategoryStatus(category, slots.filter((slot) => slot.category === category));
            return { price: status.price, slots: status.slots, booked: status.bookedSlots };
        };

        return {
            vip: entry('vip'),
            executive: entry('executive'),
            normal: entry('normal'),
        };
    }

    /**
     * True iff every id names a slot of `category` that is not booked.
     * Advisory outside a transaction: `markBooked` repeats the check under the lock.
     */
    async isAvailable(category: ParkingCategory, slotIds: readonly string[]): Promise<boolean> {
        if (slotIds.length === 0) {
            return false;
        }
        const status = await this.getStatus(category);
        const known = new Set(status.slots);
        const booked = new Set(status.bookedSlots);
        return slotIds.every((id) => known.has(id) && !booked.has(id));
    }

    /**
     * Marks every slot booked, or none of them. Runs inside `tx` when given,
     * otherwise in a transaction of its own.
     */
    async markBooked(category: ParkingCategory, slotIds: readonly string[], tx?: InventoryTransaction): Promise<SlotEntity[]> {
        if (!tx) {
            return this.store.transaction((own) => this.markBooked(category, slotIds, own));
        }

        const slots = await tx.findSlotsForUpdate(category, slotIds);
        const found = new Set(slots.map((slot) => slot.name));

        const unknown = slotIds.filter((id) => !found.has(id));
        if (unknown.length > 0) {
            throw new SlotUnavailableException(unknown, 'unknown');
        }

        const booked = slots.filter((slot) => slot.isBooked).map((slot) => slot.name);
        if (booked.length > 0) {
            throw new SlotUnavailableException(booked, 'booked');
        }

        await tx.markBooked(slotIds);
        return slots
            .map((slot) => ({ ...slot, isBooked: true }))
            .sort((a, b) => a.position - b.position);
    }

    async reset(): Promise<ResetResult> {
        const result = await this.store.transaction((tx) => tx.releaseAll());
        this.logger.logBusinessEvent('inventory_reset', { ...result });
        return result;
    }

    private toCategoryStatus(category: ParkingCategory, slots: SlotEntity[]): CategoryStatus {
        const ordered = [...slots].sort((a, b) => a.position - b.position);
        return {
            category,
            price: CATEGORY_DEFINITIONS[category].price,
            totalSlots: totalSlotCount(category),
            slots: ordered.map((slot) => slot.name),
            bookedSlots: ordered.filter((slot) => slot.isBooked).map((slot) => slot.name),
        };
    }
}
