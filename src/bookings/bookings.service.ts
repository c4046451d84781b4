import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'node:crypto';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { ClockService } from '../common/services/clock.service';
import { ADMIN_ROLES } from '../common/constants/roles';
import type { ParkingConfig } from '../common/config/parking.config';
import type { AuthenticatedUser } from '../common/interfaces/jwt-payload.interface';
import {
    InvalidInputException,
    ResourceNotFoundException,
    StorageFailureException,
} from '../common/exceptions/domain.exceptions';
import { isParkingCategory, ParkingCategory, PARKING_CATEGORIES } from '../parking/constants/pricing.constants';
import { FeeBreakdown, FeePolicy } from '../parking/policies/fee.policy';
import { SlotIdentifierPolicy } from '../parking/policies/slot-identifier.policy';
import { SlotInventoryService } from '../parking/slot-inventory.service';
import {
    InventoryTransaction,
    PARKING_STORE,
    ParkingStore,
} from '../parking/persistence/parking-store.interface';
import type { BookingEntity } from './entities/booking.entity';

export interface BookingResult {
    bookingReference: string;
    fees: FeeBreakdown;
    bookedSlots: string[];
    booking: BookingEntity;
}

export interface FeeQuery {
    baseAmount?: number;
    category?: string;
    slotCount?: number;
}

@Injectable()
export class BookingsService {
    constructor(
        @Inject(PARKING_STORE) private readonly store: ParkingStore,
        private readonly inventory: SlotInventoryService,
        private readonly configService: ConfigService,
        private readonly clock: ClockService,
        private readonly logger: CustomLoggerService,
        private readonly metrics: MetricsService,
    ) { }

    /**
     * Books every requested slot for `userId`, or none of them.
     */
    async bookSlots(userId: string, category: string, slotIds: readonly string[]): Promise<BookingResult> {
        const validCategory = this.validateRequest(category, slotIds);

        try {
            const booking = await this.store.transaction(async (tx) => {
                const slots = await this.inventory.markBooked(validCategory, slotIds, tx);
                const bookedAt = this.clock.now();
                const fees = FeePolicy.forSlots(validCategory, slots.length, bookedAt);
                const reference = await this.generateUniqueReference(tx);

                const entity: BookingEntity = {
                    reference,
                    userId,
                    category: validCategory,
                    slots: slots.map((slot) => slot.name),
                    baseAmount: fees.baseAmount,
                    platformFee: fees.platformFee,
                    nightSurcharge: fees.nightSurcharge,
                    grandTotal: fees.grandTotal,
                    status: 'active',
                    bookedAt,
                };

                await tx.insertBooking(entity);
                return { entity, fees };
            });

            this.metrics.incrementBusinessEvent('booking_created', 'success');
            this.metrics.incrementSlotsBooked(validCategory, booking.entity.slots.length);
            this.logger.logBusinessEvent('slots_booked', {
                bookingReference: booking.entity.reference,
                userId,
                category: validCategory,
                slots: booking.entity.slots,
                grandTotal: booking.fees.grandTotal,
                isNightTime: booking.fees.isNightTime,
            });

            return {
                bookingReference: booking.entity.reference,
                fees: booking.fees,
                bookedSlots: booking.entity.slots,
                booking: booking.entity,
            };
        } catch (error) {
            this.metrics.incrementBusinessEvent('booking_created', 'failure');
            this.logger.logBusinessEvent('booking_rejected', {
                userId,
                category: validCategory,
                slots: [...slotIds],
                reason: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }

    async getUserBookings(userId: string): Promise<BookingEntity[]> {
        return this.store.findBookingsByUser(userId);
    }

    /**
     * Visible to its owner and to admin or staff; anyone else gets not-found
     * so references cannot be probed.
     */
    async getBookingByReference(reference: string, caller: AuthenticatedUser): Promise<BookingEntity> {
        const booking = await this.store.findBookingByReference(reference.trim().toUpperCase());

        if (!booking || (booking.userId !== caller.id && !ADMIN_ROLES.includes(caller.role))) {
            throw new ResourceNotFoundException(`Booking ${reference} not found`);
        }

        return booking;
    }

    calculateFees(query: FeeQuery): FeeBreakdown {
        const now = this.clock.now();
        const { baseAmount, category, slotCount } = query;

        if (category === undefined && slotCount === undefined) {
            return FeePolicy.forAmount(baseAmount ?? 0, now);
        }

        if (baseAmount !== undefined) {
            throw new InvalidInputException('Provide either base_amount or type with slotCount, not both');
        }

        if (category === undefined || slotCount === undefined) {
            throw new InvalidInputException('type and slotCount must be given together');
        }

        if (!isParkingCategory(category)) {
            throw new InvalidInputException(`Unknown parking type: ${category}`, {
                allowed: [...PARKING_CATEGORIES],
            });
        }

        return FeePolicy.forSlots(category, slotCount, now);
    }

    /** 8 random bytes, uppercase hex. */
    generateReference(): string {
        return randomBytes(8).toString('hex').toUpperCase();
    }

    private async generateUniqueReference(tx: InventoryTransaction): Promise<string> {
        const { bookingReferenceAttempts } = this.configService.getOrThrow<ParkingConfig>('parking');

        for (let attempt = 1; attempt <= bookingReferenceAttempts; attempt++) {
            const reference = this.generateReference();
            if (!(await tx.referenceExists(reference))) {
                return reference;
            }
            this.logger.warn('Booking reference collision', { attempt });
        }

        throw new StorageFailureException('Could not allocate a unique booking reference');
    }

    private validateRequest(category: string, slotIds: readonly string[]): ParkingCategory {
        if (!isParkingCategory(category)) {
            throw new InvalidInputException(`Unknown parking type: ${category}`, {
                allowed: [...PARKING_CATEGORIES],
            });
        }

        if (slotIds.length === 0) {
            throw new InvalidInputException('No slots provided');
        }

        const duplicates = SlotIdentifierPolicy.findDuplicates(slotIds);
        if (duplicates.length > 0) {
            throw new InvalidInputException('Duplicate slots in request', { slots: duplicates });
        }

        const malformed = SlotIdentifierPolicy.findMalformed(category, slotIds);
        if (malformed.length > 0) {
            throw new InvalidInputException(`Invalid ${category} slot identifiers`, { slots: malformed });
        }

        return category;
    }
}
