import type { PoolClient, QueryResultRow } from 'pg';
import type { BookingEntity } from '../../bookings/entities/booking.entity';
import type { DatabaseExecutor } from '../../database/database.client';
import { SlotUnavailableException, StorageFailureException } from '../../common/exceptions/domain.exceptions';
import {
    CATEGORY_DEFINITIONS,
    PARKING_CATEGORIES,
    ParkingCategory,
    buildSlotNames,
    isParkingCategory,
} from '../constants/pricing.constants';
import type { SlotEntity } from '../entities/slot.entity';
import type { InventoryTransaction, ParkingStore, ResetResult } from './parking-store.interface';

interface SlotRow extends QueryResultRow {
    name: string;
    category: string;
    price: number;
    position: number;
    is_booked: boolean;
}

interface BookingRow extends QueryResultRow {
    reference: string;
    user_id: string;
    category: string;
    slots: string[];
    base_amount: number;
    platform_fee: number;
    night_surcharge: number;
    grand_total: number;
    status: string;
    booked_at: Date;
}

const BOOKING_SELECT = `
    SELECT b.reference, b.user_id, b.category, b.base_amount, b.platform_fee,
           b.night_surcharge, b.grand_total, b.status, b.booked_at,
           array_agg(bs.slot_name ORDER BY s.position) AS slots
    FROM bookings b
    JOIN booking_slots bs ON bs.booking_reference = b.reference
    JOIN slots s ON s.name = bs.slot_name`;

function toCategory(value: string): ParkingCategory {
    if (!isParkingCategory(value)) {
        throw new StorageFailureException(`Unknown slot category in storage: ${value}`);
    }
    return value;
}

function mapSlotRow(row: SlotRow): SlotEntity {
    return {
        name: row.name,
        category: toCategory(row.category),
        price: row.price,
        position: row.position,
        isBooked: row.is_booked,
    };
}

function mapBookingRow(row: BookingRow): BookingEntity {
    if (row.status !== 'active') {
        throw new StorageFailureException(`Unknown booking status in storage: ${row.status}`);
    }
    return {
        reference: row.reference,
        userId: row.user_id,
        category: toCategory(row.category),
        slots: row.slots,
        baseAmount: row.base_amount,
        platformFee: row.platform_fee,
        nightSurcharge: row.night_surcharge,
        grandTotal: row.grand_total,
        status: 'active',
        bookedAt: row.booked_at,
    };
}

class PostgresInventoryTransaction implements InventoryTransaction {
    constructor(private readonly client: PoolClient) { }

    async findSlotsForUpdate(category: ParkingCategory, names: readonly string[]): Promise<SlotEntity[]> {
        // Rows are locked in name order
        const result = await this.client.query<SlotRow>(
            `SELECT name, category, price, position, is_booked
            FROM slots
            WHERE category = $1 AND name = ANY($2::text[])
            ORDER BY name
            FOR UPDATE`,
            [category, [...names]],
        );
        return result.rows.map(mapSlotRow);
    }

    async markBooked(names: readonly string[]): Promise<void> {
        const result = await this.client.query<{ name: string }>(
            `UPDATE slots SET is_booked = TRUE
            WHERE name = ANY($1::text[]) AND is_booked = FALSE
            RETURNING name`,
            [[...names]],
        );
        const marked = new Set(result.rows.map((row) => row.name));
        const unavailable = names.filter((name) => !marked.has(name));
        if (unavailable.length > 0) {
            throw new SlotUnavailableException(unavailable);
        }
    }

    async referenceExists(reference: string): Promise<boolean> {
        const result = await this.client.query(
            'SELECT 1 FROM bookings WHERE reference = $1',
            [reference],
        );
        return (result.rowCount ?? 0) > 0;
    }

    async insertBooking(booking: BookingEntity): Promise<void> {
        await this.client.query(
            `INSERT INTO bookings (
                reference, user_id, category, base_amount, platform_fee,
                night_surcharge, grand_total, status, booked_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
            [
                booking.reference,
                booking.userId,
                booking.category,
                booking.baseAmount,
                booking.platformFee,
                booking.nightSurcharge,
                booking.grandTotal,
                booking.status,
                booking.bookedAt,
            ],
        );
        await this.client.query(
            `INSERT INTO booking_slots (booking_reference, slot_name)
            SELECT $1, unnest($2::text[])`,
            [booking.reference, booking.slots],
        );
    }

    async releaseAll(): Promise<ResetResult> {
        // Blocks until in-flight bookings commit
        await this.client.query('SELECT name FROM slots ORDER BY name FOR UPDATE');
        await this.client.query('DELETE FROM booking_slots');
        const deleted = await this.client.query('DELETE FROM bookings');
        const released = await this.client.query('UPDATE slots SET is_booked = FALSE WHERE is_booked = TRUE');

        return {
            releasedSlots: released.rowCount ?? 0,
            deletedBookings: deleted.rowCount ?? 0,
        };
    }
}

export class PostgresParkingStore implements ParkingStore {
    constructor(private readonly db: DatabaseExecutor) { }

    async initialize(): Promise<void> {
        const names: string[] = [];
        const categories: string[] = [];
        const prices: number[] = [];
        const positions: number[] = [];

        for (const category of PARKING_CATEGORIES) {
            buildSlotNames(category).forEach((name, position) => {
                names.push(name);
                categories.push(category);
                prices.push(CATEGORY_DEFINITIONS[category].price);
                positions.push(position);
            });
        }

        await this.db.query(
            `INSERT INTO slots (name, category, price, position)
            SELECT * FROM unnest($1::text[], $2::text[], $3::int[], $4::int[])
            ON CONFLICT (name) DO NOTHING`,
            [names, categories, prices, positions],
        );
    }

    async listSlots(): Promise<SlotEntity[]> {
        const result = await this.db.query<SlotRow>(
            `SELECT name, category, price, position, is_booked
            FROM slots
            ORDER BY array_position($1::text[], category), position`,
            [[...PARKING_CATEGORIES]],
        );
        return result.rows.map(mapSlotRow);
    }

    async findBookingsByUser(userId: string): Promise<BookingEntity[]> {
        const result = await this.db.query<BookingRow>(
            `${BOOKING_SELECT}
            WHERE b.user_id = $1
            GROUP BY b.reference
            ORDER BY b.booked_at DESC`,
            [userId],
        );
        return result.rows.map(mapBookingRow);
    }

    async findBookingByReference(reference: string): Promise<BookingEntity | null> {
        const result = await this.db.query<BookingRow>(
            `${BOOKING_SELECT}
            WHERE b.reference = $1
            GROUP BY b.reference`,
            [reference],
        );
        const [row] = result.rows;
        return row ? mapBookingRow(row) : null;
    }

    transaction<T>(work: (tx: InventoryTransaction) => Promise<T>): Promise<T> {
        return this.db.transaction((client) => work(new PostgresInventoryTransaction(client)));
    }
}
