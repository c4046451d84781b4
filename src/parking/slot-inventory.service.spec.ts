import { Test, TestingModule } from '@nestjs/testing';
import { SlotInventoryService } from './slot-inventory.service';
import { PARKING_STORE } from './persistence/parking-store.interface';
import { InMemoryParkingStore } from './persistence/in-memory-parking.store';
import { CustomLoggerService } from '../common/services/logger.service';
import { SlotUnavailableException } from '../common/exceptions/domain.exceptions';

describe('SlotInventoryService', () => {
    let service: SlotInventoryService;
    let logger: { logBusinessEvent: jest.Mock };

    beforeEach(async () => {
        logger = { logBusinessEvent: jest.fn() };

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                SlotInventoryService,
                { provide: PARKING_STORE, useValue: new InMemoryParkingStore() },
                { provide: CustomLoggerService, useValue: logger },
            ],
        }).compile();

        service = module.get<SlotInventoryService>(SlotInventoryService);
    });

    it('should report every category as free initially', async () => {
        const status = await service.getParkingStatus();

        expect(status.vip.price).toBe(500);
        expect(status.vip.slots).toHaveLength(10);
        expect(status.executive.price).toBe(350);
        expect(status.executive.slots).toHaveLength(100);
        expect(status.normal.price).toBe(320);
        expect(status.normal.slots).toHaveLength(11);
        expect([...status.vip.booked, ...status.executive.booked, ...status.normal.booked]).toEqual([]);
    });

    it('should show booked slots in layout order on the next query', async () => {
        const booked = await service.markBooked('vip', ['V10', 'V2']);

        expect(booked.map((slot) => slot.name)).toEqual(['V2', 'V10']);
        const status = await service.getStatus('vip');
        expect(status.bookedSlots).toEqual(['V2', 'V10']);
        expect(status.totalSlots).toBe(10);
    });

    it('should reject unknown slots before checking bookings', async () => {
        await service.markBooked('vip', ['V1']);

        await expect(service.markBooked('vip', ['V1', 'V11'])).rejects.toMatchObject({ slots: ['V11'] });
        await expect(service.markBooked('vip', ['V1', 'V3'])).rejects.toMatchObject({ slots: ['V1'] });
        expect((await service.getStatus('vip')).bookedSlots).toEqual(['V1']);
    });

    it('should not book slots of another category', async () => {
        await expect(service.markBooked('vip', ['N1'])).rejects.toBeInstanceOf(SlotUnavailableException);
    });

    it('should answer availability', async () => {
        await service.markBooked('normal', ['N4']);

        expect(await service.isAvailable('normal', ['N3', 'N5'])).toBe(true);
        expect(await service.isAvailable('normal', ['N3', 'N4'])).toBe(false);
        expect(await service.isAvailable('normal', ['N12'])).toBe(false);
        expect(await service.isAvailable('normal', [])).toBe(false);
    });

    it('should release every slot on reset', async () => {
        await service.markBooked('executive', ['E0101', 'E0520']);

        const result = await service.reset();

        expect(result).toEqual({ releasedSlots: 2, deletedBookings: 0 });
        expect((await service.getStatus('executive')).bookedSlots).toEqual([]);
        expect(logger.logBusinessEvent).toHaveBeenCalledWith('inventory_reset', result);
    });
});
