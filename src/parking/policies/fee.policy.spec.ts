import { FeePolicy } from './fee.policy';

const at = (hour: number, minute = 0) => new Date(2024, 5, 15, hour, minute, 0);

describe('FeePolicy', () => {
    describe('isNightTime', () => {
        it('should treat midnight up to 04:59 as night', () => {
            expect(FeePolicy.isNightTime(at(0, 0))).toBe(true);
            expect(FeePolicy.isNightTime(at(2, 30))).toBe(true);
            expect(FeePolicy.isNightTime(at(4, 59))).toBe(true);
        });

        it('should treat 05:00 onwards as day', () => {
            expect(FeePolicy.isNightTime(at(5, 0))).toBe(false);
            expect(FeePolicy.isNightTime(at(14, 0))).toBe(false);
            expect(FeePolicy.isNightTime(at(23, 59))).toBe(false);
        });
    });

    describe('forSlots', () => {
        it('should price two VIP slots during the day', () => {
            expect(FeePolicy.forSlots('vip', 2, at(14))).toEqual({
                baseAmount: 1000,
                platformFee: 18,
                nightSurcharge: 0,
                totalFees: 18,
                grandTotal: 1018,
                isNightTime: false,
            });
        });

        it('should add the night surcharge once per booking', () => {
            expect(FeePolicy.forSlots('executive', 3, at(4, 59))).toEqual({
                baseAmount: 1050,
                platformFee: 18,
                nightSurcharge: 12,
                totalFees: 30,
                grandTotal: 1080,
                isNightTime: true,
            });
        });

        it('should charge a single normal slot at 05:00 without surcharge', () => {
            const fees = FeePolicy.forSlots('normal', 1, at(5));
            expect(fees.grandTotal).toBe(338);
            expect(fees.nightSurcharge).toBe(0);
        });

        it('should keep grandTotal equal to base plus fees', () => {
            for (const hour of [0, 3, 5, 12, 23]) {
                const fees = FeePolicy.forSlots('executive', 7, at(hour));
                expect(fees.grandTotal).toBe(fees.baseAmount + fees.platformFee + fees.nightSurcharge);
                expect(fees.totalFees).toBe(fees.platformFee + fees.nightSurcharge);
            }
        });
    });

    describe('forAmount', () => {
        it('should apply fees to a raw amount', () => {
            expect(FeePolicy.forAmount(0, at(1))).toEqual({
                baseAmount: 0,
                platformFee: 18,
                nightSurcharge: 12,
                totalFees: 30,
                grandTotal: 30,
                isNightTime: true,
            });
        });
    });
});
