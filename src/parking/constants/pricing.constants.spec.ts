import {
    buildSlotNames,
    isParkingCategory,
    PARKING_CATEGORIES,
    totalSlotCount,
} from './pricing.constants';

describe('pricing constants', () => {
    it('should size each category', () => {
        expect(totalSlotCount('vip')).toBe(10);
        expect(totalSlotCount('executive')).toBe(100);
        expect(totalSlotCount('normal')).toBe(11);
    });

    it('should build names in layout order', () => {
        expect(buildSlotNames('vip')).toEqual(['V1', 'V2', 'V3', 'V4', 'V5', 'V6', 'V7', 'V8', 'V9', 'V10']);

        const executive = buildSlotNames('executive');
        expect(executive).toHaveLength(100);
        expect(executive.slice(0, 3)).toEqual(['E0101', 'E0102', 'E0103']);
        expect(executive[19]).toBe('E0120');
        expect(executive[20]).toBe('E0201');
        expect(executive[99]).toBe('E0520');

        expect(buildSlotNames('normal')[10]).toBe('N11');
    });

    it('should keep names unique across categories', () => {
        const all = PARKING_CATEGORIES.flatMap((category) => buildSlotNames(category));
        expect(new Set(all).size).toBe(121);
    });

    it('should recognise category names', () => {
        expect(isParkingCategory('vip')).toBe(true);
        expect(isParkingCategory('VIP')).toBe(false);
        expect(isParkingCategory(undefined)).toBe(false);
    });
});
