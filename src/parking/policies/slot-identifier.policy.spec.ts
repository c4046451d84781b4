import { SlotIdentifierPolicy } from './slot-identifier.policy';

describe('SlotIdentifierPolicy', () => {
    it('should accept well-formed identifiers whether or not the slot exists', () => {
        expect(SlotIdentifierPolicy.findMalformed('vip', ['V1', 'V10', 'V99'])).toEqual([]);
        expect(SlotIdentifierPolicy.findMalformed('executive', ['E0101', 'E0520', 'E0999'])).toEqual([]);
        expect(SlotIdentifierPolicy.findMalformed('normal', ['N1', 'N11'])).toEqual([]);
    });

    it('should reject identifiers of another category or shape', () => {
        expect(SlotIdentifierPolicy.findMalformed('vip', ['N1', 'V0', 'v1', 'V1 ', 'E0101'])).toEqual([
            'N1',
            'V0',
            'v1',
            'V1 ',
            'E0101',
        ]);
        expect(SlotIdentifierPolicy.findMalformed('executive', ['E101', 'E01010', 'E1'])).toEqual([
            'E101',
            'E01010',
            'E1',
        ]);
    });

    it('should report each duplicate once', () => {
        expect(SlotIdentifierPolicy.findDuplicates(['V1', 'V2', 'V1', 'V1', 'V3', 'V2'])).toEqual(['V1', 'V2']);
        expect(SlotIdentifierPolicy.findDuplicates(['V1', 'V2'])).toEqual([]);
    });
});
