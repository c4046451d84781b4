import { CATEGORY_DEFINITIONS, ParkingCategory } from '../constants/pricing.constants';

export class SlotIdentifierPolicy {
    /**
     * Shape of an identifier in the category; says nothing about whether
     * the slot exists (`V99` is well-formed).
     */
    static patternFor(category: ParkingCategory): RegExp {
        const { prefix, layout } = CATEGORY_DEFINITIONS[category];
        return layout.kind === 'sequence'
            ? new RegExp(`^${prefix}[1-9]\\d*$`)
            : new RegExp(`^${prefix}\\d{4}$`);
    }

    static findMalformed(category: ParkingCategory, slotIds: readonly string[]): string[] {
        const pattern = SlotIdentifierPolicy.patternFor(category);
        return slotIds.filter((id) => !pattern.test(id));
    }

    static findDuplicates(slotIds: readonly string[]): string[] {
        const seen = new Set<string>();
        const duplicates = new Set<string>();
        for (const id of slotIds) {
            if (seen.has(id)) {
                duplicates.add(id);
            }
            seen.add(id);
        }
        return [...duplicates];
    }
}
