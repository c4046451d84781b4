export const PARKING_CATEGORIES = ['vip', 'executive', 'normal'] as const;

export type ParkingCategory = (typeof PARKING_CATEGORIES)[number];

/**
 * How a category's slot identifiers are laid out. Sequences are numbered
 * from 1 (`V1`, `V2`, ...); grids use two-digit row and column (`E0101`).
 */
export type SlotLayout =
  | { kind: 'sequence'; count: number }
  | { kind: 'grid'; rows: number; columns: number };

export interface CategoryDefinition {
  name: ParkingCategory;
  label: string;
  price: number;
  prefix: string;
  layout: SlotLayout;
}

export const CATEGORY_DEFINITIONS: Readonly<Record<ParkingCategory, CategoryDefinition>> = {
  vip: {
    name: 'vip',
    label: 'VIP',
    price: 500,
    prefix: 'V',
    layout: { kind: 'sequence', count: 10 },
  },
  executive: {
    name: 'executive',
    label: 'Executive',
    price: 350,
    prefix: 'E',
    layout: { kind: 'grid', rows: 5, columns: 20 },
  },
  normal: {
    name: 'normal',
    label: 'Normal',
    price: 320,
    prefix: 'N',
    layout: { kind: 'sequence', count: 11 },
  },
};

/** Charged once per booking, whatever the number of slots. */
export const PLATFORM_FEE = 18;

/** Charged once per booking made inside the night window. */
export const NIGHT_SURCHARGE = 12;

/** Local hours [startHour, endHour) */
export const NIGHT_WINDOW = { startHour: 0, endHour: 5 } as const;

export function isParkingCategory(value: unknown): value is ParkingCategory {
  return typeof value === 'string' && PARKING_CATEGORIES.some((category) => category === value);
}

export function totalSlotCount(category: ParkingCategory): number {
  const { layout } = CATEGORY_DEFINITIONS[category];
  return layout.kind === 'sequence' ? layout.count : layout.rows * layout.columns;
}

const twoDigits = (value: number): string => value.toString().padStart(2, '0');

/** Slot identifiers of a category in layout order. */
export function buildSlotNames(category: ParkingCategory): string[] {
  const { prefix, layout } = CATEGORY_DEFINITIONS[category];

  if (layout.kind === 'sequence') {
    return Array.from({ length: layout.count }, (_, index) => `${prefix}${index + 1}`);
  }

  const names: string[] = [];
  for (let row = 1; row <= layout.rows; row++) {
    for (let column = 1; column <= layout.columns; column++) {
      names.push(`${prefix}${twoDigits(row)}${twoDigits(column)}`);
    }
  }
  return names;
}
