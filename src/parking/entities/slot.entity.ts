import type { ParkingCategory } from '../constants/pricing.constants';

export type SlotEntity = {
  name: string;
  category: ParkingCategory;
  price: number;
  /** Index within the category's layout, starting at 0. */
  position: number;
  isBooked: boolean;
};
