import {
    ArrayMaxSize,
    ArrayNotEmpty,
    ArrayUnique,
    IsArray,
    IsIn,
    IsString,
} from 'class-validator';
import { PARKING_CATEGORIES, ParkingCategory } from '../../parking/constants/pricing.constants';

/** Largest category holds 100 slots; no single booking can exceed that. */
const MAX_SLOTS_PER_BOOKING = 100;

export class BookSlotsDto {
    @IsIn(PARKING_CATEGORIES, { message: `type must be one of: ${PARKING_CATEGORIES.join(', ')}` })
    type!: ParkingCategory;

    @IsArray()
    @ArrayNotEmpty({ message: 'slots must contain at least one slot' })
    @ArrayMaxSize(MAX_SLOTS_PER_BOOKING)
    @ArrayUnique({ message: 'slots must not contain duplicates' })
    @IsString({ each: true })
    slots!: string[];
}
