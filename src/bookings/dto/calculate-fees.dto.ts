import { IsIn, IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';
import { PARKING_CATEGORIES, ParkingCategory } from '../../parking/constants/pricing.constants';

/**
 * Either a raw `base_amount`, or a `type` with a `slotCount` to price.
 */
export class CalculateFeesDto {
    @IsOptional()
    @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
    @Min(0)
    base_amount?: number;

    @IsOptional()
    @IsIn(PARKING_CATEGORIES)
    type?: ParkingCategory;

    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(100)
    slotCount?: number;
}
