import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { BookingsService } from './bookings.service';
import { BookSlotsDto } from './dto/book-slots.dto';
import { CalculateFeesDto } from './dto/calculate-fees.dto';
import {
  BookingResponse,
  BookSlotsResponse,
  FeeBreakdownResponse,
  toBookingResponse,
  toFeeBreakdownResponse,
} from './dto/booking-response.dto';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import type { AuthenticatedUser } from '../common/interfaces/jwt-payload.interface';
import { ThrottleBooking } from '../common/decorators/throttle.decorator';

@Controller('api')
export class BookingsController {
  constructor(private readonly bookingsService: BookingsService) { }

  @Post('book-slots')
  @ThrottleBooking()
  @HttpCode(HttpStatus.CREATED)
  async bookSlots(
    @Body() dto: BookSlotsDto,
    @CurrentUser() user: AuthenticatedUser,
  ): Promise<BookSlotsResponse> {
    const result = await this.bookingsService.bookSlots(user.id, dto.type, dto.slots);

    return {
      success: true,
      message: `Successfully booked ${result.bookedSlots.length} slots`,
      pricing: toFeeBreakdownResponse(result.fees),
      booked_slots: result.bookedSlots,
      booking_reference: result.bookingReference,
    };
  }

  @Get('my-bookings')
  async myBookings(@CurrentUser() user: AuthenticatedUser): Promise<BookingResponse[]> {
    const bookings = await this.bookingsService.getUserBookings(user.id);
    return bookings.map(toBookingResponse);
  }

  @Get('booking/:reference')
  async getBooking(
    @Param('reference') reference: string,
    @CurrentUser() user: AuthenticatedUser,
  ): Promise<BookingResponse> {
    return toBookingResponse(await this.bookingsService.getBookingByReference(reference, user));
  }

  @Post('calculate-fees')
  @HttpCode(HttpStatus.OK)
  calculateFees(@Body() dto: CalculateFeesDto): FeeBreakdownResponse {
    return toFeeBreakdownResponse(this.bookingsService.calculateFees({
      baseAmount: dto.base_amount,
      category: dto.type,
      slotCount: dto.slotCount,
    }));
  }
}
