import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { AdminService, BookingStats } from './admin.service';
import { Roles } from '../common/decorators/roles.decorator';
import { ThrottleAdmin } from '../common/decorators/throttle.decorator';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import type { AuthenticatedUser } from '../common/interfaces/jwt-payload.interface';

@Controller('api')
@Roles('admin', 'staff')
@ThrottleAdmin()
export class AdminController {
  constructor(private readonly adminService: AdminService) { }

  @Post('reset-bookings')
  @HttpCode(HttpStatus.OK)
  async resetBookings(@CurrentUser() user: AuthenticatedUser): Promise<{ success: true; message: string }> {
    await this.adminService.resetAll(user.id);
    return { success: true, message: 'All bookings have been reset' };
  }

  @Get('booking-stats')
  async bookingStats(): Promise<BookingStats> {
    return this.adminService.getStats();
  }
}
