import { Throttle } from '@nestjs/throttler';

// Per-endpoint overrides of the global "default" throttler
export const ThrottleConfig = {
  // Login and registration
  AUTH: { default: { ttl: 60000, limit: 10 } }, // 10 requests per minute

  // Booking submissions
  BOOKING: { default: { ttl: 60000, limit: 30 } }, // 30 requests per minute

  ADMIN: { default: { ttl: 60000, limit: 50 } }, // 50 requests per minute
};

export const ThrottleAuth = () => Throttle(ThrottleConfig.AUTH);
export const ThrottleBooking = () => Throttle(ThrottleConfig.BOOKING);
export const ThrottleAdmin = () => Throttle(ThrottleConfig.ADMIN);
