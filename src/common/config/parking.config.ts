import { registerAs } from '@nestjs/config';

export const STORAGE_DRIVERS = ['memory', 'postgres'] as const;

export type StorageDriver = (typeof STORAGE_DRIVERS)[number];

export interface ParkingConfig {
  storageDriver: StorageDriver;
  bookingReferenceAttempts: number;
}

const DEFAULT_REFERENCE_ATTEMPTS = 5;

function parseStorageDriver(value: string | undefined): StorageDriver {
  const driver = value ?? 'memory';
  const match = STORAGE_DRIVERS.find((candidate) => candidate === driver);
  if (!match) {
    throw new Error(`STORAGE_DRIVER must be one of: ${STORAGE_DRIVERS.join(', ')}`);
  }
  return match;
}

export default registerAs('parking', (): ParkingConfig => {
  const attempts = Number(process.env.BOOKING_REFERENCE_ATTEMPTS ?? DEFAULT_REFERENCE_ATTEMPTS);

  if (!Number.isInteger(attempts) || attempts <= 0) {
    throw new Error('BOOKING_REFERENCE_ATTEMPTS must be a positive integer');
  }

  return {
    storageDriver: parseStorageDriver(process.env.STORAGE_DRIVER),
    bookingReferenceAttempts: attempts,
  };
});
