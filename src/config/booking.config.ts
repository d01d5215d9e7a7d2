import { registerAs } from '@nestjs/config';

export interface BookingConfig {
  holdTtlMinutes: number;
  sweepBatchLimit: number;
  seatLockTtlMs: number;
}

export const DEFAULT_BOOKING_CONFIG: BookingConfig = {
  holdTtlMinutes: 15,
  sweepBatchLimit: 50,
  seatLockTtlMs: 10000,
};

export const bookingConfig = registerAs(
  'booking',
  (): BookingConfig => ({
    holdTtlMinutes: parseInt(
      process.env.HOLD_TTL_MINUTES ?? String(DEFAULT_BOOKING_CONFIG.holdTtlMinutes),
      10,
    ),
    sweepBatchLimit: parseInt(
      process.env.SWEEP_BATCH_LIMIT ?? String(DEFAULT_BOOKING_CONFIG.sweepBatchLimit),
      10,
    ),
    seatLockTtlMs: parseInt(
      process.env.SEAT_LOCK_TTL_MS ?? String(DEFAULT_BOOKING_CONFIG.seatLockTtlMs),
      10,
    ),
  }),
);
