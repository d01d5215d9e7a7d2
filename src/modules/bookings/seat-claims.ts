import {
  SeatAvailability,
  findDuplicateSeatLabels,
  normalizeSeatLabel,
  sortSeatLabels,
} from '@common/utils/seat.util';
import { BookingStatus } from './booking-status';
import { InvalidSeatException } from './booking.errors';

interface HoldClaim {
  seatLabel: string;
  expiresAt: Date;
}

interface BookingClaim {
  status: BookingStatus;
  expiresAt: Date;
  seats: Array<{ seatLabel: string }>;
}

export interface ClaimedSeats {
  held: ReadonlySet<string>;
  booked: ReadonlySet<string>;
}

export function isHoldActive(hold: { expiresAt: Date }, now: Date): boolean {
  return hold.expiresAt.getTime() > now.getTime();
}

/** A pending booking stops claiming its seats once its deadline passes, swept or not. */
export function isBookingClaiming(
  booking: { status: BookingStatus; expiresAt: Date },
  now: Date,
): boolean {
  switch (booking.status) {
    case BookingStatus.CONFIRMED:
      return true;
    case BookingStatus.PENDING:
      return booking.expiresAt.getTime() > now.getTime();
    default:
      return false;
  }
}

export function isPendingOverdue(
  booking: { status: BookingStatus; expiresAt: Date },
  now: Date,
): boolean {
  return booking.status === BookingStatus.PENDING && !isBookingClaiming(booking, now);
}

export function seatLockResource(scheduleId: string, seatLabel: string): string {
  return `schedule:${scheduleId}:seat:${seatLabel}`;
}

export function seatLockResources(scheduleId: string, seatLabels: Iterable<string>): string[] {
  return [...new Set(seatLabels)].map((label) => seatLockResource(scheduleId, label)).sort();
}

export function collectClaimedSeats(
  holds: HoldClaim[],
  bookings: BookingClaim[],
  now: Date,
): ClaimedSeats {
  const held = new Set<string>();
  const booked = new Set<string>();

  for (const hold of holds) {
    if (isHoldActive(hold, now)) {
      held.add(hold.seatLabel);
    }
  }

  for (const booking of bookings) {
    if (isBookingClaiming(booking, now)) {
      booking.seats.forEach((seat) => booked.add(seat.seatLabel));
    }
  }

  return { held, booked };
}

export function seatAvailability(seatLabel: string, claimed: ClaimedSeats): SeatAvailability {
  if (claimed.booked.has(seatLabel)) {
    return SeatAvailability.BOOKED;
  }
  return claimed.held.has(seatLabel) ? SeatAvailability.HELD : SeatAvailability.AVAILABLE;
}

/** Normalizes and orders a requested seat set; empty or repeated requests are invalid. */
export function normalizeRequestedSeats(seatLabels: string[]): string[] {
  if (seatLabels.length === 0) {
    throw new InvalidSeatException([], 'At least one seat must be requested');
  }

  const duplicates = findDuplicateSeatLabels(seatLabels);
  if (duplicates.length > 0) {
    throw new InvalidSeatException(
      duplicates,
      `Seats requested more than once: ${duplicates.join(', ')}`,
    );
  }

  return sortSeatLabels(seatLabels.map(normalizeSeatLabel));
}
