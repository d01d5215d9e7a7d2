import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { BookingStatus } from './booking-status';
import { Booking } from './entities/booking.entity';
import { SeatHold } from './entities/seat-hold.entity';
import { isHoldActive, isPendingOverdue } from './seat-claims';
import { BookingStoreTransaction } from './store/booking.store';

export interface ReclaimedClaims {
  holds: SeatHold[];
  bookings: Booking[];
}

/**
 * Deletes the expired holds and expires the overdue pending bookings among the
 * given records. Must run under the locks of every seat involved.
 */
export async function reclaimStaleClaims(
  tx: BookingStoreTransaction,
  holds: SeatHold[],
  bookings: Booking[],
  now: Date,
): Promise<ReclaimedClaims> {
  const staleHolds = holds.filter((hold) => !isHoldActive(hold, now));
  if (staleHolds.length > 0) {
    await tx.deleteHolds(staleHolds.map((hold) => hold.id));
  }

  const expired: Booking[] = [];
  for (const booking of bookings.filter((candidate) => isPendingOverdue(candidate, now))) {
    const updated = await tx.transitionBooking(booking.id, BookingStatus.PENDING, {
      status: BookingStatus.EXPIRED,
    });
    if (updated) {
      expired.push(updated);
    }
  }

  return { holds: staleHolds, bookings: expired };
}

export async function publishReclaimed(
  publisher: EventPublisher,
  reclaimed: ReclaimedClaims,
): Promise<void> {
  const releasedBySchedule = new Map<string, string[]>();
  for (const hold of reclaimed.holds) {
    const labels = releasedBySchedule.get(hold.scheduleId) ?? [];
    labels.push(hold.seatLabel);
    releasedBySchedule.set(hold.scheduleId, labels);
  }

  for (const [scheduleId, seatLabels] of releasedBySchedule) {
    await publisher.publishSeatsReleased(scheduleId, seatLabels, 'expired');
  }

  for (const booking of reclaimed.bookings) {
    await publisher.publishBookingExpired(booking);
    await publisher.publishSeatsReleased(
      booking.scheduleId,
      booking.seats.map((seat) => seat.seatLabel),
      'expired',
      booking.userId,
    );
  }
}
