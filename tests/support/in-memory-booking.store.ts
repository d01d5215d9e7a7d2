import { randomUUID } from 'crypto';
import { BookingStatus, CLAIMING_STATUSES } from '@modules/bookings/booking-status';
import { Booking } from '@modules/bookings/entities/booking.entity';
import { BookedSeat } from '@modules/bookings/entities/booked-seat.entity';
import { SeatHold } from '@modules/bookings/entities/seat-hold.entity';
import {
  BookingStatusChange,
  BookingStore,
  BookingStoreTransaction,
  NewBooking,
  NewSeatHold,
  ScheduleClaims,
} from '@modules/bookings/store/booking.store';

export class UniqueViolationError extends Error {
  readonly code = '23505';

  constructor(constraint: string) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
  }
}

function copyHold(hold: SeatHold): SeatHold {
  return Object.assign(new SeatHold(), hold);
}

function copyBooking(booking: Booking): Booking {
  return Object.assign(new Booking(), booking, {
    seats: booking.seats.map((seat) => Object.assign(new BookedSeat(), seat)),
  });
}

/**
 * BookingStore over two maps. Enforces the same unique keys as the schema and
 * rolls a transaction's writes back when its work throws.
 */
export class InMemoryBookingStore implements BookingStore {
  private holds = new Map<string, SeatHold>();
  private bookings = new Map<string, Booking>();
  transactionCount = 0;

  async transaction<T>(work: (tx: BookingStoreTransaction) => Promise<T>): Promise<T> {
    this.transactionCount++;
    const holds = new Map(this.holds);
    const bookings = new Map(this.bookings);

    try {
      return await work(this);
    } catch (error) {
      this.holds = holds;
      this.bookings = bookings;
      throw error;
    }
  }

  allHolds(): SeatHold[] {
    return [...this.holds.values()].map(copyHold);
  }

  allBookings(): Booking[] {
    return [...this.bookings.values()].map(copyBooking);
  }

  seedHold(hold: NewSeatHold): SeatHold {
    const stored = Object.assign(new SeatHold(), { id: randomUUID(), ...hold });
    this.holds.set(stored.id, stored);
    return copyHold(stored);
  }

  async findHoldById(holdId: string): Promise<SeatHold | null> {
    const hold = this.holds.get(holdId);
    return hold ? copyHold(hold) : null;
  }

  async findHoldsForSeats(scheduleId: string, seatLabels: string[]): Promise<SeatHold[]> {
    return this.allHolds().filter(
      (hold) => hold.scheduleId === scheduleId && seatLabels.includes(hold.seatLabel),
    );
  }

  async insertHolds(holds: NewSeatHold[]): Promise<SeatHold[]> {
    const taken = new Set(
      [...this.holds.values()].map((hold) => `${hold.scheduleId}:${hold.seatLabel}`),
    );
    for (const hold of holds) {
      const key = `${hold.scheduleId}:${hold.seatLabel}`;
      if (taken.has(key)) {
        throw new UniqueViolationError('UQ_seat_holds_schedule_seat_label');
      }
      taken.add(key);
    }

    return holds.map((hold) => this.seedHold(hold));
  }

  async deleteHolds(holdIds: string[]): Promise<number> {
    return holdIds.filter((id) => this.holds.delete(id)).length;
  }

  async findBookingsClaimingSeats(scheduleId: string, seatLabels: string[]): Promise<Booking[]> {
    return this.allBookings().filter(
      (booking) =>
        booking.scheduleId === scheduleId &&
        CLAIMING_STATUSES.includes(booking.status) &&
        booking.seats.some((seat) => seatLabels.includes(seat.seatLabel)),
    );
  }

  async findBookingByReference(reference: string): Promise<Booking | null> {
    const booking = this.allBookings().find((item) => item.bookingReference === reference);
    return booking ?? null;
  }

  async insertBooking(booking: NewBooking): Promise<Booking> {
    for (const existing of this.bookings.values()) {
      if (existing.bookingReference === booking.bookingReference) {
        throw new UniqueViolationError('UQ_bookings_reference');
      }
      if (booking.idempotencyKey && existing.idempotencyKey === booking.idempotencyKey) {
        throw new UniqueViolationError('UQ_bookings_idempotency_key');
      }
    }

    const id = randomUUID();
    const stored = Object.assign(new Booking(), {
      ...booking,
      id,
      status: BookingStatus.PENDING,
      confirmedAt: null,
      cancelledAt: null,
      updatedAt: booking.createdAt,
      seats: booking.seats.map((seat) =>
        Object.assign(new BookedSeat(), {
          ...seat,
          id: randomUUID(),
          bookingId: id,
          scheduleId: booking.scheduleId,
        }),
      ),
    });
    this.bookings.set(id, stored);
    return copyBooking(stored);
  }

  async transitionBooking(
    bookingId: string,
    expected: BookingStatus,
    change: BookingStatusChange,
  ): Promise<Booking | null> {
    const current = this.bookings.get(bookingId);
    if (!current || current.status !== expected) {
      return null;
    }

    const updated = Object.assign(copyBooking(current), {
      status: change.status,
      confirmedAt: change.confirmedAt ?? current.confirmedAt,
      cancelledAt: change.cancelledAt ?? current.cancelledAt,
    });
    this.bookings.set(bookingId, updated);
    return copyBooking(updated);
  }

  async findActiveHoldsByUser(userId: string, now: Date): Promise<SeatHold[]> {
    return this.allHolds().filter(
      (hold) => hold.userId === userId && hold.expiresAt.getTime() > now.getTime(),
    );
  }

  async findBookingByIdempotencyKey(idempotencyKey: string): Promise<Booking | null> {
    const booking = this.allBookings().find((item) => item.idempotencyKey === idempotencyKey);
    return booking ?? null;
  }

  async findBookingsByUser(userId: string): Promise<Booking[]> {
    return this.allBookings()
      .filter((booking) => booking.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async findScheduleClaims(scheduleId: string): Promise<ScheduleClaims> {
    return {
      holds: this.allHolds().filter((hold) => hold.scheduleId === scheduleId),
      bookings: this.allBookings().filter(
        (booking) =>
          booking.scheduleId === scheduleId && CLAIMING_STATUSES.includes(booking.status),
      ),
    };
  }

  async findExpiredHolds(now: Date, limit: number): Promise<SeatHold[]> {
    return this.allHolds()
      .filter((hold) => hold.expiresAt.getTime() <= now.getTime())
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
      .slice(0, limit);
  }

  async findOverduePendingBookings(now: Date, limit: number): Promise<Booking[]> {
    return this.allBookings()
      .filter(
        (booking) =>
          booking.status === BookingStatus.PENDING &&
          booking.expiresAt.getTime() <= now.getTime(),
      )
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
      .slice(0, limit);
  }
}
