import { BookingStatus } from '../booking-status';
import { Booking } from '../entities/booking.entity';
import { SeatHold } from '../entities/seat-hold.entity';

export const BOOKING_STORE = Symbol('BOOKING_STORE');

export interface NewSeatHold {
  scheduleId: string;
  seatLabel: string;
  userId: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface NewBookedSeat {
  seatLabel: string;
  row: string;
  seatNumber: string;
}

export interface NewBooking {
  bookingReference: string;
  userId: string;
  scheduleId: string;
  totalAmount: number;
  idempotencyKey: string | null;
  createdAt: Date;
  expiresAt: Date;
  seats: NewBookedSeat[];
}

export interface BookingStatusChange {
  status: BookingStatus;
  confirmedAt?: Date;
  cancelledAt?: Date;
}

export interface ScheduleClaims {
  holds: SeatHold[];
  bookings: Booking[];
}

/**
 * Reads and conditional writes over seat holds and bookings. Every method on a
 * transaction runs inside the same unit of work; bookings are returned with
 * their seats loaded.
 */
export interface BookingStoreTransaction {
  findHoldById(holdId: string): Promise<SeatHold | null>;
  findHoldsForSeats(scheduleId: string, seatLabels: string[]): Promise<SeatHold[]>;

  /** Create-if-absent: fails with a unique violation when a seat already has a hold row. */
  insertHolds(holds: NewSeatHold[]): Promise<SeatHold[]>;
  deleteHolds(holdIds: string[]): Promise<number>;

  /** Pending and confirmed bookings holding any of the seats, regardless of deadline. */
  findBookingsClaimingSeats(scheduleId: string, seatLabels: string[]): Promise<Booking[]>;
  findBookingByReference(reference: string): Promise<Booking | null>;
  insertBooking(booking: NewBooking): Promise<Booking>;

  /**
   * Compare-and-swap on status: applies `change` only while the booking is still
   * in `expected`, returning the updated booking, or null when it was not.
   */
  transitionBooking(
    bookingId: string,
    expected: BookingStatus,
    change: BookingStatusChange,
  ): Promise<Booking | null>;
}

export interface BookingStore extends BookingStoreTransaction {
  transaction<T>(work: (tx: BookingStoreTransaction) => Promise<T>): Promise<T>;

  findActiveHoldsByUser(userId: string, now: Date): Promise<SeatHold[]>;
  findBookingByIdempotencyKey(idempotencyKey: string): Promise<Booking | null>;
  findBookingsByUser(userId: string): Promise<Booking[]>;
  findScheduleClaims(scheduleId: string): Promise<ScheduleClaims>;

  findExpiredHolds(now: Date, limit: number): Promise<SeatHold[]>;
  findOverduePendingBookings(now: Date, limit: number): Promise<Booking[]>;
}
