import { ConflictException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingConfig, DEFAULT_BOOKING_CONFIG } from '@config/booking.config';
import { CLOCK, Clock } from '@infrastructure/clock/clock';
import { RedisLockService } from '@infrastructure/redis/redis-lock.service';
import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { SchedulesService, SeatLayout } from '@modules/schedules/schedules.service';
import { isUniqueViolation } from '@common/utils/error.util';
import { sortSeatLabels } from '@common/utils/seat.util';
import { Booking } from './entities/booking.entity';
import { BookingStatus, assertTransition } from './booking-status';
import {
  AlreadyFinalizedException,
  BookingNotFoundException,
  HoldExpiredException,
  HoldNotOwnedException,
  InvalidSeatException,
  NotOwnerException,
} from './booking.errors';
import { generateBookingReference } from './booking-reference.util';
import {
  isHoldActive,
  isPendingOverdue,
  normalizeRequestedSeats,
  seatLockResources,
} from './seat-claims';
import { BOOKING_STORE, BookingStore, BookingStoreTransaction } from './store/booking.store';

export const MAX_REFERENCE_ATTEMPTS = 3;

export interface PromoteToBookingCommand {
  scheduleId: string;
  seatLabels: string[];
  userId: string;
  totalAmount?: number;
  idempotencyKey?: string;
}

type FinalizeOutcome =
  | { kind: 'finalized'; booking: Booking }
  | { kind: 'expired'; booking: Booking };

@Injectable()
export class BookingsService {
  private readonly logger = new Logger(BookingsService.name);
  private readonly config: BookingConfig;

  constructor(
    @Inject(BOOKING_STORE) private readonly store: BookingStore,
    private readonly schedulesService: SchedulesService,
    private readonly redisLockService: RedisLockService,
    private readonly eventPublisher: EventPublisher,
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.config = this.configService.get<BookingConfig>('booking') ?? DEFAULT_BOOKING_CONFIG;
  }

  /**
   * Turns the caller's active holds on `seatLabels` into one PENDING booking.
   *
   * The booking expires with the soonest of the consumed holds. A repeated
   * request with the same idempotency key returns the booking created first.
   */
  async promoteToBooking(command: PromoteToBookingCommand): Promise<Booking> {
    const { scheduleId, userId, idempotencyKey } = command;

    if (idempotencyKey) {
      const existing = await this.store.findBookingByIdempotencyKey(idempotencyKey);
      if (existing) {
        return this.replayIdempotent(existing, userId, idempotencyKey);
      }
    }

    const labels = normalizeRequestedSeats(command.seatLabels);
    const layout = await this.schedulesService.getSeatLayout(scheduleId);
    const unknown = labels.filter((label) => !layout.seatLabels.has(label));
    if (unknown.length > 0) {
      throw new InvalidSeatException(sortSeatLabels(unknown));
    }

    const totalAmount = command.totalAmount ?? this.defaultTotal(layout, labels.length);

    for (let attempt = 1; ; attempt++) {
      try {
        const booking = await this.redisLockService.withLocks(
          seatLockResources(scheduleId, labels),
          () =>
            this.store.transaction((tx) =>
              this.promoteWithinLocks(tx, layout, labels, userId, totalAmount, idempotencyKey),
            ),
          this.config.seatLockTtlMs,
        );

        this.logger.log(
          `Booking ${booking.bookingReference} created for user ${userId}: ${labels.join(', ')}`,
        );
        await this.eventPublisher.publishBookingCreated(booking);
        return booking;
      } catch (error) {
        if (!isUniqueViolation(error)) {
          throw error;
        }

        if (idempotencyKey) {
          const existing = await this.store.findBookingByIdempotencyKey(idempotencyKey);
          if (existing) {
            return this.replayIdempotent(existing, userId, idempotencyKey);
          }
        }

        if (attempt >= MAX_REFERENCE_ATTEMPTS) {
          throw error;
        }
        this.logger.warn(
          `Booking reference collision, retrying (${attempt}/${MAX_REFERENCE_ATTEMPTS})`,
        );
      }
    }
  }

  /**
   * PENDING → CONFIRMED. A booking past its deadline is expired instead and
   * reported as already finalized. With `userId`, only the owner may confirm.
   */
  async confirm(bookingReference: string, userId?: string): Promise<Booking> {
    const outcome = await this.store.transaction(async (tx) => {
      const booking = await this.loadBooking(tx, bookingReference, userId);
      const now = this.clock.now();

      if (isPendingOverdue(booking, now)) {
        return this.expireWithin(tx, booking);
      }

      assertTransition(booking, BookingStatus.CONFIRMED);
      const confirmed = await tx.transitionBooking(booking.id, BookingStatus.PENDING, {
        status: BookingStatus.CONFIRMED,
        confirmedAt: now,
      });

      return this.finalized(tx, booking, confirmed);
    });

    const booking = await this.settle(outcome);
    this.logger.log(`Booking confirmed: ${booking.bookingReference}`);
    await this.eventPublisher.publishBookingConfirmed(booking);
    return booking;
  }

  /** PENDING or CONFIRMED → CANCELLED by the owner; the seats become free again. */
  async cancel(bookingReference: string, userId: string): Promise<Booking> {
    const outcome = await this.store.transaction(async (tx) => {
      const booking = await this.loadBooking(tx, bookingReference, userId);
      const now = this.clock.now();

      if (isPendingOverdue(booking, now)) {
        return this.expireWithin(tx, booking);
      }

      assertTransition(booking, BookingStatus.CANCELLED);
      const cancelled = await tx.transitionBooking(booking.id, booking.status, {
        status: BookingStatus.CANCELLED,
        cancelledAt: now,
      });

      return this.finalized(tx, booking, cancelled);
    });

    const booking = await this.settle(outcome);
    this.logger.log(`Booking cancelled: ${booking.bookingReference}`);
    await this.eventPublisher.publishBookingCancelled(booking);
    await this.eventPublisher.publishSeatsReleased(
      booking.scheduleId,
      booking.seats.map((seat) => seat.seatLabel),
      'cancelled',
      booking.userId,
    );
    return booking;
  }

  async findByReference(bookingReference: string, userId: string): Promise<Booking> {
    const booking = await this.store.findBookingByReference(bookingReference);
    if (!booking) {
      throw new BookingNotFoundException(bookingReference);
    }
    if (booking.userId !== userId) {
      throw new NotOwnerException(bookingReference);
    }
    return booking;
  }

  async findForUser(userId: string): Promise<Booking[]> {
    return this.store.findBookingsByUser(userId);
  }

  private async promoteWithinLocks(
    tx: BookingStoreTransaction,
    layout: SeatLayout,
    labels: string[],
    userId: string,
    totalAmount: number,
    idempotencyKey: string | undefined,
  ): Promise<Booking> {
    const now = this.clock.now();
    const holds = await tx.findHoldsForSeats(layout.scheduleId, labels);
    const byLabel = new Map(holds.map((hold) => [hold.seatLabel, hold]));

    const notOwned: string[] = [];
    const expired: string[] = [];
    for (const label of labels) {
      const hold = byLabel.get(label);
      if (!hold || hold.userId !== userId) {
        notOwned.push(label);
      } else if (!isHoldActive(hold, now)) {
        expired.push(label);
      }
    }

    if (notOwned.length > 0) {
      throw new HoldNotOwnedException(notOwned);
    }
    if (expired.length > 0) {
      throw new HoldExpiredException(expired);
    }

    const expiresAt = new Date(Math.min(...holds.map((hold) => hold.expiresAt.getTime())));
    const seatsByLabel = new Map(layout.seats.map((seat) => [seat.seatLabel, seat]));

    await tx.deleteHolds(holds.map((hold) => hold.id));

    return tx.insertBooking({
      bookingReference: generateBookingReference(),
      userId,
      scheduleId: layout.scheduleId,
      totalAmount,
      idempotencyKey: idempotencyKey ?? null,
      createdAt: now,
      expiresAt,
      seats: labels.map((seatLabel) => {
        const seat = seatsByLabel.get(seatLabel);
        return {
          seatLabel,
          row: seat?.row ?? '',
          seatNumber: seat?.seatNumber ?? '',
        };
      }),
    });
  }

  private async loadBooking(
    tx: BookingStoreTransaction,
    bookingReference: string,
    userId: string | undefined,
  ): Promise<Booking> {
    const booking = await tx.findBookingByReference(bookingReference);
    if (!booking) {
      throw new BookingNotFoundException(bookingReference);
    }
    if (userId !== undefined && booking.userId !== userId) {
      throw new NotOwnerException(bookingReference);
    }
    return booking;
  }

  private async expireWithin(
    tx: BookingStoreTransaction,
    booking: Booking,
  ): Promise<FinalizeOutcome> {
    const expired = await tx.transitionBooking(booking.id, BookingStatus.PENDING, {
      status: BookingStatus.EXPIRED,
    });
    if (!expired) {
      return this.lostRace(tx, booking);
    }
    return { kind: 'expired', booking: expired };
  }

  private async finalized(
    tx: BookingStoreTransaction,
    booking: Booking,
    updated: Booking | null,
  ): Promise<FinalizeOutcome> {
    if (!updated) {
      return this.lostRace(tx, booking);
    }
    return { kind: 'finalized', booking: updated };
  }

  /** Another writer moved the booking first; report the status it now has. */
  private async lostRace(tx: BookingStoreTransaction, booking: Booking): Promise<never> {
    const current = await tx.findBookingByReference(booking.bookingReference);
    throw new AlreadyFinalizedException(
      booking.bookingReference,
      current?.status ?? booking.status,
    );
  }

  /** Publishes the implicit expiry, then fails; otherwise hands back the finalized booking. */
  private async settle(outcome: FinalizeOutcome): Promise<Booking> {
    if (outcome.kind === 'finalized') {
      return outcome.booking;
    }

    const { booking } = outcome;
    this.logger.log(`Booking expired before it could be finalized: ${booking.bookingReference}`);
    await this.eventPublisher.publishBookingExpired(booking);
    await this.eventPublisher.publishSeatsReleased(
      booking.scheduleId,
      booking.seats.map((seat) => seat.seatLabel),
      'expired',
      booking.userId,
    );
    throw new AlreadyFinalizedException(booking.bookingReference, BookingStatus.EXPIRED);
  }

  private replayIdempotent(existing: Booking, userId: string, idempotencyKey: string): Booking {
    if (existing.userId !== userId) {
      throw new ConflictException(`Idempotency key ${idempotencyKey} was used by another user`);
    }
    this.logger.log(`Returning existing booking for idempotency key: ${idempotencyKey}`);
    return existing;
  }

  private defaultTotal(layout: SeatLayout, seatCount: number): number {
    return Math.round(layout.ticketPrice * seatCount * 100) / 100;
  }
}
