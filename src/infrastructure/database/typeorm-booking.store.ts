import { Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager, In, LessThanOrEqual, MoreThan } from 'typeorm';
import { withRetry, TRANSACTION_RETRY_OPTIONS } from '@common/utils/retry.util';
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
import { executeInTransaction, TransactionOptions } from './transaction.util';

const BOOKING_TRANSACTION_OPTIONS: TransactionOptions = { isolationLevel: 'READ COMMITTED' };

class TypeOrmBookingStoreTransaction implements BookingStoreTransaction {
  constructor(protected readonly manager: EntityManager) {}

  findHoldById(holdId: string): Promise<SeatHold | null> {
    return this.manager.findOne(SeatHold, { where: { id: holdId } });
  }

  findHoldsForSeats(scheduleId: string, seatLabels: string[]): Promise<SeatHold[]> {
    if (seatLabels.length === 0) {
      return Promise.resolve([]);
    }
    return this.manager.find(SeatHold, {
      where: { scheduleId, seatLabel: In(seatLabels) },
    });
  }

  insertHolds(holds: NewSeatHold[]): Promise<SeatHold[]> {
    return this.manager.save(holds.map((hold) => this.manager.create(SeatHold, hold)));
  }

  async deleteHolds(holdIds: string[]): Promise<number> {
    if (holdIds.length === 0) {
      return 0;
    }
    const result = await this.manager.delete(SeatHold, { id: In(holdIds) });
    return result.affected ?? 0;
  }

  findBookingsClaimingSeats(scheduleId: string, seatLabels: string[]): Promise<Booking[]> {
    if (seatLabels.length === 0) {
      return Promise.resolve([]);
    }
    return this.manager
      .createQueryBuilder(Booking, 'booking')
      .innerJoin('booking.seats', 'claimed', 'claimed.seat_label IN (:...seatLabels)', {
        seatLabels,
      })
      .leftJoinAndSelect('booking.seats', 'seat')
      .where('booking.schedule_id = :scheduleId', { scheduleId })
      .andWhere('booking.status IN (:...statuses)', { statuses: [...CLAIMING_STATUSES] })
      .getMany();
  }

  findBookingByReference(reference: string): Promise<Booking | null> {
    return this.manager.findOne(Booking, {
      where: { bookingReference: reference },
      relations: { seats: true },
    });
  }

  insertBooking(booking: NewBooking): Promise<Booking> {
    const entity = this.manager.create(Booking, {
      ...booking,
      status: BookingStatus.PENDING,
      confirmedAt: null,
      cancelledAt: null,
      seats: booking.seats.map((seat) =>
        this.manager.create(BookedSeat, { ...seat, scheduleId: booking.scheduleId }),
      ),
    });
    return this.manager.save(entity);
  }

  async transitionBooking(
    bookingId: string,
    expected: BookingStatus,
    change: BookingStatusChange,
  ): Promise<Booking | null> {
    const result = await this.manager.update(
      Booking,
      { id: bookingId, status: expected },
      {
        status: change.status,
        ...(change.confirmedAt ? { confirmedAt: change.confirmedAt } : {}),
        ...(change.cancelledAt ? { cancelledAt: change.cancelledAt } : {}),
      },
    );

    if (!result.affected) {
      return null;
    }

    return this.manager.findOne(Booking, {
      where: { id: bookingId },
      relations: { seats: true },
    });
  }
}

/**
 * PostgreSQL-backed store. Transactions run at READ COMMITTED: seat exclusion
 * comes from the seat locks, the unique (schedule_id, seat_label) index on
 * seat_holds and the status compare-and-swap on bookings.
 */
@Injectable()
export class TypeOrmBookingStore extends TypeOrmBookingStoreTransaction implements BookingStore {
  private readonly logger = new Logger(TypeOrmBookingStore.name);

  constructor(private readonly dataSource: DataSource) {
    super(dataSource.manager);
  }

  transaction<T>(work: (tx: BookingStoreTransaction) => Promise<T>): Promise<T> {
    return withRetry(
      () =>
        executeInTransaction(
          this.dataSource,
          (manager) => work(new TypeOrmBookingStoreTransaction(manager)),
          BOOKING_TRANSACTION_OPTIONS,
        ),
      TRANSACTION_RETRY_OPTIONS,
      this.logger,
      'Booking transaction',
    );
  }

  findActiveHoldsByUser(userId: string, now: Date): Promise<SeatHold[]> {
    return this.manager.find(SeatHold, {
      where: { userId, expiresAt: MoreThan(now) },
      order: { expiresAt: 'ASC' },
    });
  }

  findBookingByIdempotencyKey(idempotencyKey: string): Promise<Booking | null> {
    return this.manager.findOne(Booking, {
      where: { idempotencyKey },
      relations: { seats: true },
    });
  }

  findBookingsByUser(userId: string): Promise<Booking[]> {
    return this.manager.find(Booking, {
      where: { userId },
      relations: { seats: true },
      order: { createdAt: 'DESC' },
    });
  }

  async findScheduleClaims(scheduleId: string): Promise<ScheduleClaims> {
    const [holds, bookings] = await Promise.all([
      this.manager.find(SeatHold, { where: { scheduleId } }),
      this.manager.find(Booking, {
        where: { scheduleId, status: In([...CLAIMING_STATUSES]) },
        relations: { seats: true },
      }),
    ]);
    return { holds, bookings };
  }

  findExpiredHolds(now: Date, limit: number): Promise<SeatHold[]> {
    return this.manager.find(SeatHold, {
      where: { expiresAt: LessThanOrEqual(now) },
      order: { expiresAt: 'ASC' },
      take: limit,
    });
  }

  findOverduePendingBookings(now: Date, limit: number): Promise<Booking[]> {
    return this.manager.find(Booking, {
      where: { status: BookingStatus.PENDING, expiresAt: LessThanOrEqual(now) },
      relations: { seats: true },
      order: { expiresAt: 'ASC' },
      take: limit,
    });
  }
}
