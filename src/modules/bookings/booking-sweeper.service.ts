import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingConfig, DEFAULT_BOOKING_CONFIG } from '@config/booking.config';
import { RedisLockService } from '@infrastructure/redis/redis-lock.service';
import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { getErrorMessageString } from '@common/utils/error.util';
import { Booking } from './entities/booking.entity';
import { SeatHold } from './entities/seat-hold.entity';
import { BookingStatus } from './booking-status';
import { isHoldActive, isPendingOverdue, seatLockResources } from './seat-claims';
import { publishReclaimed } from './stale-claims';
import { BOOKING_STORE, BookingStore } from './store/booking.store';

export interface SweepResult {
  reclaimedHolds: number;
  expiredBookings: number;
  failed: number;
  total: number;
}

/**
 * Reclaims expired holds and overdue pending bookings.
 *
 * Every record is re-checked and committed on its own, under the locks of its
 * seats, so a sweep never frees a seat a promotion is still validating and an
 * interrupted sweep can simply run again.
 */
@Injectable()
export class BookingSweeperService {
  private readonly logger = new Logger(BookingSweeperService.name);
  private readonly config: BookingConfig;

  constructor(
    @Inject(BOOKING_STORE) private readonly store: BookingStore,
    private readonly redisLockService: RedisLockService,
    private readonly eventPublisher: EventPublisher,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.get<BookingConfig>('booking') ?? DEFAULT_BOOKING_CONFIG;
  }

  /**
   * Reclaims everything past its deadline at `now`, reading at most
   * `sweepBatchLimit` records per query. A record that fails is counted once
   * and left for the next sweep.
   */
  async sweepExpired(now: Date): Promise<SweepResult> {
    const holds = await this.drain(
      (limit) => this.store.findExpiredHolds(now, limit),
      (hold) => this.reclaimHold(hold, now),
      (hold) => `hold ${hold.id} (${hold.seatLabel})`,
    );
    const bookings = await this.drain(
      (limit) => this.store.findOverduePendingBookings(now, limit),
      (booking) => this.expireBooking(booking, now),
      (booking) => `booking ${booking.bookingReference}`,
    );

    const failed = holds.failed + bookings.failed;
    const result: SweepResult = {
      reclaimedHolds: holds.done,
      expiredBookings: bookings.done,
      failed,
      total: holds.done + bookings.done,
    };

    if (result.total > 0 || failed > 0) {
      this.logger.log(
        `Sweep at ${now.toISOString()}: ${result.reclaimedHolds} holds reclaimed, ${result.expiredBookings} bookings expired, ${failed} failed`,
      );
    }

    return result;
  }

  /** Reads batches until one comes back short or holds nothing not already tried. */
  private async drain<T extends { id: string }>(
    fetchBatch: (limit: number) => Promise<T[]>,
    settle: (record: T) => Promise<boolean>,
    describe: (record: T) => string,
  ): Promise<{ done: number; failed: number }> {
    const limit = this.config.sweepBatchLimit;
    const attempted = new Set<string>();
    let done = 0;
    let failed = 0;

    for (;;) {
      const batch = await fetchBatch(limit);
      const fresh = batch.filter((record) => !attempted.has(record.id));
      if (fresh.length === 0) {
        break;
      }

      for (const record of fresh) {
        attempted.add(record.id);
        try {
          if (await settle(record)) {
            done++;
          }
        } catch (error) {
          failed++;
          this.logger.error(`Failed to settle ${describe(record)}: ${getErrorMessageString(error)}`);
        }
      }

      if (batch.length < limit) {
        break;
      }
    }

    return { done, failed };
  }

  private async reclaimHold(hold: SeatHold, now: Date): Promise<boolean> {
    const reclaimed = await this.redisLockService.withLocks(
      seatLockResources(hold.scheduleId, [hold.seatLabel]),
      () =>
        this.store.transaction(async (tx) => {
          const current = await tx.findHoldById(hold.id);
          if (!current || isHoldActive(current, now)) {
            return null;
          }
          await tx.deleteHolds([current.id]);
          return current;
        }),
      this.config.seatLockTtlMs,
    );

    if (!reclaimed) {
      return false;
    }

    await publishReclaimed(this.eventPublisher, { holds: [reclaimed], bookings: [] });
    return true;
  }

  private async expireBooking(booking: Booking, now: Date): Promise<boolean> {
    const expired = await this.redisLockService.withLocks(
      seatLockResources(
        booking.scheduleId,
        booking.seats.map((seat) => seat.seatLabel),
      ),
      () =>
        this.store.transaction(async (tx) => {
          const current = await tx.findBookingByReference(booking.bookingReference);
          if (!current || !isPendingOverdue(current, now)) {
            return null;
          }
          return tx.transitionBooking(current.id, BookingStatus.PENDING, {
            status: BookingStatus.EXPIRED,
          });
        }),
      this.config.seatLockTtlMs,
    );

    if (!expired) {
      return false;
    }

    await publishReclaimed(this.eventPublisher, { holds: [], bookings: [expired] });
    return true;
  }
}
