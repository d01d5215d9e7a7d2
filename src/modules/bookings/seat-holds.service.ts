import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingConfig, DEFAULT_BOOKING_CONFIG } from '@config/booking.config';
import { CLOCK, Clock, addMinutes } from '@infrastructure/clock/clock';
import { RedisLockService } from '@infrastructure/redis/redis-lock.service';
import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { SchedulesService } from '@modules/schedules/schedules.service';
import { isUniqueViolation } from '@common/utils/error.util';
import { compareSeatLabels, normalizeSeatLabel, sortSeatLabels } from '@common/utils/seat.util';
import { SeatHold } from './entities/seat-hold.entity';
import {
  InvalidSeatException,
  NotHolderException,
  SeatUnavailableException,
} from './booking.errors';
import {
  collectClaimedSeats,
  isHoldActive,
  normalizeRequestedSeats,
  seatLockResources,
} from './seat-claims';
import { ReclaimedClaims, publishReclaimed, reclaimStaleClaims } from './stale-claims';
import { BOOKING_STORE, BookingStore } from './store/booking.store';

interface ReserveOutcome {
  holds: SeatHold[];
  expiresAt: Date;
  reclaimed: ReclaimedClaims;
}

@Injectable()
export class SeatHoldsService {
  private readonly logger = new Logger(SeatHoldsService.name);
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
   * Places one hold per requested seat, all or nothing. Requested labels are
   * trimmed and upper-cased; the result is ordered by seat label.
   */
  async reserve(scheduleId: string, seatLabels: string[], userId: string): Promise<SeatHold[]> {
    const labels = normalizeRequestedSeats(seatLabels);

    const layout = await this.schedulesService.getSeatLayout(scheduleId);
    const unknown = labels.filter((label) => !layout.seatLabels.has(label));
    if (unknown.length > 0) {
      throw new InvalidSeatException(sortSeatLabels(unknown));
    }

    const { holds, expiresAt, reclaimed } = await this.redisLockService.withLocks(
      seatLockResources(scheduleId, labels),
      () => this.reserveWithinLocks(scheduleId, labels, userId),
      this.config.seatLockTtlMs,
    );

    this.logger.log(
      `Seats held on schedule ${scheduleId} for user ${userId}: ${labels.join(', ')}`,
    );

    await publishReclaimed(this.eventPublisher, reclaimed);
    await this.eventPublisher.publishSeatsHeld({
      scheduleId,
      userId,
      seatLabels: labels,
      expiresAt,
    });

    return holds;
  }

  async release(holdId: string, userId: string): Promise<SeatHold> {
    const hold = await this.store.findHoldById(holdId);
    this.assertActiveHolder(hold, userId, [], missingHoldMessage(holdId));
    return this.releaseUnderLock(hold.scheduleId, hold.seatLabel, userId, hold.id);
  }

  async releaseSeat(scheduleId: string, seatLabel: string, userId: string): Promise<SeatHold> {
    return this.releaseUnderLock(scheduleId, normalizeSeatLabel(seatLabel), userId);
  }

  async listHolds(userId: string): Promise<SeatHold[]> {
    const holds = await this.store.findActiveHoldsByUser(userId, this.clock.now());
    return holds.sort(
      (a, b) =>
        a.scheduleId.localeCompare(b.scheduleId) || compareSeatLabels(a.seatLabel, b.seatLabel),
    );
  }

  private reserveWithinLocks(
    scheduleId: string,
    labels: string[],
    userId: string,
  ): Promise<ReserveOutcome> {
    return this.store.transaction(async (tx) => {
      const now = this.clock.now();
      const existingHolds = await tx.findHoldsForSeats(scheduleId, labels);
      const bookings = await tx.findBookingsClaimingSeats(scheduleId, labels);

      const claimed = collectClaimedSeats(existingHolds, bookings, now);
      const conflicts = labels.filter(
        (label) => claimed.held.has(label) || claimed.booked.has(label),
      );
      if (conflicts.length > 0) {
        throw new SeatUnavailableException(conflicts);
      }

      const reclaimed = await reclaimStaleClaims(tx, existingHolds, bookings, now);
      const expiresAt = addMinutes(now, this.config.holdTtlMinutes);

      try {
        const holds = await tx.insertHolds(
          labels.map((seatLabel) => ({
            scheduleId,
            seatLabel,
            userId,
            createdAt: now,
            expiresAt,
          })),
        );
        holds.sort((a, b) => compareSeatLabels(a.seatLabel, b.seatLabel));
        return { holds, expiresAt, reclaimed };
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new SeatUnavailableException(labels);
        }
        throw error;
      }
    });
  }

  /** Re-reads the seat's hold under its lock; `expectedHoldId` pins the hold being released. */
  private async releaseUnderLock(
    scheduleId: string,
    seatLabel: string,
    userId: string,
    expectedHoldId?: string,
  ): Promise<SeatHold> {
    const released = await this.redisLockService.withLocks(
      seatLockResources(scheduleId, [seatLabel]),
      () =>
        this.store.transaction(async (tx) => {
          const [current] = await tx.findHoldsForSeats(scheduleId, [seatLabel]);
          const hold =
            current && (!expectedHoldId || current.id === expectedHoldId) ? current : null;
          this.assertActiveHolder(
            hold,
            userId,
            [seatLabel],
            expectedHoldId ? missingHoldMessage(expectedHoldId) : undefined,
          );
          await tx.deleteHolds([hold.id]);
          return hold;
        }),
      this.config.seatLockTtlMs,
    );

    this.logger.log(`Hold released on schedule ${scheduleId}: ${seatLabel}`);
    await this.eventPublisher.publishSeatsReleased(scheduleId, [seatLabel], 'released', userId);

    return released;
  }

  private assertActiveHolder(
    hold: SeatHold | null,
    userId: string,
    seatLabels: string[],
    message?: string,
  ): asserts hold is SeatHold {
    if (!hold || hold.userId !== userId || !isHoldActive(hold, this.clock.now())) {
      throw new NotHolderException(hold ? [hold.seatLabel] : seatLabels, message);
    }
  }
}

function missingHoldMessage(holdId: string): string {
  return `No active hold ${holdId} owned by the caller`;
}
