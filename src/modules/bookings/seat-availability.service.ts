import { Inject, Injectable } from '@nestjs/common';
import { CLOCK, Clock } from '@infrastructure/clock/clock';
import { SchedulesService } from '@modules/schedules/schedules.service';
import {
  SeatAvailability,
  countSeatsByAvailability,
  normalizeSeatLabel,
} from '@common/utils/seat.util';
import { InvalidSeatException } from './booking.errors';
import { collectClaimedSeats, seatAvailability } from './seat-claims';
import { BOOKING_STORE, BookingStore } from './store/booking.store';

export interface SeatStatusView {
  seatLabel: string;
  row: string;
  seatNumber: string;
  status: SeatAvailability;
}

export interface ScheduleAvailability {
  scheduleId: string;
  asOf: Date;
  capacity: number;
  availableSeats: number;
  heldSeats: number;
  bookedSeats: number;
  seats: SeatStatusView[];
}

/**
 * Derived view of which seats are free. A seat is available at `at` when no
 * hold on it outlives `at` and no pending (still within its deadline) or
 * confirmed booking contains it. Reads take no locks.
 */
@Injectable()
export class SeatAvailabilityService {
  constructor(
    @Inject(BOOKING_STORE) private readonly store: BookingStore,
    private readonly schedulesService: SchedulesService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async getAvailability(
    scheduleId: string,
    at: Date = this.clock.now(),
  ): Promise<ScheduleAvailability> {
    const layout = await this.schedulesService.getSeatLayout(scheduleId);
    const { holds, bookings } = await this.store.findScheduleClaims(scheduleId);
    const claimed = collectClaimedSeats(holds, bookings, at);

    const seats = layout.seats.map((seat) => ({
      seatLabel: seat.seatLabel,
      row: seat.row,
      seatNumber: seat.seatNumber,
      status: seatAvailability(seat.seatLabel, claimed),
    }));
    const counts = countSeatsByAvailability(seats);

    return {
      scheduleId,
      asOf: at,
      capacity: layout.capacity,
      availableSeats: counts.available,
      heldSeats: counts.held,
      bookedSeats: counts.booked,
      seats,
    };
  }

  async isSeatAvailable(
    scheduleId: string,
    seatLabel: string,
    at: Date = this.clock.now(),
  ): Promise<boolean> {
    const label = normalizeSeatLabel(seatLabel);
    const layout = await this.schedulesService.getSeatLayout(scheduleId);
    if (!layout.seatLabels.has(label)) {
      throw new InvalidSeatException([label]);
    }

    const { holds, bookings } = await this.store.findScheduleClaims(scheduleId);
    const claimed = collectClaimedSeats(holds, bookings, at);
    return seatAvailability(label, claimed) === SeatAvailability.AVAILABLE;
  }
}
