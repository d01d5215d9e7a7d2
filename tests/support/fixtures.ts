import { NotFoundException } from '@nestjs/common';
import { BookingStatus } from '@modules/bookings/booking-status';
import { BookedSeat } from '@modules/bookings/entities/booked-seat.entity';
import { Booking } from '@modules/bookings/entities/booking.entity';
import { SeatHold } from '@modules/bookings/entities/seat-hold.entity';
import { EventPublisher } from '@modules/messaging/publishers/event.publisher';
import { Schedule } from '@modules/schedules/entities/schedule.entity';
import { Seat } from '@modules/schedules/entities/seat.entity';
import { SeatLayout } from '@modules/schedules/schedules.service';
import { parseSeatLabel, sortSeatLabels } from '@common/utils/seat.util';

export const SCHEDULE_ID = '4f1c2a9e-0b7d-4e52-9a61-3c8d5e7f1a20';
export const OTHER_SCHEDULE_ID = '9b3e6d21-5c4a-4f8e-b7d2-1a0c9e8f6b54';
export const USER_A = '1a2b3c4d-0000-4000-8000-00000000000a';
export const USER_B = '1a2b3c4d-0000-4000-8000-00000000000b';

/** Rows A-C, seats 1-4, at 12.50 per ticket. */
export const DEFAULT_SEAT_LABELS = ['A', 'B', 'C'].flatMap((row) =>
  [1, 2, 3, 4].map((seat) => `${row}${seat}`),
);

export function buildSchedule(id = SCHEDULE_ID, ticketPrice = 12.5): Schedule {
  return Object.assign(new Schedule(), {
    id,
    movieTitle: 'Test Feature',
    screenNumber: 1,
    startTime: new Date('2025-03-01T20:00:00.000Z'),
    endTime: new Date('2025-03-01T22:00:00.000Z'),
    ticketPrice,
    createdAt: new Date('2025-02-01T00:00:00.000Z'),
  });
}

export function buildSeat(scheduleId: string, seatLabel: string): Seat {
  const position = parseSeatLabel(seatLabel);
  return Object.assign(new Seat(), {
    id: `${scheduleId}-${seatLabel}`,
    scheduleId,
    seatLabel,
    row: position?.row ?? '',
    seatNumber: position?.seatNumber ?? '',
  });
}

export function buildLayout(
  scheduleId = SCHEDULE_ID,
  labels: string[] = DEFAULT_SEAT_LABELS,
  ticketPrice = 12.5,
): SeatLayout {
  const ordered = sortSeatLabels(labels);
  return {
    schedule: buildSchedule(scheduleId, ticketPrice),
    scheduleId,
    ticketPrice,
    capacity: ordered.length,
    seats: ordered.map((label) => buildSeat(scheduleId, label)),
    seatLabels: new Set(ordered),
  };
}

export function createSchedulesServiceStub(layouts: SeatLayout[] = [buildLayout()]) {
  const byId = new Map(layouts.map((layout) => [layout.scheduleId, layout]));

  return {
    getSeatLayout: jest.fn(async (scheduleId: string): Promise<SeatLayout> => {
      const layout = byId.get(scheduleId);
      if (!layout) {
        throw new NotFoundException(`Schedule with ID ${scheduleId} not found`);
      }
      return layout;
    }),
  };
}

export type PublisherMock = jest.Mocked<
  Pick<
    EventPublisher,
    | 'publishSeatsHeld'
    | 'publishSeatsReleased'
    | 'publishBookingCreated'
    | 'publishBookingConfirmed'
    | 'publishBookingCancelled'
    | 'publishBookingExpired'
  >
>;

export function createPublisherMock(): PublisherMock {
  return {
    publishSeatsHeld: jest.fn().mockResolvedValue(undefined),
    publishSeatsReleased: jest.fn().mockResolvedValue(undefined),
    publishBookingCreated: jest.fn().mockResolvedValue(undefined),
    publishBookingConfirmed: jest.fn().mockResolvedValue(undefined),
    publishBookingCancelled: jest.fn().mockResolvedValue(undefined),
    publishBookingExpired: jest.fn().mockResolvedValue(undefined),
  };
}

export function buildHold(overrides: Partial<SeatHold> = {}): SeatHold {
  return Object.assign(new SeatHold(), {
    id: 'c0ffee00-0000-4000-8000-000000000001',
    scheduleId: SCHEDULE_ID,
    seatLabel: 'A1',
    userId: USER_A,
    createdAt: new Date('2025-03-01T18:00:00.000Z'),
    expiresAt: new Date('2025-03-01T18:15:00.000Z'),
    ...overrides,
  });
}

export function buildBooking(
  overrides: Partial<Booking> = {},
  seatLabels: string[] = ['A1', 'A2'],
): Booking {
  const bookingId = overrides.id ?? 'b00c0000-0000-4000-8000-000000000001';
  return Object.assign(new Booking(), {
    id: bookingId,
    bookingReference: 'BK-0A1B2C3D4E5F',
    userId: USER_A,
    scheduleId: SCHEDULE_ID,
    status: BookingStatus.PENDING,
    totalAmount: 25,
    idempotencyKey: null,
    createdAt: new Date('2025-03-01T18:02:00.000Z'),
    expiresAt: new Date('2025-03-01T18:15:00.000Z'),
    confirmedAt: null,
    cancelledAt: null,
    updatedAt: new Date('2025-03-01T18:02:00.000Z'),
    seats: seatLabels.map((seatLabel, index) =>
      Object.assign(new BookedSeat(), {
        ...buildSeat(overrides.scheduleId ?? SCHEDULE_ID, seatLabel),
        id: `${bookingId}-${index}`,
        bookingId,
      }),
    ),
    ...overrides,
  });
}
