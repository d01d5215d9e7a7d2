import { sortSeatLabels } from '@common/utils/seat.util';
import { Booking } from '../entities/booking.entity';
import { SeatHold } from '../entities/seat-hold.entity';
import { BookingResponseDto } from './booking-response.dto';
import { HoldResponseDto } from './hold-response.dto';

export function toHoldResponse(hold: SeatHold): HoldResponseDto {
  return {
    id: hold.id,
    scheduleId: hold.scheduleId,
    seatLabel: hold.seatLabel,
    userId: hold.userId,
    createdAt: hold.createdAt,
    expiresAt: hold.expiresAt,
  };
}

export function toBookingResponse(booking: Booking): BookingResponseDto {
  const byLabel = new Map(booking.seats.map((seat) => [seat.seatLabel, seat]));

  return {
    id: booking.id,
    bookingReference: booking.bookingReference,
    userId: booking.userId,
    scheduleId: booking.scheduleId,
    status: booking.status,
    totalAmount: Number(booking.totalAmount),
    createdAt: booking.createdAt,
    expiresAt: booking.expiresAt,
    confirmedAt: booking.confirmedAt,
    cancelledAt: booking.cancelledAt,
    seats: sortSeatLabels(byLabel.keys()).flatMap((label) => {
      const seat = byLabel.get(label);
      return seat ? [{ seatLabel: seat.seatLabel, row: seat.row, seatNumber: seat.seatNumber }] : [];
    }),
  };
}
