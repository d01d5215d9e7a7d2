import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  GoneException,
  NotFoundException,
} from '@nestjs/common';
import type { BookingStatus } from './booking-status';

export enum BookingErrorCode {
  INVALID_SEAT = 'INVALID_SEAT',
  SEAT_UNAVAILABLE = 'SEAT_UNAVAILABLE',
  HOLD_EXPIRED = 'HOLD_EXPIRED',
  HOLD_NOT_OWNED = 'HOLD_NOT_OWNED',
  NOT_HOLDER = 'NOT_HOLDER',
  NOT_OWNER = 'NOT_OWNER',
  ALREADY_FINALIZED = 'ALREADY_FINALIZED',
  BOOKING_NOT_FOUND = 'BOOKING_NOT_FOUND',
}

function body(code: BookingErrorCode, error: string, message: string, seats?: string[]) {
  return seats ? { message, error, code, seats } : { message, error, code };
}

export class InvalidSeatException extends BadRequestException {
  readonly code = BookingErrorCode.INVALID_SEAT;

  constructor(
    readonly seats: string[],
    message = `Seats not in schedule layout: ${seats.join(', ')}`,
  ) {
    super(body(BookingErrorCode.INVALID_SEAT, 'Bad Request', message, seats));
  }
}

export class SeatUnavailableException extends ConflictException {
  readonly code = BookingErrorCode.SEAT_UNAVAILABLE;

  constructor(readonly seats: string[]) {
    super(
      body(
        BookingErrorCode.SEAT_UNAVAILABLE,
        'Conflict',
        `Seats not available: ${seats.join(', ')}`,
        seats,
      ),
    );
  }
}

export class HoldExpiredException extends GoneException {
  readonly code = BookingErrorCode.HOLD_EXPIRED;

  constructor(readonly seats: string[]) {
    super(
      body(BookingErrorCode.HOLD_EXPIRED, 'Gone', `Seat holds expired: ${seats.join(', ')}`, seats),
    );
  }
}

export class HoldNotOwnedException extends ConflictException {
  readonly code = BookingErrorCode.HOLD_NOT_OWNED;

  constructor(readonly seats: string[]) {
    super(
      body(
        BookingErrorCode.HOLD_NOT_OWNED,
        'Conflict',
        `Seats not held by the requesting user: ${seats.join(', ')}`,
        seats,
      ),
    );
  }
}

export class NotHolderException extends ForbiddenException {
  readonly code = BookingErrorCode.NOT_HOLDER;

  constructor(readonly seats: string[], message = `No active hold owned by the caller`) {
    super(
      body(
        BookingErrorCode.NOT_HOLDER,
        'Forbidden',
        seats.length > 0 ? `${message}: ${seats.join(', ')}` : message,
        seats,
      ),
    );
  }
}

export class NotOwnerException extends ForbiddenException {
  readonly code = BookingErrorCode.NOT_OWNER;

  constructor(readonly bookingReference: string) {
    super(
      body(
        BookingErrorCode.NOT_OWNER,
        'Forbidden',
        `Booking ${bookingReference} belongs to another user`,
      ),
    );
  }
}

export class AlreadyFinalizedException extends ConflictException {
  readonly code = BookingErrorCode.ALREADY_FINALIZED;

  constructor(
    readonly bookingReference: string,
    readonly bookingStatus: BookingStatus,
  ) {
    super(
      body(
        BookingErrorCode.ALREADY_FINALIZED,
        'Conflict',
        `Booking ${bookingReference} is already ${bookingStatus.toLowerCase()}`,
      ),
    );
  }
}

export class BookingNotFoundException extends NotFoundException {
  readonly code = BookingErrorCode.BOOKING_NOT_FOUND;

  constructor(readonly bookingReference: string) {
    super(
      body(
        BookingErrorCode.BOOKING_NOT_FOUND,
        'Not Found',
        `Booking ${bookingReference} not found`,
      ),
    );
  }
}
