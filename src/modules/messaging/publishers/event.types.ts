import type { BookingStatus } from '@modules/bookings/booking-status';

export type SeatEventType = 'seat.held' | 'seat.released';

export type BookingEventType =
  | 'booking.created'
  | 'booking.confirmed'
  | 'booking.cancelled'
  | 'booking.expired';

export type EventType = SeatEventType | BookingEventType;

export type SeatReleaseReason = 'released' | 'expired' | 'cancelled';

export interface BaseEvent {
  eventId: string;
  type: EventType;
  timestamp: string;
}

export interface SeatEvent extends BaseEvent {
  type: SeatEventType;
  scheduleId: string;
  seatLabels: string[];
  userId: string | null;
  expiresAt?: string;
  reason?: SeatReleaseReason;
}

export interface BookingEvent extends BaseEvent {
  type: BookingEventType;
  bookingId: string;
  bookingReference: string;
  userId: string;
  scheduleId: string;
  seatLabels: string[];
  status: BookingStatus;
  totalAmount: number;
}

export type LifecycleEvent = SeatEvent | BookingEvent;

export function isSeatEvent(event: LifecycleEvent): event is SeatEvent {
  return event.type === 'seat.held' || event.type === 'seat.released';
}

export function isBookingEvent(event: LifecycleEvent): event is BookingEvent {
  return !isSeatEvent(event);
}

const EVENT_TYPES: readonly EventType[] = [
  'seat.held',
  'seat.released',
  'booking.created',
  'booking.confirmed',
  'booking.cancelled',
  'booking.expired',
];

function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

/** Checks the envelope shared by every event; handlers read the rest. */
export function isLifecycleEvent(value: unknown): value is LifecycleEvent {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (
    !('eventId' in value) ||
    !('type' in value) ||
    !('scheduleId' in value) ||
    !('seatLabels' in value)
  ) {
    return false;
  }

  return (
    typeof value.eventId === 'string' &&
    value.eventId.length > 0 &&
    isEventType(value.type) &&
    typeof value.scheduleId === 'string' &&
    Array.isArray(value.seatLabels)
  );
}
