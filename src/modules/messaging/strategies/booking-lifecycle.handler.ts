import { Injectable, Logger } from '@nestjs/common';
import { EventType, LifecycleEvent, isBookingEvent } from '../publishers/event.types';
import { EventHandlerStrategy } from './event-handler.interface';

@Injectable()
export class BookingLifecycleHandler implements EventHandlerStrategy {
  readonly eventTypes: readonly EventType[] = [
    'booking.created',
    'booking.cancelled',
    'booking.expired',
  ];
  private readonly logger = new Logger(BookingLifecycleHandler.name);

  handle(event: LifecycleEvent): void {
    if (!isBookingEvent(event)) {
      return;
    }

    this.logger.log(
      `Booking ${event.bookingReference} ${event.type.replace('booking.', '')} for user ${event.userId}: ${event.seatLabels.length} seats`,
    );
  }
}
