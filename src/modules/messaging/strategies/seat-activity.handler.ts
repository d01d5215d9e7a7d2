import { Injectable, Logger } from '@nestjs/common';
import { EventType, LifecycleEvent, isSeatEvent } from '../publishers/event.types';
import { EventHandlerStrategy } from './event-handler.interface';

@Injectable()
export class SeatActivityHandler implements EventHandlerStrategy {
  readonly eventTypes: readonly EventType[] = ['seat.held', 'seat.released'];
  private readonly logger = new Logger(SeatActivityHandler.name);

  handle(event: LifecycleEvent): void {
    if (!isSeatEvent(event)) {
      return;
    }

    const seats = event.seatLabels.join(', ');
    if (event.type === 'seat.held') {
      this.logger.log(
        `Seats held on schedule ${event.scheduleId} by ${event.userId ?? 'unknown'}: ${seats} until ${event.expiresAt ?? '?'}`,
      );
      return;
    }

    this.logger.log(
      `Seats released on schedule ${event.scheduleId} (${event.reason ?? 'released'}): ${seats}`,
    );
  }
}
