import { Injectable, Logger } from '@nestjs/common';
import { EventType, LifecycleEvent, isBookingEvent } from '../publishers/event.types';
import { EventHandlerStrategy } from './event-handler.interface';
import { RedisStatsService } from '@infrastructure/redis/redis-stats.service';

@Injectable()
export class BookingConfirmedHandler implements EventHandlerStrategy {
  readonly eventTypes: readonly EventType[] = ['booking.confirmed'];
  private readonly logger = new Logger(BookingConfirmedHandler.name);

  constructor(private readonly redisStatsService: RedisStatsService) {}

  async handle(event: LifecycleEvent): Promise<void> {
    if (!isBookingEvent(event)) {
      return;
    }

    this.logger.log(`Booking confirmed: ${event.bookingReference}, amount ${event.totalAmount}`);

    await this.redisStatsService.recordConfirmedBooking(
      event.scheduleId,
      event.seatLabels.length,
      event.totalAmount,
    );

    const stats = await this.redisStatsService.getScheduleStats(event.scheduleId);
    this.logger.log(
      `Schedule ${event.scheduleId} stats: ${stats.confirmedBookings} bookings, ${stats.seatsSold} seats, ${stats.totalRevenue.toFixed(2)} revenue`,
    );
  }
}
