import { Injectable, Inject, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

export interface ScheduleStats {
  confirmedBookings: number;
  seatsSold: number;
  totalRevenue: number;
}

@Injectable()
export class RedisStatsService {
  private readonly logger = new Logger(RedisStatsService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async recordConfirmedBooking(scheduleId: string, seats: number, amount: number): Promise<void> {
    const prefix = `stats:schedule:${scheduleId}`;
    await this.redis
      .multi()
      .incr(`${prefix}:confirmed_bookings`)
      .incrby(`${prefix}:seats_sold`, seats)
      .incrbyfloat(`${prefix}:total_revenue`, amount)
      .incr('stats:global:confirmed_bookings')
      .incrbyfloat('stats:global:total_revenue', amount)
      .exec();
    this.logger.debug(`Schedule ${scheduleId} stats updated: +${seats} seats, +${amount} revenue`);
  }

  async getScheduleStats(scheduleId: string): Promise<ScheduleStats> {
    const prefix = `stats:schedule:${scheduleId}`;
    const [confirmedBookings, seatsSold, totalRevenue] = await this.redis.mget(
      `${prefix}:confirmed_bookings`,
      `${prefix}:seats_sold`,
      `${prefix}:total_revenue`,
    );

    return {
      confirmedBookings: confirmedBookings ? parseInt(confirmedBookings, 10) : 0,
      seatsSold: seatsSold ? parseInt(seatsSold, 10) : 0,
      totalRevenue: totalRevenue ? parseFloat(totalRevenue) : 0,
    };
  }
}
