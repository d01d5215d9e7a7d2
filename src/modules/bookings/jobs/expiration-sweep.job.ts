import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { CLOCK, Clock } from '@infrastructure/clock/clock';
import { getErrorMessageString } from '@common/utils/error.util';
import { BookingSweeperService } from '../booking-sweeper.service';

@Injectable()
export class ExpirationSweepJob {
  private readonly logger = new Logger(ExpirationSweepJob.name);
  private isProcessing = false;

  constructor(
    private readonly bookingSweeperService: BookingSweeperService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Cron(CronExpression.EVERY_10_SECONDS)
  async handle(): Promise<void> {
    if (this.isProcessing) {
      this.logger.debug('Expiration sweep already running, skipping...');
      return;
    }

    this.isProcessing = true;

    try {
      const result = await this.bookingSweeperService.sweepExpired(this.clock.now());

      if (result.total > 0) {
        this.logger.log(
          `Reclaimed ${result.reclaimedHolds} hold(s) and expired ${result.expiredBookings} booking(s)`,
        );
      }
    } catch (error) {
      this.logger.error(`Error sweeping expired claims: ${getErrorMessageString(error)}`);
    } finally {
      this.isProcessing = false;
    }
  }
}
