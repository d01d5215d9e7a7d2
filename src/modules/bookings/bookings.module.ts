import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SchedulesModule } from '@modules/schedules/schedules.module';
import { MessagingModule } from '@modules/messaging/messaging.module';
import { TypeOrmBookingStore } from '@infrastructure/database/typeorm-booking.store';
import { SeatHold } from './entities/seat-hold.entity';
import { Booking } from './entities/booking.entity';
import { BookedSeat } from './entities/booked-seat.entity';
import { BOOKING_STORE } from './store/booking.store';
import { SeatHoldsService } from './seat-holds.service';
import { BookingsService } from './bookings.service';
import { BookingSweeperService } from './booking-sweeper.service';
import { SeatAvailabilityService } from './seat-availability.service';
import { HoldsController } from './holds.controller';
import { BookingsController } from './bookings.controller';
import { AvailabilityController } from './availability.controller';
import { ExpirationSweepJob } from './jobs/expiration-sweep.job';

@Module({
  imports: [
    TypeOrmModule.forFeature([SeatHold, Booking, BookedSeat]),
    SchedulesModule,
    MessagingModule,
  ],
  controllers: [HoldsController, BookingsController, AvailabilityController],
  providers: [
    { provide: BOOKING_STORE, useClass: TypeOrmBookingStore },
    SeatHoldsService,
    BookingsService,
    BookingSweeperService,
    SeatAvailabilityService,
    ExpirationSweepJob,
  ],
  exports: [SeatHoldsService, BookingsService, BookingSweeperService, SeatAvailabilityService],
})
export class BookingsModule {}
