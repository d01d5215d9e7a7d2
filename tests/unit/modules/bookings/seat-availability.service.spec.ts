import { NotFoundException } from '@nestjs/common';
import { SeatAvailability } from '@common/utils/seat.util';
import { InvalidSeatException } from '@modules/bookings/booking.errors';
import { BookingHarness, createBookingHarness } from '@test/support/booking-harness';
import { SCHEDULE_ID, USER_A, USER_B } from '@test/support/fixtures';

const T0 = new Date('2025-03-01T18:00:00.000Z');

describe('SeatAvailabilityService', () => {
  let harness: BookingHarness;

  beforeEach(async () => {
    harness = await createBookingHarness();
    harness.clock.set(T0);
  });

  describe('getAvailability', () => {
    it('should report every seat free on an untouched schedule', async () => {
      const availability = await harness.availability.getAvailability(SCHEDULE_ID);

      expect(availability).toMatchObject({
        scheduleId: SCHEDULE_ID,
        asOf: T0,
        capacity: 12,
        availableSeats: 12,
        heldSeats: 0,
        bookedSeats: 0,
      });
      expect(availability.seats[0]).toEqual({
        seatLabel: 'A1',
        row: 'A',
        seatNumber: '1',
        status: SeatAvailability.AVAILABLE,
      });
    });

    it('should mark held and booked seats', async () => {
      await harness.holds.reserve(SCHEDULE_ID, ['A1', 'A2'], USER_A);
      await harness.holds.reserve(SCHEDULE_ID, ['B1'], USER_B);
      await harness.bookings.promoteToBooking({
        scheduleId: SCHEDULE_ID,
        seatLabels: ['A2'],
        userId: USER_A,
      });

      const availability = await harness.availability.getAvailability(SCHEDULE_ID);
      const status = new Map(availability.seats.map((seat) => [seat.seatLabel, seat.status]));

      expect(status.get('A1')).toBe(SeatAvailability.HELD);
      expect(status.get('A2')).toBe(SeatAvailability.BOOKED);
      expect(status.get('B1')).toBe(SeatAvailability.HELD);
      expect(status.get('C4')).toBe(SeatAvailability.AVAILABLE);
      expect(availability.availableSeats).toBe(9);
      expect(availability.heldSeats).toBe(2);
      expect(availability.bookedSeats).toBe(1);
    });

    it('should treat holds and pending bookings past their deadline as free before any sweep', async () => {
      await harness.holds.reserve(SCHEDULE_ID, ['A1', 'A2'], USER_A);
      await harness.bookings.promoteToBooking({
        scheduleId: SCHEDULE_ID,
        seatLabels: ['A2'],
        userId: USER_A,
      });

      const availability = await harness.availability.getAvailability(
        SCHEDULE_ID,
        new Date('2025-03-01T18:15:00.000Z'),
      );

      expect(availability.availableSeats).toBe(12);
      expect(harness.store.allHolds()).toHaveLength(1);
    });

    it('should keep confirmed seats booked after the deadline', async () => {
      await harness.holds.reserve(SCHEDULE_ID, ['A1'], USER_A);
      const booking = await harness.bookings.promoteToBooking({
        scheduleId: SCHEDULE_ID,
        seatLabels: ['A1'],
        userId: USER_A,
      });
      await harness.bookings.confirm(booking.bookingReference);

      const availability = await harness.availability.getAvailability(
        SCHEDULE_ID,
        new Date('2025-03-02T00:00:00.000Z'),
      );

      expect(availability.bookedSeats).toBe(1);
      expect(availability.seats[0].status).toBe(SeatAvailability.BOOKED);
    });

    it('should fail for an unknown schedule', async () => {
      await expect(
        harness.availability.getAvailability('00000000-0000-4000-8000-000000000000'),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('isSeatAvailable', () => {
    it('should follow a hold from placement to expiry', async () => {
      await harness.holds.reserve(SCHEDULE_ID, ['B2'], USER_A);

      await expect(
        harness.availability.isSeatAvailable(SCHEDULE_ID, 'b2', new Date('2025-03-01T18:14:59.000Z')),
      ).resolves.toBe(false);
      await expect(
        harness.availability.isSeatAvailable(SCHEDULE_ID, 'B2', new Date('2025-03-01T18:15:00.000Z')),
      ).resolves.toBe(true);
    });

    it('should reject a seat outside the layout', async () => {
      const error = await harness.availability
        .isSeatAvailable(SCHEDULE_ID, 'z1')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidSeatException);
      expect(error).toMatchObject({ seats: ['Z1'] });
    });
  });
});
