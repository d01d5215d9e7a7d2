import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { BookingsController } from '@modules/bookings/bookings.controller';
import { BookingsService } from '@modules/bookings/bookings.service';
import { BookingStatus } from '@modules/bookings/booking-status';
import { NotOwnerException } from '@modules/bookings/booking.errors';
import { SCHEDULE_ID, USER_A, USER_B, buildBooking } from '@test/support/fixtures';

describe('BookingsController', () => {
  let controller: BookingsController;
  let promoteMock: jest.Mock;
  let confirmMock: jest.Mock;
  let cancelMock: jest.Mock;
  let findByReferenceMock: jest.Mock;
  let findForUserMock: jest.Mock;

  beforeEach(async () => {
    promoteMock = jest.fn();
    confirmMock = jest.fn();
    cancelMock = jest.fn();
    findByReferenceMock = jest.fn();
    findForUserMock = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [BookingsController],
      providers: [
        {
          provide: BookingsService,
          useValue: {
            promoteToBooking: promoteMock,
            confirm: confirmMock,
            cancel: cancelMock,
            findByReference: findByReferenceMock,
            findForUser: findForUserMock,
          },
        },
      ],
    }).compile();

    controller = module.get<BookingsController>(BookingsController);
  });

  describe('promote', () => {
    it('should promote the caller\'s holds and return the booking', async () => {
      promoteMock.mockResolvedValue(buildBooking({}, ['A2', 'A1']));

      const result = await controller.promote(
        { scheduleId: SCHEDULE_ID, seatLabels: ['A1', 'A2'], totalAmount: 25 },
        USER_A,
        'checkout-1',
      );

      expect(promoteMock).toHaveBeenCalledWith({
        scheduleId: SCHEDULE_ID,
        seatLabels: ['A1', 'A2'],
        userId: USER_A,
        totalAmount: 25,
        idempotencyKey: 'checkout-1',
      });
      expect(result).toEqual({
        id: 'b00c0000-0000-4000-8000-000000000001',
        bookingReference: 'BK-0A1B2C3D4E5F',
        userId: USER_A,
        scheduleId: SCHEDULE_ID,
        status: BookingStatus.PENDING,
        totalAmount: 25,
        createdAt: new Date('2025-03-01T18:02:00.000Z'),
        expiresAt: new Date('2025-03-01T18:15:00.000Z'),
        confirmedAt: null,
        cancelledAt: null,
        seats: [
          { seatLabel: 'A1', row: 'A', seatNumber: '1' },
          { seatLabel: 'A2', row: 'A', seatNumber: '2' },
        ],
      });
    });

    it('should drop an empty idempotency key', async () => {
      promoteMock.mockResolvedValue(buildBooking());

      await controller.promote({ scheduleId: SCHEDULE_ID, seatLabels: ['A1', 'A2'] }, USER_A, '');

      expect(promoteMock).toHaveBeenCalledWith(
        expect.objectContaining({ idempotencyKey: undefined, totalAmount: undefined }),
      );
    });

    it('should accept an idempotency key of exactly 255 characters', async () => {
      promoteMock.mockResolvedValue(buildBooking());
      const key = 'k'.repeat(255);

      await controller.promote({ scheduleId: SCHEDULE_ID, seatLabels: ['A1'] }, USER_A, key);

      expect(promoteMock).toHaveBeenCalledWith(expect.objectContaining({ idempotencyKey: key }));
    });

    it('should reject a longer idempotency key before touching any seat', async () => {
      const error = await controller
        .promote({ scheduleId: SCHEDULE_ID, seatLabels: ['A1'] }, USER_A, 'k'.repeat(256))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BadRequestException);
      expect(error).toMatchObject({
        message: 'Idempotency-Key must be at most 255 characters',
      });
      expect(promoteMock).not.toHaveBeenCalled();
    });
  });

  describe('findMine', () => {
    it('should list the caller\'s bookings', async () => {
      findForUserMock.mockResolvedValue([buildBooking()]);

      const result = await controller.findMine(USER_A);

      expect(findForUserMock).toHaveBeenCalledWith(USER_A);
      expect(result).toHaveLength(1);
    });
  });

  describe('findOne', () => {
    it('should pass the caller through for the ownership check', async () => {
      findByReferenceMock.mockRejectedValue(new NotOwnerException('BK-0A1B2C3D4E5F'));

      await expect(controller.findOne('BK-0A1B2C3D4E5F', USER_B)).rejects.toThrow(
        NotOwnerException,
      );
      expect(findByReferenceMock).toHaveBeenCalledWith('BK-0A1B2C3D4E5F', USER_B);
    });
  });

  describe('confirm', () => {
    it('should confirm on behalf of the caller', async () => {
      confirmMock.mockResolvedValue(
        buildBooking({
          status: BookingStatus.CONFIRMED,
          confirmedAt: new Date('2025-03-01T18:03:00.000Z'),
        }),
      );

      const result = await controller.confirm('BK-0A1B2C3D4E5F', USER_A);

      expect(confirmMock).toHaveBeenCalledWith('BK-0A1B2C3D4E5F', USER_A);
      expect(result.status).toBe(BookingStatus.CONFIRMED);
      expect(result.confirmedAt).toEqual(new Date('2025-03-01T18:03:00.000Z'));
    });
  });

  describe('cancel', () => {
    it('should cancel on behalf of the caller', async () => {
      cancelMock.mockResolvedValue(buildBooking({ status: BookingStatus.CANCELLED }));

      const result = await controller.cancel('BK-0A1B2C3D4E5F', USER_A);

      expect(cancelMock).toHaveBeenCalledWith('BK-0A1B2C3D4E5F', USER_A);
      expect(result.status).toBe(BookingStatus.CANCELLED);
    });
  });
});
