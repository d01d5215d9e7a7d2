import { Test, TestingModule } from '@nestjs/testing';
import { AvailabilityController } from '@modules/bookings/availability.controller';
import { SeatAvailabilityService } from '@modules/bookings/seat-availability.service';
import { SeatAvailability } from '@common/utils/seat.util';
import { SCHEDULE_ID } from '@test/support/fixtures';

describe('AvailabilityController', () => {
  let controller: AvailabilityController;
  let getAvailabilityMock: jest.Mock;
  let isSeatAvailableMock: jest.Mock;

  beforeEach(async () => {
    getAvailabilityMock = jest.fn();
    isSeatAvailableMock = jest.fn();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AvailabilityController],
      providers: [
        {
          provide: SeatAvailabilityService,
          useValue: {
            getAvailability: getAvailabilityMock,
            isSeatAvailable: isSeatAvailableMock,
          },
        },
      ],
    }).compile();

    controller = module.get<AvailabilityController>(AvailabilityController);
  });

  it('should return the schedule availability', async () => {
    const availability = {
      scheduleId: SCHEDULE_ID,
      asOf: new Date('2025-03-01T18:00:00.000Z'),
      capacity: 1,
      availableSeats: 0,
      heldSeats: 1,
      bookedSeats: 0,
      seats: [{ seatLabel: 'A1', row: 'A', seatNumber: '1', status: SeatAvailability.HELD }],
    };
    getAvailabilityMock.mockResolvedValue(availability);

    await expect(controller.getAvailability(SCHEDULE_ID)).resolves.toEqual(availability);
    expect(getAvailabilityMock).toHaveBeenCalledWith(SCHEDULE_ID);
  });

  it('should report a single seat under its normalized label', async () => {
    isSeatAvailableMock.mockResolvedValue(true);

    await expect(controller.isSeatAvailable(SCHEDULE_ID, ' c3 ')).resolves.toEqual({
      seatLabel: 'C3',
      available: true,
    });
    expect(isSeatAvailableMock).toHaveBeenCalledWith(SCHEDULE_ID, ' c3 ');
  });
});
