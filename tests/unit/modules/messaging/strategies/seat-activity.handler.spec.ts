import { Logger } from '@nestjs/common';
import { SeatActivityHandler } from '@modules/messaging/strategies';
import { SeatEvent } from '@modules/messaging/publishers/event.types';
import { SCHEDULE_ID, USER_A } from '@test/support/fixtures';

describe('SeatActivityHandler', () => {
  const handler = new SeatActivityHandler();

  const held: SeatEvent = {
    eventId: 'evt-1',
    type: 'seat.held',
    scheduleId: SCHEDULE_ID,
    seatLabels: ['A1', 'A2'],
    userId: USER_A,
    expiresAt: '2025-03-01T18:15:00.000Z',
    timestamp: '2025-03-01T18:00:00.000Z',
  };

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('subscribes to seat events', () => {
    expect(handler.eventTypes).toEqual(['seat.held', 'seat.released']);
  });

  it('logs held seats with their deadline', () => {
    handler.handle(held);

    expect(Logger.prototype.log).toHaveBeenCalledWith(
      `Seats held on schedule ${SCHEDULE_ID} by ${USER_A}: A1, A2 until 2025-03-01T18:15:00.000Z`,
    );
  });

  it('logs released seats with the reason', () => {
    handler.handle({ ...held, type: 'seat.released', userId: null, reason: 'expired' });

    expect(Logger.prototype.log).toHaveBeenCalledWith(
      `Seats released on schedule ${SCHEDULE_ID} (expired): A1, A2`,
    );
  });
});
