import {
  isBookingEvent,
  isLifecycleEvent,
  isSeatEvent,
  SeatEvent,
} from '@modules/messaging/publishers/event.types';

describe('event types', () => {
  const seatEvent: SeatEvent = {
    eventId: 'evt-1',
    type: 'seat.released',
    scheduleId: 'schedule-1',
    seatLabels: ['A1'],
    userId: null,
    reason: 'released',
    timestamp: '2025-03-01T18:00:00.000Z',
  };

  describe('isLifecycleEvent', () => {
    it('accepts a well-formed envelope', () => {
      expect(isLifecycleEvent(seatEvent)).toBe(true);
    });

    it.each([
      ['null', null],
      ['a string', 'seat.released'],
      ['an empty event id', { ...seatEvent, eventId: '' }],
      ['an unknown type', { ...seatEvent, type: 'seat.moved' }],
      ['a missing schedule', { eventId: 'evt-1', type: 'seat.held', seatLabels: [] }],
      ['seat labels that are not a list', { ...seatEvent, seatLabels: 'A1' }],
    ])('rejects %s', (_case, value) => {
      expect(isLifecycleEvent(value)).toBe(false);
    });
  });

  it('tells seat events from booking events', () => {
    expect(isSeatEvent(seatEvent)).toBe(true);
    expect(isBookingEvent(seatEvent)).toBe(false);
  });
});
