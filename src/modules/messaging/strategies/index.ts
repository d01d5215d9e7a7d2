import { BookingConfirmedHandler } from './booking-confirmed.handler';
import { BookingLifecycleHandler } from './booking-lifecycle.handler';
import { SeatActivityHandler } from './seat-activity.handler';

export { EventHandlerStrategy } from './event-handler.interface';
export { BookingConfirmedHandler } from './booking-confirmed.handler';
export { BookingLifecycleHandler } from './booking-lifecycle.handler';
export { SeatActivityHandler } from './seat-activity.handler';

export const EVENT_HANDLER_PROVIDERS = [
  SeatActivityHandler,
  BookingLifecycleHandler,
  BookingConfirmedHandler,
];
