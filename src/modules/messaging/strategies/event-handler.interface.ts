import { EventType, LifecycleEvent } from '../publishers/event.types';

export interface EventHandlerStrategy {
  readonly eventTypes: readonly EventType[];
  handle(event: LifecycleEvent): void | Promise<void>;
}
