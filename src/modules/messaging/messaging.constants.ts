export const MESSAGING_CONSTANTS = {
  EXCHANGE_NAME: 'booking.events',
  DLQ_NAME: 'booking.dlq',
  RECONNECT_DELAY_MS: 5000,
  BATCH_SIZE: 10,
  BATCH_TIMEOUT_MS: 1000,
  PREFETCH_MULTIPLIER: 2,
} as const;

export const QUEUE_CONFIGS = [
  { name: 'booking.seat-activity', routingKey: 'seat.*' },
  { name: 'booking.lifecycle', routingKey: 'booking.*' },
] as const;
