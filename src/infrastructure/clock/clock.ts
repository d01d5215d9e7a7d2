export const CLOCK = Symbol('CLOCK');

/**
 * Source of the current instant for hold and booking expiry.
 * Injected everywhere a deadline is computed or compared.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}
