import { randomBytes } from 'crypto';

export const BOOKING_REFERENCE_PREFIX = 'BK';

/** `BK-` followed by 12 uppercase hex digits, e.g. `BK-3F9A0C11D2E4`. */
export function generateBookingReference(): string {
  return `${BOOKING_REFERENCE_PREFIX}-${randomBytes(6).toString('hex').toUpperCase()}`;
}

