import { SetMetadata } from '@nestjs/common';
import { RATE_LIMIT_KEY, RateLimitConfig } from '../guards/rate-limit.guard';

export const RateLimit = (config: Partial<RateLimitConfig>) => SetMetadata(RATE_LIMIT_KEY, config);

/** Placing holds: 20 per minute per caller, then a two-minute block. */
export const HoldRateLimit = () =>
  RateLimit({ points: 20, duration: 60, blockDuration: 120, keyPrefix: 'rl:holds' });

export const WriteRateLimit = () => RateLimit({ points: 30, duration: 60 });
