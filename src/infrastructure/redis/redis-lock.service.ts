import { Injectable, Inject, Logger, ServiceUnavailableException } from '@nestjs/common';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';
import { REDIS_CLIENT } from './redis.constants';
import { calculateBackoffDelay, RetryOptions, sleep } from '@common/utils/retry.util';

export const LOCK_TIMEOUT_CODE = 'LOCK_TIMEOUT';

export class LockAcquisitionException extends ServiceUnavailableException {
  readonly code = LOCK_TIMEOUT_CODE;

  constructor(readonly resource: string) {
    super({
      message: `Could not acquire lock for resource: ${resource}`,
      error: 'Service Unavailable',
      code: LOCK_TIMEOUT_CODE,
    });
  }
}

export const DEFAULT_LOCK_RETRY: RetryOptions = {
  maxRetries: 10,
  baseDelayMs: 50,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
  jitterFactor: 0.3,
};

interface HeldLock {
  resource: string;
  token: string;
}

const RELEASE_SCRIPT = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`;

@Injectable()
export class RedisLockService {
  private readonly logger = new Logger(RedisLockService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async acquireLock(resource: string, ttlMs: number = 5000): Promise<string | null> {
    const token = randomUUID();
    const result = await this.redis.set(`lock:${resource}`, token, 'PX', ttlMs, 'NX');

    if (result === 'OK') {
      this.logger.debug(`Lock acquired for ${resource}`);
      return token;
    }

    return null;
  }

  async releaseLock(resource: string, token: string): Promise<boolean> {
    const result = await this.redis.eval(RELEASE_SCRIPT, 1, `lock:${resource}`, token);

    if (result === 1) {
      this.logger.debug(`Lock released for ${resource}`);
      return true;
    }

    // The lock outlived its TTL and may now belong to someone else
    this.logger.warn(`Failed to release lock for ${resource} - token mismatch`);
    return false;
  }

  async acquireLockWithRetry(
    resource: string,
    ttlMs: number = 5000,
    options: Partial<RetryOptions> = {},
  ): Promise<string | null> {
    const opts = { ...DEFAULT_LOCK_RETRY, ...options };

    for (let attempt = 0; attempt < opts.maxRetries; attempt++) {
      const token = await this.acquireLock(resource, ttlMs);
      if (token) {
        if (attempt > 0) {
          this.logger.debug(`Lock acquired for ${resource} after ${attempt + 1} attempts`);
        }
        return token;
      }

      if (attempt < opts.maxRetries - 1) {
        const delay = calculateBackoffDelay(attempt, opts);
        this.logger.debug(
          `Lock attempt ${attempt + 1}/${opts.maxRetries} failed for ${resource}, waiting ${delay}ms`,
        );
        await sleep(delay);
      }
    }

    this.logger.warn(`Failed to acquire lock for ${resource} after ${opts.maxRetries} attempts`);
    return null;
  }

  async withLock<T>(resource: string, fn: () => Promise<T>, ttlMs: number = 5000): Promise<T> {
    return this.withLocks([resource], fn, ttlMs);
  }

  /**
   * Runs `fn` while holding every lock in `resources`.
   *
   * Resources are acquired one by one in sorted order, so two callers asking for
   * overlapping sets never wait on each other in a cycle. If any lock cannot be
   * acquired the ones already held are released and a LockAcquisitionException
   * is thrown without running `fn`.
   */
  async withLocks<T>(
    resources: string[],
    fn: () => Promise<T>,
    ttlMs: number = 5000,
    options: Partial<RetryOptions> = {},
  ): Promise<T> {
    const ordered = [...new Set(resources)].sort();
    const held: HeldLock[] = [];

    try {
      for (const resource of ordered) {
        const token = await this.acquireLockWithRetry(resource, ttlMs, options);
        if (!token) {
          throw new LockAcquisitionException(resource);
        }
        held.push({ resource, token });
      }

      return await fn();
    } finally {
      await this.releaseAll(held);
    }
  }

  private async releaseAll(held: HeldLock[]): Promise<void> {
    for (const lock of [...held].reverse()) {
      try {
        await this.releaseLock(lock.resource, lock.token);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Error releasing lock for ${lock.resource}: ${message}`);
      }
    }
  }
}
