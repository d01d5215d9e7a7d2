import { Controller, Get, Inject, Logger } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DataSource } from 'typeorm';
import Redis from 'ioredis';
import { CLOCK, Clock } from '@infrastructure/clock/clock';
import { REDIS_CLIENT } from '@infrastructure/redis/redis.constants';
import { getErrorMessageString } from '@common/utils/error.util';

export type DependencyStatus = 'up' | 'down';

export interface HealthStatus {
  status: 'ok' | 'degraded';
  timestamp: string;
  checks: {
    database: DependencyStatus;
    redis: DependencyStatus;
  };
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly dataSource: DataSource,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Liveness with database and Redis reachability' })
  @ApiResponse({ status: 200, description: 'Service is running' })
  async check(): Promise<HealthStatus> {
    const [database, redis] = await Promise.all([
      this.checkDependency('database', async () => {
        await this.dataSource.query('SELECT 1');
      }),
      this.checkDependency('redis', async () => {
        await this.redis.ping();
      }),
    ]);

    return {
      status: database === 'up' && redis === 'up' ? 'ok' : 'degraded',
      timestamp: this.clock.now().toISOString(),
      checks: { database, redis },
    };
  }

  private async checkDependency(
    name: string,
    check: () => Promise<void>,
  ): Promise<DependencyStatus> {
    try {
      await check();
      return 'up';
    } catch (error) {
      this.logger.warn(`Health check for ${name} failed: ${getErrorMessageString(error)}`);
      return 'down';
    }
  }
}
