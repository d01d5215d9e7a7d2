import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  DATABASE_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  DATABASE_PORT: number = 5432;

  @IsString()
  DATABASE_USER: string = 'postgres';

  @IsString()
  DATABASE_PASSWORD: string = 'postgres';

  @IsString()
  DATABASE_NAME: string = 'cinema_booking';

  @IsString()
  REDIS_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  REDIS_PORT: number = 6379;

  @IsOptional()
  @IsString()
  LOG_LEVEL?: string;

  // Messaging is disabled when unset
  @IsOptional()
  @IsString()
  RABBITMQ_URL?: string;

  @IsInt()
  @Min(100)
  @Max(600000)
  RABBITMQ_RECONNECT_DELAY_MS: number = 5000;

  @IsInt()
  @Min(1)
  @Max(240)
  HOLD_TTL_MINUTES: number = 15;

  @IsInt()
  @Min(1)
  @Max(1000)
  SWEEP_BATCH_LIMIT: number = 50;

  @IsInt()
  @Min(100)
  @Max(60000)
  SEAT_LOCK_TTL_MS: number = 10000;
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(`Invalid environment configuration: ${errors.toString()}`);
  }

  return validatedConfig;
}
