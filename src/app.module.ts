import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { WinstonModule } from 'nest-winston';

import { createWinstonConfig } from './infrastructure/logger/logger.config';
import { appConfig } from './config/app.config';
import { bookingConfig } from './config/booking.config';
import { databaseConfig } from './config/database.config';
import { rabbitmqConfig } from './config/rabbitmq.config';
import { redisConfig } from './config/redis.config';
import { validateEnvironment } from './config/env.validation';
import { ClockModule } from './infrastructure/clock/clock.module';
import { RedisModule } from './infrastructure/redis/redis.module';
import { MessagingModule } from './modules/messaging/messaging.module';
import { SchedulesModule } from './modules/schedules/schedules.module';
import { BookingsModule } from './modules/bookings/bookings.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [appConfig, databaseConfig, redisConfig, rabbitmqConfig, bookingConfig],
      validate: validateEnvironment,
    }),

    WinstonModule.forRootAsync({
      useFactory: (configService: ConfigService) =>
        createWinstonConfig(configService.get<string>('app.logLevel') ?? 'info'),
      inject: [ConfigService],
    }),

    ScheduleModule.forRoot(),

    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.user'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.name'),
        autoLoadEntities: true,
        synchronize: false,
        migrationsRun: true,
        migrations: [`${__dirname}/infrastructure/database/migrations/*.js`],
        logging: configService.get<string>('app.nodeEnv') === 'development',
      }),
      inject: [ConfigService],
    }),

    ClockModule,
    RedisModule,
    MessagingModule,

    SchedulesModule,
    BookingsModule,
    HealthModule,
  ],
})
export class AppModule {}
