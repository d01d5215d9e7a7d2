import 'reflect-metadata';
import { NestFactory, Reflector } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { RateLimitGuard } from './common/guards/rate-limit.guard';
import { REDIS_CLIENT } from './infrastructure/redis/redis.constants';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));
  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');

  app.useGlobalFilters(new HttpExceptionFilter());

  app.useGlobalInterceptors(new LoggingInterceptor());

  const redisClient = app.get<Redis>(REDIS_CLIENT);
  const reflector = app.get(Reflector);
  app.useGlobalGuards(new RateLimitGuard(redisClient, reflector));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Cinema Booking Lifecycle')
    .setDescription('Seat holds, bookings and their expiry for cinema schedules')
    .setVersion('1.0')
    .addTag('schedules', 'Schedules, seat layouts and availability')
    .addTag('holds', 'Temporary seat holds')
    .addTag('bookings', 'Booking promotion, confirmation and cancellation')
    .addTag('health', 'Liveness')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document);

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') ?? 3000;
  await app.listen(port);

  logger.log(`Application running on port ${port}`);
  logger.log(`Swagger available at http://localhost:${port}/api-docs`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start application: ${err instanceof Error ? err.message : String(err)}`,
    err instanceof Error ? err.stack : undefined,
  );
  process.exit(1);
});
