import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as amqp from 'amqplib';
import { EventType, LifecycleEvent, isLifecycleEvent } from '../publishers/event.types';
import { withRetry, MESSAGE_RETRY_OPTIONS } from '@common/utils/retry.util';
import { getErrorMessageString } from '@common/utils/error.util';
import { MESSAGING_CONSTANTS, QUEUE_CONFIGS } from '../messaging.constants';
import { setupAmqpInfrastructure } from '../amqp-setup.util';
import {
  EventHandlerStrategy,
  SeatActivityHandler,
  BookingLifecycleHandler,
  BookingConfirmedHandler,
} from '../strategies';

interface PendingMessage {
  msg: amqp.ConsumeMessage;
  payload: LifecycleEvent;
  queueName: string;
  receivedAt: number;
}

export interface BatchOutcome {
  succeeded: number;
  failed: number;
}

@Injectable()
export class EventConsumer implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(EventConsumer.name);
  private connection: amqp.ChannelModel | null = null;
  private channel: amqp.Channel | null = null;
  private isShuttingDown = false;

  private readonly pendingMessages = new Map<string, PendingMessage[]>();
  private readonly batchTimers = new Map<string, NodeJS.Timeout>();

  private readonly handlerStrategies = new Map<EventType, EventHandlerStrategy>();

  constructor(
    private readonly configService: ConfigService,
    seatActivityHandler: SeatActivityHandler,
    bookingLifecycleHandler: BookingLifecycleHandler,
    bookingConfirmedHandler: BookingConfirmedHandler,
  ) {
    QUEUE_CONFIGS.forEach((q) => this.pendingMessages.set(q.name, []));
    this.registerHandlerStrategies([
      seatActivityHandler,
      bookingLifecycleHandler,
      bookingConfirmedHandler,
    ]);
  }

  private registerHandlerStrategies(handlers: EventHandlerStrategy[]): void {
    for (const handler of handlers) {
      for (const eventType of handler.eventTypes) {
        this.handlerStrategies.set(eventType, handler);
      }
    }
  }

  async onModuleInit(): Promise<void> {
    await this.connect();
  }

  async onModuleDestroy(): Promise<void> {
    this.isShuttingDown = true;
    await this.flushAllBatches();

    this.batchTimers.forEach((timer) => clearTimeout(timer));
    this.batchTimers.clear();

    await this.channel?.close().catch((error: unknown) => {
      this.logger.warn(`Error closing consumer channel: ${getErrorMessageString(error)}`);
    });
    await this.connection?.close().catch((error: unknown) => {
      this.logger.warn(`Error closing consumer connection: ${getErrorMessageString(error)}`);
    });
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown) {
      return;
    }
    const delay =
      this.configService.get<number>('rabbitmq.reconnectDelayMs') ??
      MESSAGING_CONSTANTS.RECONNECT_DELAY_MS;
    setTimeout(() => void this.connect(), delay);
  }

  private async connect(): Promise<void> {
    try {
      const url = this.configService.get<string>('rabbitmq.url');
      if (!url) {
        this.logger.warn('RabbitMQ URL not configured, consumer disabled');
        return;
      }

      this.connection = await amqp.connect(url);
      this.channel = await this.connection.createChannel();

      await setupAmqpInfrastructure(this.channel);

      const prefetchCount =
        MESSAGING_CONSTANTS.BATCH_SIZE * MESSAGING_CONSTANTS.PREFETCH_MULTIPLIER;
      await this.channel.prefetch(prefetchCount);

      for (const queue of QUEUE_CONFIGS) {
        await this.channel.consume(queue.name, (msg) => this.collectForBatch(msg, queue.name), {
          noAck: false,
        });
      }

      this.logger.log(
        `Event consumer connected to RabbitMQ (batch size: ${MESSAGING_CONSTANTS.BATCH_SIZE})`,
      );

      this.connection.on('error', (err: Error) => {
        this.logger.error(`RabbitMQ consumer connection error: ${err.message}`);
      });

      this.connection.on('close', () => {
        this.logger.warn('RabbitMQ consumer connection closed');
        this.scheduleReconnect();
      });
    } catch (error) {
      this.logger.error(`Failed to connect consumer: ${getErrorMessageString(error)}`);
      this.scheduleReconnect();
    }
  }

  private collectForBatch(msg: amqp.ConsumeMessage | null, queueName: string): void {
    if (!msg || !this.channel) {
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(msg.content.toString());
    } catch (error) {
      this.logger.error(`Failed to parse message from ${queueName}: ${getErrorMessageString(error)}`);
      this.channel.nack(msg, false, false);
      return;
    }

    if (!isLifecycleEvent(payload)) {
      this.logger.error(`Discarding malformed event from ${queueName}`);
      this.channel.nack(msg, false, false);
      return;
    }

    const pending = this.pendingMessages.get(queueName) ?? [];
    pending.push({ msg, payload, queueName, receivedAt: Date.now() });
    this.pendingMessages.set(queueName, pending);

    if (pending.length >= MESSAGING_CONSTANTS.BATCH_SIZE) {
      void this.processBatch(queueName);
    } else if (!this.batchTimers.has(queueName)) {
      const timer = setTimeout(() => {
        void this.processBatch(queueName);
      }, MESSAGING_CONSTANTS.BATCH_TIMEOUT_MS);
      this.batchTimers.set(queueName, timer);
    }
  }

  /** Handles every pending message of a queue concurrently; each is acked or dead-lettered. */
  async processBatch(queueName: string): Promise<BatchOutcome> {
    const timer = this.batchTimers.get(queueName);
    if (timer) {
      clearTimeout(timer);
      this.batchTimers.delete(queueName);
    }

    const pending = this.pendingMessages.get(queueName) ?? [];
    if (pending.length === 0) {
      return { succeeded: 0, failed: 0 };
    }

    this.pendingMessages.set(queueName, []);
    const startTime = Date.now();

    this.logger.debug(`Processing batch of ${pending.length} messages from ${queueName}`);

    const outcomes = await Promise.all(pending.map((item) => this.processMessageWithRetry(item)));
    const succeeded = outcomes.filter(Boolean).length;
    const failed = outcomes.length - succeeded;

    this.logger.log(
      `Batch processed: ${succeeded} succeeded, ${failed} failed in ${Date.now() - startTime}ms from ${queueName}`,
    );

    return { succeeded, failed };
  }

  private async processMessageWithRetry(item: PendingMessage): Promise<boolean> {
    const { msg, payload, queueName } = item;

    try {
      await withRetry(
        () => this.processEvent(payload),
        MESSAGE_RETRY_OPTIONS,
        this.logger,
        `Process event ${payload.eventId}`,
      );

      this.channel?.ack(msg);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to process message ${payload.eventId} from ${queueName} after retries: ${getErrorMessageString(error)}`,
      );
      this.channel?.nack(msg, false, false);
      return false;
    }
  }

  private async flushAllBatches(): Promise<void> {
    const flushes: Promise<BatchOutcome>[] = [];

    for (const queue of QUEUE_CONFIGS) {
      const pending = this.pendingMessages.get(queue.name) ?? [];
      if (pending.length > 0) {
        this.logger.log(`Flushing ${pending.length} pending messages from ${queue.name}`);
        flushes.push(this.processBatch(queue.name));
      }
    }

    await Promise.all(flushes);
  }

  async processEvent(event: LifecycleEvent): Promise<void> {
    const strategy = this.handlerStrategies.get(event.type);
    if (!strategy) {
      throw new Error(`Unhandled event type: ${event.type}`);
    }

    await strategy.handle(event);
  }
}
