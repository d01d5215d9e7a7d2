import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import * as amqp from 'amqplib';
import { CLOCK, Clock } from '@infrastructure/clock/clock';
import { getErrorMessageString } from '@common/utils/error.util';
import { MESSAGING_CONSTANTS } from '../messaging.constants';
import { setupAmqpInfrastructure } from '../amqp-setup.util';
import {
  BookingEvent,
  BookingEventType,
  LifecycleEvent,
  SeatEvent,
  SeatReleaseReason,
} from './event.types';
import type { BookingStatus } from '@modules/bookings/booking-status';

export interface PublishableBooking {
  id: string;
  bookingReference: string;
  userId: string;
  scheduleId: string;
  status: BookingStatus;
  totalAmount: number | string;
  seats?: Array<{ seatLabel: string }>;
}

export interface SeatsHeld {
  scheduleId: string;
  userId: string;
  seatLabels: string[];
  expiresAt: Date;
}

/**
 * Publishes lifecycle events on the topic exchange once the change behind them
 * has committed. Publishing never fails the caller: when the broker is
 * unreachable the event is logged and dropped.
 */
@Injectable()
export class EventPublisher implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(EventPublisher.name);
  private connection: amqp.ChannelModel | null = null;
  private channel: amqp.ConfirmChannel | null = null;
  private isConnected = false;
  private isShuttingDown = false;

  constructor(
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.connect();
  }

  async onModuleDestroy(): Promise<void> {
    this.isShuttingDown = true;
    this.isConnected = false;
    await this.channel?.close().catch((error: unknown) => {
      this.logger.warn(`Error closing publisher channel: ${getErrorMessageString(error)}`);
    });
    await this.connection?.close().catch((error: unknown) => {
      this.logger.warn(`Error closing publisher connection: ${getErrorMessageString(error)}`);
    });
  }

  private get reconnectDelayMs(): number {
    return (
      this.configService.get<number>('rabbitmq.reconnectDelayMs') ??
      MESSAGING_CONSTANTS.RECONNECT_DELAY_MS
    );
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown) {
      return;
    }
    setTimeout(() => void this.connect(), this.reconnectDelayMs);
  }

  private async connect(): Promise<void> {
    try {
      const url = this.configService.get<string>('rabbitmq.url');
      if (!url) {
        this.logger.warn('RabbitMQ URL not configured, messaging disabled');
        return;
      }

      this.connection = await amqp.connect(url);
      this.channel = await this.connection.createConfirmChannel();

      await setupAmqpInfrastructure(this.channel);

      this.isConnected = true;
      this.logger.log('Connected to RabbitMQ');

      this.connection.on('error', (err: Error) => {
        this.logger.error(`RabbitMQ connection error: ${err.message}`);
        this.isConnected = false;
      });

      this.connection.on('close', () => {
        this.logger.warn('RabbitMQ connection closed');
        this.isConnected = false;
        this.scheduleReconnect();
      });
    } catch (error) {
      this.logger.error(`Failed to connect to RabbitMQ: ${getErrorMessageString(error)}`);
      this.scheduleReconnect();
    }
  }

  private async publish(message: LifecycleEvent): Promise<void> {
    if (!this.isConnected || !this.channel) {
      this.logger.warn(`Cannot publish ${message.type}, not connected to RabbitMQ`);
      return;
    }

    try {
      this.channel.publish(
        MESSAGING_CONSTANTS.EXCHANGE_NAME,
        message.type,
        Buffer.from(JSON.stringify(message)),
        {
          persistent: true,
          contentType: 'application/json',
          messageId: message.eventId,
          type: message.type,
          timestamp: Math.floor(this.clock.now().getTime() / 1000),
        },
      );
      await this.channel.waitForConfirms();
      this.logger.debug(`Published ${message.type}: ${JSON.stringify(message)}`);
    } catch (error) {
      this.logger.error(`Failed to publish ${message.type}: ${getErrorMessageString(error)}`);
    }
  }

  async publishSeatsHeld(held: SeatsHeld): Promise<void> {
    const event: SeatEvent = {
      eventId: randomUUID(),
      type: 'seat.held',
      scheduleId: held.scheduleId,
      seatLabels: held.seatLabels,
      userId: held.userId,
      expiresAt: held.expiresAt.toISOString(),
      timestamp: this.clock.now().toISOString(),
    };
    await this.publish(event);
  }

  async publishSeatsReleased(
    scheduleId: string,
    seatLabels: string[],
    reason: SeatReleaseReason,
    userId: string | null = null,
  ): Promise<void> {
    if (seatLabels.length === 0) {
      return;
    }

    const event: SeatEvent = {
      eventId: randomUUID(),
      type: 'seat.released',
      scheduleId,
      seatLabels,
      userId,
      reason,
      timestamp: this.clock.now().toISOString(),
    };
    await this.publish(event);
  }

  async publishBookingCreated(booking: PublishableBooking): Promise<void> {
    await this.publish(this.bookingEvent('booking.created', booking));
  }

  async publishBookingConfirmed(booking: PublishableBooking): Promise<void> {
    await this.publish(this.bookingEvent('booking.confirmed', booking));
  }

  async publishBookingCancelled(booking: PublishableBooking): Promise<void> {
    await this.publish(this.bookingEvent('booking.cancelled', booking));
  }

  async publishBookingExpired(booking: PublishableBooking): Promise<void> {
    await this.publish(this.bookingEvent('booking.expired', booking));
  }

  private bookingEvent(type: BookingEventType, booking: PublishableBooking): BookingEvent {
    return {
      eventId: randomUUID(),
      type,
      bookingId: booking.id,
      bookingReference: booking.bookingReference,
      userId: booking.userId,
      scheduleId: booking.scheduleId,
      seatLabels: booking.seats?.map((seat) => seat.seatLabel) ?? [],
      status: booking.status,
      totalAmount: Number(booking.totalAmount),
      timestamp: this.clock.now().toISOString(),
    };
  }
}
