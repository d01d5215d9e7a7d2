import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import type { Booking } from './booking.entity';

@Entity('booked_seats')
export class BookedSeat {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'booking_id', type: 'uuid' })
  bookingId!: string;

  @ManyToOne('Booking', 'seats', { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'booking_id' })
  booking?: Booking;

  @Column({ name: 'schedule_id', type: 'uuid' })
  scheduleId!: string;

  @Column({ name: 'seat_label', length: 10 })
  seatLabel!: string;

  @Column({ length: 5 })
  row!: string;

  @Column({ name: 'seat_number', length: 10 })
  seatNumber!: string;
}
