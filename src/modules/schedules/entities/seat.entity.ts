import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Schedule } from './schedule.entity';

/**
 * One position in a schedule's seat layout. Hold and booking state is not
 * stored here; it is derived from seat holds and bookings.
 */
@Entity('seats')
@Unique(['scheduleId', 'seatLabel'])
export class Seat {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'schedule_id', type: 'uuid' })
  scheduleId!: string;

  @ManyToOne(() => Schedule, (schedule) => schedule.seats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'schedule_id' })
  schedule!: Schedule;

  @Column({ name: 'seat_label', length: 10 })
  seatLabel!: string;

  @Column({ length: 5 })
  row!: string;

  @Column({ name: 'seat_number', length: 10 })
  seatNumber!: string;
}
