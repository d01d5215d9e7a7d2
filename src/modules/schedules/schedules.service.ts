import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Schedule } from './entities/schedule.entity';
import { Seat } from './entities/seat.entity';
import { sortSeatLabels } from '@common/utils/seat.util';

export interface SeatLayout {
  schedule: Schedule;
  scheduleId: string;
  ticketPrice: number;
  capacity: number;
  seats: Seat[];
  seatLabels: ReadonlySet<string>;
}

/**
 * Read-only view of the catalog: schedules and their seat layouts.
 * Schedules are created outside this service.
 */
@Injectable()
export class SchedulesService {
  constructor(
    @InjectRepository(Schedule)
    private readonly scheduleRepository: Repository<Schedule>,
    @InjectRepository(Seat)
    private readonly seatRepository: Repository<Seat>,
  ) {}

  async findAll(): Promise<Schedule[]> {
    return this.scheduleRepository.find({
      order: { startTime: 'ASC' },
    });
  }

  async findById(id: string): Promise<Schedule> {
    const schedule = await this.scheduleRepository.findOne({ where: { id } });

    if (!schedule) {
      throw new NotFoundException(`Schedule with ID ${id} not found`);
    }

    return schedule;
  }

  async getSeatLayout(scheduleId: string): Promise<SeatLayout> {
    const schedule = await this.findById(scheduleId);
    const seats = await this.seatRepository.find({ where: { scheduleId } });

    const ordered = sortSeatLabels(seats.map((seat) => seat.seatLabel));
    const byLabel = new Map(seats.map((seat) => [seat.seatLabel, seat]));

    return {
      schedule,
      scheduleId: schedule.id,
      ticketPrice: Number(schedule.ticketPrice),
      capacity: seats.length,
      seats: ordered.flatMap((label) => byLabel.get(label) ?? []),
      seatLabels: new Set(ordered),
    };
  }
}
