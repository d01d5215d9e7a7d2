import { Controller, Get, Param, ParseUUIDPipe } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SchedulesService } from './schedules.service';
import { ScheduleResponseDto } from './dto/schedule-response.dto';
import { Schedule } from './entities/schedule.entity';
import { Seat } from './entities/seat.entity';

@ApiTags('schedules')
@Controller('schedules')
export class SchedulesController {
  constructor(private readonly schedulesService: SchedulesService) {}

  @Get()
  @ApiOperation({ summary: 'List schedules ordered by start time' })
  @ApiResponse({ status: 200, type: [ScheduleResponseDto] })
  async findAll(): Promise<ScheduleResponseDto[]> {
    const schedules = await this.schedulesService.findAll();
    return schedules.map((schedule) => this.toResponseDto(schedule));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a schedule with its seat layout' })
  @ApiResponse({ status: 200, type: ScheduleResponseDto })
  @ApiResponse({ status: 404, description: 'Schedule not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<ScheduleResponseDto> {
    const layout = await this.schedulesService.getSeatLayout(id);
    return this.toResponseDto(layout.schedule, layout.seats);
  }

  private toResponseDto(schedule: Schedule, seats?: Seat[]): ScheduleResponseDto {
    return {
      id: schedule.id,
      movieTitle: schedule.movieTitle,
      screenNumber: schedule.screenNumber,
      startTime: schedule.startTime,
      endTime: schedule.endTime,
      ticketPrice: Number(schedule.ticketPrice),
      capacity: seats?.length,
      seats: seats?.map((seat) => ({
        seatLabel: seat.seatLabel,
        row: seat.row,
        seatNumber: seat.seatNumber,
      })),
    };
  }
}
