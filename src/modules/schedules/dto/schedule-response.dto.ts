import { ApiProperty } from '@nestjs/swagger';
import { SeatResponseDto } from './seat-response.dto';

export class ScheduleResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'The Grand Budapest Hotel' })
  movieTitle!: string;

  @ApiProperty({ example: 3 })
  screenNumber!: number;

  @ApiProperty()
  startTime!: Date;

  @ApiProperty()
  endTime!: Date;

  @ApiProperty({ example: 12.75 })
  ticketPrice!: number;

  @ApiProperty({ required: false })
  capacity?: number;

  @ApiProperty({ type: [SeatResponseDto], required: false })
  seats?: SeatResponseDto[];
}
