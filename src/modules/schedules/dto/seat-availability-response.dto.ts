import { ApiProperty } from '@nestjs/swagger';
import { SeatAvailabilityDto } from './seat-response.dto';

export class SeatAvailabilityResponseDto {
  @ApiProperty()
  scheduleId!: string;

  @ApiProperty({ description: 'Instant the availability was computed at' })
  asOf!: Date;

  @ApiProperty()
  capacity!: number;

  @ApiProperty()
  availableSeats!: number;

  @ApiProperty()
  heldSeats!: number;

  @ApiProperty()
  bookedSeats!: number;

  @ApiProperty({ type: [SeatAvailabilityDto] })
  seats!: SeatAvailabilityDto[];
}
