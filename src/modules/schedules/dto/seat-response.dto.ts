import { ApiProperty } from '@nestjs/swagger';
import { SeatAvailability } from '@common/utils/seat.util';

export class SeatResponseDto {
  @ApiProperty({ example: 'A1' })
  seatLabel!: string;

  @ApiProperty({ example: 'A' })
  row!: string;

  @ApiProperty({ example: '1' })
  seatNumber!: string;
}

export class SeatAvailabilityDto extends SeatResponseDto {
  @ApiProperty({ enum: SeatAvailability })
  status!: SeatAvailability;
}
