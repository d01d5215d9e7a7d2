import { ApiProperty } from '@nestjs/swagger';
import { SeatResponseDto } from '@modules/schedules/dto/seat-response.dto';
import { BookingStatus } from '../booking-status';

export class BookingResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'BK-3F9A0C11D2E4' })
  bookingReference!: string;

  @ApiProperty()
  userId!: string;

  @ApiProperty()
  scheduleId!: string;

  @ApiProperty({ enum: BookingStatus })
  status!: BookingStatus;

  @ApiProperty({ example: 25.5 })
  totalAmount!: number;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  expiresAt!: Date;

  @ApiProperty({ nullable: true, type: Date })
  confirmedAt!: Date | null;

  @ApiProperty({ nullable: true, type: Date })
  cancelledAt!: Date | null;

  @ApiProperty({ type: [SeatResponseDto] })
  seats!: SeatResponseDto[];
}
