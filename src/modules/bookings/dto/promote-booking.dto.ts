import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  Min,
} from 'class-validator';
import { MAX_SEATS_PER_REQUEST, SEAT_LABEL_FORMAT, normalizeLabels } from './reserve-seats.dto';

export class PromoteBookingDto {
  @ApiProperty({ example: '6f1c2a9e-8d4b-4c3e-9a57-2b0d1e4f6a10' })
  @IsUUID()
  scheduleId!: string;

  @ApiProperty({ example: ['A1', 'A2'], description: 'Held seats to turn into a booking' })
  @Transform(normalizeLabels)
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(MAX_SEATS_PER_REQUEST)
  @IsString({ each: true })
  @Matches(SEAT_LABEL_FORMAT, { each: true, message: 'each seat label must look like A1' })
  seatLabels!: string[];

  @ApiPropertyOptional({
    example: 25.5,
    description: 'Defaults to seat count times the schedule ticket price',
  })
  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  totalAmount?: number;
}
