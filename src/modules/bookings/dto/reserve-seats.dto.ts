import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsString,
  IsUUID,
  Matches,
} from 'class-validator';

export const MAX_SEATS_PER_REQUEST = 10;

export const SEAT_LABEL_FORMAT = /^[A-Z]{1,5}\d{1,5}$/;

export const normalizeLabels = ({ value }: { value: unknown }): unknown =>
  Array.isArray(value)
    ? value.map((label) => (typeof label === 'string' ? label.trim().toUpperCase() : label))
    : value;

export class ReserveSeatsDto {
  @ApiProperty({ example: '6f1c2a9e-8d4b-4c3e-9a57-2b0d1e4f6a10' })
  @IsUUID()
  scheduleId!: string;

  @ApiProperty({ example: ['A1', 'A2'], description: 'Seat labels from the schedule layout' })
  @Transform(normalizeLabels)
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(MAX_SEATS_PER_REQUEST)
  @IsString({ each: true })
  @Matches(SEAT_LABEL_FORMAT, { each: true, message: 'each seat label must look like A1' })
  seatLabels!: string[];
}
