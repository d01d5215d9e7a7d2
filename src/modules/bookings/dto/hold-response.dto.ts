import { ApiProperty } from '@nestjs/swagger';

export class HoldResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  scheduleId!: string;

  @ApiProperty({ example: 'A1' })
  seatLabel!: string;

  @ApiProperty()
  userId!: string;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  expiresAt!: Date;
}
