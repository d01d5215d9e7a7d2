import { Controller, Get, Param, ParseUUIDPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SeatAvailabilityResponseDto } from '@modules/schedules/dto/seat-availability-response.dto';
import { normalizeSeatLabel } from '@common/utils/seat.util';
import { SeatAvailabilityService } from './seat-availability.service';

@ApiTags('schedules')
@Controller('schedules/:id/seats')
export class AvailabilityController {
  constructor(private readonly seatAvailabilityService: SeatAvailabilityService) {}

  @Get()
  @ApiOperation({ summary: 'Every seat of the schedule with its current status' })
  @ApiResponse({ status: 200, type: SeatAvailabilityResponseDto })
  @ApiResponse({ status: 404, description: 'Schedule not found' })
  async getAvailability(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<SeatAvailabilityResponseDto> {
    return this.seatAvailabilityService.getAvailability(id);
  }

  @Get(':seatLabel')
  @ApiOperation({ summary: 'Whether one seat can be held right now' })
  @ApiResponse({ status: 200, description: '{ seatLabel, available }' })
  @ApiResponse({ status: 400, description: 'Seat not in the schedule layout' })
  async isSeatAvailable(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('seatLabel') seatLabel: string,
  ): Promise<{ seatLabel: string; available: boolean }> {
    return {
      seatLabel: normalizeSeatLabel(seatLabel),
      available: await this.seatAvailabilityService.isSeatAvailable(id, seatLabel),
    };
  }
}
