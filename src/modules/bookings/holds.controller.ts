import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '@common/decorators/current-user.decorator';
import { HoldRateLimit, RateLimit } from '@common/decorators/rate-limit.decorator';
import { SeatHoldsService } from './seat-holds.service';
import { ReserveSeatsDto } from './dto/reserve-seats.dto';
import { HoldResponseDto } from './dto/hold-response.dto';
import { toHoldResponse } from './dto/booking.mapper';

@ApiTags('holds')
@ApiHeader({ name: 'X-User-Id', description: 'Authenticated user id (UUID)', required: true })
@Controller()
@RateLimit({ points: 60, duration: 60 })
export class HoldsController {
  constructor(private readonly seatHoldsService: SeatHoldsService) {}

  @Post('holds')
  @HoldRateLimit()
  @ApiOperation({ summary: 'Hold seats for 15 minutes, all or nothing' })
  @ApiResponse({ status: 201, type: [HoldResponseDto] })
  @ApiResponse({ status: 400, description: 'Seat not in the schedule layout' })
  @ApiResponse({ status: 409, description: 'Seats already held or booked' })
  async reserve(
    @Body() dto: ReserveSeatsDto,
    @CurrentUser() userId: string,
  ): Promise<HoldResponseDto[]> {
    const holds = await this.seatHoldsService.reserve(dto.scheduleId, dto.seatLabels, userId);
    return holds.map(toHoldResponse);
  }

  @Get('holds')
  @ApiOperation({ summary: "List the caller's active holds" })
  @ApiResponse({ status: 200, type: [HoldResponseDto] })
  async list(@CurrentUser() userId: string): Promise<HoldResponseDto[]> {
    const holds = await this.seatHoldsService.listHolds(userId);
    return holds.map(toHoldResponse);
  }

  @Delete('holds/:id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Release a hold by id' })
  @ApiResponse({ status: 200, type: HoldResponseDto })
  @ApiResponse({ status: 403, description: 'No active hold owned by the caller' })
  async release(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() userId: string,
  ): Promise<HoldResponseDto> {
    return toHoldResponse(await this.seatHoldsService.release(id, userId));
  }

  @Delete('schedules/:scheduleId/holds/:seatLabel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Release the hold on one seat of a schedule' })
  @ApiResponse({ status: 200, type: HoldResponseDto })
  @ApiResponse({ status: 403, description: 'No active hold owned by the caller' })
  async releaseSeat(
    @Param('scheduleId', ParseUUIDPipe) scheduleId: string,
    @Param('seatLabel') seatLabel: string,
    @CurrentUser() userId: string,
  ): Promise<HoldResponseDto> {
    return toHoldResponse(await this.seatHoldsService.releaseSeat(scheduleId, seatLabel, userId));
  }
}
