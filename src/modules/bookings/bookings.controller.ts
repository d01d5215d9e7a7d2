import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CurrentUser } from '@common/decorators/current-user.decorator';
import { RateLimit, WriteRateLimit } from '@common/decorators/rate-limit.decorator';
import { BookingsService } from './bookings.service';
import { PromoteBookingDto } from './dto/promote-booking.dto';
import { BookingResponseDto } from './dto/booking-response.dto';
import { toBookingResponse } from './dto/booking.mapper';
import { IDEMPOTENCY_KEY_MAX_LENGTH } from './entities/booking.entity';

@ApiTags('bookings')
@ApiHeader({ name: 'X-User-Id', description: 'Authenticated user id (UUID)', required: true })
@Controller('bookings')
@RateLimit({ points: 60, duration: 60 })
export class BookingsController {
  constructor(private readonly bookingsService: BookingsService) {}

  @Post()
  @WriteRateLimit()
  @ApiOperation({ summary: 'Turn held seats into a pending booking' })
  @ApiHeader({
    name: 'Idempotency-Key',
    description: `Repeating a request with the same key returns the first booking (at most ${IDEMPOTENCY_KEY_MAX_LENGTH} characters)`,
    required: false,
  })
  @ApiResponse({ status: 201, type: BookingResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid body or Idempotency-Key too long' })
  @ApiResponse({ status: 409, description: 'A seat is not held by the caller' })
  @ApiResponse({ status: 410, description: 'A hold expired' })
  async promote(
    @Body() dto: PromoteBookingDto,
    @CurrentUser() userId: string,
    @Headers('Idempotency-Key') idempotencyKey?: string,
  ): Promise<BookingResponseDto> {
    if (idempotencyKey && idempotencyKey.length > IDEMPOTENCY_KEY_MAX_LENGTH) {
      throw new BadRequestException(
        `Idempotency-Key must be at most ${IDEMPOTENCY_KEY_MAX_LENGTH} characters`,
      );
    }

    const booking = await this.bookingsService.promoteToBooking({
      scheduleId: dto.scheduleId,
      seatLabels: dto.seatLabels,
      userId,
      totalAmount: dto.totalAmount,
      idempotencyKey: idempotencyKey || undefined,
    });
    return toBookingResponse(booking);
  }

  @Get()
  @ApiOperation({ summary: "List the caller's bookings, newest first" })
  @ApiResponse({ status: 200, type: [BookingResponseDto] })
  async findMine(@CurrentUser() userId: string): Promise<BookingResponseDto[]> {
    const bookings = await this.bookingsService.findForUser(userId);
    return bookings.map(toBookingResponse);
  }

  @Get(':reference')
  @ApiOperation({ summary: "Get one of the caller's bookings by reference" })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 404, description: 'Booking not found' })
  async findOne(
    @Param('reference') reference: string,
    @CurrentUser() userId: string,
  ): Promise<BookingResponseDto> {
    return toBookingResponse(await this.bookingsService.findByReference(reference, userId));
  }

  @Post(':reference/confirm')
  @HttpCode(HttpStatus.OK)
  @WriteRateLimit()
  @ApiOperation({ summary: 'Confirm a pending booking' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 409, description: 'Booking already finalized or expired' })
  async confirm(
    @Param('reference') reference: string,
    @CurrentUser() userId: string,
  ): Promise<BookingResponseDto> {
    return toBookingResponse(await this.bookingsService.confirm(reference, userId));
  }

  @Post(':reference/cancel')
  @HttpCode(HttpStatus.OK)
  @WriteRateLimit()
  @ApiOperation({ summary: 'Cancel a pending or confirmed booking' })
  @ApiResponse({ status: 200, type: BookingResponseDto })
  @ApiResponse({ status: 403, description: 'Booking belongs to another user' })
  @ApiResponse({ status: 409, description: 'Booking already cancelled or expired' })
  async cancel(
    @Param('reference') reference: string,
    @CurrentUser() userId: string,
  ): Promise<BookingResponseDto> {
    return toBookingResponse(await this.bookingsService.cancel(reference, userId));
  }
}
