import {
  Body,
  ConflictException,
  Controller,
  Delete,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ENGINE_CONFIG, EngineConfig } from '../config/engine.config';
import { CurrentActor } from './actor.decorator';
import { Actor, Booking } from './domain/booking.types';
import { createTimeRange } from './domain/time-range';
import { AvailabilityQueryDto } from './dto/availability-query.dto';
import {
  AvailabilityResponseDto,
  toAvailabilityResponse,
} from './dto/availability-response.dto';
import {
  BookingListResponseDto,
  BookingResponseDto,
  RoomConflictResponse,
  toBookingResponse,
  toBusyResponse,
  toConflictResponse,
  toRoomConflictResponse,
  toStaleResponse,
} from './dto/booking-response.dto';
import { CancelBookingDto } from './dto/cancel-booking.dto';
import { CreateBookingDto } from './dto/create-booking.dto';
import {
  ListBookingsQueryDto,
  RoomConflictsQueryDto,
} from './dto/list-bookings-query.dto';
import { toRecurrencePattern } from './dto/recurrence.dto';
import { RescheduleBookingDto } from './dto/reschedule-booking.dto';
import { BookingService } from './services/booking.service';
import { RecurrenceService } from './services/recurrence.service';

@Controller('bookings')
export class BookingController {
  constructor(
    private readonly bookingService: BookingService,
    private readonly recurrenceService: RecurrenceService,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createBooking(
    @Body() dto: CreateBookingDto,
    @CurrentActor() actor: Actor,
  ): Promise<BookingResponseDto> {
    const outcome = await this.bookingService.createBooking({
      roomId: dto.room_id,
      actor,
      title: dto.title,
      description: dto.description ?? null,
      attendees: dto.attendees ?? null,
      range: createTimeRange(new Date(dto.start_time), new Date(dto.end_time)),
      recurrence: dto.recurrence ? toRecurrencePattern(dto.recurrence) : null,
      override: dto.override,
    });

    switch (outcome.status) {
      case 'confirmed':
        return {
          ...this.present(outcome.booking),
          superseded_booking_ids: outcome.superseded.map((booking) => booking.id),
        };
      case 'conflict':
        throw new ConflictException(toConflictResponse(outcome));
      case 'busy':
        throw new ServiceUnavailableException(toBusyResponse(outcome));
    }
  }

  @Get('availability')
  async getAvailability(
    @Query() query: AvailabilityQueryDto,
  ): Promise<AvailabilityResponseDto[]> {
    const windows = await this.bookingService.getAvailability(
      query.room_ids,
      createTimeRange(new Date(query.start_date), new Date(query.end_date)),
    );
    return windows.map(toAvailabilityResponse);
  }

  /** Overlaps between active bookings of a room; audit view for elevated roles. */
  @Get('conflicts')
  async getRoomConflicts(
    @Query() query: RoomConflictsQueryDto,
    @CurrentActor() actor: Actor,
  ): Promise<RoomConflictResponse[]> {
    if (actor.role !== 'auditor' && !this.config.overrideRoles.includes(actor.role)) {
      throw new ForbiddenException('Conflict audit requires an elevated role');
    }
    const pairs = await this.bookingService.findRoomConflicts(query.room_id);
    return pairs.map(toRoomConflictResponse);
  }

  @Get()
  async listBookings(
    @Query() query: ListBookingsQueryDto,
    @CurrentActor() actor: Actor,
  ): Promise<BookingListResponseDto> {
    const result = await this.bookingService.listBookings(
      actor,
      {
        roomId: query.room_id,
        userId: query.user_id,
        state: query.state,
        startsFrom: query.start_date === undefined ? undefined : new Date(query.start_date),
        endsBy: query.end_date === undefined ? undefined : new Date(query.end_date),
      },
      { page: query.page, perPage: query.per_page },
    );
    return {
      bookings: result.bookings.map((booking) => this.present(booking)),
      total: result.total,
      page: result.page,
      per_page: result.perPage,
    };
  }

  @Get(':id')
  async getBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentActor() actor: Actor,
  ): Promise<BookingResponseDto> {
    return this.present(await this.bookingService.getBookingFor(actor, id));
  }

  @Put(':id')
  async rescheduleBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RescheduleBookingDto,
    @CurrentActor() actor: Actor,
  ): Promise<BookingResponseDto> {
    const outcome = await this.bookingService.rescheduleBooking({
      bookingId: id,
      actor,
      range: createTimeRange(new Date(dto.start_time), new Date(dto.end_time)),
      recurrence:
        dto.recurrence === undefined || dto.recurrence === null
          ? dto.recurrence
          : toRecurrencePattern(dto.recurrence),
      expectedVersion: dto.expected_version,
      override: dto.override,
    });

    switch (outcome.status) {
      case 'confirmed':
        return {
          ...this.present(outcome.booking),
          superseded_booking_ids: outcome.superseded.map((booking) => booking.id),
        };
      case 'conflict':
        throw new ConflictException(toConflictResponse(outcome));
      case 'stale':
        throw new ConflictException(toStaleResponse(outcome));
      case 'busy':
        throw new ServiceUnavailableException(toBusyResponse(outcome));
    }
  }

  @Delete(':id')
  @HttpCode(HttpStatus.OK)
  async cancelBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: CancelBookingDto,
    @CurrentActor() actor: Actor,
  ): Promise<BookingResponseDto> {
    const outcome = await this.bookingService.cancelBooking(
      id,
      actor,
      dto.reason ?? 'Cancelled by user',
    );
    if (outcome.status === 'busy') {
      throw new ServiceUnavailableException(toBusyResponse(outcome));
    }
    return this.present(outcome.booking);
  }

  private present(booking: Booking): BookingResponseDto {
    return toBookingResponse(
      booking,
      this.recurrenceService.describe(booking.range, booking.recurrence),
    );
  }
}
