import { Type } from 'class-transformer';
import {
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { BookingState } from '../domain/booking.types';

export class ListBookingsQueryDto {
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  room_id?: string;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  user_id?: string;

  @IsEnum(BookingState)
  @IsOptional()
  state?: BookingState;

  /** Bookings starting at or after. */
  @IsDateString()
  @IsOptional()
  start_date?: string;

  /** Bookings ending at or before. */
  @IsDateString()
  @IsOptional()
  end_date?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  page?: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  per_page?: number;
}

export class RoomConflictsQueryDto {
  @IsString()
  @IsNotEmpty()
  room_id!: string;
}
