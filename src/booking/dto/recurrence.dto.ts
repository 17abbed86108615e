import {
  IsArray,
  IsDateString,
  IsEnum,
  IsInt,
  IsOptional,
  Min,
} from 'class-validator';
import {
  RecurrenceFrequency,
  RecurrencePattern,
  Weekday,
} from '../domain/booking.types';

export class RecurrenceDto {
  @IsEnum(RecurrenceFrequency)
  frequency!: RecurrenceFrequency;

  @IsInt()
  @Min(1)
  @IsOptional()
  interval?: number;

  @IsDateString()
  @IsOptional()
  end_date?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  count?: number;

  @IsArray()
  @IsEnum(Weekday, { each: true })
  @IsOptional()
  days_of_week?: Weekday[];
}

export function toRecurrencePattern(dto: RecurrenceDto): RecurrencePattern {
  return {
    frequency: dto.frequency,
    interval: dto.interval ?? 1,
    endDate: dto.end_date === undefined ? null : new Date(dto.end_date),
    count: dto.count ?? null,
    daysOfWeek: dto.days_of_week ?? [],
  };
}
