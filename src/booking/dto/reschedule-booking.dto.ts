import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDateString,
  IsInt,
  IsNotEmpty,
  IsOptional,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { RecurrenceDto } from './recurrence.dto';

export class RescheduleBookingDto {
  @IsDateString()
  @IsNotEmpty()
  start_time!: string;

  @IsDateString()
  @IsNotEmpty()
  end_time!: string;

  /** Omit to keep the current pattern; `null` turns the booking into a single one. */
  @ValidateNested()
  @Type(() => RecurrenceDto)
  @ValidateIf((o: RescheduleBookingDto) => o.recurrence !== null && o.recurrence !== undefined)
  recurrence?: RecurrenceDto | null;

  @IsInt()
  @Min(1)
  expected_version!: number;

  @IsBoolean()
  @IsOptional()
  override?: boolean;
}
