import {
  Booking,
  Occurrence,
  RecurrenceFrequency,
  RecurrencePattern,
  Weekday,
} from '../../domain/booking.types';
import { createTimeRange } from '../../domain/time-range';
import { BookingOccurrenceEntity } from '../../entities/booking-occurrence.entity';
import { BookingEntity, RecurrenceColumn } from '../../entities/booking.entity';

const FREQUENCY_VALUES: readonly string[] = Object.values(RecurrenceFrequency);
const WEEKDAY_VALUES: readonly string[] = Object.values(Weekday);

function isFrequency(value: string): value is RecurrenceFrequency {
  return FREQUENCY_VALUES.includes(value);
}

function isWeekday(value: string): value is Weekday {
  return WEEKDAY_VALUES.includes(value);
}

export function toRecurrenceColumn(
  pattern: RecurrencePattern | null,
): RecurrenceColumn | null {
  if (!pattern) return null;
  return {
    frequency: pattern.frequency,
    interval: pattern.interval,
    endDate: pattern.endDate ? pattern.endDate.toISOString() : null,
    count: pattern.count,
    daysOfWeek: [...pattern.daysOfWeek],
  };
}

export function fromRecurrenceColumn(
  column: RecurrenceColumn | null,
): RecurrencePattern | null {
  if (!column) return null;
  const { frequency } = column;
  if (!isFrequency(frequency)) {
    throw new Error(`Cannot map recurrence: unknown frequency "${frequency}"`);
  }
  const daysOfWeek = column.daysOfWeek.map((day) => {
    if (!isWeekday(day)) {
      throw new Error(`Cannot map recurrence: unknown weekday "${day}"`);
    }
    return day;
  });
  return {
    frequency,
    interval: column.interval,
    endDate: column.endDate ? new Date(column.endDate) : null,
    count: column.count,
    daysOfWeek,
  };
}

export function toBookingEntity(booking: Booking): BookingEntity {
  const entity = new BookingEntity();
  entity.id = booking.id;
  entity.room_id = booking.roomId;
  entity.user_id = booking.userId;
  entity.title = booking.title;
  entity.description = booking.description;
  entity.attendees = booking.attendees;
  entity.start_time = booking.range.start;
  entity.end_time = booking.range.end;
  entity.recurrence = toRecurrenceColumn(booking.recurrence);
  entity.state = booking.state;
  entity.version = booking.version;
  entity.cancellation_reason = booking.cancellation?.reason ?? null;
  entity.cancelled_by = booking.cancellation?.cancelledBy ?? null;
  entity.cancelled_at = booking.cancellation?.cancelledAt ?? null;
  entity.superseded_by = booking.cancellation?.supersededBy ?? null;
  entity.created_at = booking.createdAt;
  entity.updated_at = booking.updatedAt;
  return entity;
}

export function toOccurrenceEntities(booking: Booking): BookingOccurrenceEntity[] {
  return booking.occurrences.map((occurrence) => {
    const entity = new BookingOccurrenceEntity();
    entity.booking_id = booking.id;
    entity.room_id = booking.roomId;
    entity.start_time = occurrence.range.start;
    entity.end_time = occurrence.range.end;
    entity.sequence_index = occurrence.sequenceIndex;
    return entity;
  });
}

export function toBooking(entity: BookingEntity): Booking {
  const occurrences: Occurrence[] = (entity.occurrences ?? [])
    .map((row) => ({
      bookingId: entity.id,
      range: createTimeRange(row.start_time, row.end_time),
      sequenceIndex: row.sequence_index,
    }))
    .sort((a, b) => a.sequenceIndex - b.sequenceIndex);

  return {
    id: entity.id,
    roomId: entity.room_id,
    userId: entity.user_id,
    title: entity.title,
    description: entity.description,
    attendees: entity.attendees,
    range: createTimeRange(entity.start_time, entity.end_time),
    recurrence: fromRecurrenceColumn(entity.recurrence),
    state: entity.state,
    occurrences,
    version: entity.version,
    createdAt: entity.created_at,
    updatedAt: entity.updated_at,
    cancellation:
      entity.cancelled_at && entity.cancelled_by
        ? {
            reason: entity.cancellation_reason ?? '',
            cancelledBy: entity.cancelled_by,
            cancelledAt: entity.cancelled_at,
            supersededBy: entity.superseded_by,
          }
        : null,
  };
}
