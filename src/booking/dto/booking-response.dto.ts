import type {
  Booking,
  ConflictPair,
  RecurrencePattern,
} from '../domain/booking.types';
import type { TimeRange } from '../domain/time-range';
import type {
  BusyOutcome,
  ConflictOutcome,
  StaleOutcome,
} from '../services/booking.outcomes';

export class TimeSlot {
  start_time!: string;
  end_time!: string;
}

export class OccurrenceResponse extends TimeSlot {
  sequence_index!: number;
}

export class RecurrenceResponse {
  frequency!: string;
  interval!: number;
  end_date!: string | null;
  count!: number | null;
  days_of_week!: string[];
}

export class CancellationResponse {
  reason!: string;
  cancelled_by!: string;
  cancelled_at!: string;
  superseded_by!: string | null;
}

export class BookingResponseDto {
  booking_id!: string;
  room_id!: string;
  user_id!: string;
  title!: string;
  description!: string | null;
  attendees!: number | null;
  start_time!: string;
  end_time!: string;
  state!: string;
  version!: number;
  recurrence!: RecurrenceResponse | null;
  recurrence_rule!: string | null;
  occurrences!: OccurrenceResponse[];
  cancellation!: CancellationResponse | null;
  created_at!: string;
  updated_at!: string;
  superseded_booking_ids?: string[];
}

export class BookingListResponseDto {
  bookings!: BookingResponseDto[];
  total!: number;
  page!: number;
  per_page!: number;
}

export class ConflictInfo {
  booking_id!: string;
  start_time!: string;
  end_time!: string;
  candidate_sequence_index!: number;
}

export class ConflictResponseDto {
  error!: 'BookingConflict';
  message!: string;
  booking_id!: string;
  state!: string;
  conflicts!: ConflictInfo[];
  conflicting_booking_ids!: string[];
  next_available_slots!: TimeSlot[];
}

export class RoomConflictResponse {
  booking_id!: string;
  start_time!: string;
  end_time!: string;
  conflicting_booking_id!: string;
  conflicting_start_time!: string;
  conflicting_end_time!: string;
}

export function toTimeSlot(range: TimeRange): TimeSlot {
  return {
    start_time: range.start.toISOString(),
    end_time: range.end.toISOString(),
  };
}

function toRecurrenceResponse(pattern: RecurrencePattern): RecurrenceResponse {
  return {
    frequency: pattern.frequency,
    interval: pattern.interval,
    end_date: pattern.endDate ? pattern.endDate.toISOString() : null,
    count: pattern.count,
    days_of_week: [...pattern.daysOfWeek],
  };
}

export function toBookingResponse(
  booking: Booking,
  recurrenceRule: string | null,
): BookingResponseDto {
  return {
    booking_id: booking.id,
    room_id: booking.roomId,
    user_id: booking.userId,
    title: booking.title,
    description: booking.description,
    attendees: booking.attendees,
    ...toTimeSlot(booking.range),
    state: booking.state,
    version: booking.version,
    recurrence: booking.recurrence ? toRecurrenceResponse(booking.recurrence) : null,
    recurrence_rule: recurrenceRule,
    occurrences: booking.occurrences.map((occurrence) => ({
      sequence_index: occurrence.sequenceIndex,
      ...toTimeSlot(occurrence.range),
    })),
    cancellation: booking.cancellation
      ? {
          reason: booking.cancellation.reason,
          cancelled_by: booking.cancellation.cancelledBy,
          cancelled_at: booking.cancellation.cancelledAt.toISOString(),
          superseded_by: booking.cancellation.supersededBy,
        }
      : null,
    created_at: booking.createdAt.toISOString(),
    updated_at: booking.updatedAt.toISOString(),
  };
}

function toConflictInfo(pair: ConflictPair): ConflictInfo {
  return {
    booking_id: pair.existing.bookingId,
    ...toTimeSlot(pair.existing.range),
    candidate_sequence_index: pair.candidate.sequenceIndex,
  };
}

export function toRoomConflictResponse(pair: ConflictPair): RoomConflictResponse {
  return {
    booking_id: pair.candidate.bookingId,
    ...toTimeSlot(pair.candidate.range),
    conflicting_booking_id: pair.existing.bookingId,
    conflicting_start_time: pair.existing.range.start.toISOString(),
    conflicting_end_time: pair.existing.range.end.toISOString(),
  };
}

export function toConflictResponse(outcome: ConflictOutcome): ConflictResponseDto {
  return {
    error: 'BookingConflict',
    message: `Booking conflicts with ${outcome.conflictingBookingIds.length} existing booking(s)`,
    booking_id: outcome.booking.id,
    state: outcome.booking.state,
    conflicts: outcome.conflicts.map(toConflictInfo),
    conflicting_booking_ids: outcome.conflictingBookingIds,
    next_available_slots: outcome.suggestions.map(toTimeSlot),
  };
}

export function toStaleResponse(outcome: StaleOutcome) {
  return {
    error: 'StaleBooking',
    message: `Booking ${outcome.bookingId} was modified concurrently`,
    booking_id: outcome.bookingId,
    expected_version: outcome.expectedVersion,
    current_version: outcome.currentVersion,
  };
}

export function toBusyResponse(outcome: BusyOutcome) {
  return {
    error: 'RoomBusy',
    message: `Room ${outcome.roomId} is busy, try again`,
    room_id: outcome.roomId,
    reason: outcome.reason,
  };
}
