import { InvalidTransitionError } from './booking.errors';
import {
  ACTIVE_STATES,
  Booking,
  BookingState,
  CancellationDetails,
  Occurrence,
  RecurrencePattern,
} from './booking.types';
import type { TimeRange } from './time-range';

const TRANSITIONS: Record<BookingState, readonly BookingState[]> = {
  [BookingState.Pending]: [
    BookingState.Confirmed,
    BookingState.Rejected,
    BookingState.Cancelled,
  ],
  [BookingState.Confirmed]: [BookingState.Cancelled],
  [BookingState.Cancelled]: [],
  [BookingState.Rejected]: [],
};

export function canTransition(from: BookingState, to: BookingState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isActive(booking: Booking): boolean {
  return ACTIVE_STATES.includes(booking.state);
}

export interface NewBookingProps {
  id: string;
  roomId: string;
  userId: string;
  title: string;
  description: string | null;
  attendees: number | null;
  range: TimeRange;
  recurrence: RecurrencePattern | null;
  occurrences: readonly Occurrence[];
  now: Date;
}

export function newPendingBooking(props: NewBookingProps): Booking {
  return {
    id: props.id,
    roomId: props.roomId,
    userId: props.userId,
    title: props.title,
    description: props.description,
    attendees: props.attendees,
    range: props.range,
    recurrence: props.recurrence,
    state: BookingState.Pending,
    occurrences: props.occurrences,
    version: 1,
    createdAt: props.now,
    updatedAt: props.now,
    cancellation: null,
  };
}

export function transition(
  booking: Booking,
  to: BookingState,
  now: Date,
): Booking {
  if (!canTransition(booking.state, to)) {
    throw new InvalidTransitionError(booking.id, booking.state, to);
  }
  return {
    ...booking,
    state: to,
    version: booking.version + 1,
    updatedAt: now,
  };
}

export function cancel(
  booking: Booking,
  details: CancellationDetails,
): Booking {
  return {
    ...transition(booking, BookingState.Cancelled, details.cancelledAt),
    cancellation: details,
  };
}

/**
 * Replace the schedule of an active booking. Occurrences are swapped
 * wholesale, never patched.
 */
export function reschedule(
  booking: Booking,
  range: TimeRange,
  recurrence: RecurrencePattern | null,
  occurrences: readonly Occurrence[],
  now: Date,
): Booking {
  if (!isActive(booking)) {
    throw new InvalidTransitionError(booking.id, booking.state, 'rescheduled');
  }
  return {
    ...booking,
    range,
    recurrence,
    occurrences,
    version: booking.version + 1,
    updatedAt: now,
  };
}
