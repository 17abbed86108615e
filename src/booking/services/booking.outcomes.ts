import type {
  Actor,
  Booking,
  ConflictPair,
  RecurrencePattern,
} from '../domain/booking.types';
import type { TimeRange } from '../domain/time-range';
import type { LockRejectReason } from './room-lock.service';

export interface CreateBookingCommand {
  roomId: string;
  actor: Actor;
  title: string;
  description?: string | null;
  attendees?: number | null;
  range: TimeRange;
  recurrence?: RecurrencePattern | null;
  /** Force confirmation over conflicts; requires an override role. */
  override?: boolean;
}

export interface RescheduleBookingCommand {
  bookingId: string;
  actor: Actor;
  range: TimeRange;
  /** Omit to keep the current pattern, `null` to drop it. */
  recurrence?: RecurrencePattern | null;
  expectedVersion: number;
  override?: boolean;
}

export interface AdmissionOptions {
  /** Aborting before the room is acquired yields `busy` with no side effects. */
  signal?: AbortSignal;
}

export interface ConfirmedOutcome {
  status: 'confirmed';
  booking: Booking;
  /** Bookings cancelled by an override admission. */
  superseded: Booking[];
}

export interface ConflictOutcome {
  status: 'conflict';
  /** The rejected booking on create, the unchanged booking on reschedule. */
  booking: Booking;
  conflicts: ConflictPair[];
  conflictingBookingIds: string[];
  suggestions: TimeRange[];
}

export interface StaleOutcome {
  status: 'stale';
  bookingId: string;
  expectedVersion: number;
  currentVersion: number | null;
}

export interface BusyOutcome {
  status: 'busy';
  roomId: string;
  reason: LockRejectReason;
}

export interface CancelledOutcome {
  status: 'cancelled';
  booking: Booking;
}

export type CreateBookingOutcome = ConfirmedOutcome | ConflictOutcome | BusyOutcome;

export type RescheduleBookingOutcome =
  | ConfirmedOutcome
  | ConflictOutcome
  | StaleOutcome
  | BusyOutcome;

export type CancelBookingOutcome = CancelledOutcome | BusyOutcome;
