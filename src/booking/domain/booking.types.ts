import type { TimeRange } from './time-range';

export enum BookingState {
  Pending = 'pending',
  Confirmed = 'confirmed',
  Cancelled = 'cancelled',
  Rejected = 'rejected',
}

/** States whose occurrences occupy the room. */
export const ACTIVE_STATES: readonly BookingState[] = [
  BookingState.Pending,
  BookingState.Confirmed,
];

export enum RecurrenceFrequency {
  None = 'none',
  Daily = 'daily',
  Weekly = 'weekly',
  Monthly = 'monthly',
}

export enum Weekday {
  Monday = 'monday',
  Tuesday = 'tuesday',
  Wednesday = 'wednesday',
  Thursday = 'thursday',
  Friday = 'friday',
  Saturday = 'saturday',
  Sunday = 'sunday',
}

export interface RecurrencePattern {
  readonly frequency: RecurrenceFrequency;
  readonly interval: number;
  readonly endDate: Date | null;
  readonly count: number | null;
  readonly daysOfWeek: readonly Weekday[];
}

export interface Occurrence {
  readonly bookingId: string;
  readonly range: TimeRange;
  readonly sequenceIndex: number;
}

export interface CancellationDetails {
  readonly reason: string;
  readonly cancelledBy: string;
  readonly cancelledAt: Date;
  /** Set when an override admission displaced this booking. */
  readonly supersededBy: string | null;
}

export interface Booking {
  readonly id: string;
  readonly roomId: string;
  readonly userId: string;
  readonly title: string;
  readonly description: string | null;
  /** Expected headcount, when given. */
  readonly attendees: number | null;
  /** Base occurrence; the recurrence expands from it. */
  readonly range: TimeRange;
  readonly recurrence: RecurrencePattern | null;
  readonly state: BookingState;
  readonly occurrences: readonly Occurrence[];
  readonly version: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly cancellation: CancellationDetails | null;
}

export type ActorRole = 'user' | 'facility_manager' | 'admin' | 'auditor';

export interface Actor {
  readonly id: string;
  readonly role: ActorRole;
}

export const SYSTEM_ACTOR_ID = 'system';

export interface AvailabilityWindow {
  readonly roomId: string;
  readonly queryRange: TimeRange;
  readonly busy: readonly TimeRange[];
  readonly free: readonly TimeRange[];
}

export interface ConflictPair {
  readonly candidate: Occurrence;
  readonly existing: Occurrence;
}
