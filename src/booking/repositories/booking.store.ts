import type { Booking, BookingState } from '../domain/booking.types';

export interface VersionedWrite {
  booking: Booking;
  /** Version the writer read; the update applies only if it still holds. */
  expectedVersion: number;
}

/**
 * Everything one admission writes. A store applies all of it or none of it.
 */
export interface BookingWriteSet {
  created?: Booking[];
  updated?: VersionedWrite[];
}

export interface BookingListFilter {
  roomId?: string;
  userId?: string;
  state?: BookingState;
  /** Bookings starting at or after this instant. */
  startsFrom?: Date;
  /** Bookings ending at or before this instant. */
  endsBy?: Date;
}

export interface PageRequest {
  /** 1-based. */
  page: number;
  perPage: number;
}

export interface BookingPage extends PageRequest {
  bookings: Booking[];
  total: number;
}

export interface BookingStore {
  findById(id: string): Promise<Booking | null>;

  /** Pending and confirmed bookings of a room, with their occurrences. */
  findActiveByRoom(roomId: string): Promise<Booking[]>;

  /** Bookings matching `filter`, ordered by start. */
  list(filter: BookingListFilter, page: PageRequest): Promise<BookingPage>;

  /**
   * Atomically insert new bookings with their occurrences and apply
   * version-checked updates, replacing the occurrences of each updated
   * booking. Throws `StaleBookingError` when any expected version no longer
   * matches; nothing is written in that case.
   */
  commit(writeSet: BookingWriteSet): Promise<void>;
}
