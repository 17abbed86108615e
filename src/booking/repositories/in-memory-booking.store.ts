import { StaleBookingError } from '../domain/booking.errors';
import { ACTIVE_STATES, Booking } from '../domain/booking.types';
import { compareByStart } from '../domain/time-range';
import type {
  BookingListFilter,
  BookingPage,
  BookingStore,
  BookingWriteSet,
  PageRequest,
} from './booking.store';

function copy(booking: Booking): Booking {
  return {
    ...booking,
    occurrences: [...booking.occurrences],
    cancellation: booking.cancellation ? { ...booking.cancellation } : null,
  };
}

/**
 * Process-local store for development and tests. Commits are validated in
 * full before any booking is written.
 */
export class InMemoryBookingStore implements BookingStore {
  private readonly bookings = new Map<string, Booking>();

  async findById(id: string): Promise<Booking | null> {
    const booking = this.bookings.get(id);
    return booking ? copy(booking) : null;
  }

  async findActiveByRoom(roomId: string): Promise<Booking[]> {
    return this.select(
      (booking) =>
        booking.roomId === roomId && ACTIVE_STATES.includes(booking.state),
    );
  }

  async list(filter: BookingListFilter, { page, perPage }: PageRequest): Promise<BookingPage> {
    const matching = this.select(
      (booking) =>
        (filter.roomId === undefined || booking.roomId === filter.roomId) &&
        (filter.userId === undefined || booking.userId === filter.userId) &&
        (filter.state === undefined || booking.state === filter.state) &&
        (filter.startsFrom === undefined || booking.range.start >= filter.startsFrom) &&
        (filter.endsBy === undefined || booking.range.end <= filter.endsBy),
    );
    const offset = (page - 1) * perPage;

    return {
      bookings: matching.slice(offset, offset + perPage),
      total: matching.length,
      page,
      perPage,
    };
  }

  async commit(writeSet: BookingWriteSet): Promise<void> {
    const created = writeSet.created ?? [];
    const updated = writeSet.updated ?? [];

    for (const booking of created) {
      if (this.bookings.has(booking.id)) {
        throw new Error(`Booking ${booking.id} already exists`);
      }
    }
    for (const { booking, expectedVersion } of updated) {
      const current = this.bookings.get(booking.id);
      if (!current || current.version !== expectedVersion) {
        throw new StaleBookingError(booking.id, expectedVersion);
      }
    }

    for (const booking of [...created, ...updated.map((write) => write.booking)]) {
      this.bookings.set(booking.id, copy(booking));
    }
  }

  private select(predicate: (booking: Booking) => boolean): Booking[] {
    return Array.from(this.bookings.values())
      .filter(predicate)
      .sort((a, b) => compareByStart(a.range, b.range))
      .map(copy);
  }
}
