import { BookingState, RecurrenceFrequency, Weekday } from '../../domain/booking.types';
import { BookingOccurrenceEntity } from '../../entities/booking-occurrence.entity';
import { bookingFixture } from '../../testing/booking.fixtures';
import {
  fromRecurrenceColumn,
  toBooking,
  toBookingEntity,
  toOccurrenceEntities,
} from './booking.mapper';

describe('booking mapper', () => {
  const booking = {
    ...bookingFixture({
      id: 'b1',
      ranges: [
        ['2025-01-06T09:00:00Z', '2025-01-06T10:00:00Z'],
        ['2025-01-08T09:00:00Z', '2025-01-08T10:00:00Z'],
      ],
      recurrence: {
        frequency: RecurrenceFrequency.Weekly,
        interval: 1,
        endDate: new Date('2025-01-08T09:00:00Z'),
        count: null,
        daysOfWeek: [Weekday.Monday, Weekday.Wednesday],
      },
    }),
    description: 'Sprint review',
    attendees: 8,
    state: BookingState.Cancelled,
    cancellation: {
      reason: 'Superseded by booking b2',
      cancelledBy: 'system',
      cancelledAt: new Date('2025-01-02T00:00:00Z'),
      supersededBy: 'b2',
    },
  };

  it('should flatten a booking into columns', () => {
    const entity = toBookingEntity(booking);

    expect(entity.room_id).toBe('room-a');
    expect([entity.title, entity.description, entity.attendees]).toEqual([
      'Team sync',
      'Sprint review',
      8,
    ]);
    expect(entity.recurrence).toEqual({
      frequency: 'weekly',
      interval: 1,
      endDate: '2025-01-08T09:00:00.000Z',
      count: null,
      daysOfWeek: ['monday', 'wednesday'],
    });
    expect(entity.superseded_by).toBe('b2');
    expect(entity.cancelled_by).toBe('system');
  });

  it('should number occurrence rows by sequence', () => {
    const rows = toOccurrenceEntities(booking);
    expect(rows.map((row) => [row.sequence_index, row.start_time.toISOString()])).toEqual([
      [0, '2025-01-06T09:00:00.000Z'],
      [1, '2025-01-08T09:00:00.000Z'],
    ]);
    expect(rows.every((row) => row.room_id === 'room-a' && row.booking_id === 'b1')).toBe(true);
  });

  it('should rebuild the booking from its rows', () => {
    const entity = toBookingEntity(booking);
    entity.occurrences = toOccurrenceEntities(booking).reverse();

    expect(toBooking(entity)).toEqual(booking);
  });

  it('should leave cancellation empty for an active booking', () => {
    const entity = toBookingEntity(bookingFixture({
      id: 'b3',
      ranges: [['2025-01-06T09:00:00Z', '2025-01-06T10:00:00Z']],
    }));
    entity.occurrences = [];

    const mapped = toBooking(entity);
    expect(mapped.cancellation).toBeNull();
    expect(mapped.occurrences).toEqual([]);
  });

  it('should refuse unknown recurrence values', () => {
    expect(() =>
      fromRecurrenceColumn({
        frequency: 'yearly',
        interval: 1,
        endDate: null,
        count: 2,
        daysOfWeek: [],
      }),
    ).toThrow('Cannot map recurrence: unknown frequency "yearly"');
    expect(() =>
      fromRecurrenceColumn({
        frequency: 'weekly',
        interval: 1,
        endDate: null,
        count: 2,
        daysOfWeek: ['funday'],
      }),
    ).toThrow('Cannot map recurrence: unknown weekday "funday"');
  });

  it('should keep occurrence entities typed', () => {
    expect(toOccurrenceEntities(booking)[0]).toBeInstanceOf(BookingOccurrenceEntity);
  });
});
