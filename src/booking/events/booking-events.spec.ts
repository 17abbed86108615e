import {
  BookingEvent,
  BookingEventType,
  InMemoryBookingEventSink,
} from './booking-events';

describe('InMemoryBookingEventSink', () => {
  let sink: InMemoryBookingEventSink;

  const event: BookingEvent = {
    eventType: BookingEventType.Confirmed,
    bookingId: 'b1',
    roomId: 'room-a',
    version: 2,
    timestamp: '2025-01-01T00:00:00.000Z',
  };

  beforeEach(() => {
    sink = new InMemoryBookingEventSink();
  });

  it('should deliver events to handlers of that type only', async () => {
    const confirmed = jest.fn();
    const cancelled = jest.fn();
    sink.subscribe(BookingEventType.Confirmed, confirmed);
    sink.subscribe(BookingEventType.Cancelled, cancelled);

    await sink.publish(event);

    expect(confirmed).toHaveBeenCalledWith(event);
    expect(cancelled).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', async () => {
    const handler = jest.fn();
    const unsubscribe = sink.subscribe(BookingEventType.Confirmed, handler);
    unsubscribe();

    await sink.publish(event);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should surface handler failures to the publisher', async () => {
    sink.subscribe(BookingEventType.Confirmed, async () => {
      throw new Error('handler down');
    });
    await expect(sink.publish(event)).rejects.toThrow('handler down');
  });

  it('should drop every subscriber on clear', async () => {
    const handler = jest.fn();
    sink.subscribe(BookingEventType.Confirmed, handler);
    sink.clearAllSubscribers();

    await sink.publish(event);
    expect(handler).not.toHaveBeenCalled();
  });
});
