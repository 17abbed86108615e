import { Logger } from '@nestjs/common';

export enum BookingEventType {
  Confirmed = 'booking.confirmed',
  Rejected = 'booking.rejected',
  Cancelled = 'booking.cancelled',
  Superseded = 'booking.superseded',
}

/**
 * Delivered at least once. Consumers deduplicate on `bookingId` + `version`.
 */
export interface BookingEvent {
  eventType: BookingEventType;
  bookingId: string;
  roomId: string;
  version: number;
  timestamp: string;
  reason?: string;
}

export type BookingEventHandler = (event: BookingEvent) => Promise<void> | void;

export interface BookingEventSink {
  publish(event: BookingEvent): Promise<void>;
}

export class InMemoryBookingEventSink implements BookingEventSink {
  private readonly logger = new Logger(InMemoryBookingEventSink.name);
  private readonly handlers = new Map<BookingEventType, Set<BookingEventHandler>>();

  async publish(event: BookingEvent): Promise<void> {
    const handlers = this.handlers.get(event.eventType);
    if (!handlers || handlers.size === 0) {
      this.logger.debug(
        `No handlers for ${event.eventType} (booking ${event.bookingId} v${event.version})`,
      );
      return;
    }

    await Promise.all(
      Array.from(handlers.values()).map(async (handler) => handler(event)),
    );
  }

  subscribe(
    eventType: BookingEventType,
    handler: BookingEventHandler,
  ): () => void {
    const handlers = this.handlers.get(eventType) ?? new Set<BookingEventHandler>();
    handlers.add(handler);
    this.handlers.set(eventType, handlers);

    return () => {
      const set = this.handlers.get(eventType);
      if (!set) return;
      set.delete(handler);
      if (set.size === 0) {
        this.handlers.delete(eventType);
      }
    };
  }

  clearAllSubscribers(): void {
    this.handlers.clear();
  }
}
