import { Inject, Injectable, Logger } from '@nestjs/common';
import { BOOKING_STORE, ROOM_DIRECTORY } from '../booking.constants';
import { RoomNotFoundError } from '../domain/booking.errors';
import { AvailabilityWindow, Occurrence } from '../domain/booking.types';
import {
  TimeRange,
  intersect,
  mergeSorted,
  subtract,
} from '../domain/time-range';
import type { BookingStore } from '../repositories/booking.store';
import type { RoomDirectory } from '../rooms/room-directory';

@Injectable()
export class AvailabilityService {
  private readonly logger = new Logger(AvailabilityService.name);

  constructor(
    @Inject(BOOKING_STORE) private readonly store: BookingStore,
    @Inject(ROOM_DIRECTORY) private readonly rooms: RoomDirectory,
  ) {}

  /**
   * Free/busy partition of `queryRange`. Both lists are sorted by start,
   * disjoint, and together cover the query range exactly.
   */
  buildAvailability(
    roomId: string,
    queryRange: TimeRange,
    occurrences: readonly Occurrence[],
  ): AvailabilityWindow {
    const clipped: TimeRange[] = [];
    for (const occurrence of occurrences) {
      const part = intersect(occurrence.range, queryRange);
      if (part) {
        clipped.push(part);
      }
    }

    const busy = mergeSorted(clipped);

    let free: TimeRange[] = [queryRange];
    for (const block of busy) {
      free = free.flatMap((gap) => subtract(gap, block));
    }

    return { roomId, queryRange, busy, free };
  }

  getAvailability(roomId: string, queryRange: TimeRange): Promise<AvailabilityWindow>;
  getAvailability(
    roomIds: readonly string[],
    queryRange: TimeRange,
  ): Promise<AvailabilityWindow[]>;
  async getAvailability(
    roomIdOrIds: string | readonly string[],
    queryRange: TimeRange,
  ): Promise<AvailabilityWindow | AvailabilityWindow[]> {
    if (typeof roomIdOrIds === 'string') {
      return this.loadWindow(roomIdOrIds, queryRange);
    }
    return Promise.all(
      roomIdOrIds.map((roomId) => this.loadWindow(roomId, queryRange)),
    );
  }

  /**
   * Reads without the room's admission boundary. The snapshot may miss an
   * admission that is still in flight; availability is advisory.
   */
  private async loadWindow(
    roomId: string,
    queryRange: TimeRange,
  ): Promise<AvailabilityWindow> {
    if (!(await this.rooms.roomExists(roomId))) {
      throw new RoomNotFoundError(roomId);
    }
    const bookings = await this.store.findActiveByRoom(roomId);
    const occurrences = bookings.flatMap((booking) => booking.occurrences);
    const window = this.buildAvailability(roomId, queryRange, occurrences);
    this.logger.debug(
      `Room ${roomId}: ${window.busy.length} busy / ${window.free.length} free blocks`,
    );
    return window;
  }
}
