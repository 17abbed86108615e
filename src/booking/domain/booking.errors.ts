import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

export class InvalidRangeError extends BadRequestException {
  constructor(message: string) {
    super({ error: 'InvalidRange', message });
  }
}

export class InvalidRecurrenceError extends BadRequestException {
  constructor(message: string) {
    super({ error: 'InvalidRecurrence', message });
  }
}

export class InvalidTransitionError extends ConflictException {
  constructor(
    readonly bookingId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super({
      error: 'InvalidTransition',
      message: `Booking ${bookingId} cannot move from ${from} to ${to}`,
    });
  }
}

/**
 * Raised by a store when an optimistic update finds a different version
 * than the one the writer read.
 */
export class StaleBookingError extends ConflictException {
  constructor(
    readonly bookingId: string,
    readonly expectedVersion: number,
  ) {
    super({
      error: 'StaleBooking',
      message: `Booking ${bookingId} is no longer at version ${expectedVersion}`,
    });
  }
}

/** Another writer confirmed an overlapping booking in the same room first. */
export class RoomOccupiedError extends ConflictException {
  constructor(
    readonly roomId: string,
    readonly conflictingBookingIds: string[],
  ) {
    super({
      error: 'RoomOccupied',
      message: `Room ${roomId} already holds overlapping booking(s): ${conflictingBookingIds.join(', ')}`,
    });
  }
}

export class BookingNotFoundError extends NotFoundException {
  constructor(readonly bookingId: string) {
    super({ error: 'BookingNotFound', message: `Booking ${bookingId} not found` });
  }
}

export class RoomNotFoundError extends NotFoundException {
  constructor(readonly roomId: string) {
    super({ error: 'RoomNotFound', message: `Room ${roomId} not found` });
  }
}

export class PersistenceFailureError extends ServiceUnavailableException {
  constructor(message: string, cause: unknown) {
    super({ error: 'PersistenceFailure', message }, { cause });
  }
}
