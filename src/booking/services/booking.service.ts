import {
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ENGINE_CONFIG, EngineConfig } from '../../config/engine.config';
import {
  BOOKING_EVENT_SINK,
  BOOKING_STORE,
  CLOCK,
  Clock,
  ROOM_DIRECTORY,
} from '../booking.constants';
import {
  cancel,
  isActive,
  newPendingBooking,
  reschedule,
  transition,
} from '../domain/booking-state';
import {
  BookingNotFoundError,
  InvalidRangeError,
  InvalidTransitionError,
  PersistenceFailureError,
  RoomNotFoundError,
  RoomOccupiedError,
  StaleBookingError,
} from '../domain/booking.errors';
import {
  Actor,
  ActorRole,
  AvailabilityWindow,
  Booking,
  BookingState,
  ConflictPair,
  Occurrence,
  RecurrencePattern,
  SYSTEM_ACTOR_ID,
} from '../domain/booking.types';
import { TimeRange, createTimeRange, durationMs } from '../domain/time-range';
import {
  BookingEvent,
  BookingEventSink,
  BookingEventType,
} from '../events/booking-events';
import type {
  BookingListFilter,
  BookingPage,
  BookingStore,
  BookingWriteSet,
  PageRequest,
  VersionedWrite,
} from '../repositories/booking.store';
import type { RoomDirectory } from '../rooms/room-directory';
import { AvailabilityService } from './availability.service';
import {
  AdmissionOptions,
  BusyOutcome,
  CancelBookingOutcome,
  CancelledOutcome,
  ConfirmedOutcome,
  ConflictOutcome,
  CreateBookingOutcome,
  RescheduleBookingCommand,
  RescheduleBookingOutcome,
  StaleOutcome,
  CreateBookingCommand,
} from './booking.outcomes';
import { ConflictDetectionService } from './conflict-detection.service';
import { RecurrenceService } from './recurrence.service';
import { LockOptions, LockRejectReason, RoomLockService } from './room-lock.service';
import { SlotSuggestionService } from './slot-suggestion.service';

const MINUTE_MS = 60 * 1000;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const READ_ALL_ROLES: readonly ActorRole[] = ['admin', 'facility_manager', 'auditor'];

/**
 * A conflict found under the room lock. Suggestions are searched for after
 * the lock is released.
 */
interface UnsuggestedConflict {
  status: 'unsuggested';
  outcome: Omit<ConflictOutcome, 'suggestions'>;
  requestedRange: TimeRange;
  requestedRecurrence: RecurrencePattern | null;
  occupied: Occurrence[];
}

/** Rejections that a second attempt would only repeat. */
function isFinalCommitError(error: unknown): boolean {
  return error instanceof StaleBookingError || error instanceof RoomOccupiedError;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Owns booking state transitions and the per-room admission protocol.
 *
 * Every check-then-write sequence for a room runs while that room's lock is
 * held, so at most one active booking covers any instant of a room. Input
 * validation happens before the lock; reads for availability never take it.
 */
@Injectable()
export class BookingService {
  private readonly logger = new Logger(BookingService.name);

  constructor(
    private readonly recurrenceService: RecurrenceService,
    private readonly conflictDetection: ConflictDetectionService,
    private readonly availabilityService: AvailabilityService,
    private readonly slotSuggestions: SlotSuggestionService,
    private readonly roomLocks: RoomLockService,
    @Inject(BOOKING_STORE) private readonly store: BookingStore,
    @Inject(ROOM_DIRECTORY) private readonly rooms: RoomDirectory,
    @Inject(BOOKING_EVENT_SINK) private readonly events: BookingEventSink,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async createBooking(
    command: CreateBookingCommand,
    options: AdmissionOptions = {},
  ): Promise<CreateBookingOutcome> {
    const now = this.clock.now();
    const range = this.assertBookingPolicy(command.range, now);
    const recurrence = command.recurrence ?? null;
    const id = uuidv4();
    const occurrences = this.expandOccurrences(id, range, recurrence);
    const override = this.resolveOverride(command.actor, command.override);
    await this.assertRoomExists(command.roomId);

    const candidate = newPendingBooking({
      id,
      roomId: command.roomId,
      userId: command.actor.id,
      title: command.title,
      description: command.description ?? null,
      attendees: command.attendees ?? null,
      range,
      recurrence,
      occurrences,
      now,
    });

    const result = await this.roomLocks.runExclusive(
      command.roomId,
      () => this.admitNew(candidate, override),
      this.lockOptions(options),
    );

    if (!result.acquired) {
      return this.busy(command.roomId, result.reason);
    }
    const admitted = result.value;
    return admitted.status === 'unsuggested' ? this.withSuggestions(admitted) : admitted;
  }

  async rescheduleBooking(
    command: RescheduleBookingCommand,
    options: AdmissionOptions = {},
  ): Promise<RescheduleBookingOutcome> {
    const now = this.clock.now();
    const range = this.assertBookingPolicy(command.range, now);
    const snapshot = await this.getBooking(command.bookingId);
    this.assertCanModify(snapshot, command.actor);

    const recurrence =
      command.recurrence === undefined ? snapshot.recurrence : command.recurrence;
    const occurrences = this.expandOccurrences(snapshot.id, range, recurrence);
    const override = this.resolveOverride(command.actor, command.override);

    const result = await this.roomLocks.runExclusive(
      snapshot.roomId,
      () =>
        this.admitReschedule(command, range, recurrence, occurrences, override),
      this.lockOptions(options),
    );

    if (!result.acquired) {
      return this.busy(snapshot.roomId, result.reason);
    }
    const admitted = result.value;
    return admitted.status === 'unsuggested' ? this.withSuggestions(admitted) : admitted;
  }

  async cancelBooking(
    bookingId: string,
    actor: Actor,
    reason: string,
    options: AdmissionOptions = {},
  ): Promise<CancelBookingOutcome> {
    const snapshot = await this.getBooking(bookingId);
    this.assertCanModify(snapshot, actor);

    const result = await this.roomLocks.runExclusive(
      snapshot.roomId,
      async (): Promise<CancelledOutcome> => {
        const current = await this.getBooking(bookingId);
        const cancelled = cancel(current, {
          reason,
          cancelledBy: actor.id,
          cancelledAt: this.clock.now(),
          supersededBy: null,
        });
        await this.persist({
          updated: [{ booking: cancelled, expectedVersion: current.version }],
        });

        this.logger.log(`Booking ${bookingId} cancelled by ${actor.id}`);
        this.emit(BookingEventType.Cancelled, cancelled, reason);
        return { status: 'cancelled', booking: cancelled };
      },
      this.lockOptions(options),
    );

    return result.acquired
      ? result.value
      : this.busy(snapshot.roomId, result.reason);
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
    const range = createTimeRange(queryRange.start, queryRange.end);
    return typeof roomIdOrIds === 'string'
      ? this.availabilityService.getAvailability(roomIdOrIds, range)
      : this.availabilityService.getAvailability(roomIdOrIds, range);
  }

  private async getBooking(bookingId: string): Promise<Booking> {
    const booking = await this.store.findById(bookingId);
    if (!booking) {
      throw new BookingNotFoundError(bookingId);
    }
    return booking;
  }

  /** Owners see their own bookings; read-all roles see any. */
  async getBookingFor(actor: Actor, bookingId: string): Promise<Booking> {
    const booking = await this.getBooking(bookingId);
    if (booking.userId !== actor.id && !READ_ALL_ROLES.includes(actor.role)) {
      throw new ForbiddenException('You can only view your own bookings');
    }
    return booking;
  }

  /**
   * A regular user's listing is limited to their own bookings, whatever
   * `filter.userId` asks for. `perPage` is capped at `MAX_PAGE_SIZE`.
   */
  listBookings(
    actor: Actor,
    filter: BookingListFilter,
    { page = 1, perPage = DEFAULT_PAGE_SIZE }: Partial<PageRequest> = {},
  ): Promise<BookingPage> {
    const scoped = READ_ALL_ROLES.includes(actor.role)
      ? filter
      : { ...filter, userId: actor.id };
    return this.store.list(scoped, {
      page: Math.max(1, page),
      perPage: Math.min(Math.max(1, perPage), MAX_PAGE_SIZE),
    });
  }

  /**
   * Overlapping pairs between different active bookings of a room. Empty
   * unless data was written outside the admission protocol.
   */
  async findRoomConflicts(roomId: string): Promise<ConflictPair[]> {
    await this.assertRoomExists(roomId);
    const active = await this.store.findActiveByRoom(roomId);
    return this.conflictDetection.findOverlapsWithin(
      active.flatMap((booking) => booking.occurrences),
    );
  }

  private async admitNew(
    candidate: Booking,
    override: boolean,
  ): Promise<ConfirmedOutcome | UnsuggestedConflict> {
    const active = await this.store.findActiveByRoom(candidate.roomId);
    const conflicts = this.conflictDetection.findConflicts(
      candidate.occurrences,
      active.flatMap((booking) => booking.occurrences),
    );
    const now = this.clock.now();

    if (conflicts.length === 0) {
      const confirmed = transition(candidate, BookingState.Confirmed, now);
      await this.persist({ created: [confirmed] });
      return this.confirm(confirmed, []);
    }

    if (override) {
      const confirmed = transition(candidate, BookingState.Confirmed, now);
      return this.supersede(confirmed, { created: [confirmed] }, conflicts, active);
    }

    const rejected = transition(candidate, BookingState.Rejected, now);
    await this.persist({ created: [rejected] });
    this.logger.log(
      `Booking ${rejected.id} rejected in room ${rejected.roomId}: ${conflicts.length} conflicting occurrence(s)`,
    );
    this.emit(BookingEventType.Rejected, rejected, 'Conflicts with existing bookings');
    return this.conflictOutcome(rejected, rejected.range, rejected.recurrence, conflicts, active);
  }

  private async admitReschedule(
    command: RescheduleBookingCommand,
    range: TimeRange,
    recurrence: RecurrencePattern | null,
    occurrences: readonly Occurrence[],
    override: boolean,
  ): Promise<ConfirmedOutcome | StaleOutcome | UnsuggestedConflict> {
    const current = await this.getBooking(command.bookingId);
    if (current.version !== command.expectedVersion) {
      return this.stale(current.id, command.expectedVersion, current.version);
    }
    if (!isActive(current)) {
      throw new InvalidTransitionError(current.id, current.state, 'rescheduled');
    }

    const active = await this.store.findActiveByRoom(current.roomId);
    const conflicts = this.conflictDetection.findConflicts(
      occurrences,
      active.flatMap((booking) => booking.occurrences),
    );

    if (conflicts.length > 0 && !override) {
      return this.conflictOutcome(current, range, recurrence, conflicts, active);
    }

    const now = this.clock.now();
    let next = reschedule(current, range, recurrence, occurrences, now);
    if (next.state === BookingState.Pending) {
      next = transition(next, BookingState.Confirmed, now);
    }
    const write: VersionedWrite = { booking: next, expectedVersion: current.version };

    try {
      if (conflicts.length === 0) {
        await this.persist({ updated: [write] });
        return this.confirm(next, []);
      }
      return await this.supersede(next, { updated: [write] }, conflicts, active);
    } catch (error) {
      if (error instanceof StaleBookingError && error.bookingId === current.id) {
        return this.stale(current.id, command.expectedVersion, null);
      }
      throw error;
    }
  }

  /**
   * Cancel every booking the admitted one displaces, in the same commit,
   * then announce each displacement before the confirmation.
   */
  private async supersede(
    confirmed: Booking,
    writeSet: BookingWriteSet,
    conflicts: ConflictPair[],
    active: readonly Booking[],
  ): Promise<ConfirmedOutcome> {
    const byId = new Map(active.map((booking) => [booking.id, booking]));
    const reason = `Superseded by booking ${confirmed.id}`;
    const displaced: VersionedWrite[] = [];

    for (const id of this.conflictDetection.conflictingBookingIds(conflicts)) {
      const booking = byId.get(id);
      if (!booking) continue;
      displaced.push({
        booking: cancel(booking, {
          reason,
          cancelledBy: SYSTEM_ACTOR_ID,
          cancelledAt: this.clock.now(),
          supersededBy: confirmed.id,
        }),
        expectedVersion: booking.version,
      });
    }

    await this.persist({
      created: writeSet.created,
      updated: [...(writeSet.updated ?? []), ...displaced],
    });

    const superseded = displaced.map((write) => write.booking);
    for (const booking of superseded) {
      this.logger.warn(`Booking ${booking.id} superseded by ${confirmed.id}`);
      this.emit(BookingEventType.Superseded, booking, reason);
    }
    return this.confirm(confirmed, superseded);
  }

  private confirm(booking: Booking, superseded: Booking[]): ConfirmedOutcome {
    this.logger.log(
      `Booking ${booking.id} confirmed in room ${booking.roomId} (v${booking.version}, ${booking.occurrences.length} occurrence(s))`,
    );
    this.emit(BookingEventType.Confirmed, booking);
    return { status: 'confirmed', booking, superseded };
  }

  private conflictOutcome(
    booking: Booking,
    requestedRange: TimeRange,
    requestedRecurrence: RecurrencePattern | null,
    conflicts: ConflictPair[],
    active: readonly Booking[],
  ): UnsuggestedConflict {
    return {
      status: 'unsuggested',
      outcome: {
        status: 'conflict',
        booking,
        conflicts,
        conflictingBookingIds: this.conflictDetection.conflictingBookingIds(conflicts),
      },
      requestedRange,
      requestedRecurrence,
      occupied: active.flatMap((b) => b.occurrences),
    };
  }

  /** Runs outside the room lock; suggestions are advisory. */
  private withSuggestions(conflict: UnsuggestedConflict): ConflictOutcome {
    return {
      ...conflict.outcome,
      suggestions: this.slotSuggestions.suggest(
        conflict.outcome.booking.id,
        conflict.requestedRange,
        conflict.requestedRecurrence,
        conflict.occupied,
      ),
    };
  }

  private stale(
    bookingId: string,
    expectedVersion: number,
    currentVersion: number | null,
  ): StaleOutcome {
    this.logger.warn(
      `Stale write on booking ${bookingId}: expected v${expectedVersion}, found ${currentVersion === null ? 'a newer version' : `v${currentVersion}`}`,
    );
    return { status: 'stale', bookingId, expectedVersion, currentVersion };
  }

  private busy(roomId: string, reason: LockRejectReason): BusyOutcome {
    return { status: 'busy', roomId, reason };
  }

  /**
   * One retry under the same room lock, then give up. A store commit is
   * all-or-nothing, so a failure leaves no partial booking behind.
   */
  private async persist(writeSet: BookingWriteSet): Promise<void> {
    try {
      await this.store.commit(writeSet);
      return;
    } catch (error) {
      if (isFinalCommitError(error)) throw error;
      this.logger.warn(`Commit failed, retrying once: ${describeError(error)}`);
    }

    try {
      await this.store.commit(writeSet);
    } catch (error) {
      if (isFinalCommitError(error)) throw error;
      this.logger.error(`Commit failed after retry: ${describeError(error)}`);
      throw new PersistenceFailureError('Booking could not be persisted', error);
    }
  }

  /** Fire and forget: delivery never affects the admission result. */
  private emit(eventType: BookingEventType, booking: Booking, reason?: string): void {
    const event: BookingEvent = {
      eventType,
      bookingId: booking.id,
      roomId: booking.roomId,
      version: booking.version,
      timestamp: this.clock.now().toISOString(),
      ...(reason === undefined ? {} : { reason }),
    };

    void Promise.resolve()
      .then(() => this.events.publish(event))
      .catch((error: unknown) =>
        this.logger.warn(
          `Failed to publish ${eventType} for booking ${booking.id}: ${describeError(error)}`,
        ),
      );
  }

  private assertBookingPolicy(range: TimeRange, now: Date): TimeRange {
    const checked = createTimeRange(range.start, range.end);
    const minutes = durationMs(checked) / MINUTE_MS;

    if (minutes < this.config.minBookingMinutes) {
      throw new InvalidRangeError(
        `Booking must last at least ${this.config.minBookingMinutes} minutes`,
      );
    }
    if (minutes > this.config.maxBookingMinutes) {
      throw new InvalidRangeError(
        `Booking cannot last more than ${this.config.maxBookingMinutes} minutes`,
      );
    }
    if (!this.config.allowPastBookings && checked.start < now) {
      throw new InvalidRangeError('Booking start time cannot be in the past');
    }
    return checked;
  }

  private expandOccurrences(
    bookingId: string,
    range: TimeRange,
    recurrence: RecurrencePattern | null,
  ): Occurrence[] {
    return this.recurrenceService
      .expand(range, recurrence, this.config.maxOccurrences)
      .map((occurrenceRange, sequenceIndex) => ({
        bookingId,
        range: occurrenceRange,
        sequenceIndex,
      }));
  }

  private resolveOverride(actor: Actor, requested: boolean | undefined): boolean {
    if (!requested) {
      return false;
    }
    if (!this.config.overrideRoles.includes(actor.role)) {
      throw new ForbiddenException('Override requires an elevated role');
    }
    return true;
  }

  private assertCanModify(booking: Booking, actor: Actor): void {
    if (
      booking.userId !== actor.id &&
      !this.config.overrideRoles.includes(actor.role)
    ) {
      throw new ForbiddenException('You can only modify your own bookings');
    }
  }

  private async assertRoomExists(roomId: string): Promise<void> {
    if (!(await this.rooms.roomExists(roomId))) {
      throw new RoomNotFoundError(roomId);
    }
  }

  private lockOptions(options: AdmissionOptions): LockOptions {
    return { timeoutMs: this.config.roomLockTimeoutMs, signal: options.signal };
  }
}
