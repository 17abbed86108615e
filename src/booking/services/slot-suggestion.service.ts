import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../booking.constants';
import { ENGINE_CONFIG, EngineConfig } from '../../config/engine.config';
import { InvalidRecurrenceError } from '../domain/booking.errors';
import { Occurrence, RecurrencePattern } from '../domain/booking.types';
import { TimeRange, shiftRange } from '../domain/time-range';
import { ConflictDetectionService } from './conflict-detection.service';
import { RecurrenceService } from './recurrence.service';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

@Injectable()
export class SlotSuggestionService {
  private readonly logger = new Logger(SlotSuggestionService.name);

  constructor(
    private readonly recurrenceService: RecurrenceService,
    private readonly conflictDetection: ConflictDetectionService,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Base ranges after `baseRange`, on the step grid, whose whole series
   * would be admissible against `existing`.
   *
   * A conflicting shift jumps the offset to the first grid point that
   * clears every overlap it found, so a long occupant costs one attempt.
   * The search stops after `suggestionMaxAttempts` shifts or once
   * `suggestionOccurrenceBudget` occurrences have been expanded.
   */
  suggest(
    bookingId: string,
    baseRange: TimeRange,
    pattern: RecurrencePattern | null,
    existing: readonly Occurrence[],
  ): TimeRange[] {
    const suggestions: TimeRange[] = [];
    if (this.config.maxSuggestions === 0) {
      return suggestions;
    }

    const stepMs = this.config.suggestionStepMinutes * MINUTE_MS;
    const baseStart = baseRange.start.getTime();
    const searchEnd = baseStart + this.config.suggestionWindowDays * DAY_MS;
    const now = this.clock.now().getTime();
    const alignUp = (ms: number) => Math.max(stepMs, Math.ceil(ms / stepMs) * stepMs);

    let attempts = 0;
    let expanded = 0;
    let offset = stepMs;

    while (
      baseStart + offset <= searchEnd &&
      attempts < this.config.suggestionMaxAttempts &&
      expanded < this.config.suggestionOccurrenceBudget
    ) {
      if (!this.config.allowPastBookings && baseStart + offset < now) {
        offset = alignUp(now - baseStart);
        continue;
      }

      const shifted = shiftRange(baseRange, offset);
      let ranges: TimeRange[];
      try {
        ranges = this.recurrenceService.expand(
          shifted,
          pattern,
          this.config.maxOccurrences,
        );
      } catch (error) {
        // Shifted past the series' endDate; later offsets fare no better.
        if (error instanceof InvalidRecurrenceError) break;
        throw error;
      }
      attempts += 1;
      expanded += ranges.length;

      const candidates = ranges.map((range, sequenceIndex) => ({
        bookingId,
        range,
        sequenceIndex,
      }));
      const conflicts = this.conflictDetection.findConflicts(candidates, existing);

      if (conflicts.length === 0) {
        suggestions.push(shifted);
        if (suggestions.length >= this.config.maxSuggestions) {
          break;
        }
        offset += stepMs;
        continue;
      }

      const clearance = conflicts.reduce(
        (widest, { candidate, existing: occupied }) =>
          Math.max(widest, occupied.range.end.getTime() - candidate.range.start.getTime()),
        0,
      );
      offset += alignUp(clearance);
    }

    if (
      attempts >= this.config.suggestionMaxAttempts ||
      expanded >= this.config.suggestionOccurrenceBudget
    ) {
      this.logger.debug(
        `Suggestion search for booking ${bookingId} stopped after ${attempts} attempt(s), ${expanded} occurrence(s)`,
      );
    }
    return suggestions;
  }
}
