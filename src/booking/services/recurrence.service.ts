import { Injectable } from '@nestjs/common';
import { RRule, Frequency, Options, Weekday as RRuleWeekday } from 'rrule';
import { InvalidRecurrenceError } from '../domain/booking.errors';
import {
  RecurrenceFrequency,
  RecurrencePattern,
  Weekday,
} from '../domain/booking.types';
import { TimeRange, createTimeRange, durationMs } from '../domain/time-range';

const FREQUENCIES: Record<
  Exclude<RecurrenceFrequency, RecurrenceFrequency.None>,
  Frequency
> = {
  [RecurrenceFrequency.Daily]: RRule.DAILY,
  [RecurrenceFrequency.Weekly]: RRule.WEEKLY,
  [RecurrenceFrequency.Monthly]: RRule.MONTHLY,
};

const WEEKDAYS: Record<Weekday, RRuleWeekday> = {
  [Weekday.Monday]: RRule.MO,
  [Weekday.Tuesday]: RRule.TU,
  [Weekday.Wednesday]: RRule.WE,
  [Weekday.Thursday]: RRule.TH,
  [Weekday.Friday]: RRule.FR,
  [Weekday.Saturday]: RRule.SA,
  [Weekday.Sunday]: RRule.SU,
};

/**
 * Expands a base range and a recurrence pattern into concrete ranges.
 *
 * Dates are interpreted in UTC. Monthly series keep the base day-of-month
 * and skip months that do not have it (a series starting on the 31st
 * produces nothing in April, June, September or November, and nothing in
 * February), so `count` always counts real occurrences.
 */
@Injectable()
export class RecurrenceService {
  expand(
    baseRange: TimeRange,
    pattern: RecurrencePattern | null,
    horizonLimit: number,
  ): TimeRange[] {
    if (!Number.isInteger(horizonLimit) || horizonLimit < 1) {
      throw new InvalidRecurrenceError('horizonLimit must be a positive integer');
    }
    if (pattern) {
      this.validatePattern(pattern);
    }
    if (!pattern || pattern.frequency === RecurrenceFrequency.None) {
      return [baseRange];
    }

    const rule = new RRule(this.toRRuleOptions(baseRange, pattern));
    const starts = rule.all((_, length) => length < horizonLimit);

    if (starts.length === 0) {
      throw new InvalidRecurrenceError('Recurrence generated no occurrences');
    }

    // rrule works at second precision
    const baseMillis = baseRange.start.getTime() % 1000;
    const duration = durationMs(baseRange);
    return starts.map((date) => {
      const start = Math.floor(date.getTime() / 1000) * 1000 + baseMillis;
      return createTimeRange(new Date(start), new Date(start + duration));
    });
  }

  validatePattern(pattern: RecurrencePattern): void {
    if (!Number.isInteger(pattern.interval) || pattern.interval <= 0) {
      throw new InvalidRecurrenceError('interval must be a positive integer');
    }
    if (
      pattern.count !== null &&
      (!Number.isInteger(pattern.count) || pattern.count <= 0)
    ) {
      throw new InvalidRecurrenceError('count must be a positive integer');
    }
    if (pattern.endDate !== null && Number.isNaN(pattern.endDate.getTime())) {
      throw new InvalidRecurrenceError('endDate must be a valid date');
    }
    if (pattern.endDate !== null && pattern.count !== null) {
      throw new InvalidRecurrenceError('Specify either endDate or count, not both');
    }
    if (
      pattern.frequency !== RecurrenceFrequency.None &&
      pattern.endDate === null &&
      pattern.count === null
    ) {
      throw new InvalidRecurrenceError(
        'Recurring bookings must be bounded by endDate or count',
      );
    }
  }

  /**
   * RFC 5545 form of the series, e.g. `RRULE:FREQ=WEEKLY;COUNT=4;BYDAY=MO,WE`.
   */
  describe(baseRange: TimeRange, pattern: RecurrencePattern | null): string | null {
    if (!pattern || pattern.frequency === RecurrenceFrequency.None) {
      return null;
    }
    const rule = new RRule({
      ...this.toRRuleOptions(baseRange, pattern),
      dtstart: null,
    });
    return rule.toString();
  }

  private toRRuleOptions(
    baseRange: TimeRange,
    pattern: RecurrencePattern,
  ): Partial<Options> {
    const frequency = pattern.frequency;
    if (frequency === RecurrenceFrequency.None) {
      throw new InvalidRecurrenceError('A non-repeating pattern has no rule');
    }

    const options: Partial<Options> = {
      freq: FREQUENCIES[frequency],
      dtstart: baseRange.start,
      interval: pattern.interval,
    };

    if (pattern.count !== null) {
      options.count = pattern.count;
    }
    if (pattern.endDate !== null) {
      options.until = pattern.endDate;
    }
    if (frequency === RecurrenceFrequency.Weekly && pattern.daysOfWeek.length > 0) {
      options.byweekday = pattern.daysOfWeek.map((day) => WEEKDAYS[day]);
    }

    return options;
  }
}
