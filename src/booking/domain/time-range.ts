import { InvalidRangeError } from './booking.errors';

/**
 * Half-open interval `[start, end)`. Touching endpoints never overlap.
 */
export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

export function createTimeRange(start: Date, end: Date): TimeRange {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new InvalidRangeError('start and end must be valid dates');
  }
  if (start.getTime() >= end.getTime()) {
    throw new InvalidRangeError('start must be before end');
  }
  return Object.freeze({
    start: new Date(start.getTime()),
    end: new Date(end.getTime()),
  });
}

function assertWellFormed(range: TimeRange): void {
  if (!(range.start.getTime() < range.end.getTime())) {
    throw new InvalidRangeError(
      `Malformed range ${range.start.toISOString()} - ${range.end.toISOString()}`,
    );
  }
}

export function overlaps(a: TimeRange, b: TimeRange): boolean {
  assertWellFormed(a);
  assertWellFormed(b);
  return a.start < b.end && b.start < a.end;
}

export function contains(outer: TimeRange, inner: TimeRange): boolean {
  assertWellFormed(outer);
  assertWellFormed(inner);
  return outer.start <= inner.start && inner.end <= outer.end;
}

/**
 * Clip `a` to `b`, or null when they do not overlap.
 */
export function intersect(a: TimeRange, b: TimeRange): TimeRange | null {
  if (!overlaps(a, b)) {
    return null;
  }
  const start = a.start > b.start ? a.start : b.start;
  const end = a.end < b.end ? a.end : b.end;
  return createTimeRange(start, end);
}

/**
 * Parts of `a` not covered by `b`: zero, one or two ranges in start order.
 */
export function subtract(a: TimeRange, b: TimeRange): TimeRange[] {
  if (!overlaps(a, b)) {
    return [a];
  }
  const remainder: TimeRange[] = [];
  if (a.start < b.start) {
    remainder.push(createTimeRange(a.start, b.start));
  }
  if (b.end < a.end) {
    remainder.push(createTimeRange(b.end, a.end));
  }
  return remainder;
}

/**
 * Sort by start and coalesce ranges that overlap or touch.
 */
export function mergeSorted(ranges: readonly TimeRange[]): TimeRange[] {
  ranges.forEach(assertWellFormed);
  const sorted = [...ranges].sort(compareByStart);
  const merged: TimeRange[] = [];

  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end) {
      if (range.end > last.end) {
        merged[merged.length - 1] = createTimeRange(last.start, range.end);
      }
      continue;
    }
    merged.push(range);
  }

  return merged;
}

export function compareByStart(a: TimeRange, b: TimeRange): number {
  return (
    a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime()
  );
}

export function durationMs(range: TimeRange): number {
  return range.end.getTime() - range.start.getTime();
}

export function shiftRange(range: TimeRange, offsetMs: number): TimeRange {
  return createTimeRange(
    new Date(range.start.getTime() + offsetMs),
    new Date(range.end.getTime() + offsetMs),
  );
}

export function rangesEqual(a: TimeRange, b: TimeRange): boolean {
  return (
    a.start.getTime() === b.start.getTime() && a.end.getTime() === b.end.getTime()
  );
}
