import { Injectable } from '@nestjs/common';
import { ConflictPair, Occurrence } from '../domain/booking.types';
import { compareByStart } from '../domain/time-range';

function byStart(a: Occurrence, b: Occurrence): number {
  return compareByStart(a.range, b.range);
}

@Injectable()
export class ConflictDetectionService {
  /**
   * Every overlapping (candidate, existing) pair.
   *
   * Both sides are sorted by start and swept once; each side keeps the
   * intervals that are still open at the sweep position, so a new interval
   * only meets open intervals of the other side. Existing occurrences of a
   * booking that is itself among the candidates are skipped by booking id.
   */
  findConflicts(
    candidates: readonly Occurrence[],
    existing: readonly Occurrence[],
  ): ConflictPair[] {
    const candidateIds = new Set(candidates.map((c) => c.bookingId));
    const left = [...candidates].sort(byStart);
    const right = existing
      .filter((occurrence) => !candidateIds.has(occurrence.bookingId))
      .sort(byStart);

    const pairs: ConflictPair[] = [];
    let openLeft: Occurrence[] = [];
    let openRight: Occurrence[] = [];
    let i = 0;
    let j = 0;

    while (i < left.length && (j < right.length || openRight.length > 0)) {
      const takeLeft =
        j >= right.length || left[i].range.start <= right[j].range.start;

      if (takeLeft) {
        const candidate = left[i++];
        openRight = openRight.filter((e) => e.range.end > candidate.range.start);
        for (const e of openRight) {
          pairs.push({ candidate, existing: e });
        }
        openLeft.push(candidate);
      } else {
        const current = right[j++];
        openLeft = openLeft.filter((c) => c.range.end > current.range.start);
        for (const c of openLeft) {
          pairs.push({ candidate: c, existing: current });
        }
        openRight.push(current);
      }
    }

    // Remaining existing intervals can still meet candidates that are open.
    while (j < right.length && openLeft.length > 0) {
      const current = right[j++];
      openLeft = openLeft.filter((c) => c.range.end > current.range.start);
      for (const c of openLeft) {
        pairs.push({ candidate: c, existing: current });
      }
    }

    return pairs.sort(
      (a, b) =>
        a.candidate.sequenceIndex - b.candidate.sequenceIndex ||
        byStart(a.existing, b.existing),
    );
  }

  /** Distinct booking ids on the existing side, in first-seen order. */
  conflictingBookingIds(pairs: readonly ConflictPair[]): string[] {
    return Array.from(new Set(pairs.map((pair) => pair.existing.bookingId)));
  }

  /**
   * Overlaps between different bookings inside one set of occurrences.
   * Used to audit a room's active schedule.
   */
  findOverlapsWithin(occurrences: readonly Occurrence[]): ConflictPair[] {
    const sorted = [...occurrences].sort(byStart);
    const pairs: ConflictPair[] = [];
    let open: Occurrence[] = [];

    for (const current of sorted) {
      open = open.filter((o) => o.range.end > current.range.start);
      for (const earlier of open) {
        if (earlier.bookingId !== current.bookingId) {
          pairs.push({ candidate: earlier, existing: current });
        }
      }
      open.push(current);
    }

    return pairs;
  }
}
