import { Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';

type RoomLimit = ReturnType<typeof pLimit>;

export type LockRejectReason = 'timeout' | 'aborted';

export type LockResult<T> =
  | { acquired: true; value: T }
  | { acquired: false; reason: LockRejectReason };

export interface LockOptions {
  timeoutMs: number;
  /** Honoured only while waiting; once the room is held the task completes. */
  signal?: AbortSignal;
}

/**
 * One FIFO queue of concurrency 1 per room, created on first use. Rooms
 * never share a queue, so unrelated rooms admit in parallel.
 */
@Injectable()
export class RoomLockService {
  private readonly logger = new Logger(RoomLockService.name);
  private readonly limits = new Map<string, RoomLimit>();

  async runExclusive<T>(
    roomId: string,
    task: () => Promise<T>,
    { timeoutMs, signal }: LockOptions,
  ): Promise<LockResult<T>> {
    if (signal?.aborted) {
      return { acquired: false, reason: 'aborted' };
    }

    const limit = this.limitFor(roomId);
    let abandonedBy: LockRejectReason | null = null;
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const stopWaiting = () => {
      clearTimeout(timer);
      if (onAbort) {
        signal?.removeEventListener('abort', onAbort);
      }
    };

    const gaveUp = new Promise<LockResult<T>>((resolve) => {
      const giveUp = (reason: LockRejectReason) => {
        abandonedBy = reason;
        stopWaiting();
        resolve({ acquired: false, reason });
      };
      timer = setTimeout(() => giveUp('timeout'), timeoutMs);
      onAbort = () => giveUp('aborted');
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    const held = limit(async (): Promise<LockResult<T>> => {
      if (abandonedBy !== null) {
        // The caller left the queue; release the slot without running.
        return { acquired: false, reason: abandonedBy };
      }
      stopWaiting();
      return { acquired: true, value: await task() };
    });

    const result = await Promise.race([held, gaveUp]);
    if (!result.acquired) {
      this.logger.warn(
        `Gave up waiting for room ${roomId} (${result.reason}, ${limit.pendingCount} queued)`,
      );
    }
    return result;
  }

  /** Requests queued or running for a room. */
  queueDepth(roomId: string): number {
    const limit = this.limits.get(roomId);
    return limit ? limit.activeCount + limit.pendingCount : 0;
  }

  private limitFor(roomId: string): RoomLimit {
    let limit = this.limits.get(roomId);
    if (!limit) {
      limit = pLimit(1);
      this.limits.set(roomId, limit);
    }
    return limit;
  }
}
