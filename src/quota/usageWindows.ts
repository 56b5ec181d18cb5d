import type { QuotaWindowPolicyName } from '../config';
import type { QuotaWindow, UsageCounter, UsageCounts, UsageIncrement } from './types';

/** Window boundaries for one request, as the usage store sees them. */
export type WindowSpan = {
  windowStart: number;
  resetAt: number;
  previousWindowStart: number;
  previousWeight: number;
};

/**
 * Maps a request time onto epoch-aligned buckets. Every process and every
 * store agrees on the bucket starts, so usage rows are keyed by account and
 * bucket whichever policy is in use.
 */
export interface UsageWindows {
  readonly policy: QuotaWindowPolicyName;
  readonly windowMs: number;
  span(now: number): WindowSpan;
  /** Time until a rejected account can be admitted again. */
  retryAfter(span: WindowSpan, counts: UsageCounts, limit: number, now: number): number;
}

export const alignWindow = (now: number, windowMs: number) =>
  Math.floor(now / windowMs) * windowMs;

/** Requests charged right now: the current bucket plus the weighted previous one. */
export const weightedCount = (
  counts: Pick<UsageCounts, 'current' | 'previous'>,
  previousWeight: number,
) => counts.current + Math.floor(counts.previous * previousWeight);

export const toQuotaWindow = (
  span: WindowSpan,
  counts: UsageCounts,
  limit: number | null,
): QuotaWindow => {
  const count = weightedCount(counts, span.previousWeight);

  return {
    windowStart: span.windowStart,
    count,
    limit,
    remaining: limit === null ? null : Math.max(0, limit - count),
    resetAt: span.resetAt,
  };
};

/** Counters reset on each window boundary. */
export class FixedUsageWindows implements UsageWindows {
  readonly policy = 'fixed';
  readonly windowMs: number;

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  span(now: number): WindowSpan {
    const windowStart = alignWindow(now, this.windowMs);

    return {
      windowStart,
      resetAt: windowStart + this.windowMs,
      previousWindowStart: windowStart - this.windowMs,
      previousWeight: 0,
    };
  }

  retryAfter(span: WindowSpan, _counts: UsageCounts, _limit: number, now: number): number {
    return span.resetAt - now;
  }
}

/**
 * Sliding window counter. The previous bucket is charged in proportion to how
 * much of it still overlaps the trailing window ending now.
 */
export class SlidingUsageWindows implements UsageWindows {
  readonly policy = 'sliding';
  readonly windowMs: number;

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  span(now: number): WindowSpan {
    const windowStart = alignWindow(now, this.windowMs);
    const resetAt = windowStart + this.windowMs;

    return {
      windowStart,
      resetAt,
      previousWindowStart: windowStart - this.windowMs,
      previousWeight: (resetAt - now) / this.windowMs,
    };
  }

  retryAfter(span: WindowSpan, counts: UsageCounts, limit: number, now: number): number {
    const { current, previous } = counts;

    let readyAfter: number;
    if (current < limit && previous > 0) {
      // The previous bucket's share has to fall below what the current one leaves.
      readyAfter = span.resetAt - ((limit - current) * this.windowMs) / previous;
    } else if (current > 0) {
      // The current bucket becomes the previous one and has to decay below the limit.
      readyAfter = span.resetAt + this.windowMs * (1 - limit / current);
    } else {
      readyAfter = span.resetAt;
    }

    return Math.max(1, Math.floor(readyAfter) + 1 - now);
  }
}

export const createUsageWindows = (
  policy: QuotaWindowPolicyName,
  windowMs: number,
): UsageWindows =>
  policy === 'sliding' ? new SlidingUsageWindows(windowMs) : new FixedUsageWindows(windowMs);

/**
 * Usage buckets held in this process. Backs the in-memory account store and
 * anonymous callers, who have no account row to count against.
 */
export class LocalUsageCounter implements UsageCounter {
  private readonly buckets = new Map<string, Map<number, number>>();

  async incrementUsage(increment: UsageIncrement): Promise<UsageCounts> {
    let buckets = this.buckets.get(increment.token);
    if (!buckets) {
      buckets = new Map();
      this.buckets.set(increment.token, buckets);
    }

    const current = buckets.get(increment.windowStart) ?? 0;
    const previous = buckets.get(increment.previousWindowStart) ?? 0;
    const admitted =
      increment.limit === null ||
      weightedCount({ current, previous }, increment.previousWeight) < increment.limit;
    const recorded = admitted ? current + 1 : current;

    buckets.set(increment.windowStart, recorded);
    for (const start of buckets.keys()) {
      if (start < increment.previousWindowStart) {
        buckets.delete(start);
      }
    }

    return { admitted, current: recorded, previous };
  }

  countFor(token: string, windowStart: number): number {
    return this.buckets.get(token)?.get(windowStart) ?? 0;
  }

  /** Drops buckets that started before `before`; returns how many tokens were emptied. */
  prune(before: number): number {
    let removed = 0;

    for (const [token, buckets] of this.buckets) {
      for (const start of buckets.keys()) {
        if (start < before) {
          buckets.delete(start);
        }
      }

      if (buckets.size === 0) {
        this.buckets.delete(token);
        removed += 1;
      }
    }

    return removed;
  }

  size(): number {
    return this.buckets.size;
  }
}
