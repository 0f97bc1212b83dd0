import type { Event, EventData } from '../domain/index.js';

export type InsertResult = 'stored' | 'expired';

export interface EventWindowOptions {
  /** Retention in seconds. 0 disables pruning and the store grows unbounded. */
  windowSeconds: number;
  /** Clock in whole seconds since the epoch. */
  now?: () => number;
}

function systemNow(): number {
  return Math.floor(Date.now() / 1000);
}

function freezeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item) => freezeValue(item)));
  }
  if (typeof value === 'object' && value !== null) {
    return freezeRecord(value);
  }
  return value;
}

// Object.fromEntries defines own properties, so a `__proto__` key is kept as data.
function freezeRecord(source: object): EventData {
  const clone: EventData = Object.fromEntries(
    Object.entries(source).map(([key, value]) => [key, freezeValue(value)]),
  );
  return Object.freeze(clone);
}

/**
 * In-memory store of the events inside the retention window.
 *
 * Events are kept sorted by `creationTime` (ties in arrival order), so
 * pruning only ever has to drop a prefix. `insert()` and `query()` are
 * synchronous: each runs to completion on the event loop, so a reader
 * sees the state either before or after a whole insert-and-prune step.
 *
 * Stored events are deep-frozen copies and every query returns a new
 * frozen array; callers never hold a reference into live storage.
 *
 * `query()` is a linear scan with no secondary index; its cost grows
 * with the number of retained events.
 */
export class WindowedEventStore {
  private events: Event[] = [];
  private readonly now: () => number;

  readonly windowSeconds: number;

  constructor(options: EventWindowOptions) {
    if (!Number.isInteger(options.windowSeconds) || options.windowSeconds < 0) {
      throw new RangeError(`windowSeconds must be a non-negative integer, got ${options.windowSeconds}`);
    }
    this.windowSeconds = options.windowSeconds;
    this.now = options.now ?? systemNow;
  }

  /** Number of retained events. */
  get size(): number {
    return this.events.length;
  }

  /**
   * Stores an event and prunes the expired prefix.
   *
   * An event that is already older than `now - window` is not stored.
   * A late event that is still inside the window is placed after every
   * retained event with the same or an earlier `creationTime`.
   */
  insert(event: Event): InsertResult {
    const cutoff = this.cutoff();
    if (cutoff !== null && event.creationTime < cutoff) {
      return 'expired';
    }

    const stored: Event = Object.freeze({
      deviceId: event.deviceId,
      creationTime: event.creationTime,
      data: freezeRecord(event.data),
    });

    const last = this.events.at(-1);
    if (last === undefined || last.creationTime <= stored.creationTime) {
      this.events.push(stored);
    } else {
      this.events.splice(this.upperBound(stored.creationTime), 0, stored);
    }

    if (cutoff !== null) {
      this.prune(cutoff);
    }
    return 'stored';
  }

  /**
   * Events for `deviceId` (empty string: every device) created at or after
   * `since`, oldest first. `max <= 0` means no limit.
   */
  query(deviceId: string, since: number, max: number): readonly Event[] {
    const limit = max > 0 ? max : Number.POSITIVE_INFINITY;
    const matches: Event[] = [];

    for (const event of this.events) {
      if (matches.length >= limit) break;
      if (deviceId !== '' && event.deviceId !== deviceId) continue;
      if (event.creationTime < since) continue;
      matches.push(event);
    }

    return Object.freeze(matches);
  }

  /** Point-in-time copy of every retained event. */
  snapshot(): readonly Event[] {
    return Object.freeze([...this.events]);
  }

  private cutoff(): number | null {
    if (this.windowSeconds === 0) return null;
    return this.now() - this.windowSeconds;
  }

  /** Drops the leading events older than `cutoff`; stops at the first fresh one. */
  private prune(cutoff: number): void {
    let expired = 0;
    while (expired < this.events.length) {
      const event = this.events[expired];
      if (event === undefined || event.creationTime >= cutoff) break;
      expired++;
    }
    if (expired > 0) {
      this.events.splice(0, expired);
    }
  }

  /** Index of the first event created strictly after `creationTime`. */
  private upperBound(creationTime: number): number {
    let lo = 0;
    let hi = this.events.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const event = this.events[mid];
      if (event !== undefined && event.creationTime <= creationTime) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
