import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import { BrokerTransportError } from '../../application/errors.js';

/** Stream entry field holding the JSON event envelope. */
const BODY_FIELD = 'body';

// Messages fetched per XREADGROUP; the next batch is only requested once
// the previous one has been handed out.
const DEFAULT_CREDIT = 10;
// How long one XREADGROUP blocks waiting for new entries (ms)
const DEFAULT_BLOCK_MS = 5000;

/** A received message that must be settled exactly once. */
export interface BrokerMessage {
  readonly id: string;
  readonly body: string;
  /** Acknowledge: the message has been consumed. */
  accept(): Promise<void>;
  /** Move the message to the dead-letter stream and acknowledge it. */
  reject(reason: string): Promise<void>;
}

export interface Subscription {
  /**
   * Resolves with the next message, or `null` once the subscription is
   * closed (by `close()` or by `signal`). Rejects with BrokerTransportError.
   */
  receive(signal?: AbortSignal): Promise<BrokerMessage | null>;
  close(): Promise<void>;
}

export interface SubscriptionOptions {
  redisUrl: string;
  /** Stream key. */
  topic: string;
  group: string;
  consumer: string;
  /** Start entry ID, used when no retention window is configured. */
  offset: string;
  /** Retention window in seconds; when > 0 the start ID is `now - window`. */
  windowSeconds: number;
  credit?: number;
  blockMs?: number;
}

interface StreamEntry {
  id: string;
  fields: string[];
}

/**
 * XREADGROUP reply: [[streamKey, [[entryId, [field, value, ...]], ...]], ...]
 * or null on timeout. Entries deleted while pending come back with null fields.
 */
const readReplySchema = z
  .array(
    z.tuple([
      z.string(),
      z.array(z.tuple([z.string(), z.array(z.string()).nullable()])),
    ]),
  )
  .nullable();

/** Dead-letter stream for messages the consumer rejected. */
export function rejectedStreamKey(topic: string): string {
  return `${topic}:rejected`;
}

/**
 * Stream ID the consumer group starts from.
 *
 * Stream IDs are `<milliseconds>-<sequence>`, so a time filter is just an
 * ID: with a retention window the broker skips entries the store would
 * prune on arrival.
 */
export function resolveStartId(
  options: Pick<SubscriptionOptions, 'offset' | 'windowSeconds'>,
  nowMs: number = Date.now(),
): string {
  if (options.windowSeconds > 0) {
    const sinceMs = Math.max(0, Math.floor(nowMs) - options.windowSeconds * 1000);
    return `${sinceMs}-0`;
  }
  return options.offset;
}

/** Looks up one field in a flat [field, value, field, value, ...] list. */
function fieldValue(fields: readonly string[], name: string): string | undefined {
  for (let i = 0; i + 1 < fields.length; i += 2) {
    if (fields[i] === name) return fields[i + 1];
  }
  return undefined;
}

/**
 * Ensures the consumer group exists and points at `startId`.
 *
 * The cache keeps nothing across restarts, so an existing group (BUSYGROUP)
 * is rewound with SETID: a fresh process replays its window instead of
 * resuming where a previous one stopped. Uses MKSTREAM so the stream is
 * created if it doesn't exist yet.
 */
export async function ensureConsumerGroup(
  redis: Redis,
  topic: string,
  group: string,
  startId: string,
  log: Logger,
): Promise<void> {
  try {
    await redis.xgroup('CREATE', topic, group, startId, 'MKSTREAM');
    log.info({ group, stream: topic, startId }, 'Consumer group created');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      await redis.xgroup('SETID', topic, group, startId);
      log.info({ group, stream: topic, startId }, 'Consumer group rewound');
      return;
    }
    throw err;
  }
}

/**
 * Consumer-group subscription on one Redis stream.
 *
 * Accept is XACK. Reject copies the entry to `<topic>:rejected` with the
 * reason, then XACKs it. Messages still buffered when the subscription
 * closes stay in the group's pending entries list.
 */
export class RedisStreamSubscription implements Subscription {
  private readonly buffer: StreamEntry[] = [];
  private readonly credit: number;
  private readonly blockMs: number;
  private closed = false;

  constructor(
    private readonly redis: Redis,
    private readonly options: Pick<SubscriptionOptions, 'topic' | 'group' | 'consumer' | 'credit' | 'blockMs'>,
    private readonly log: Logger,
  ) {
    this.credit = options.credit ?? DEFAULT_CREDIT;
    this.blockMs = options.blockMs ?? DEFAULT_BLOCK_MS;
  }

  async receive(signal?: AbortSignal): Promise<BrokerMessage | null> {
    if (signal?.aborted) {
      this.shutdown();
      return null;
    }

    const onAbort = (): void => this.shutdown();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      for (;;) {
        if (this.closed) return null;

        const entry = this.buffer.shift();
        if (entry !== undefined) return this.toMessage(entry);

        this.buffer.push(...(await this.read()));
      }
    } catch (err: unknown) {
      // A read interrupted by close() is a clean shutdown, not a failure.
      if (this.closed) return null;
      if (err instanceof BrokerTransportError) throw err;
      throw new BrokerTransportError('Failed to read from event stream', { cause: err });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async close(): Promise<void> {
    this.shutdown();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    // disconnect() (not quit()) so a blocked XREADGROUP is interrupted
    this.redis.disconnect();
    this.log.info(
      { stream: this.options.topic, buffered: this.buffer.length },
      'Event stream subscription closed',
    );
  }

  private async read(): Promise<StreamEntry[]> {
    const reply: unknown = await this.redis.xreadgroup(
      'GROUP', this.options.group, this.options.consumer,
      'COUNT', this.credit,
      'BLOCK', this.blockMs,
      'STREAMS', this.options.topic,
      '>',  // only new, undelivered messages
    );

    const parsed = readReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new BrokerTransportError('Unexpected XREADGROUP reply');
    }

    const entries: StreamEntry[] = [];
    for (const [, streamEntries] of parsed.data ?? []) {
      for (const [id, fields] of streamEntries) {
        entries.push({ id, fields: fields ?? [] });
      }
    }
    return entries;
  }

  private toMessage(entry: StreamEntry): BrokerMessage {
    const { topic, group } = this.options;
    const body = fieldValue(entry.fields, BODY_FIELD) ?? '';
    let settled = false;

    const settle = async (action: () => Promise<unknown>, what: string): Promise<void> => {
      if (settled) {
        throw new Error(`Message ${entry.id} is already settled`);
      }
      settled = true;
      try {
        await action();
      } catch (err: unknown) {
        throw new BrokerTransportError(`Failed to ${what} message ${entry.id}`, { cause: err });
      }
    };

    return {
      id: entry.id,
      body,
      accept: () => settle(() => this.redis.xack(topic, group, entry.id), 'accept'),
      reject: (reason: string) => settle(async () => {
        await this.redis.xadd(
          rejectedStreamKey(topic),
          '*',
          'source_id', entry.id,
          'reason', reason,
          'body', body,
        );
        await this.redis.xack(topic, group, entry.id);
      }, 'reject'),
    };
  }
}

/**
 * Sets up the consumer group on an already connected client and returns
 * the subscription. Group setup failures are BrokerTransportErrors.
 */
export async function openSubscription(
  redis: Redis,
  options: SubscriptionOptions,
  log: Logger,
  nowMs: number = Date.now(),
): Promise<RedisStreamSubscription> {
  const startId = resolveStartId(options, nowMs);

  try {
    await ensureConsumerGroup(redis, options.topic, options.group, startId, log);
  } catch (err: unknown) {
    redis.disconnect();
    throw new BrokerTransportError(
      `Failed to set up consumer group ${options.group} on ${options.topic}`,
      { cause: err },
    );
  }

  log.info(
    { stream: options.topic, group: options.group, consumer: options.consumer, startId },
    'Subscribed to event stream',
  );
  return new RedisStreamSubscription(redis, options, log);
}

/**
 * Connects to Redis and subscribes to the event stream.
 *
 * The client never reconnects on its own: a dropped connection rejects the
 * pending read and surfaces as a BrokerTransportError. Retry policy belongs
 * to whoever supervises the ingestion loop.
 */
export async function connectSubscription(
  options: SubscriptionOptions,
  log: Logger,
): Promise<RedisStreamSubscription> {
  const redis = new Redis(options.redisUrl, {
    maxRetriesPerRequest: null,   // required for blocking stream reads
    enableReadyCheck: true,
    lazyConnect: true,
    retryStrategy: () => null,
  });

  redis.on('error', (err: Error) => {
    log.warn({ err }, 'Event stream connection error');
  });

  try {
    await redis.connect();
  } catch (err: unknown) {
    redis.disconnect();
    throw new BrokerTransportError('Failed to connect to event stream', { cause: err });
  }
  log.info('Redis connected');

  return openSubscription(redis, options, log);
}
