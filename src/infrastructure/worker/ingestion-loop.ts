import type { Logger } from 'pino';
import { decodeEvent } from '../../application/event-schema.js';
import type { WindowedEventStore } from '../../application/event-window.js';
import { BrokerTransportError } from '../../application/errors.js';
import type { BrokerMessage, Subscription } from '../redis/stream-subscription.js';

export type IngestionState = 'connecting' | 'running' | 'closed' | 'failed';

/** Terminal result of one `run()`. */
export type IngestionOutcome =
  | { state: 'closed' }
  | { state: 'failed'; error: Error };

export interface IngestionStatus {
  state: IngestionState;
  /** Messages taken off the subscription. */
  received: number;
  /** Messages acknowledged after a successful decode (stored or expired). */
  accepted: number;
  /** Messages rejected because they did not decode. */
  rejected: number;
  /** Decoded events already outside the retention window on arrival. */
  expired: number;
  lastError: string | null;
}

/** Anything that can report ingestion progress (used by the health route). */
export interface IngestionStatusSource {
  status(): IngestionStatus;
}

export type SubscriptionFactory = () => Promise<Subscription>;

export interface IngestionDeps {
  connect: SubscriptionFactory;
  store: WindowedEventStore;
  log: Logger;
}

/**
 * Drives subscription → decoder → store for the lifetime of the process.
 *
 * States: connecting → running → (closed | failed).
 *
 * - A decoded event is inserted, then accepted.
 * - A body that does not decode is rejected; the loop keeps running and
 *   the store is left untouched.
 * - `receive()` resolving `null` (close or abort) ends the loop cleanly.
 * - Any transport error (connect, read, ack) ends the loop as failed.
 *
 * `run()` never throws: the outcome goes back to the supervisor, which
 * decides between terminating and degrading.
 */
export class IngestionLoop implements IngestionStatusSource {
  private state: IngestionState = 'connecting';
  private received = 0;
  private accepted = 0;
  private rejected = 0;
  private expired = 0;
  private lastError: string | null = null;

  constructor(private readonly deps: IngestionDeps) {}

  status(): IngestionStatus {
    return {
      state: this.state,
      received: this.received,
      accepted: this.accepted,
      rejected: this.rejected,
      expired: this.expired,
      lastError: this.lastError,
    };
  }

  /** Counters and the last error start from zero on every run. */
  async run(signal: AbortSignal): Promise<IngestionOutcome> {
    const { log } = this.deps;
    this.state = 'connecting';
    this.received = 0;
    this.accepted = 0;
    this.rejected = 0;
    this.expired = 0;
    this.lastError = null;

    let subscription: Subscription;
    try {
      subscription = await this.deps.connect();
    } catch (err: unknown) {
      return this.fail(err, 'Failed to connect to event stream');
    }

    this.state = 'running';
    log.info('Ingestion running');

    try {
      for (;;) {
        const message = await subscription.receive(signal);
        if (message === null) break;
        await this.handle(message);
      }
    } catch (err: unknown) {
      return this.fail(err, 'Event stream transport error');
    } finally {
      await subscription.close().catch((err: unknown) => {
        log.warn({ err }, 'Failed to close event stream subscription');
      });
    }

    this.state = 'closed';
    log.info(
      { received: this.received, accepted: this.accepted, rejected: this.rejected, expired: this.expired },
      'Ingestion stopped',
    );
    return { state: 'closed' };
  }

  private async handle(message: BrokerMessage): Promise<void> {
    const { log, store } = this.deps;
    this.received++;

    const decoded = decodeEvent(message.body);
    if (!decoded.ok) {
      log.warn({ err: decoded.error, messageId: message.id }, 'Rejecting undecodable message');
      await message.reject(decoded.error.message);
      this.rejected++;
      return;
    }

    const result = store.insert(decoded.event);
    if (result === 'expired') {
      this.expired++;
      log.debug(
        { messageId: message.id, deviceId: decoded.event.deviceId, creationTime: decoded.event.creationTime },
        'Event older than retention window, not stored',
      );
    } else {
      log.debug({ messageId: message.id, deviceId: decoded.event.deviceId }, 'Event cached');
    }

    await message.accept();
    this.accepted++;
  }

  private fail(err: unknown, message: string): IngestionOutcome {
    const error = err instanceof Error
      ? err
      : new BrokerTransportError(String(err));
    this.state = 'failed';
    this.lastError = error.message;
    this.deps.log.error({ err: error }, message);
    return { state: 'failed', error };
  }
}
