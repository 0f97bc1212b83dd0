import { describe, it, expect, vi } from 'vitest';
import { IngestionLoop } from '../../src/infrastructure/worker/ingestion-loop.js';
import type { BrokerMessage, Subscription } from '../../src/infrastructure/redis/stream-subscription.js';
import { WindowedEventStore } from '../../src/application/event-window.js';
import { BrokerTransportError } from '../../src/application/errors.js';
import { eventBody, fakeLogger } from '../helpers.js';

function fakeMessage(id: string, body: string) {
  return {
    id,
    body,
    accept: vi.fn(async () => {}),
    reject: vi.fn(async (_reason: string) => {}),
  };
}

/** Hands out `items` in order; `null` or running out ends the subscription. */
function scriptedSubscription(items: Array<BrokerMessage | Error | null>) {
  const queue = [...items];
  return {
    receive: vi.fn(async (_signal?: AbortSignal): Promise<BrokerMessage | null> => {
      const next = queue.shift();
      if (next === undefined || next === null) return null;
      if (next instanceof Error) throw next;
      return next;
    }),
    close: vi.fn(async () => {}),
  };
}

function setup(subscription: Subscription, windowSeconds = 0) {
  const store = new WindowedEventStore({ windowSeconds, now: () => 1000 });
  const log = fakeLogger();
  const loop = new IngestionLoop({ connect: async () => subscription, store, log });
  return { store, log, loop };
}

describe('IngestionLoop', () => {
  it('stores decoded events, rejects undecodable ones and keeps going', async () => {
    const first = fakeMessage('1-0', eventBody({ creationTime: 1000 }));
    const invalid = fakeMessage('2-0', '{"deviceId": "x"}');
    const third = fakeMessage('3-0', eventBody({ creationTime: 1001 }));
    const subscription = scriptedSubscription([first, invalid, third, null]);
    const { store, loop } = setup(subscription);

    const outcome = await loop.run(new AbortController().signal);

    expect(outcome).toEqual({ state: 'closed' });
    expect(store.query('', 0, 0).map((e) => e.creationTime)).toEqual([1000, 1001]);
    expect(first.accept).toHaveBeenCalledTimes(1);
    expect(third.accept).toHaveBeenCalledTimes(1);
    expect(invalid.accept).not.toHaveBeenCalled();
    expect(invalid.reject).toHaveBeenCalledTimes(1);
    expect(invalid.reject.mock.calls[0]?.[0]).toContain('creationTime: Required');
  });

  it('leaves the store untouched when a message is rejected', async () => {
    const invalid = fakeMessage('1-0', 'not json');
    const { store, loop } = setup(scriptedSubscription([invalid, null]));

    await loop.run(new AbortController().signal);

    expect(store.size).toBe(0);
    expect(invalid.reject.mock.calls[0]?.[0]).toMatch(/^Malformed JSON:/);
  });

  it('inserts before accepting', async () => {
    const sizes: number[] = [];
    const message = fakeMessage('1-0', eventBody());
    const subscription = scriptedSubscription([message, null]);
    const { store, loop } = setup(subscription);
    message.accept.mockImplementation(async () => {
      sizes.push(store.size);
    });

    await loop.run(new AbortController().signal);

    expect(sizes).toEqual([1]);
  });

  it('accepts events that are already outside the window without storing them', async () => {
    const old = fakeMessage('1-0', eventBody({ creationTime: 800 }));
    const { store, loop } = setup(scriptedSubscription([old, null]), 100);

    await loop.run(new AbortController().signal);

    expect(old.accept).toHaveBeenCalledTimes(1);
    expect(store.size).toBe(0);
    expect(loop.status()).toMatchObject({ accepted: 1, expired: 1 });
  });

  it('counts what it handled', async () => {
    const subscription = scriptedSubscription([
      fakeMessage('1-0', eventBody()),
      fakeMessage('2-0', '{}'),
      fakeMessage('3-0', eventBody()),
      null,
    ]);
    const { loop } = setup(subscription);

    await loop.run(new AbortController().signal);

    expect(loop.status()).toEqual({
      state: 'closed',
      received: 3,
      accepted: 2,
      rejected: 1,
      expired: 0,
      lastError: null,
    });
  });

  it('starts its counters over on every run', async () => {
    const store = new WindowedEventStore({ windowSeconds: 0, now: () => 1000 });
    const first = scriptedSubscription([
      fakeMessage('1-0', eventBody()),
      fakeMessage('2-0', '{}'),
      new BrokerTransportError('Failed to read from event stream'),
    ]);
    const second = scriptedSubscription([fakeMessage('3-0', eventBody({ creationTime: 1001 })), null]);
    const connect = vi.fn(async (): Promise<Subscription> => first)
      .mockResolvedValueOnce(first)
      .mockResolvedValueOnce(second);
    const loop = new IngestionLoop({ connect, store, log: fakeLogger() });

    await loop.run(new AbortController().signal);
    expect(loop.status()).toMatchObject({ state: 'failed', received: 2, rejected: 1 });

    await loop.run(new AbortController().signal);

    expect(loop.status()).toEqual({
      state: 'closed',
      received: 1,
      accepted: 1,
      rejected: 0,
      expired: 0,
      lastError: null,
    });
  });

  it('reports running while receiving', async () => {
    const states: string[] = [];
    const subscription = scriptedSubscription([null]);
    const { loop } = setup(subscription);
    subscription.receive.mockImplementationOnce(async () => {
      states.push(loop.status().state);
      return null;
    });

    expect(loop.status().state).toBe('connecting');
    await loop.run(new AbortController().signal);

    expect(states).toEqual(['running']);
    expect(loop.status().state).toBe('closed');
  });

  it('passes the abort signal to receive', async () => {
    const subscription = scriptedSubscription([null]);
    const { loop } = setup(subscription);
    const ac = new AbortController();

    await loop.run(ac.signal);

    expect(subscription.receive).toHaveBeenCalledWith(ac.signal);
  });

  it('fails when the subscription cannot be opened', async () => {
    const store = new WindowedEventStore({ windowSeconds: 0 });
    const log = fakeLogger();
    const error = new BrokerTransportError('Failed to connect to event stream');
    const loop = new IngestionLoop({ connect: async () => { throw error; }, store, log });

    const outcome = await loop.run(new AbortController().signal);

    expect(outcome).toEqual({ state: 'failed', error });
    expect(loop.status()).toMatchObject({ state: 'failed', lastError: 'Failed to connect to event stream' });
    expect(log.error).toHaveBeenCalledWith({ err: error }, 'Failed to connect to event stream');
  });

  it('fails on a transport error and closes the subscription', async () => {
    const error = new BrokerTransportError('Failed to read from event stream');
    const message = fakeMessage('1-0', eventBody());
    const subscription = scriptedSubscription([message, error]);
    const { store, loop } = setup(subscription);

    const outcome = await loop.run(new AbortController().signal);

    expect(outcome).toEqual({ state: 'failed', error });
    expect(subscription.close).toHaveBeenCalledTimes(1);
    expect(store.size).toBe(1);
  });

  it('fails when an acknowledgement fails', async () => {
    const message = fakeMessage('1-0', eventBody());
    message.accept.mockRejectedValueOnce(new BrokerTransportError('Failed to accept message 1-0'));
    const { loop } = setup(scriptedSubscription([message, null]));

    const outcome = await loop.run(new AbortController().signal);

    expect(outcome.state).toBe('failed');
    expect(loop.status().lastError).toBe('Failed to accept message 1-0');
  });

  it('wraps a non-Error failure', async () => {
    const store = new WindowedEventStore({ windowSeconds: 0 });
    const loop = new IngestionLoop({
      connect: () => Promise.reject('boom'),
      store,
      log: fakeLogger(),
    });

    const outcome = await loop.run(new AbortController().signal);

    expect(outcome.state).toBe('failed');
    if (outcome.state === 'failed') {
      expect(outcome.error).toBeInstanceOf(BrokerTransportError);
      expect(outcome.error.message).toBe('boom');
    }
  });

  it('closes the subscription after a clean stop', async () => {
    const subscription = scriptedSubscription([null]);
    const { loop, log } = setup(subscription);

    await loop.run(new AbortController().signal);

    expect(subscription.close).toHaveBeenCalledTimes(1);
    expect(log.info).toHaveBeenCalledWith(
      { received: 0, accepted: 0, rejected: 0, expired: 0 },
      'Ingestion stopped',
    );
  });

  it('still reports the outcome when close fails', async () => {
    const subscription = scriptedSubscription([null]);
    subscription.close.mockRejectedValueOnce(new Error('already closed'));
    const { loop } = setup(subscription);

    await expect(loop.run(new AbortController().signal)).resolves.toEqual({ state: 'closed' });
  });
});
