import { vi } from 'vitest';
import type { Event } from '../src/domain/index.js';

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    deviceId: overrides.deviceId ?? 'd1',
    creationTime: overrides.creationTime ?? 1000,
    data: overrides.data ?? { temperature: 21 },
  };
}

/** JSON body of a broker message carrying `event`. */
export function eventBody(overrides: Partial<Event> = {}): string {
  return JSON.stringify(makeEvent(overrides));
}

/** Minimal fake logger; `child()` returns the same fake. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}
