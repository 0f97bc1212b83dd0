import { z } from 'zod';
import type { Event } from '../domain/index.js';
import { EventDecodeError } from './errors.js';

/**
 * Zod schema for the event envelope carried in a broker message body.
 *
 * - `deviceId` may be empty; it then only shows up in wildcard queries.
 * - `creationTime` is whole seconds since the epoch.
 * - `data` is an open-ended object, interpreted only by the API adapters.
 */
export const eventSchema = z.object({
  deviceId: z.string(),
  creationTime: z.number().int().safe(),
  data: z.record(z.string(), z.unknown()),
});

export type EventInput = z.infer<typeof eventSchema>;

export type DecodeResult =
  | { ok: true; event: Event }
  | { ok: false; error: EventDecodeError };

/**
 * Parses a raw message body into an event.
 * Returns a discriminated result so the caller decides how to surface errors.
 */
export function decodeEvent(raw: string | Buffer): DecodeResult {
  const text = typeof raw === 'string' ? raw : raw.toString('utf-8');

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new EventDecodeError(`Malformed JSON: ${reason}`) };
  }

  const parsed = eventSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    return {
      ok: false,
      error: new EventDecodeError(`Invalid event envelope: ${issues.join('; ')}`, issues),
    };
  }

  return {
    ok: true,
    event: {
      deviceId: parsed.data.deviceId,
      creationTime: parsed.data.creationTime,
      data: parsed.data.data,
    },
  };
}
