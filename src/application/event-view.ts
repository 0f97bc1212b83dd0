import type { Event, EventData } from '../domain/index.js';

/**
 * Typed projection of an event for API responses.
 *
 * The cache treats `data` as opaque; only the adapters read the sensor
 * fields they know about. A missing or mistyped field projects to `null`.
 */
export interface EventView {
  deviceId: string;
  creationTime: number;
  temperature: number | null;
  motion: boolean | null;
}

function numberField(data: EventData, key: string): number | null {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function booleanField(data: EventData, key: string): boolean | null {
  const value = data[key];
  return typeof value === 'boolean' ? value : null;
}

export function toEventView(event: Event): EventView {
  return {
    deviceId: event.deviceId,
    creationTime: event.creationTime,
    temperature: numberField(event.data, 'temperature'),
    motion: booleanField(event.data, 'motion'),
  };
}
