/**
 * Core domain types for the telemetry event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the cache. They carry no framework dependencies.
 */

/** Open-ended payload attached to every event; opaque to the cache. */
export type EventData = Record<string, unknown>;

/**
 * One telemetry reading.
 *
 * `deviceId` may be empty ("unknown device"); such events are only
 * returned by a wildcard query. `creationTime` is producer-supplied,
 * in whole seconds since the epoch.
 */
export interface Event {
  readonly deviceId: string;
  readonly creationTime: number;
  readonly data: EventData;
}
