import type { Device, Event } from '../domain/index.js';
import type { WindowedEventStore } from './event-window.js';
import { QueryValidationError } from './errors.js';

/** Source of the device list; implemented by the HTTP registry client. */
export interface DeviceRegistry {
  listDevices(): Promise<readonly Device[]>;
}

/**
 * The two reads the API adapters bind to.
 * Safe to call from any number of concurrent requests while ingestion runs.
 */
export interface QueryService {
  listEvents(deviceId: string, max: number, since: number): Promise<readonly Event[]>;
  listDevices(): Promise<readonly Device[]>;
}

export interface QueryServiceDeps {
  store: WindowedEventStore;
  registry: DeviceRegistry;
}

function requireInteger(field: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new QueryValidationError(field, `${field} must be an integer`);
  }
}

/**
 * Use case: query the windowed cache and the device registry.
 *
 * `max <= 0` returns every match. An empty `deviceId` matches all devices.
 * Non-integer `max` or `since` is a QueryValidationError, never an empty list.
 */
export function createQueryService(deps: QueryServiceDeps): QueryService {
  return {
    async listEvents(deviceId, max, since) {
      requireInteger('max', max);
      requireInteger('since', since);
      return deps.store.query(deviceId, since, max);
    },

    async listDevices() {
      return deps.registry.listDevices();
    },
  };
}
