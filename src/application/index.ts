export { eventSchema, decodeEvent } from './event-schema.js';
export type { EventInput, DecodeResult } from './event-schema.js';
export { WindowedEventStore } from './event-window.js';
export type { EventWindowOptions, InsertResult } from './event-window.js';
export { createQueryService } from './query-events.js';
export type { QueryService, QueryServiceDeps, DeviceRegistry } from './query-events.js';
export { toEventView } from './event-view.js';
export type { EventView } from './event-view.js';
export {
  BrokerTransportError,
  EventDecodeError,
  QueryValidationError,
  DeviceRegistryError,
} from './errors.js';
