export type { Event, EventData } from './event.js';
export type { Device } from './device.js';
