export * from './redis/index.js';
export * from './worker/index.js';
export { createDeviceRegistryClient, resolveRegistryUrl } from './registry/device-registry.js';
export type { DeviceRegistryOptions } from './registry/device-registry.js';
export { loadConfig } from './config.js';
export type { AppConfig, BasicAuthCredentials, LogLevel } from './config.js';
