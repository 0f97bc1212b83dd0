import { z } from 'zod';
import type { Device } from '../../domain/index.js';
import type { DeviceRegistry } from '../../application/query-events.js';
import { DeviceRegistryError } from '../../application/errors.js';

const DEFAULT_TIMEOUT_MS = 10_000;

export interface DeviceRegistryOptions {
  url: string;
  /** When set, appended to the URL as a path segment. */
  tenant?: string | undefined;
  username: string;
  password: string;
  timeoutMs?: number;
}

/** Registry wire format. A device without `enabled` is treated as disabled. */
const registryDeviceSchema = z.object({
  'device-id': z.string(),
  enabled: z.boolean().default(false),
  name: z.string().optional(),
  description: z.string().optional(),
  sensors: z.array(z.string()).nullish(),
});

const registryResponseSchema = z.object({
  devices: z.array(registryDeviceSchema).nullish(),
});

type RegistryDevice = z.infer<typeof registryDeviceSchema>;

function toDevice(raw: RegistryDevice): Device {
  return {
    id: raw['device-id'],
    enabled: raw.enabled,
    name: raw.name,
    description: raw.description,
    sensors: raw.sensors ?? undefined,
  };
}

export function resolveRegistryUrl(url: string, tenant?: string): string {
  if (tenant === undefined) return url;
  return `${url.replace(/\/+$/, '')}/${encodeURIComponent(tenant)}`;
}

/**
 * HTTP client for the external device registry.
 *
 * `listDevices()` is a single authenticated GET: no retry and no cached
 * fallback. Every failure (network, non-2xx, body that is not the expected
 * JSON) surfaces as a DeviceRegistryError.
 */
export function createDeviceRegistryClient(options: DeviceRegistryOptions): DeviceRegistry {
  const url = resolveRegistryUrl(options.url, options.tenant);
  const credentials = Buffer.from(`${options.username}:${options.password}`).toString('base64');
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    async listDevices() {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: {
            Authorization: `Basic ${credentials}`,
            Accept: 'application/json',
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err: unknown) {
        throw new DeviceRegistryError('Device registry request failed', undefined, { cause: err });
      }

      if (!response.ok) {
        throw new DeviceRegistryError(
          `Device registry returned HTTP ${response.status}`,
          response.status,
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err: unknown) {
        throw new DeviceRegistryError('Device registry returned malformed JSON', response.status, { cause: err });
      }

      const parsed = registryResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new DeviceRegistryError(
          `Unexpected device registry response: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
          response.status,
        );
      }

      return (parsed.data.devices ?? []).map(toDevice);
    },
  };
}
