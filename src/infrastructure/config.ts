import { hostname } from 'node:os';
import { z } from 'zod';
import type { FailurePolicy } from './worker/supervisor.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Redis stream entry ID (`<ms>` or `<ms>-<seq>`) or `$` for "new entries only". */
const STREAM_ID_RE = /^(\d+(-\d+)?|\$)$/;

const envSchema = z
  .object({
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    EVENT_STREAM: z.string().min(1).default('events'),
    EVENT_CONSUMER_GROUP: z.string().min(1).optional(),
    EVENT_CONSUMER_NAME: z.string().min(1).default('cache-1'),
    EVENT_START_OFFSET: z.string().regex(STREAM_ID_RE, 'Must be a stream entry ID').default('0'),
    EVENT_WINDOW_SECONDS: z.coerce.number().int().min(0).default(3600),
    EVENT_RECEIVE_CREDIT: z.coerce.number().int().min(1).max(1000).default(10),
    INGEST_FAILURE_POLICY: z.enum(['exit', 'degrade']).default('exit'),

    DEVICE_REGISTRY_URL: z.string().url().default('http://localhost:8081/registration'),
    DEVICE_REGISTRY_TENANT: z.string().min(1).optional(),
    DEVICE_REGISTRY_USERNAME: z.string().min(1).optional(),
    DEVICE_REGISTRY_PASSWORD: z.string().default(''),

    API_USERNAME: z.string().min(1).optional(),
    API_PASSWORD: z.string().min(1).optional(),
    API_REALM: z.string().min(1).default('telemetry'),
  })
  .refine(
    (env) => (env.API_USERNAME === undefined) === (env.API_PASSWORD === undefined),
    { message: 'API_USERNAME and API_PASSWORD must be set together', path: ['API_PASSWORD'] },
  );

export interface BasicAuthCredentials {
  username: string;
  password: string;
  realm: string;
}

export interface AppConfig {
  server: { host: string; port: number };
  logLevel: LogLevel;
  broker: {
    redisUrl: string;
    topic: string;
    group: string;
    consumer: string;
    offset: string;
    credit: number;
  };
  /** Retention in seconds; 0 keeps every event. */
  windowSeconds: number;
  failurePolicy: FailurePolicy;
  registry: {
    url: string;
    tenant: string | undefined;
    username: string;
    password: string;
  };
  /** `null` when the API is served without authentication. */
  auth: BasicAuthCredentials | null;
}

/** Unset and empty variables are treated the same. */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Loads and validates configuration from environment variables.
 * Throws on the first invalid value so a misconfigured process never starts.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  const tenant = e.DEVICE_REGISTRY_TENANT;

  return {
    server: { host: e.HOST, port: e.PORT },
    logLevel: e.LOG_LEVEL,
    broker: {
      redisUrl: e.REDIS_URL,
      topic: e.EVENT_STREAM,
      group: e.EVENT_CONSUMER_GROUP ?? `event-cache-${hostname()}`,
      consumer: e.EVENT_CONSUMER_NAME,
      offset: e.EVENT_START_OFFSET,
      credit: e.EVENT_RECEIVE_CREDIT,
    },
    windowSeconds: e.EVENT_WINDOW_SECONDS,
    failurePolicy: e.INGEST_FAILURE_POLICY,
    registry: {
      url: e.DEVICE_REGISTRY_URL,
      tenant,
      username: e.DEVICE_REGISTRY_USERNAME
        ?? (tenant !== undefined ? `device-registry@${tenant}` : ''),
      password: e.DEVICE_REGISTRY_PASSWORD,
    },
    auth: e.API_USERNAME !== undefined && e.API_PASSWORD !== undefined
      ? { username: e.API_USERNAME, password: e.API_PASSWORD, realm: e.API_REALM }
      : null,
  };
}
