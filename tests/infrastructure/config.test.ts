import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/infrastructure/config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ host: '0.0.0.0', port: 8080 });
    expect(config.logLevel).toBe('info');
    expect(config.windowSeconds).toBe(3600);
    expect(config.failurePolicy).toBe('exit');
    expect(config.auth).toBeNull();
    expect(config.broker).toMatchObject({
      redisUrl: 'redis://localhost:6379',
      topic: 'events',
      consumer: 'cache-1',
      offset: '0',
      credit: 10,
    });
    expect(config.broker.group.startsWith('event-cache-')).toBe(true);
    expect(config.registry).toEqual({
      url: 'http://localhost:8081/registration',
      tenant: undefined,
      username: '',
      password: '',
    });
  });

  it('reads broker and window settings', () => {
    const config = loadConfig({
      REDIS_URL: 'redis://cache.internal:6380',
      EVENT_STREAM: 'telemetry',
      EVENT_CONSUMER_GROUP: 'cache',
      EVENT_START_OFFSET: '$',
      EVENT_WINDOW_SECONDS: '0',
      EVENT_RECEIVE_CREDIT: '50',
      INGEST_FAILURE_POLICY: 'degrade',
    });

    expect(config.broker).toMatchObject({
      redisUrl: 'redis://cache.internal:6380',
      topic: 'telemetry',
      group: 'cache',
      offset: '$',
      credit: 50,
    });
    expect(config.windowSeconds).toBe(0);
    expect(config.failurePolicy).toBe('degrade');
  });

  it('derives the registry username from the tenant', () => {
    const config = loadConfig({ DEVICE_REGISTRY_TENANT: 't1', DEVICE_REGISTRY_PASSWORD: 'test-secret' });

    expect(config.registry).toMatchObject({ tenant: 't1', username: 'device-registry@t1', password: 'test-secret' });
  });

  it('prefers an explicit registry username', () => {
    const config = loadConfig({ DEVICE_REGISTRY_TENANT: 't1', DEVICE_REGISTRY_USERNAME: 'reader' });

    expect(config.registry.username).toBe('reader');
  });

  it('enables basic auth when both credentials are set', () => {
    const config = loadConfig({ API_USERNAME: 'admin', API_PASSWORD: 'test-secret' });

    expect(config.auth).toEqual({ username: 'admin', password: 'test-secret', realm: 'telemetry' });
  });

  it('treats empty variables as unset', () => {
    const config = loadConfig({ PORT: '', EVENT_WINDOW_SECONDS: '  ', API_USERNAME: '' });

    expect(config.server.port).toBe(8080);
    expect(config.windowSeconds).toBe(3600);
    expect(config.auth).toBeNull();
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('rejects a negative window', () => {
    expect(() => loadConfig({ EVENT_WINDOW_SECONDS: '-5' })).toThrow(/EVENT_WINDOW_SECONDS/);
  });

  it('rejects an unknown failure policy', () => {
    expect(() => loadConfig({ INGEST_FAILURE_POLICY: 'retry' })).toThrow(/INGEST_FAILURE_POLICY/);
  });

  it('rejects a malformed start offset', () => {
    expect(() => loadConfig({ EVENT_START_OFFSET: 'latest' })).toThrow('EVENT_START_OFFSET: Must be a stream entry ID');
  });

  it('rejects half-configured API credentials', () => {
    expect(() => loadConfig({ API_USERNAME: 'admin' }))
      .toThrow('Invalid configuration: API_PASSWORD: API_USERNAME and API_PASSWORD must be set together');
  });
});
