import { pino } from 'pino';
import { buildServer } from './app.js';
import { WindowedEventStore, createQueryService } from './application/index.js';
import {
  loadConfig,
  createDeviceRegistryClient,
  connectSubscription,
  IngestionLoop,
  superviseIngestion,
} from './infrastructure/index.js';
import type { IngestionOutcome } from './infrastructure/index.js';

/**
 * Composition root.
 *
 * Order:
 * 1) Config + logger
 * 2) Store, registry client, query service, ingestion loop
 * 3) HTTP server (shutdown hook registered before listen())
 * 4) listen()
 * 5) Ingestion under supervision
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  // --------------------------------------------------
  // Core
  // --------------------------------------------------

  const store = new WindowedEventStore({ windowSeconds: config.windowSeconds });
  if (config.windowSeconds === 0) {
    log.warn('EVENT_WINDOW_SECONDS=0: retention disabled, the cache grows without bound');
  }

  const registry = createDeviceRegistryClient(config.registry);
  const queries = createQueryService({ store, registry });

  const loop = new IngestionLoop({
    connect: () => connectSubscription(
      { ...config.broker, windowSeconds: config.windowSeconds },
      log.child({ component: 'stream-subscription' }),
    ),
    store,
    log: log.child({ component: 'ingestion' }),
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = buildServer({
    queries,
    store,
    ingestion: loop,
    auth: config.auth,
    logLevel: config.logLevel,
  });

  const ac = new AbortController();
  let ingestion: Promise<IngestionOutcome | null> | null = null;

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    ac.abort();
    if (ingestion) {
      await ingestion;
    }
  });

  let shuttingDown = false;
  function shutdown(exitCode: number): void {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down...');

    fastify.close().then(
      () => process.exit(exitCode),
      (err: unknown) => {
        log.error({ err }, 'Failed to close server');
        process.exit(1);
      },
    );
  }

  process.on('SIGINT', () => shutdown(0));
  process.on('SIGTERM', () => shutdown(0));

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  // --------------------------------------------------
  // Ingestion (after listen)
  // --------------------------------------------------

  log.info(
    {
      stream: config.broker.topic,
      group: config.broker.group,
      windowSeconds: config.windowSeconds,
      failurePolicy: config.failurePolicy,
    },
    'Starting ingestion',
  );

  ingestion = superviseIngestion({
    loop,
    signal: ac.signal,
    policy: config.failurePolicy,
    log: log.child({ component: 'supervisor' }),
    onFatal: () => shutdown(1),
  }).catch((err: unknown) => {
    log.fatal({ err }, 'Ingestion supervisor crashed');
    shutdown(1);
    return null;
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
