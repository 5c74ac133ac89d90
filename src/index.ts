import Fastify from 'fastify';
import pino from 'pino';

import { Servient } from './application/index.js';
import type { Subscription } from './application/index.js';
import {
  loadServerConfig,
  loadThingCatalog,
  redisPlugin,
  relayThingEvents,
} from './infrastructure/index.js';
import { servientPlugin, thingRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the Thing host.
 *
 * Order:
 * 1) Config + logger
 * 2) Servient, Things from the catalog (exposed immediately)
 * 3) Optional Redis relay
 * 4) HTTP binding
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadServerConfig();
  const log = pino({ level: config.logLevel });

  const fastify = Fastify({ loggerInstance: log });

  // --------------------------------------------------
  // Things
  // --------------------------------------------------

  const servient = new Servient({ log });

  const catalog = loadThingCatalog(config.thingCatalogPath);
  for (const init of catalog) {
    const exposed = servient.produce(init);
    exposed.expose();
  }

  log.info(
    { thingCount: catalog.length, catalog: config.thingCatalogPath },
    'Thing catalog loaded',
  );

  // --------------------------------------------------
  // Event relay (optional)
  // --------------------------------------------------

  const relays: Subscription[] = [];

  if (config.redisUrl) {
    await fastify.register(redisPlugin, { url: config.redisUrl });
    for (const exposed of servient.exposedThings) {
      relays.push(relayThingEvents(fastify.redis, log, exposed));
    }
  }

  // --------------------------------------------------
  // HTTP binding
  // --------------------------------------------------

  await fastify.register(servientPlugin, { servient });
  await fastify.register(thingRoutes);

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    for (const relay of relays) {
      relay.unsubscribe();
    }
    for (const exposed of servient.exposedThings) {
      exposed.destroy();
    }
  });

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = (): void => {
    log.info('Shutting down host...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
