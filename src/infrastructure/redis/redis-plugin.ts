import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  url: string;
}

/**
 * Publisher connection for the thing event relay.
 *
 * Only PUBLISH goes through it, so a failed command rejects instead of
 * queueing forever. The relay already treats a rejection as a dropped event.
 */
async function redisPlugin(fastify: FastifyInstance, { url }: RedisPluginOptions): Promise<void> {
  const publisher = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    connectionName: 'thing-event-relay',
  });

  publisher.on('error', (err: Error) => {
    fastify.log.warn({ err }, 'Event relay connection error');
  });

  await publisher.connect();
  fastify.decorate('redis', publisher);
  fastify.log.info('Event relay connected');

  fastify.addHook('onClose', async () => {
    await publisher.quit();
    fastify.log.info('Event relay disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
