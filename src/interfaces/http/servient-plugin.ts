import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Servient } from '../../application/index.js';

export interface ServientPluginOptions {
  servient: Servient;
}

/**
 * Decorates `fastify.servient` so binding routes can resolve Things.
 * The servient's lifecycle belongs to the caller.
 */
async function servientPlugin(fastify: FastifyInstance, options: ServientPluginOptions): Promise<void> {
  fastify.decorate('servient', options.servient);
}

export default fp(servientPlugin, {
  name: 'servient',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    servient: Servient;
  }
}
