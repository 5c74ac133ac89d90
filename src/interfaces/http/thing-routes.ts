import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ExposedThing } from '../../application/index.js';
import {
  NotFoundError,
  NotWritableError,
  UndefinedActionHandlerError,
} from '../../domain/index.js';

const writePropertyBodySchema = z.object({
  value: z.unknown(),
}).refine((body) => 'value' in body, { message: 'value is required' });

const invokeActionBodySchema = z.object({
  args: z.array(z.unknown()).default([]),
}).default({});

type ThingParams = { thing: string };
type InteractionParams = { thing: string; name: string };

/**
 * Runtime errors that map onto a client-facing status.
 * Anything else is rethrown to Fastify's default handler (500, logged).
 */
function statusFor(err: unknown): number | null {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof NotWritableError) return 405;
  if (err instanceof UndefinedActionHandlerError) return 501;
  return null;
}

/**
 * HTTP binding for exposed Things.
 *
 * GET  /api/v1/things                          enabled Things
 * GET  /api/v1/things/:thing                   Thing description
 * GET  /api/v1/things/:thing/properties/:name  read property
 * PUT  /api/v1/things/:thing/properties/:name  write property
 * POST /api/v1/things/:thing/actions/:name     invoke action
 *
 * `:thing` is the Thing's URL name or its id. Disabled Things are 404.
 */
async function thingRoutes(fastify: FastifyInstance): Promise<void> {

  /** Only enabled Things take part: URL name first, then id. */
  function resolveThing(key: string): ExposedThing | null {
    const enabled = fastify.servient.enabledThings;
    return (
      enabled.find((exposed) => exposed.urlName === key)
      ?? enabled.find((exposed) => exposed.id === key)
      ?? null
    );
  }

  async function sendFailure(reply: FastifyReply, err: unknown): Promise<FastifyReply> {
    const status = statusFor(err);
    if (status === null || !(err instanceof Error)) {
      throw err;
    }
    return reply.status(status).send({ error: err.message });
  }

  // ── GET /api/v1/things ───────────────────────────────────
  fastify.get(
    '/api/v1/things',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const things = fastify.servient.enabledThings.map((exposed) => ({
        id: exposed.id,
        name: exposed.name,
        url_name: exposed.urlName,
      }));
      return reply.status(200).send(things);
    },
  );

  // ── GET /api/v1/things/:thing ────────────────────────────
  fastify.get(
    '/api/v1/things/:thing',
    async (request: FastifyRequest<{ Params: ThingParams }>, reply: FastifyReply) => {
      const exposed = resolveThing(request.params.thing);
      if (!exposed) {
        return reply.status(404).send({ error: 'Thing not found' });
      }
      return reply.status(200).type('application/json').send(exposed.getThingDescription());
    },
  );

  // ── GET /api/v1/things/:thing/properties/:name ───────────
  fastify.get(
    '/api/v1/things/:thing/properties/:name',
    async (request: FastifyRequest<{ Params: InteractionParams }>, reply: FastifyReply) => {
      const exposed = resolveThing(request.params.thing);
      if (!exposed) {
        return reply.status(404).send({ error: 'Thing not found' });
      }

      try {
        const value = await exposed.readProperty(request.params.name);
        return reply.status(200).send({ value: value ?? null });
      } catch (err: unknown) {
        return sendFailure(reply, err);
      }
    },
  );

  // ── PUT /api/v1/things/:thing/properties/:name ───────────
  fastify.put(
    '/api/v1/things/:thing/properties/:name',
    async (
      request: FastifyRequest<{ Params: InteractionParams; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const exposed = resolveThing(request.params.thing);
      if (!exposed) {
        return reply.status(404).send({ error: 'Thing not found' });
      }

      const parsed = writePropertyBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      try {
        await exposed.writeProperty(request.params.name, parsed.data.value);
        return reply.status(204).send();
      } catch (err: unknown) {
        return sendFailure(reply, err);
      }
    },
  );

  // ── POST /api/v1/things/:thing/actions/:name ─────────────
  fastify.post(
    '/api/v1/things/:thing/actions/:name',
    async (
      request: FastifyRequest<{ Params: InteractionParams; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const exposed = resolveThing(request.params.thing);
      if (!exposed) {
        return reply.status(404).send({ error: 'Thing not found' });
      }

      const parsed = invokeActionBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      try {
        const result = await exposed.invokeAction(request.params.name, ...parsed.data.args);
        return reply.status(200).send({ result: result ?? null });
      } catch (err: unknown) {
        return sendFailure(reply, err);
      }
    },
  );
}

export default fp(thingRoutes, {
  name: 'thing-routes',
  dependencies: ['servient'],
  fastify: '5.x',
});
