import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { EmittedEvent } from '../../domain/index.js';
import type { ExposedThing, Subscription } from '../../application/index.js';

export const THING_EVENTS_CHANNEL = 'thing_events';

export interface ThingEventMessage {
  thing_id: string;
  type: EmittedEvent['type'];
  name: string;
  data: unknown;
  emitted_at: string;
}

/**
 * Publishes one emitted event to the "thing_events" Pub/Sub channel.
 *
 * Best-effort: failures are logged and never reach the publisher.
 */
export async function publishThingEvent(
  redis: Redis,
  log: Logger,
  thingId: string,
  event: EmittedEvent,
): Promise<void> {
  const message: ThingEventMessage = {
    thing_id: thingId,
    type: event.type,
    name: event.name,
    data: event.data,
    emitted_at: new Date().toISOString(),
  };

  try {
    await redis.publish(THING_EVENTS_CHANNEL, JSON.stringify(message));
    log.debug({ channel: THING_EVENTS_CHANNEL, thing_id: thingId, event: event.name }, 'Relayed thing event');
  } catch (err: unknown) {
    log.warn({ err, thing_id: thingId, event: event.name }, 'Failed to relay thing event');
  }
}

/**
 * Forwards every event of `exposed` to Redis until the returned
 * subscription is closed or the Thing is destroyed.
 */
export function relayThingEvents(redis: Redis, log: Logger, exposed: ExposedThing): Subscription {
  return exposed.events().subscribe((event) => {
    void publishThingEvent(redis, log, exposed.id, event);
  });
}
