export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { publishThingEvent, relayThingEvents, THING_EVENTS_CHANNEL } from './event-relay.js';
export type { ThingEventMessage } from './event-relay.js';
