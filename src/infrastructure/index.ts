export { redisPlugin, publishThingEvent, relayThingEvents, THING_EVENTS_CHANNEL } from './redis/index.js';
export type { RedisPluginOptions, ThingEventMessage } from './redis/index.js';
export { loadServerConfig, loadThingCatalog } from './config/index.js';
export type { ServerConfig, LogLevel } from './config/index.js';
