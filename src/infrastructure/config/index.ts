export { loadServerConfig } from './server-config.js';
export type { ServerConfig, LogLevel } from './server-config.js';
export { loadThingCatalog } from './thing-catalog.js';
