export { default as servientPlugin } from './servient-plugin.js';
export type { ServientPluginOptions } from './servient-plugin.js';
export { default as thingRoutes } from './thing-routes.js';
