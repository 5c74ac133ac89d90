export { HandlerRegistry, HandlerKind } from './handler-registry.js';
export type {
  HandlerMap,
  MaybePromise,
  PropertyReadHandler,
  PropertyWriteHandler,
  ActionHandler,
} from './handler-registry.js';
export { InteractionStateStore } from './interaction-state.js';
export { EventBus } from './event-bus.js';
export type { Observer, Subscription, Subscribable, EventPredicate } from './event-bus.js';
export {
  propertyInitSchema,
  actionInitSchema,
  eventInitSchema,
  thingInitSchema,
  interactionNameSchema,
  parseInteractionInit,
  toValidationIssues,
} from './interaction-schema.js';
export type {
  PropertyInit,
  PropertyInitInput,
  ActionInit,
  ActionInitInput,
  EventInit,
  EventInitInput,
  ThingInit,
  ThingInitInput,
} from './interaction-schema.js';
export { ExposedThing } from './exposed-thing.js';
export { Servient } from './servient.js';
export type { ServientOptions } from './servient.js';
