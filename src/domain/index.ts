export type {
  DataSchema,
  Interaction,
  InteractionKind,
  InteractionOfKind,
  PropertyInteraction,
  ActionInteraction,
  EventInteraction,
} from './interaction.js';
export { isInteractionOfKind } from './interaction.js';
export { Thing, toUrlName, cloneSchema, TD_CONTEXT } from './thing.js';
export type {
  ThingDescriptionDocument,
  PropertyDescription,
  ActionDescription,
  EventDescription,
} from './thing.js';
export {
  DefaultThingEvent,
  isReservedEventName,
  createPropertyChangeEvent,
  createActionInvocationEvent,
  createDescriptionChangeEvent,
  createUserEvent,
} from './events.js';
export type {
  DefaultThingEventName,
  DescriptionChangeType,
  DescriptionChangeMethod,
  PropertyChangeData,
  ActionInvocationData,
  DescriptionChangeData,
  EmittedEvent,
  PropertyChangeEmittedEvent,
  ActionInvocationEmittedEvent,
  DescriptionChangeEmittedEvent,
  UserEmittedEvent,
} from './events.js';
export {
  ThingError,
  NotFoundError,
  NotWritableError,
  UnknownEventError,
  UnknownPropertyError,
  NotObservableError,
  UndefinedActionHandlerError,
  DuplicateInteractionError,
  InvalidInteractionError,
  InvalidThingError,
  ThingNotFoundError,
  DuplicateThingError,
  InvalidConfigurationError,
} from './errors.js';
export type { ThingErrorCode, ValidationIssue } from './errors.js';
