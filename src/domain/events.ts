import type { InteractionKind } from './interaction.js';
import type { ThingDescriptionDocument } from './thing.js';

/** Bus-level names of the notifications the runtime emits on its own. */
export const DefaultThingEvent = {
  PropertyChange: 'propertychange',
  ActionInvocation: 'actioninvocation',
  DescriptionChange: 'descriptionchange',
} as const;

export type DefaultThingEventName = (typeof DefaultThingEvent)[keyof typeof DefaultThingEvent];

const RESERVED_EVENT_NAMES: ReadonlySet<string> = new Set(Object.values(DefaultThingEvent));

/** User events may not shadow the default notification names. */
export function isReservedEventName(name: string): boolean {
  return RESERVED_EVENT_NAMES.has(name);
}

export type DescriptionChangeType = InteractionKind;

export type DescriptionChangeMethod = 'add' | 'remove';

export interface PropertyChangeData {
  readonly name: string;
  readonly value: unknown;
}

export interface ActionInvocationData {
  readonly actionName: string;
  readonly returnValue: unknown;
}

/**
 * Payload of a description change.
 * `data` and `description` are only present for additions.
 */
export interface DescriptionChangeData {
  readonly changeType: DescriptionChangeType;
  readonly method: DescriptionChangeMethod;
  readonly name: string;
  readonly data?: Record<string, unknown>;
  readonly description?: ThingDescriptionDocument;
}

export interface PropertyChangeEmittedEvent {
  readonly type: 'propertychange';
  readonly name: 'propertychange';
  readonly data: PropertyChangeData;
}

export interface ActionInvocationEmittedEvent {
  readonly type: 'actioninvocation';
  readonly name: 'actioninvocation';
  readonly data: ActionInvocationData;
}

export interface DescriptionChangeEmittedEvent {
  readonly type: 'descriptionchange';
  readonly name: 'descriptionchange';
  readonly data: DescriptionChangeData;
}

/** An event declared by the Thing and emitted by the application. */
export interface UserEmittedEvent {
  readonly type: 'user';
  readonly name: string;
  readonly data: unknown;
}

export type EmittedEvent =
  | PropertyChangeEmittedEvent
  | ActionInvocationEmittedEvent
  | DescriptionChangeEmittedEvent
  | UserEmittedEvent;

export function createPropertyChangeEvent(data: PropertyChangeData): PropertyChangeEmittedEvent {
  const event: PropertyChangeEmittedEvent = {
    type: 'propertychange',
    name: DefaultThingEvent.PropertyChange,
    data: Object.freeze({ ...data }),
  };
  return Object.freeze(event);
}

export function createActionInvocationEvent(data: ActionInvocationData): ActionInvocationEmittedEvent {
  const event: ActionInvocationEmittedEvent = {
    type: 'actioninvocation',
    name: DefaultThingEvent.ActionInvocation,
    data: Object.freeze({ ...data }),
  };
  return Object.freeze(event);
}

export function createDescriptionChangeEvent(data: DescriptionChangeData): DescriptionChangeEmittedEvent {
  const event: DescriptionChangeEmittedEvent = {
    type: 'descriptionchange',
    name: DefaultThingEvent.DescriptionChange,
    data: Object.freeze({ ...data }),
  };
  return Object.freeze(event);
}

export function createUserEvent(name: string, data: unknown): UserEmittedEvent {
  const event: UserEmittedEvent = { type: 'user', name, data };
  return Object.freeze(event);
}
