import type { Logger } from 'pino';
import type {
  ActionInteraction,
  EmittedEvent,
  InteractionKind,
  PropertyChangeEmittedEvent,
  DescriptionChangeEmittedEvent,
  PropertyInteraction,
  EventInteraction,
  Thing,
  UserEmittedEvent,
} from '../domain/index.js';
import {
  NotFoundError,
  NotWritableError,
  NotObservableError,
  UnknownEventError,
  UnknownPropertyError,
  UndefinedActionHandlerError,
  InvalidInteractionError,
  isReservedEventName,
  createPropertyChangeEvent,
  createActionInvocationEvent,
  createDescriptionChangeEvent,
  createUserEvent,
  cloneSchema,
} from '../domain/index.js';
import { EventBus } from './event-bus.js';
import type { EventPredicate, Subscribable } from './event-bus.js';
import { HandlerRegistry, HandlerKind } from './handler-registry.js';
import type { ActionHandler, PropertyReadHandler, PropertyWriteHandler } from './handler-registry.js';
import { InteractionStateStore } from './interaction-state.js';
import {
  actionInitSchema,
  eventInitSchema,
  propertyInitSchema,
  parseInteractionInit,
} from './interaction-schema.js';
import type { ActionInitInput, EventInitInput, PropertyInitInput } from './interaction-schema.js';
import type { Servient } from './servient.js';

const KIND_LABEL: Record<InteractionKind, string> = {
  property: 'Property',
  action: 'Action',
  event: 'Event',
};

/**
 * Server side of a Thing: binds its interactions to handlers, owns the
 * property state and publishes every notification on one event bus.
 *
 * readProperty / writeProperty / invokeAction are the only asynchronous
 * calls. Existence and writability checks run before any handler is
 * resolved and surface as rejections of the returned promise; handler
 * errors pass through unchanged. Nothing here retries, times out or
 * serializes concurrent calls; a handler that needs ordering provides it.
 */
export class ExposedThing {
  readonly servient: Servient;
  readonly thing: Thing;
  private readonly log: Logger;
  private readonly state = new InteractionStateStore();
  private readonly handlers: HandlerRegistry;
  private readonly bus: EventBus;

  constructor(servient: Servient, thing: Thing) {
    this.servient = servient;
    this.thing = thing;
    this.log = servient.log.child({ thing_id: thing.id });
    this.bus = new EventBus(this.log);
    this.handlers = new HandlerRegistry({
      retrieve_property: (name) => this.defaultRetrieveProperty(name),
      update_property: (name, value) => this.defaultUpdateProperty(name, value),
      invoke_action: () => this.defaultInvokeAction(),
    });
  }

  get id(): string {
    return this.thing.id;
  }

  get name(): string {
    return this.thing.name;
  }

  get urlName(): string {
    return this.thing.urlName;
  }

  /** Same host registry and same Thing id. */
  equals(other: ExposedThing): boolean {
    return this.servient === other.servient && this.thing.id === other.thing.id;
  }

  getThingDescription(): string {
    return JSON.stringify(this.thing.toDescription());
  }

  /* ------------------------------------------------------------------ */
  /*  Read / write / invoke                                             */
  /* ------------------------------------------------------------------ */

  async readProperty(name: string): Promise<unknown> {
    const property = this.findProperty(name);
    const handler = this.handlers.getHandler(HandlerKind.RetrieveProperty, property);
    this.log.debug({ property: name }, 'Reading property');
    return handler(name);
  }

  async writeProperty(name: string, value: unknown): Promise<void> {
    const property = this.findProperty(name);
    if (!property.writable) {
      throw new NotWritableError(name);
    }

    const handler = this.handlers.getHandler(HandlerKind.UpdateProperty, property);
    this.log.debug({ property: name }, 'Writing property');
    await handler(name, value);

    this.bus.publish(createPropertyChangeEvent({ name, value }));
  }

  async invokeAction(name: string, ...args: unknown[]): Promise<unknown> {
    const action = this.findAction(name);
    const handler = this.handlers.getHandler(HandlerKind.InvokeAction, action);
    this.log.debug({ action: name, argCount: args.length }, 'Invoking action');
    const result = await handler(...args);

    this.bus.publish(createActionInvocationEvent({ actionName: name, returnValue: result }));
    return result;
  }

  /* ------------------------------------------------------------------ */
  /*  Subscriptions                                                     */
  /* ------------------------------------------------------------------ */

  onEvent(name: string): Subscribable<UserEmittedEvent> {
    if (!this.thing.findInteractionOfKind(name, 'event')) {
      throw new UnknownEventError(name);
    }
    return this.bus.filter(
      (event): event is UserEmittedEvent => event.type === 'user' && event.name === name,
    );
  }

  /** Writes are never gated on `observable`; only this subscription is. */
  onPropertyChange(name: string): Subscribable<PropertyChangeEmittedEvent> {
    const property = this.thing.findInteractionOfKind(name, 'property');
    if (!property) {
      throw new UnknownPropertyError(name);
    }
    if (!property.observable) {
      throw new NotObservableError(name);
    }
    return this.bus.filter(
      (event): event is PropertyChangeEmittedEvent =>
        event.type === 'propertychange' && event.data.name === name,
    );
  }

  onDescriptionChange(): Subscribable<DescriptionChangeEmittedEvent> {
    return this.bus.filter(
      (event): event is DescriptionChangeEmittedEvent => event.type === 'descriptionchange',
    );
  }

  /** Every emitted event, optionally narrowed by `predicate`. */
  events(predicate: EventPredicate = () => true): Subscribable<EmittedEvent> {
    return this.bus.where(predicate);
  }

  emitEvent(name: string, payload: unknown): void {
    if (!this.thing.findInteractionOfKind(name, 'event')) {
      throw new UnknownEventError(name);
    }
    this.bus.publish(createUserEvent(name, payload));
  }

  /* ------------------------------------------------------------------ */
  /*  Description mutation                                              */
  /* ------------------------------------------------------------------ */

  addProperty(name: string, init: PropertyInitInput = {}): void {
    const parsed = parseInteractionInit(propertyInitSchema, name, init);
    const property: PropertyInteraction = {
      kind: 'property',
      name,
      label: parsed.label,
      schema: structuredClone(parsed.description),
      writable: parsed.writable,
      observable: parsed.observable,
    };

    this.thing.addInteraction(property);
    if (parsed.value !== undefined) {
      this.state.set(property, parsed.value);
    }

    this.publishAddition('property', name, parsed);
  }

  removeProperty(name: string): void {
    this.removeInteraction('property', name);
  }

  addAction(name: string, init: ActionInitInput = {}): void {
    const { handler, ...definition } = init;
    const parsed = parseInteractionInit(actionInitSchema, name, definition);
    const action: ActionInteraction = {
      kind: 'action',
      name,
      label: parsed.label,
      input: cloneSchema(parsed.inputDataDescription),
      output: cloneSchema(parsed.outputDataDescription),
    };

    this.thing.addInteraction(action);
    if (handler) {
      this.handlers.setHandler(HandlerKind.InvokeAction, handler, action);
    }

    this.publishAddition('action', name, parsed);
  }

  removeAction(name: string): void {
    this.removeInteraction('action', name);
  }

  addEvent(name: string, init: EventInitInput = {}): void {
    const parsed = parseInteractionInit(eventInitSchema, name, init);
    if (isReservedEventName(name)) {
      throw new InvalidInteractionError(name, [
        { path: ['name'], message: `"${name}" is reserved for runtime notifications` },
      ]);
    }

    const event: EventInteraction = {
      kind: 'event',
      name,
      label: parsed.label,
      data: cloneSchema(parsed.dataDescription),
    };

    this.thing.addInteraction(event);
    this.publishAddition('event', name, parsed);
  }

  removeEvent(name: string): void {
    this.removeInteraction('event', name);
  }

  /* ------------------------------------------------------------------ */
  /*  Handlers                                                          */
  /* ------------------------------------------------------------------ */

  setActionHandler(handler: ActionHandler, actionName?: string): void {
    const action = actionName === undefined ? undefined : this.findAction(actionName);
    this.handlers.setHandler(HandlerKind.InvokeAction, handler, action);
  }

  setPropertyReadHandler(handler: PropertyReadHandler, propertyName?: string): void {
    const property = propertyName === undefined ? undefined : this.findProperty(propertyName);
    this.handlers.setHandler(HandlerKind.RetrieveProperty, handler, property);
  }

  setPropertyWriteHandler(handler: PropertyWriteHandler, propertyName?: string): void {
    const property = propertyName === undefined ? undefined : this.findProperty(propertyName);
    this.handlers.setHandler(HandlerKind.UpdateProperty, handler, property);
  }

  /* ------------------------------------------------------------------ */
  /*  Lifecycle                                                         */
  /* ------------------------------------------------------------------ */

  expose(): void {
    this.servient.enableExposedThing(this.thing.id);
  }

  /** Removes the Thing from its servient and completes every subscription. */
  destroy(): void {
    try {
      this.servient.removeExposedThing(this.thing.id);
    } finally {
      this.bus.complete();
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                         */
  /* ------------------------------------------------------------------ */

  private findProperty(name: string): PropertyInteraction {
    const property = this.thing.findInteractionOfKind(name, 'property');
    if (!property) {
      throw new NotFoundError(name, KIND_LABEL.property);
    }
    return property;
  }

  private findAction(name: string): ActionInteraction {
    const action = this.thing.findInteractionOfKind(name, 'action');
    if (!action) {
      throw new NotFoundError(name, KIND_LABEL.action);
    }
    return action;
  }

  private removeInteraction(kind: InteractionKind, name: string): void {
    const existing = this.thing.findInteractionOfKind(name, kind);
    if (!existing) {
      throw new NotFoundError(name, KIND_LABEL[kind]);
    }

    this.thing.removeInteraction(name);
    if (existing.kind === 'property') {
      this.state.delete(existing);
    }

    this.log.debug({ kind, interaction: name }, 'Interaction removed');
    this.bus.publish(createDescriptionChangeEvent({ changeType: kind, method: 'remove', name }));
  }

  private publishAddition(kind: InteractionKind, name: string, data: Record<string, unknown>): void {
    this.log.debug({ kind, interaction: name }, 'Interaction added');
    this.bus.publish(
      createDescriptionChangeEvent({
        changeType: kind,
        method: 'add',
        name,
        data,
        description: this.thing.toDescription(),
      }),
    );
  }

  private defaultRetrieveProperty(name: string): unknown {
    return this.state.get(this.findProperty(name));
  }

  private defaultUpdateProperty(name: string, value: unknown): void {
    this.state.set(this.findProperty(name), value);
  }

  private defaultInvokeAction(): Promise<never> {
    return Promise.reject(new UndefinedActionHandlerError());
  }
}
