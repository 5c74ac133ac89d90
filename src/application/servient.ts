import { randomUUID } from 'node:crypto';
import pino from 'pino';
import type { Logger } from 'pino';
import {
  Thing,
  DuplicateThingError,
  InvalidThingError,
  ThingNotFoundError,
} from '../domain/index.js';
import { ExposedThing } from './exposed-thing.js';
import { thingInitSchema, toValidationIssues } from './interaction-schema.js';
import type { ThingInitInput } from './interaction-schema.js';

export interface ServientOptions {
  log?: Logger;
}

/**
 * Host registry for exposed Things.
 *
 * A Thing is registered when produced and only reachable through the
 * protocol bindings once enabled. Each Thing keeps its own handler
 * registry, state and event bus; the servient only tracks identity and
 * enablement.
 */
export class Servient {
  readonly log: Logger;
  private readonly things: Map<string, ExposedThing> = new Map();
  private readonly enabled: Set<string> = new Set();

  constructor(options: ServientOptions = {}) {
    this.log = options.log ?? pino({ level: 'silent' });
  }

  /**
   * Builds an ExposedThing from a Thing init, adds every declared
   * interaction and registers it (not yet enabled).
   */
  produce(init: ThingInitInput): ExposedThing {
    const parsed = thingInitSchema.safeParse(init);
    if (!parsed.success) {
      throw new InvalidThingError(toValidationIssues(parsed.error));
    }

    const { name, description, properties, actions, events } = parsed.data;
    const id = parsed.data.id ?? `urn:uuid:${randomUUID()}`;
    if (this.things.has(id)) {
      throw new DuplicateThingError(id);
    }

    const exposed = new ExposedThing(this, new Thing(id, name, description));

    for (const [propertyName, propertyInit] of Object.entries(properties)) {
      exposed.addProperty(propertyName, propertyInit);
    }
    for (const [actionName, actionInit] of Object.entries(actions)) {
      exposed.addAction(actionName, actionInit);
    }
    for (const [eventName, eventInit] of Object.entries(events)) {
      exposed.addEvent(eventName, eventInit);
    }

    this.addExposedThing(exposed);
    return exposed;
  }

  addExposedThing(exposed: ExposedThing): void {
    if (this.things.has(exposed.id)) {
      throw new DuplicateThingError(exposed.id);
    }
    this.things.set(exposed.id, exposed);
    this.log.debug({ thing_id: exposed.id, name: exposed.name }, 'Thing registered');
  }

  enableExposedThing(thingId: string): void {
    this.require(thingId);
    this.enabled.add(thingId);
    this.log.info({ thing_id: thingId }, 'Thing exposed');
  }

  disableExposedThing(thingId: string): void {
    this.require(thingId);
    this.enabled.delete(thingId);
    this.log.info({ thing_id: thingId }, 'Thing disabled');
  }

  removeExposedThing(thingId: string): void {
    this.require(thingId);
    this.things.delete(thingId);
    this.enabled.delete(thingId);
    this.log.info({ thing_id: thingId }, 'Thing removed');
  }

  getExposedThing(thingId: string): ExposedThing | undefined {
    return this.things.get(thingId);
  }

  getExposedThingByUrlName(urlName: string): ExposedThing | undefined {
    for (const exposed of this.things.values()) {
      if (exposed.urlName === urlName) return exposed;
    }
    return undefined;
  }

  isEnabled(thingId: string): boolean {
    return this.enabled.has(thingId);
  }

  get exposedThings(): ExposedThing[] {
    return [...this.things.values()];
  }

  get enabledThings(): ExposedThing[] {
    return this.exposedThings.filter((exposed) => this.enabled.has(exposed.id));
  }

  private require(thingId: string): ExposedThing {
    const exposed = this.things.get(thingId);
    if (!exposed) {
      throw new ThingNotFoundError(thingId);
    }
    return exposed;
  }
}
