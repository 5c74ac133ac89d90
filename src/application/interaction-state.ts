import type { PropertyInteraction } from '../domain/index.js';

/**
 * Current value of every property, keyed by the property record.
 *
 * Last write wins and nothing else is kept. No locking: concurrent writers
 * going through the default handlers race and the later one sticks.
 */
export class InteractionStateStore {
  private readonly values: Map<PropertyInteraction, unknown> = new Map();

  /** `undefined` if the property was never set. */
  get(property: PropertyInteraction): unknown {
    return this.values.get(property);
  }

  set(property: PropertyInteraction, value: unknown): void {
    this.values.set(property, value);
  }

  delete(property: PropertyInteraction): boolean {
    return this.values.delete(property);
  }
}
