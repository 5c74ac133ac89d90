/**
 * Interaction affordances declared by a Thing.
 *
 * Interactions are immutable records. The record object itself is the
 * identity the runtime keys state and handler overrides on, so removing
 * an interaction and adding another with the same name yields a fresh
 * identity with no inherited value or handler.
 */

/** JSON-schema-like description of a value, e.g. `{ type: 'number' }`. */
export type DataSchema = Record<string, unknown>;

export type InteractionKind = 'property' | 'action' | 'event';

interface InteractionBase {
  readonly name: string;
  readonly label?: string;
}

export interface PropertyInteraction extends InteractionBase {
  readonly kind: 'property';
  readonly schema: DataSchema;
  readonly writable: boolean;
  readonly observable: boolean;
}

export interface ActionInteraction extends InteractionBase {
  readonly kind: 'action';
  readonly input?: DataSchema;
  readonly output?: DataSchema;
}

export interface EventInteraction extends InteractionBase {
  readonly kind: 'event';
  readonly data?: DataSchema;
}

export type Interaction = PropertyInteraction | ActionInteraction | EventInteraction;

/** Narrowing helper for lookups that only accept one kind. */
export type InteractionOfKind<K extends InteractionKind> = Extract<Interaction, { kind: K }>;

export function isInteractionOfKind<K extends InteractionKind>(
  interaction: Interaction | undefined,
  kind: K,
): interaction is InteractionOfKind<K> {
  return interaction !== undefined && interaction.kind === kind;
}
