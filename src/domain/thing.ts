import type {
  Interaction,
  InteractionKind,
  InteractionOfKind,
  DataSchema,
} from './interaction.js';
import { isInteractionOfKind } from './interaction.js';
import { DuplicateInteractionError } from './errors.js';

export const TD_CONTEXT = 'https://www.w3.org/2019/wot/td/v1';

/** Serialized shape of a Thing and its interactions. */
export interface ThingDescriptionDocument {
  readonly '@context': string;
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly properties: Record<string, PropertyDescription>;
  readonly actions: Record<string, ActionDescription>;
  readonly events: Record<string, EventDescription>;
}

export interface PropertyDescription extends DataSchema {
  readonly writable: boolean;
  readonly observable: boolean;
}

export interface ActionDescription {
  readonly label?: string;
  readonly input?: DataSchema;
  readonly output?: DataSchema;
}

export interface EventDescription {
  readonly label?: string;
  readonly data?: DataSchema;
}

/**
 * Interaction records own their schemas; anything handed out gets a copy.
 */
export function cloneSchema(schema: DataSchema | undefined): DataSchema | undefined {
  return schema === undefined ? undefined : structuredClone(schema);
}

/**
 * Lowercases, collapses anything outside [a-z0-9] into single dashes and
 * trims leading/trailing dashes.
 */
export function toUrlName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * The set of interactions a Thing currently declares.
 *
 * Names are unique across kinds. Insertion order is preserved and is the
 * order used when the description is serialized.
 */
export class Thing {
  readonly id: string;
  readonly name: string;
  readonly description: string | undefined;
  private readonly interactions: Map<string, Interaction> = new Map();

  constructor(id: string, name: string, description?: string) {
    this.id = id;
    this.name = name;
    this.description = description;
  }

  get urlName(): string {
    return toUrlName(this.name);
  }

  findInteraction(name: string): Interaction | undefined {
    return this.interactions.get(name);
  }

  /** Lookup restricted to one kind; a same-named interaction of another kind is a miss. */
  findInteractionOfKind<K extends InteractionKind>(
    name: string,
    kind: K,
  ): InteractionOfKind<K> | undefined {
    const interaction = this.interactions.get(name);
    return isInteractionOfKind(interaction, kind) ? interaction : undefined;
  }

  addInteraction(interaction: Interaction): void {
    if (this.interactions.has(interaction.name)) {
      throw new DuplicateInteractionError(interaction.name);
    }
    this.interactions.set(interaction.name, interaction);
  }

  /** Returns the removed interaction, or undefined if none had that name. */
  removeInteraction(name: string): Interaction | undefined {
    const existing = this.interactions.get(name);
    if (existing) {
      this.interactions.delete(name);
    }
    return existing;
  }

  listInteractions(kind?: InteractionKind): Interaction[] {
    const all = [...this.interactions.values()];
    return kind === undefined ? all : all.filter((i) => i.kind === kind);
  }

  toDescription(): ThingDescriptionDocument {
    const properties: Record<string, PropertyDescription> = {};
    const actions: Record<string, ActionDescription> = {};
    const events: Record<string, EventDescription> = {};

    for (const interaction of this.interactions.values()) {
      switch (interaction.kind) {
        case 'property':
          properties[interaction.name] = {
            ...structuredClone(interaction.schema),
            ...(interaction.label !== undefined ? { label: interaction.label } : {}),
            writable: interaction.writable,
            observable: interaction.observable,
          };
          break;
        case 'action':
          actions[interaction.name] = {
            label: interaction.label,
            input: cloneSchema(interaction.input),
            output: cloneSchema(interaction.output),
          };
          break;
        case 'event':
          events[interaction.name] = {
            label: interaction.label,
            data: cloneSchema(interaction.data),
          };
          break;
      }
    }

    return {
      '@context': TD_CONTEXT,
      id: this.id,
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      properties,
      actions,
      events,
    };
  }
}
