import type { Interaction } from '../domain/index.js';

export type MaybePromise<T> = T | Promise<T>;

export type PropertyReadHandler = (propertyName: string) => MaybePromise<unknown>;
export type PropertyWriteHandler = (propertyName: string, value: unknown) => MaybePromise<void>;
export type ActionHandler = (...args: unknown[]) => MaybePromise<unknown>;

export const HandlerKind = {
  RetrieveProperty: 'retrieve_property',
  UpdateProperty: 'update_property',
  InvokeAction: 'invoke_action',
} as const;

export type HandlerKind = (typeof HandlerKind)[keyof typeof HandlerKind];

/** Handler signature per kind. */
export interface HandlerMap {
  retrieve_property: PropertyReadHandler;
  update_property: PropertyWriteHandler;
  invoke_action: ActionHandler;
}

type HandlerOverrides = { [K in HandlerKind]: WeakMap<Interaction, HandlerMap[K]> };

/**
 * Kind → handler lookup table owned by one exposed Thing.
 *
 * Every kind always has a global handler (seeded from `defaults`).
 * Overrides are keyed on the interaction record itself and held weakly,
 * so an interaction that has been removed takes its overrides with it.
 *
 * This is a lookup table only: it never calls the handlers it stores.
 */
export class HandlerRegistry {
  private readonly globals: HandlerMap;
  private readonly overrides: HandlerOverrides = {
    retrieve_property: new WeakMap(),
    update_property: new WeakMap(),
    invoke_action: new WeakMap(),
  };

  constructor(defaults: HandlerMap) {
    this.globals = { ...defaults };
  }

  /** Override for `interaction` when given, otherwise the new global for `kind`. */
  setHandler<K extends HandlerKind>(kind: K, handler: HandlerMap[K], interaction?: Interaction): void {
    if (interaction === undefined) {
      this.globals[kind] = handler;
      return;
    }
    this.overrides[kind].set(interaction, handler);
  }

  /** Interaction override if one exists, else the global handler. Never fails. */
  getHandler<K extends HandlerKind>(kind: K, interaction?: Interaction): HandlerMap[K] {
    const override = interaction === undefined ? undefined : this.overrides[kind].get(interaction);
    return override ?? this.globals[kind];
  }
}
