/**
 * Error taxonomy for the Thing runtime.
 *
 * Every error the runtime raises on its own account extends ThingError.
 * Errors thrown by application handlers are never wrapped in one of these;
 * they reach the caller exactly as the handler produced them.
 */

export type ThingErrorCode =
  | 'NOT_FOUND'
  | 'NOT_WRITABLE'
  | 'UNKNOWN_EVENT'
  | 'UNKNOWN_PROPERTY'
  | 'NOT_OBSERVABLE'
  | 'UNDEFINED_ACTION_HANDLER'
  | 'DUPLICATE_INTERACTION'
  | 'INVALID_INTERACTION'
  | 'INVALID_THING'
  | 'THING_NOT_FOUND'
  | 'DUPLICATE_THING'
  | 'INVALID_CONFIGURATION';

/** One validation problem, shaped like a zod issue. */
export interface ValidationIssue {
  readonly path: ReadonlyArray<string | number>;
  readonly message: string;
}

export abstract class ThingError extends Error {
  abstract readonly code: ThingErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No interaction of the requested kind is named `interactionName`. */
export class NotFoundError extends ThingError {
  readonly code = 'NOT_FOUND';

  constructor(readonly interactionName: string, kind: string = 'Interaction') {
    super(`${kind} not found: ${interactionName}`);
  }
}

export class NotWritableError extends ThingError {
  readonly code = 'NOT_WRITABLE';

  constructor(readonly propertyName: string) {
    super(`Property is non-writable: ${propertyName}`);
  }
}

export class UnknownEventError extends ThingError {
  readonly code = 'UNKNOWN_EVENT';

  constructor(readonly eventName: string) {
    super(`Unknown event: ${eventName}`);
  }
}

export class UnknownPropertyError extends ThingError {
  readonly code = 'UNKNOWN_PROPERTY';

  constructor(readonly propertyName: string) {
    super(`Unknown property: ${propertyName}`);
  }
}

export class NotObservableError extends ThingError {
  readonly code = 'NOT_OBSERVABLE';

  constructor(readonly propertyName: string) {
    super(`Property is not observable: ${propertyName}`);
  }
}

/** Raised by the default action handler: an action nobody implemented. */
export class UndefinedActionHandlerError extends ThingError {
  readonly code = 'UNDEFINED_ACTION_HANDLER';

  constructor() {
    super('Undefined action handler');
  }
}

export class DuplicateInteractionError extends ThingError {
  readonly code = 'DUPLICATE_INTERACTION';

  constructor(readonly interactionName: string) {
    super(`Interaction already exists: ${interactionName}`);
  }
}

export class InvalidInteractionError extends ThingError {
  readonly code = 'INVALID_INTERACTION';

  constructor(
    readonly interactionName: string,
    readonly issues: readonly ValidationIssue[],
  ) {
    super(`Invalid definition for interaction: ${interactionName}`);
  }
}

export class InvalidThingError extends ThingError {
  readonly code = 'INVALID_THING';

  constructor(readonly issues: readonly ValidationIssue[]) {
    super('Invalid Thing definition');
  }
}

export class ThingNotFoundError extends ThingError {
  readonly code = 'THING_NOT_FOUND';

  constructor(readonly thingId: string) {
    super(`Thing not found: ${thingId}`);
  }
}

export class DuplicateThingError extends ThingError {
  readonly code = 'DUPLICATE_THING';

  constructor(readonly thingId: string) {
    super(`Thing already registered: ${thingId}`);
  }
}

export class InvalidConfigurationError extends ThingError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(message: string, readonly issues: readonly ValidationIssue[] = []) {
    super(message);
  }
}
