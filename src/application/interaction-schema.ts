import { z } from 'zod';
import type { ValidationIssue } from '../domain/index.js';
import type { ActionHandler } from './handler-registry.js';
import { InvalidInteractionError } from '../domain/index.js';

/** JSON-schema-like value description, kept opaque. */
const dataDescriptionSchema = z.record(z.string(), z.unknown());

export const interactionNameSchema = z.string().min(1).max(255);

/**
 * Property init.
 *
 * `description` is the value's data description (e.g. `{ type: 'number' }`),
 * not prose. Properties are writable and observable unless told otherwise.
 */
export const propertyInitSchema = z.object({
  label: z.string().min(1).optional(),
  value: z.unknown().optional(),
  description: dataDescriptionSchema.default({}),
  writable: z.boolean().default(true),
  observable: z.boolean().default(true),
});

export type PropertyInitInput = z.input<typeof propertyInitSchema>;
export type PropertyInit = z.infer<typeof propertyInitSchema>;

export const actionInitSchema = z.object({
  label: z.string().min(1).optional(),
  inputDataDescription: dataDescriptionSchema.optional(),
  outputDataDescription: dataDescriptionSchema.optional(),
});

export type ActionInit = z.infer<typeof actionInitSchema>;

/** What `addAction` accepts: the validated fields plus an optional handler override. */
export type ActionInitInput = z.input<typeof actionInitSchema> & { handler?: ActionHandler };

export const eventInitSchema = z.object({
  label: z.string().min(1).optional(),
  dataDescription: dataDescriptionSchema.optional(),
});

export type EventInitInput = z.input<typeof eventInitSchema>;
export type EventInit = z.infer<typeof eventInitSchema>;

/**
 * A whole Thing as it appears in the catalog file.
 * `id` is generated by the servient when absent.
 */
export const thingInitSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1).max(255),
  description: z.string().optional(),
  properties: z.record(interactionNameSchema, propertyInitSchema).default({}),
  actions: z.record(interactionNameSchema, actionInitSchema).default({}),
  events: z.record(interactionNameSchema, eventInitSchema).default({}),
}).superRefine((thing, ctx) => {
  // Interaction names are unique across kinds.
  const seen = new Set<string>();
  for (const kind of ['properties', 'actions', 'events'] as const) {
    for (const name of Object.keys(thing[kind])) {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [kind, name],
          message: `Interaction name already used: ${name}`,
        });
      }
      seen.add(name);
    }
  }
});

export type ThingInitInput = z.input<typeof thingInitSchema>;
export type ThingInit = z.infer<typeof thingInitSchema>;

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
}

/**
 * Validates an interaction name and its init dictionary together.
 * Throws InvalidInteractionError carrying every issue found.
 */
export function parseInteractionInit<S extends z.ZodTypeAny>(
  schema: S,
  name: string,
  init: unknown,
): z.infer<S> {
  const issues: ValidationIssue[] = [];

  const nameResult = interactionNameSchema.safeParse(name);
  if (!nameResult.success) {
    issues.push(
      ...toValidationIssues(nameResult.error).map((issue) => ({ ...issue, path: ['name', ...issue.path] })),
    );
  }

  const initResult = schema.safeParse(init);
  if (!initResult.success) {
    issues.push(...toValidationIssues(initResult.error));
  }

  if (issues.length > 0 || !initResult.success) {
    throw new InvalidInteractionError(name, issues);
  }

  return initResult.data;
}
