import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { InvalidConfigurationError } from '../../domain/index.js';
import { thingInitSchema, toValidationIssues } from '../../application/index.js';
import type { ThingInit } from '../../application/index.js';

const catalogSchema = z.object({
  things: z.array(thingInitSchema).default([]),
});

/**
 * Loads Thing definitions from a JSON catalog.
 *
 * A missing file means "no Things" so a bare host still boots.
 * A file that exists but does not parse or validate is a startup error.
 */
export function loadThingCatalog(catalogPath: string): ThingInit[] {
  const filePath = resolve(process.cwd(), catalogPath);

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(`Thing catalog is not valid JSON: ${reason}`);
  }

  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      `Invalid thing catalog: ${filePath}`,
      toValidationIssues(parsed.error),
    );
  }

  return parsed.data.things;
}
