import { vi } from 'vitest';
import type { Logger } from 'pino';
import { Servient } from '../src/application/index.js';
import type { ExposedThing } from '../src/application/index.js';

/**
 * Minimal fake pino logger. `child()` hands back the same object so
 * assertions see calls made through child loggers too.
 */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockImplementation(() => log);
  return log;
}

export function asLogger(log: ReturnType<typeof fakeLogger>): Logger {
  return log as unknown as Logger;
}

/** A registered (not yet exposed) Thing with no interactions. */
export function makeExposedThing(
  servient: Servient = new Servient(),
  id: string = 'urn:test:lamp',
): ExposedThing {
  return servient.produce({ id, name: 'Test Lamp' });
}

/** A promise plus the function that settles it, for ordering tests. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  const state = { settle: (): void => undefined };
  const promise = new Promise<void>((resolve) => {
    state.settle = resolve;
  });
  return { promise, resolve: () => state.settle() };
}

/** Runs `fn` and returns whatever it threw, or undefined. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}
