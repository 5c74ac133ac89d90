import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Servient } from '../../src/application/servient.js';
import type { ExposedThing } from '../../src/application/exposed-thing.js';
import {
  NotFoundError,
  NotWritableError,
  NotObservableError,
  UnknownEventError,
  UnknownPropertyError,
  UndefinedActionHandlerError,
  DuplicateInteractionError,
  InvalidInteractionError,
  ThingNotFoundError,
} from '../../src/domain/index.js';
import type {
  EmittedEvent,
  DescriptionChangeEmittedEvent,
  PropertyChangeEmittedEvent,
} from '../../src/domain/index.js';
import { makeExposedThing, deferred, captureError } from '../helpers.js';

function isSchema(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

describe('ExposedThing', () => {
  let servient: Servient;
  let exposed: ExposedThing;

  beforeEach(() => {
    servient = new Servient();
    exposed = makeExposedThing(servient);
  });

  // ─── readProperty / writeProperty ──────────────────────────

  describe('property access', () => {
    it('reads back what was written through the default handlers', async () => {
      exposed.addProperty('brightness', { value: 10 });

      await exposed.writeProperty('brightness', 55);

      await expect(exposed.readProperty('brightness')).resolves.toBe(55);
    });

    it('reads undefined for a property never given a value', async () => {
      exposed.addProperty('color');
      await expect(exposed.readProperty('color')).resolves.toBeUndefined();
    });

    it('rejects reads of unknown properties with NotFoundError', async () => {
      await expect(exposed.readProperty('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('does not read actions as properties', async () => {
      exposed.addAction('toggle');
      await expect(exposed.readProperty('toggle')).rejects.toThrow('Property not found: toggle');
    });

    it('rejects writes to unknown properties with NotFoundError', async () => {
      await expect(exposed.writeProperty('missing', 1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects writes to non-writable properties before resolving a handler', async () => {
      const writeHandler = vi.fn();
      exposed.addProperty('serial', { value: 'SN-1', writable: false });
      exposed.setPropertyWriteHandler(writeHandler);
      const changes = vi.fn();
      exposed.onPropertyChange('serial').subscribe(changes);

      await expect(exposed.writeProperty('serial', 'SN-2')).rejects.toBeInstanceOf(NotWritableError);

      expect(writeHandler).not.toHaveBeenCalled();
      expect(changes).not.toHaveBeenCalled();
      await expect(exposed.readProperty('serial')).resolves.toBe('SN-1');
    });

    it('accepts writes to non-observable properties', async () => {
      exposed.addProperty('secret', { observable: false });
      await exposed.writeProperty('secret', 'hidden');
      await expect(exposed.readProperty('secret')).resolves.toBe('hidden');
    });

    it('uses the property override instead of a different global read handler', async () => {
      exposed.addProperty('brightness', { value: 10 });
      exposed.addProperty('color', { value: 'red' });
      exposed.setPropertyReadHandler(async () => 'global');
      exposed.setPropertyReadHandler(async (name) => `override:${name}`, 'brightness');

      await expect(exposed.readProperty('brightness')).resolves.toBe('override:brightness');
      await expect(exposed.readProperty('color')).resolves.toBe('global');
    });

    it('passes the property name and value to the write handler', async () => {
      const writeHandler = vi.fn().mockResolvedValue(undefined);
      exposed.addProperty('brightness');
      exposed.setPropertyWriteHandler(writeHandler, 'brightness');

      await exposed.writeProperty('brightness', 70);

      expect(writeHandler).toHaveBeenCalledWith('brightness', 70);
      await expect(exposed.readProperty('brightness')).resolves.toBeUndefined();
    });

    it('propagates read handler errors unchanged', async () => {
      const failure = new Error('sensor offline');
      exposed.addProperty('brightness');
      exposed.setPropertyReadHandler(async () => {
        throw failure;
      }, 'brightness');

      await expect(exposed.readProperty('brightness')).rejects.toBe(failure);
    });

    it('setting a handler for an unknown property throws NotFoundError', () => {
      expect(() => exposed.setPropertyReadHandler(vi.fn(), 'missing')).toThrow(NotFoundError);
      expect(() => exposed.setPropertyWriteHandler(vi.fn(), 'missing')).toThrow(NotFoundError);
    });
  });

  // ─── property change notifications ─────────────────────────

  describe('onPropertyChange', () => {
    it('delivers exactly one event per successful write', async () => {
      exposed.addProperty('brightness');
      const received: PropertyChangeEmittedEvent[] = [];
      exposed.onPropertyChange('brightness').subscribe((event) => received.push(event));

      await exposed.writeProperty('brightness', 42);

      expect(received).toHaveLength(1);
      expect(received[0]?.data).toEqual({ name: 'brightness', value: 42 });
    });

    it('delivers nothing after unsubscribing', async () => {
      exposed.addProperty('brightness');
      const received = vi.fn();
      const subscription = exposed.onPropertyChange('brightness').subscribe(received);

      subscription.unsubscribe();
      await exposed.writeProperty('brightness', 42);

      expect(received).not.toHaveBeenCalled();
    });

    it('filters out changes to other properties', async () => {
      exposed.addProperty('brightness');
      exposed.addProperty('color');
      const received = vi.fn();
      exposed.onPropertyChange('brightness').subscribe(received);

      await exposed.writeProperty('color', 'blue');

      expect(received).not.toHaveBeenCalled();
    });

    it('publishes nothing when the write handler fails', async () => {
      const failure = new Error('bus fault');
      exposed.addProperty('brightness');
      exposed.setPropertyWriteHandler(() => Promise.reject(failure));
      const received = vi.fn();
      exposed.onPropertyChange('brightness').subscribe(received);

      await expect(exposed.writeProperty('brightness', 1)).rejects.toBe(failure);
      expect(received).not.toHaveBeenCalled();
    });

    it('throws UnknownPropertyError for a missing property', () => {
      expect(() => exposed.onPropertyChange('missing')).toThrow(UnknownPropertyError);
    });

    it('throws NotObservableError for a non-observable property', () => {
      exposed.addProperty('secret', { observable: false });
      expect(() => exposed.onPropertyChange('secret')).toThrow(NotObservableError);
    });

    it('orders events by handler completion, not by call order', async () => {
      const gate = deferred();
      exposed.addProperty('slow');
      exposed.addProperty('fast');
      exposed.setPropertyWriteHandler(async (name) => {
        if (name === 'slow') await gate.promise;
      });
      const order: string[] = [];
      exposed.events((event) => event.type === 'propertychange').subscribe((event) => {
        if (event.type === 'propertychange') order.push(event.data.name);
      });

      const slowWrite = exposed.writeProperty('slow', 1);
      await exposed.writeProperty('fast', 2);
      gate.resolve();
      await slowWrite;

      expect(order).toEqual(['fast', 'slow']);
    });
  });

  // ─── invokeAction ──────────────────────────────────────────

  describe('invokeAction', () => {
    it('fails with UndefinedActionHandlerError and publishes nothing when no handler is set', async () => {
      exposed.addAction('reboot');
      const invocations = vi.fn();
      exposed.events((event) => event.type === 'actioninvocation').subscribe(invocations);

      await expect(exposed.invokeAction('reboot')).rejects.toBeInstanceOf(UndefinedActionHandlerError);
      expect(invocations).not.toHaveBeenCalled();
    });

    it('rejects unknown actions with NotFoundError', async () => {
      await expect(exposed.invokeAction('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('passes arguments, resolves with the result and publishes the invocation', async () => {
      const handler = vi.fn().mockResolvedValue('done');
      exposed.addAction('fade');
      exposed.setActionHandler(handler);
      const received: EmittedEvent[] = [];
      exposed.events((event) => event.type === 'actioninvocation').subscribe((event) => received.push(event));

      await expect(exposed.invokeAction('fade', 30, 'linear')).resolves.toBe('done');

      expect(handler).toHaveBeenCalledWith(30, 'linear');
      expect(received).toHaveLength(1);
      expect(received[0]?.data).toEqual({ actionName: 'fade', returnValue: 'done' });
    });

    it('accepts synchronous handlers', async () => {
      exposed.addAction('double');
      exposed.setActionHandler((value) => Number(value) * 2, 'double');
      await expect(exposed.invokeAction('double', 21)).resolves.toBe(42);
    });

    it('prefers a handler given at addAction over the global one', async () => {
      exposed.setActionHandler(async () => 'global');
      exposed.addAction('shout', { handler: async (text) => String(text).toUpperCase() });
      exposed.addAction('whisper');

      await expect(exposed.invokeAction('shout', 'hi')).resolves.toBe('HI');
      await expect(exposed.invokeAction('whisper')).resolves.toBe('global');
    });

    it('propagates a thrown handler error unchanged and publishes nothing', async () => {
      const failure = new TypeError('bad input');
      exposed.addAction('fade', {
        handler: () => {
          throw failure;
        },
      });
      const invocations = vi.fn();
      exposed.events((event) => event.type === 'actioninvocation').subscribe(invocations);

      await expect(exposed.invokeAction('fade')).rejects.toBe(failure);
      expect(invocations).not.toHaveBeenCalled();
    });

    it('setting a handler for an unknown action throws NotFoundError', () => {
      expect(() => exposed.setActionHandler(vi.fn(), 'missing')).toThrow(NotFoundError);
    });
  });

  // ─── events ────────────────────────────────────────────────

  describe('onEvent / emitEvent', () => {
    it('delivers emitted payloads to event subscribers', () => {
      exposed.addEvent('motion');
      const payloads: unknown[] = [];
      exposed.onEvent('motion').subscribe((event) => payloads.push(event.data));

      exposed.emitEvent('motion', { zone: 'hall' });

      expect(payloads).toEqual([{ zone: 'hall' }]);
    });

    it('throws UnknownEventError when subscribing to an undefined event', () => {
      expect(() => exposed.onEvent('motion')).toThrow(UnknownEventError);
    });

    it('throws UnknownEventError when subscribing to a non-event interaction', () => {
      exposed.addProperty('brightness');
      expect(() => exposed.onEvent('brightness')).toThrow(UnknownEventError);
    });

    it('throws UnknownEventError when emitting an undefined event', () => {
      expect(() => exposed.emitEvent('motion', null)).toThrow(UnknownEventError);
    });

    it('fails on the next subscribe attempt after the event is removed', () => {
      exposed.addEvent('motion');
      exposed.removeEvent('motion');
      expect(() => exposed.onEvent('motion')).toThrow(UnknownEventError);
    });

    it('rejects event names reserved for runtime notifications', () => {
      expect(() => exposed.addEvent('propertychange')).toThrow(InvalidInteractionError);
    });
  });

  // ─── description mutation ──────────────────────────────────

  describe('description changes', () => {
    it('addProperty seeds the value and announces the addition', async () => {
      const received: DescriptionChangeEmittedEvent[] = [];
      exposed.onDescriptionChange().subscribe((event) => received.push(event));

      exposed.addProperty('temp', { value: 20, description: { type: 'number' } });

      await expect(exposed.readProperty('temp')).resolves.toBe(20);
      expect(received).toHaveLength(1);
      expect(received[0]?.data.method).toBe('add');
      expect(received[0]?.data.name).toBe('temp');
      expect(received[0]?.data.changeType).toBe('property');
      expect(received[0]?.data.data).toEqual({
        value: 20,
        description: { type: 'number' },
        writable: true,
        observable: true,
      });
      expect(received[0]?.data.description?.properties['temp']).toEqual({
        type: 'number',
        writable: true,
        observable: true,
      });
    });

    it('description-change payloads do not share schemas with the Thing', () => {
      exposed.onDescriptionChange().subscribe((event) => {
        const init = event.data.data?.['description'];
        if (isSchema(init)) init['type'] = 'string';
        const input = event.data.description?.actions['boost']?.input;
        if (input) input['type'] = 'boolean';
      });

      exposed.addProperty('temp', { description: { type: 'number' } });
      exposed.addAction('boost', { inputDataDescription: { type: 'integer' } });

      const description = exposed.thing.toDescription();
      expect(description.properties['temp']?.['type']).toBe('number');
      expect(description.actions['boost']?.input).toEqual({ type: 'integer' });
    });

    it('removals carry neither data nor description', () => {
      exposed.addAction('reboot');
      const received: DescriptionChangeEmittedEvent[] = [];
      exposed.onDescriptionChange().subscribe((event) => received.push(event));

      exposed.removeAction('reboot');

      expect(received).toHaveLength(1);
      expect(received[0]?.data).toEqual({ changeType: 'action', method: 'remove', name: 'reboot' });
    });

    it('announces additions and removals of every kind in order', () => {
      const received: string[] = [];
      exposed.onDescriptionChange().subscribe((event) => {
        received.push(`${event.data.method}:${event.data.changeType}:${event.data.name}`);
      });

      exposed.addProperty('level');
      exposed.addAction('reset');
      exposed.addEvent('alarm');
      exposed.removeEvent('alarm');
      exposed.removeAction('reset');
      exposed.removeProperty('level');

      expect(received).toEqual([
        'add:property:level',
        'add:action:reset',
        'add:event:alarm',
        'remove:event:alarm',
        'remove:action:reset',
        'remove:property:level',
      ]);
    });

    it('removing an unknown interaction throws NotFoundError', () => {
      expect(() => exposed.removeProperty('missing')).toThrow(NotFoundError);
      expect(() => exposed.removeAction('missing')).toThrow(NotFoundError);
      expect(() => exposed.removeEvent('missing')).toThrow(NotFoundError);
    });

    it('removing with the wrong kind throws NotFoundError and keeps the interaction', async () => {
      exposed.addProperty('level', { value: 3 });
      expect(() => exposed.removeAction('level')).toThrow('Action not found: level');
      await expect(exposed.readProperty('level')).resolves.toBe(3);
    });

    it('rejects duplicate names', () => {
      exposed.addProperty('level');
      expect(() => exposed.addEvent('level')).toThrow(DuplicateInteractionError);
    });

    it('rejects empty names', () => {
      const err = captureError(() => exposed.addProperty(''));
      expect(err).toBeInstanceOf(InvalidInteractionError);
      if (err instanceof InvalidInteractionError) {
        expect(err.issues[0]?.path).toEqual(['name']);
      }
    });

    it('a re-added property starts fresh: no old value, no old override', async () => {
      exposed.addProperty('level', { value: 5 });
      exposed.setPropertyReadHandler(async () => 'override', 'level');

      exposed.removeProperty('level');
      exposed.addProperty('level');

      await expect(exposed.readProperty('level')).resolves.toBeUndefined();
    });

    it('removed properties can no longer be read', async () => {
      exposed.addProperty('level', { value: 5 });
      exposed.removeProperty('level');
      await expect(exposed.readProperty('level')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('getThingDescription reflects the current interactions', () => {
      exposed.addProperty('level', { description: { type: 'integer' }, writable: false });
      exposed.addEvent('alarm', { dataDescription: { type: 'string' } });

      const description: unknown = JSON.parse(exposed.getThingDescription());

      expect(description).toEqual({
        '@context': 'https://www.w3.org/2019/wot/td/v1',
        id: 'urn:test:lamp',
        name: 'Test Lamp',
        properties: { level: { type: 'integer', writable: false, observable: true } },
        actions: {},
        events: { alarm: { data: { type: 'string' } } },
      });
    });
  });

  // ─── identity & lifecycle ──────────────────────────────────

  describe('identity and lifecycle', () => {
    it('equals another facade over the same servient and Thing id', () => {
      const otherServient = new Servient();
      const sameId = makeExposedThing(otherServient);

      expect(exposed.equals(exposed)).toBe(true);
      expect(exposed.equals(sameId)).toBe(false);
      expect(exposed.equals(makeExposedThing(servient, 'urn:test:other'))).toBe(false);
    });

    it('expose() enables the Thing in its servient', () => {
      expect(servient.isEnabled(exposed.id)).toBe(false);
      exposed.expose();
      expect(servient.isEnabled(exposed.id)).toBe(true);
    });

    it('destroy() removes the Thing and completes its subscriptions', () => {
      exposed.addProperty('level');
      const complete = vi.fn();
      const subscription = exposed.onPropertyChange('level').subscribe({ next: vi.fn(), complete });

      exposed.expose();
      exposed.destroy();

      expect(servient.getExposedThing(exposed.id)).toBeUndefined();
      expect(complete).toHaveBeenCalledTimes(1);
      expect(subscription.closed).toBe(true);
    });

    it('destroy() of an unregistered Thing still completes subscriptions', () => {
      const complete = vi.fn();
      exposed.onDescriptionChange().subscribe({ next: vi.fn(), complete });
      servient.removeExposedThing(exposed.id);

      expect(() => exposed.destroy()).toThrow(ThingNotFoundError);
      expect(complete).toHaveBeenCalledTimes(1);
    });
  });
});
