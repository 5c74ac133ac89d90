import type { Logger } from 'pino';
import type { EmittedEvent } from '../domain/index.js';

export interface Observer<T> {
  next(value: T): void;
  complete?(): void;
}

/** Handle returned by `subscribe()`. */
export interface Subscription {
  unsubscribe(): void;
  readonly closed: boolean;
}

export interface Subscribable<T> {
  subscribe(observer: Observer<T> | ((value: T) => void)): Subscription;
}

export type EventPredicate = (event: EmittedEvent) => boolean;

interface Sink {
  readonly id: number;
  readonly accept: (event: EmittedEvent) => void;
  readonly complete: () => void;
  closed: boolean;
}

function toObserver<T>(target: Observer<T> | ((value: T) => void)): Observer<T> {
  return typeof target === 'function' ? { next: target } : target;
}

/**
 * Single ordered, multiplexed channel for everything a Thing emits.
 *
 * Publishing is synchronous fan-out to the subscriptions attached at the
 * moment delivery starts; there is no buffering per subscriber and no
 * backpressure. A publish issued from inside a subscriber is queued and
 * delivered once the current event has reached every subscriber, so all
 * subscribers observe one global order.
 */
export class EventBus {
  private readonly sinks: Set<Sink> = new Set();
  private readonly pending: EmittedEvent[] = [];
  private readonly log: Logger;
  private draining = false;
  private completed = false;
  private nextSinkId = 1;

  constructor(log: Logger) {
    this.log = log;
  }

  publish(event: EmittedEvent): void {
    if (this.completed) {
      this.log.debug({ event: event.name }, 'Event bus completed, dropping event');
      return;
    }

    this.pending.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.pending.shift();
      while (next !== undefined && !this.completed) {
        this.deliver(next);
        next = this.pending.shift();
      }
    } finally {
      this.draining = false;
      this.pending.length = 0;
    }
  }

  /** Typed view of the events matching `guard`. */
  filter<E extends EmittedEvent>(guard: (event: EmittedEvent) => event is E): Subscribable<E> {
    return {
      subscribe: (target) => {
        const observer = toObserver(target);
        return this.attach(
          (event) => {
            if (guard(event)) observer.next(event);
          },
          () => observer.complete?.(),
        );
      },
    };
  }

  /** Untyped predicate subscription over the raw stream. */
  where(predicate: EventPredicate): Subscribable<EmittedEvent> {
    return this.filter((event): event is EmittedEvent => predicate(event));
  }

  /** Completes every observer and detaches them. Later publishes are dropped. */
  complete(): void {
    if (this.completed) return;
    this.completed = true;

    const sinks = [...this.sinks];
    this.sinks.clear();

    for (const sink of sinks) {
      sink.closed = true;
      try {
        sink.complete();
      } catch (err: unknown) {
        this.log.warn({ err, subscriptionId: sink.id }, 'Event subscriber failed on completion');
      }
    }

    this.log.debug({ subscriberCount: sinks.length }, 'Event bus completed');
  }

  private attach(accept: (event: EmittedEvent) => void, complete: () => void): Subscription {
    const sink: Sink = { id: this.nextSinkId++, accept, complete, closed: this.completed };

    if (this.completed) {
      complete();
    } else {
      this.sinks.add(sink);
    }

    const sinks = this.sinks;
    return {
      unsubscribe(): void {
        if (sink.closed) return;
        sink.closed = true;
        sinks.delete(sink);
      },
      get closed(): boolean {
        return sink.closed;
      },
    };
  }

  private deliver(event: EmittedEvent): void {
    // Snapshot: subscriptions added while delivering wait for the next event.
    const targets = [...this.sinks];
    let delivered = 0;

    for (const sink of targets) {
      if (sink.closed) continue;
      try {
        sink.accept(event);
        delivered++;
      } catch (err: unknown) {
        this.log.warn(
          { err, event: event.name, subscriptionId: sink.id },
          'Event subscriber threw during delivery',
        );
      }
    }

    this.log.debug({ event: event.name, subscriberCount: delivered }, 'Event published');
  }
}
