// event-stream.ts - Multicast notification stream
//
// Copyright 2026 baaaht project

import { EventEmitter } from 'events';

const VALUE_EVENT = 'value';

export type ObserverFn<E> = (value: E) => void;

/**
 * Observer receives every value emitted after it subscribed
 */
export interface Observer<E> {
  next(value: E): void;
}

/**
 * Handle returned by subscribe()
 */
export interface Subscription {
  /**
   * Stop delivery to this observer. Idempotent.
   */
  unsubscribe(): void;

  /**
   * True once unsubscribe() has been called
   */
  readonly closed: boolean;
}

/**
 * Observable is the subscribe-only view of an EventStream
 */
export interface Observable<E> {
  subscribe(observer: Observer<E> | ObserverFn<E>): Subscription;
}

/**
 * EventStream delivers each emitted value synchronously to the observers
 * subscribed at emission time, in subscription order. Nothing is buffered:
 * a late subscriber never sees earlier values.
 */
export class EventStream<E> implements Observable<E> {
  private readonly emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(0);
  }

  /**
   * Register an observer. Subscribing the same observer twice yields two
   * independent subscriptions.
   */
  subscribe(observer: Observer<E> | ObserverFn<E>): Subscription {
    const listener = typeof observer === 'function'
      ? (value: E): void => observer(value)
      : (value: E): void => observer.next(value);

    this.emitter.on(VALUE_EVENT, listener);

    let closed = false;
    const emitter = this.emitter;
    return {
      unsubscribe(): void {
        if (closed) return;
        closed = true;
        emitter.off(VALUE_EVENT, listener);
      },
      get closed(): boolean {
        return closed;
      },
    };
  }

  /**
   * Deliver `value` to every current observer. An observer that throws
   * stops delivery and the error propagates to the caller.
   */
  emit(value: E): void {
    this.emitter.emit(VALUE_EVENT, value);
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount(VALUE_EVENT);
  }
}
