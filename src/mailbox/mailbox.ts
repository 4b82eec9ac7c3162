// mailbox.ts - Cancellable, optionally bounded FIFO mailbox
//
// Producers post messages, a single consumer receives them in FIFO order.
// When the mailbox is bounded and full, post() waits for a slot. Stopping the
// mailbox or aborting its signal fails every waiter and all later calls.
//
// Copyright 2026 baaaht project

import { onAbort } from '../cancellation.js';
import { CancelledError, ClosedError } from '../errors.js';
import type { MailboxOptions, PendingPost, PendingReceive, TryReceiveResult } from './types.js';

/**
 * Mailbox is the message queue owned by an agent
 *
 * Waiting receivers only exist while the buffer is empty, and waiting posters
 * only while it is full, so a posted message is either handed straight to a
 * receiver, buffered, or parked with its poster until a slot frees.
 */
export class Mailbox<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private readonly posters: PendingPost<T>[] = [];
  private readonly maxSize: number | undefined;
  private readonly cancellation: AbortSignal;
  private readonly detachSignal: () => void;
  private closed = false;

  /**
   * Creates a new Mailbox
   *
   * @throws RangeError when capacity is not a positive integer
   */
  constructor(options: MailboxOptions = {}) {
    const { capacity, signal } = options;
    if (capacity !== undefined && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError(`Invalid mailbox capacity: ${capacity} (expected a positive integer)`);
    }

    this.maxSize = capacity;
    this.cancellation = signal ?? new AbortController().signal;
    this.detachSignal = onAbort(this.cancellation, () => {
      this.releaseWaiters(() => this.cancelledError());
    });
  }

  // ==========================================================================
  // Public Methods - Messaging
  // ==========================================================================

  /**
   * Enqueue a message, waiting for space when the mailbox is full
   *
   * @throws ClosedError if the mailbox was stopped
   * @throws CancelledError if the signal fired
   */
  async post(message: T): Promise<void> {
    const failure = this.failure();
    if (failure) {
      throw failure;
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(message);
      return;
    }

    if (this.maxSize === undefined || this.buffer.length < this.maxSize) {
      this.buffer.push(message);
      return;
    }

    return new Promise<void>((resolve, reject) => {
      this.posters.push({ message, resolve, reject });
    });
  }

  /**
   * Remove and return the oldest message, waiting until one arrives
   *
   * @throws ClosedError if the mailbox was stopped
   * @throws CancelledError if the signal fired
   */
  async receive(): Promise<T> {
    const failure = this.failure();
    if (failure) {
      throw failure;
    }

    const next = this.dequeue();
    if (next.ok) {
      return next.value;
    }

    return new Promise<T>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /**
   * Remove and return the oldest message without waiting
   */
  tryReceive(): TryReceiveResult<T> {
    if (this.failure()) {
      return { ok: false };
    }
    return this.dequeue();
  }

  /**
   * Close the mailbox. Idempotent. Queued messages become unreachable.
   */
  stop(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.detachSignal();
    this.releaseWaiters(() => new ClosedError());
  }

  // ==========================================================================
  // Public Methods - State Query
  // ==========================================================================

  /**
   * Number of buffered messages
   */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Maximum number of buffered messages, undefined when unbounded
   */
  get capacity(): number | undefined {
    return this.maxSize;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get signal(): AbortSignal {
    return this.cancellation;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private dequeue(): TryReceiveResult<T> {
    if (this.buffer.length === 0) {
      return { ok: false };
    }

    const value = this.buffer[0];
    this.buffer.shift();

    // A slot just freed: admit the oldest blocked poster
    const poster = this.posters.shift();
    if (poster) {
      this.buffer.push(poster.message);
      poster.resolve();
    }

    return { ok: true, value };
  }

  private failure(): Error | undefined {
    if (this.cancellation.aborted) {
      return this.cancelledError();
    }
    if (this.closed) {
      return new ClosedError();
    }
    return undefined;
  }

  private cancelledError(): CancelledError {
    return new CancelledError('Mailbox operation cancelled', {
      reason: String(this.cancellation.reason),
    });
  }

  private releaseWaiters(createError: () => Error): void {
    const receivers = this.receivers.splice(0);
    const posters = this.posters.splice(0);

    for (const receiver of receivers) {
      receiver.reject(createError());
    }
    for (const poster of posters) {
      poster.reject(createError());
    }
  }
}
