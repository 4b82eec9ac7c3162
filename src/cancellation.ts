// cancellation.ts - Linked cancellation scopes built on AbortSignal
//
// A scope fires when its parent signal aborts or when its timeout expires,
// whichever happens first. Scopes own a timer and a listener on the parent,
// so callers must dispose() them once the guarded operation settles.
//
// Copyright 2026 baaaht project

import { TimedOutError } from './errors.js';

/**
 * Timeout value meaning "wait forever"
 */
export const NO_TIMEOUT = Number.POSITIVE_INFINITY;

/**
 * CancellationScope is a derived signal plus the means to release it
 */
export interface CancellationScope {
  /**
   * Signal that aborts on parent cancellation or timeout expiry
   */
  readonly signal: AbortSignal;

  /**
   * Clear the timer and detach from the parent signal
   */
  dispose(): void;
}

/**
 * Validate a timeout in milliseconds. Infinity means no timeout.
 *
 * @throws RangeError for negative or NaN values
 */
export function assertValidTimeout(timeoutMs: number): void {
  if (Number.isNaN(timeoutMs) || timeoutMs < 0) {
    throw new RangeError(`Invalid timeout: ${timeoutMs} (expected a non-negative number or Infinity)`);
  }
}

/**
 * Create a scope linked to `parent` that also aborts with a TimedOutError
 * after `timeoutMs`. When the parent aborts, the scope aborts with the
 * parent's reason.
 *
 * @param parent - Signal to follow, if any
 * @param timeoutMs - Deadline in milliseconds, NO_TIMEOUT for none
 */
export function createLinkedScope(parent: AbortSignal | undefined, timeoutMs: number = NO_TIMEOUT): CancellationScope {
  assertValidTimeout(timeoutMs);

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | null = null;

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  const dispose = (): void => {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
      timeoutId = null;
    }
    parent?.removeEventListener('abort', onParentAbort);
  };

  if (parent?.aborted) {
    controller.abort(parent.reason);
    return { signal: controller.signal, dispose };
  }

  parent?.addEventListener('abort', onParentAbort, { once: true });

  if (Number.isFinite(timeoutMs)) {
    timeoutId = setTimeout(() => {
      timeoutId = null;
      controller.abort(new TimedOutError(timeoutMs));
    }, timeoutMs);
  }

  return { signal: controller.signal, dispose };
}

/**
 * Run `callback` once when `signal` aborts (immediately if it already has).
 *
 * @returns Function that detaches the callback
 */
export function onAbort(signal: AbortSignal, callback: () => void): () => void {
  if (signal.aborted) {
    callback();
    return () => undefined;
  }
  signal.addEventListener('abort', callback, { once: true });
  return () => signal.removeEventListener('abort', callback);
}
