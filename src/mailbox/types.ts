// types.ts - Type definitions for the mailbox
//
// Copyright 2026 baaaht project

/**
 * MailboxOptions configures a Mailbox
 */
export interface MailboxOptions {
  /**
   * Cancellation signal observed by every pending and future operation.
   * A mailbox without one is only ever closed by stop().
   */
  signal?: AbortSignal;

  /**
   * Maximum number of queued messages; unbounded when omitted.
   * Must be a positive integer.
   */
  capacity?: number;
}

/**
 * Result of a non-blocking receive
 */
export type TryReceiveResult<T> = { ok: true; value: T } | { ok: false };

/**
 * A receive() call waiting for a message
 * @internal
 */
export interface PendingReceive<T> {
  resolve: (message: T) => void;
  reject: (error: Error) => void;
}

/**
 * A post() call waiting for space in a full mailbox
 * @internal
 */
export interface PendingPost<T> {
  message: T;
  resolve: () => void;
  reject: (error: Error) => void;
}
