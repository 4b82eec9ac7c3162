// errors.ts - Error taxonomy for mailboxes and agents
//
// Every failure raised by this package extends AgentError and carries an
// AgentErrorCode so callers can branch on either the class or the code.
//
// Copyright 2026 baaaht project

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for mailbox and agent failures
 */
export enum AgentErrorCode {
  /**
   * Operation attempted after the mailbox was stopped
   */
  CLOSED = 'CLOSED',

  /**
   * The governing cancellation signal fired while the operation was pending
   */
  CANCELLED = 'CANCELLED',

  /**
   * A request/reply exchange ran past its deadline
   */
  TIMED_OUT = 'TIMED_OUT',

  /**
   * start() was called on an agent that is already running
   */
  ALREADY_STARTED = 'ALREADY_STARTED',
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class of every error thrown by this package
 */
export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AgentError';
  }
}

/**
 * The mailbox has been stopped
 */
export class ClosedError extends AgentError {
  constructor(message: string = 'Mailbox is closed', details?: Record<string, unknown>) {
    super(message, AgentErrorCode.CLOSED, details);
    this.name = 'ClosedError';
  }
}

/**
 * A cancellation signal fired while the operation was pending
 */
export class CancelledError extends AgentError {
  constructor(
    message: string = 'Operation was cancelled',
    details?: Record<string, unknown>,
    code: AgentErrorCode = AgentErrorCode.CANCELLED
  ) {
    super(message, code, details);
    this.name = 'CancelledError';
  }
}

/**
 * A reply did not arrive before the deadline. Specializes CancelledError, so
 * `instanceof CancelledError` holds for timeouts as well.
 */
export class TimedOutError extends CancelledError {
  constructor(public readonly timeoutMs: number, details?: Record<string, unknown>) {
    super(`Reply timeout after ${timeoutMs}ms`, { ...details, timeoutMs }, AgentErrorCode.TIMED_OUT);
    this.name = 'TimedOutError';
  }
}

/**
 * start() was called while the agent was running
 */
export class AlreadyStartedError extends AgentError {
  constructor(message: string = 'Agent already started', details?: Record<string, unknown>) {
    super(message, AgentErrorCode.ALREADY_STARTED, details);
    this.name = 'AlreadyStartedError';
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * True for CancelledError and its TimedOutError specialization
 */
export function isCancellationError(err: unknown): err is CancelledError {
  return err instanceof CancelledError;
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
