// errors.test.ts - Unit tests for the error taxonomy
//
// Copyright 2026 baaaht project

import { describe, it, expect } from '@jest/globals';
import {
  AgentError,
  AgentErrorCode,
  AlreadyStartedError,
  CancelledError,
  ClosedError,
  TimedOutError,
  isCancellationError,
  toError,
} from '../../src/errors.js';

describe('error classes', () => {
  it('should carry codes and names', () => {
    expect(new ClosedError()).toMatchObject({ name: 'ClosedError', code: AgentErrorCode.CLOSED });
    expect(new CancelledError()).toMatchObject({ name: 'CancelledError', code: AgentErrorCode.CANCELLED });
    expect(new AlreadyStartedError()).toMatchObject({
      name: 'AlreadyStartedError',
      code: AgentErrorCode.ALREADY_STARTED,
    });
  });

  it('should make TimedOutError a CancelledError', () => {
    const error = new TimedOutError(50);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toBeInstanceOf(AgentError);
    expect(error.code).toBe(AgentErrorCode.TIMED_OUT);
    expect(error.message).toBe('Reply timeout after 50ms');
    expect(error.details).toEqual({ timeoutMs: 50 });
  });

  it('should keep details', () => {
    const error = new ClosedError('closed for good', { name: 'inbox' });
    expect(error.message).toBe('closed for good');
    expect(error.details).toEqual({ name: 'inbox' });
  });
});

describe('isCancellationError', () => {
  it('should accept cancellations and timeouts only', () => {
    expect(isCancellationError(new CancelledError())).toBe(true);
    expect(isCancellationError(new TimedOutError(1))).toBe(true);
    expect(isCancellationError(new ClosedError())).toBe(false);
    expect(isCancellationError(new Error('plain'))).toBe(false);
    expect(isCancellationError('cancelled')).toBe(false);
  });
});

describe('toError', () => {
  it('should pass errors through and wrap other values', () => {
    const error = new Error('same');
    expect(toError(error)).toBe(error);
    expect(toError('text').message).toBe('text');
    expect(toError(42).message).toBe('42');
  });
});
