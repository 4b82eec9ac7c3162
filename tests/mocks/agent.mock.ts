// agent.mock.ts - Test doubles and async helpers for agent tests
//
// Copyright 2026 baaaht project

import { jest } from '@jest/globals';
import type { AgentLogger } from '../../src/logger.js';

type LogFn = (message: string, meta?: Record<string, unknown>) => void;

/**
 * MockLogger records every call so tests can assert on log output
 */
export class MockLogger implements AgentLogger {
  info = jest.fn<LogFn>();
  warn = jest.fn<LogFn>();
  error = jest.fn<LogFn>();
  debug = jest.fn<LogFn>();

  reset(): void {
    this.info.mockReset();
    this.warn.mockReset();
    this.error.mockReset();
    this.debug.mockReset();
  }

  /**
   * Messages passed to a level, in call order
   */
  messages(level: 'info' | 'warn' | 'error' | 'debug'): string[] {
    return this[level].mock.calls.map(([message]) => message);
  }
}

/**
 * Gate is a promise the test opens by hand
 */
export interface Gate {
  promise: Promise<void>;
  open(): void;
}

export function createGate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

/**
 * Let pending promise callbacks and one macrotask run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll `predicate` until it holds
 *
 * @throws Error if it still fails after `timeout` milliseconds
 */
export async function waitFor(predicate: () => boolean, timeout: number = 1000): Promise<void> {
  const deadline = Date.now() + timeout;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`waitFor timeout after ${timeout}ms`);
    }
    await sleep(5);
  }
}
