// types.ts - Type definitions for the agent
//
// Copyright 2026 baaaht project

import type { Agent } from '../agent.js';
import type { AgentConfig } from '../config.js';
import type { AgentLogger } from '../logger.js';

// =============================================================================
// Agent State
// =============================================================================

/**
 * AgentState represents the lifecycle state of an agent
 */
export enum AgentState {
  /**
   * No worker is running; start() is allowed
   */
  IDLE = 'idle',

  /**
   * A worker is running the body
   */
  RUNNING = 'running',
}

// =============================================================================
// Agent Body
// =============================================================================

/**
 * AgentBody is the worker logic. It receives the agent itself so it can call
 * receive(), tryReceive() and post() on it. Returning ends the run.
 */
export type AgentBody<T> = (agent: Agent<T>) => Promise<void>;

// =============================================================================
// Agent Options
// =============================================================================

/**
 * AgentOptions configures an agent at construction
 */
export interface AgentOptions extends AgentConfig {
  /**
   * Cancellation signal governing the mailbox and every reply wait
   */
  signal?: AbortSignal;

  /**
   * Logger instance
   * Defaults to a ConsoleLogger prefixed with the agent name
   */
  logger?: AgentLogger;

  /**
   * Whether to read AGENT_* environment variables. Explicit options still
   * win over them. Defaults to false
   */
  loadEnv?: boolean;
}
