// index.ts - Public entry point
//
// Copyright 2026 baaaht project

export { Agent, createAgent, startAgent } from './agent.js';
export { AgentState, type AgentBody, type AgentOptions } from './agent/types.js';
export {
  ReplySlot,
  createReplyChannel,
  type ReplyChannel,
  type ReplyOutcome,
} from './agent/reply-channel.js';
export { Mailbox } from './mailbox/mailbox.js';
export type { MailboxOptions, TryReceiveResult } from './mailbox/types.js';
export {
  EventStream,
  type Observable,
  type Observer,
  type ObserverFn,
  type Subscription,
} from './events/event-stream.js';
export {
  NO_TIMEOUT,
  assertValidTimeout,
  createLinkedScope,
  onAbort,
  type CancellationScope,
} from './cancellation.js';
export {
  AgentError,
  AgentErrorCode,
  AlreadyStartedError,
  CancelledError,
  ClosedError,
  TimedOutError,
  isCancellationError,
  toError,
} from './errors.js';
export {
  DEFAULT_AGENT_CONFIG,
  loadAgentConfig,
  parseDuration,
  resolveAgentConfig,
  type AgentConfig,
  type ResolvedAgentConfig,
} from './config.js';
export { ConsoleLogger, levelFromEnv, isLogLevel, type AgentLogger, type LogLevel } from './logger.js';
