// config.ts - Agent configuration defaults and environment loading
//
// Copyright 2026 baaaht project

import { NO_TIMEOUT } from './cancellation.js';

/**
 * AgentConfig holds the tunable settings of an agent
 */
export interface AgentConfig {
  /**
   * Name used as the log prefix
   * Defaults to 'agent'
   */
  name?: string;

  /**
   * Default reply timeout for postAndReply in milliseconds
   * Defaults to NO_TIMEOUT
   */
  defaultTimeout?: number;

  /**
   * How long dispose() waits for the worker in milliseconds
   * Defaults to 1000 (1 second)
   */
  disposeGracePeriod?: number;

  /**
   * Maximum number of queued messages; unbounded when omitted.
   * AGENT_MAILBOX_CAPACITY sets it only for agents built with loadEnv
   */
  capacity?: number;
}

export type ResolvedAgentConfig = Required<Omit<AgentConfig, 'capacity'>> & Pick<AgentConfig, 'capacity'>;

export const DEFAULT_AGENT_CONFIG: ResolvedAgentConfig = {
  name: 'agent',
  defaultTimeout: NO_TIMEOUT,
  disposeGracePeriod: 1000, // 1 second
};

const INFINITE_WORDS = new Set(['none', 'infinite', 'infinity']);

/**
 * Parse a duration such as "500ms", "2s", "1m30s", "1h" or a bare number of
 * milliseconds. "none", "infinite" and "infinity" yield NO_TIMEOUT.
 *
 * @returns Milliseconds, or undefined when the string is not a duration
 */
export function parseDuration(duration: string): number | undefined {
  const value = duration.trim().toLowerCase();
  if (value === '') return undefined;
  if (INFINITE_WORDS.has(value)) return NO_TIMEOUT;
  if (/^\d+$/.test(value)) return parseInt(value, 10);

  const match = value.match(/^(?:(\d+)h)?(?:(\d+)m(?!s))?(?:(\d+(?:\.\d+)?)s)?(?:(\d+)ms)?$/);
  if (!match) return undefined;

  const [, hours, minutes, seconds, millis] = match;
  let total = 0;
  if (hours) total += parseInt(hours, 10) * 3600000;
  if (minutes) total += parseInt(minutes, 10) * 60000;
  if (seconds) {
    const secs = parseFloat(seconds);
    if (Number.isNaN(secs)) return undefined;
    total += secs * 1000;
  }
  if (millis) total += parseInt(millis, 10);

  return total;
}

function parseCapacity(raw: string): number | undefined {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) return undefined;
  const capacity = parseInt(value, 10);
  return capacity > 0 ? capacity : undefined;
}

/**
 * Load agent settings from environment variables. Unset or unparseable
 * variables are left out so defaults and explicit options apply.
 */
export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const config: AgentConfig = {};

  const name = env.AGENT_NAME?.trim();
  if (name) {
    config.name = name;
  }

  if (env.AGENT_DEFAULT_TIMEOUT) {
    const timeout = parseDuration(env.AGENT_DEFAULT_TIMEOUT);
    if (timeout !== undefined) config.defaultTimeout = timeout;
  }

  if (env.AGENT_DISPOSE_GRACE_PERIOD) {
    const grace = parseDuration(env.AGENT_DISPOSE_GRACE_PERIOD);
    if (grace !== undefined && Number.isFinite(grace)) config.disposeGracePeriod = grace;
  }

  if (env.AGENT_MAILBOX_CAPACITY) {
    const capacity = parseCapacity(env.AGENT_MAILBOX_CAPACITY);
    if (capacity !== undefined) config.capacity = capacity;
  }

  return config;
}

/**
 * Merge defaults, environment-loaded settings and explicit options, in
 * increasing order of precedence. Undefined values never override.
 */
export function resolveAgentConfig(...layers: AgentConfig[]): ResolvedAgentConfig {
  const resolved: ResolvedAgentConfig = { ...DEFAULT_AGENT_CONFIG };
  for (const layer of layers) {
    if (layer.name !== undefined) resolved.name = layer.name;
    if (layer.defaultTimeout !== undefined) resolved.defaultTimeout = layer.defaultTimeout;
    if (layer.disposeGracePeriod !== undefined) resolved.disposeGracePeriod = layer.disposeGracePeriod;
    if (layer.capacity !== undefined) resolved.capacity = layer.capacity;
  }
  return resolved;
}
