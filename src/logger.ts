// logger.ts - Logging for agents and mailboxes
//
// Agents accept any AgentLogger; the default ConsoleLogger prefixes each line
// with the agent name and filters by LOG_LEVEL.
//
// Copyright 2026 baaaht project

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger interface used by the agent
 */
export interface AgentLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve the minimum level from LOG_LEVEL, falling back to info
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements AgentLogger {
  private readonly prefix: string;
  private readonly minLevel: LogLevel;

  constructor(prefix: string = 'Agent', minLevel: LogLevel = levelFromEnv()) {
    this.prefix = prefix;
    this.minLevel = minLevel;
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('info')) {
      console.log(this.format('INFO', message), meta ? JSON.stringify(meta) : '');
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('warn')) {
      console.warn(this.format('WARN', message), meta ? JSON.stringify(meta) : '');
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('error')) {
      console.error(this.format('ERROR', message), meta ? JSON.stringify(meta) : '');
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('debug')) {
      console.debug(this.format('DEBUG', message), meta ? JSON.stringify(meta) : '');
    }
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private format(tag: string, message: string): string {
    return `[${this.prefix}] [${tag}] ${message}`;
  }
}
