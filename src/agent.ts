// agent.ts - Single-consumer agent built on a mailbox
//
// This file contains the Agent class, which owns a mailbox and runs a
// user-supplied body that drains it, along with the factory functions.
//
// Copyright 2026 baaaht project

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { assertValidTimeout, createLinkedScope, onAbort } from './cancellation.js';
import { loadAgentConfig, resolveAgentConfig, type ResolvedAgentConfig } from './config.js';
import {
  AlreadyStartedError,
  CancelledError,
  TimedOutError,
  isCancellationError,
  toError,
} from './errors.js';
import { EventStream, type Observable } from './events/event-stream.js';
import { ConsoleLogger, type AgentLogger } from './logger.js';
import { Mailbox } from './mailbox/mailbox.js';
import type { TryReceiveResult } from './mailbox/types.js';
import { ReplySlot, createReplyChannel, type ReplyChannel } from './agent/reply-channel.js';
import { AgentState, type AgentBody, type AgentOptions } from './agent/types.js';

const GRACE_EXPIRED = Symbol('grace-expired');

// =============================================================================
// Main Agent Class
// =============================================================================

/**
 * Agent runs a body that processes messages from a private mailbox
 *
 * - start() spawns one worker running the body; a second start() while it
 *   runs fails with AlreadyStartedError
 * - post(), receive() and tryReceive() go through the mailbox
 * - postAndReply() sends a message carrying a ReplyChannel and waits for
 *   the body to answer it
 * - faults escaping the body are published on `errors`
 */
export class Agent<T> {
  private readonly body: AgentBody<T>;
  private readonly mailbox: Mailbox<T>;
  private readonly errorStream: EventStream<Error>;
  private readonly logger: AgentLogger;
  private readonly config: ResolvedAgentConfig;

  private lifecycle: AgentState;
  private worker: Promise<void> | undefined;
  private runs: number;
  private replyTimeout: number;

  /**
   * Creates a new Agent. The agent is idle until start() is called, but
   * messages may already be posted.
   *
   * @param body - Worker logic, invoked with the agent on each start
   * @param options - Cancellation signal, capacity, timeouts and logger
   */
  constructor(body: AgentBody<T>, options: AgentOptions = {}) {
    const { signal, logger, loadEnv = false, ...overrides } = options;

    this.config = resolveAgentConfig(loadEnv ? loadAgentConfig() : {}, overrides);
    assertValidTimeout(this.config.defaultTimeout);

    this.body = body;
    this.mailbox = new Mailbox<T>({ signal, capacity: this.config.capacity });
    this.errorStream = new EventStream<Error>();
    this.logger = logger ?? new ConsoleLogger(this.config.name);

    this.lifecycle = AgentState.IDLE;
    this.worker = undefined;
    this.runs = 0;
    this.replyTimeout = this.config.defaultTimeout;

    this.logger.debug('Agent created', {
      name: this.config.name,
      capacity: this.config.capacity ?? 'unbounded',
      defaultTimeout: String(this.config.defaultTimeout),
    });
  }

  // ==========================================================================
  // Lifecycle Methods
  // ==========================================================================

  /**
   * Start the worker
   *
   * @throws AlreadyStartedError if a worker is already running
   */
  start(): void {
    if (this.lifecycle === AgentState.RUNNING) {
      throw new AlreadyStartedError(`Agent '${this.config.name}' already started`, {
        name: this.config.name,
      });
    }

    this.lifecycle = AgentState.RUNNING;
    const run = ++this.runs;
    const task = this.runBody(run);
    this.worker = task;

    // Settles exactly once per start, whatever the outcome
    task.then(
      () => this.onWorkerFinished(task, undefined),
      (err: unknown) => this.onWorkerFinished(task, err)
    );

    this.logger.info('Agent started', { name: this.config.name });
  }

  /**
   * Stop the worker: close the mailbox and wait for the body to finish.
   * A no-op unless the agent is running.
   *
   * @throws The body's error if it failed with anything but a cancellation
   */
  async stop(): Promise<void> {
    if (this.lifecycle !== AgentState.RUNNING) {
      return;
    }

    this.lifecycle = AgentState.IDLE;
    const task = this.worker;

    this.logger.info('Agent stopping', {
      name: this.config.name,
      pending: this.mailbox.size,
    });

    this.mailbox.stop();

    if (!task) {
      return;
    }

    try {
      await task;
    } catch (err) {
      if (isCancellationError(err)) {
        return;
      }
      throw err;
    }
  }

  /**
   * Stop the agent, waiting at most `gracePeriod` milliseconds for the
   * worker. Returns once the grace period expires even if it is still busy.
   *
   * @throws The error from stop() if it fails within the grace period
   */
  async dispose(gracePeriod: number = this.config.disposeGracePeriod): Promise<void> {
    let timeoutId: NodeJS.Timeout | undefined;
    const grace = new Promise<typeof GRACE_EXPIRED>((resolve) => {
      timeoutId = setTimeout(() => resolve(GRACE_EXPIRED), gracePeriod);
    });

    const stopping = this.stop().then(
      (): Error | undefined => undefined,
      (err: unknown) => toError(err)
    );

    try {
      const outcome = await Promise.race([stopping, grace]);
      if (outcome === GRACE_EXPIRED) {
        this.logger.warn('Worker did not finish within grace period', {
          name: this.config.name,
          gracePeriod,
        });
        return;
      }
      if (outcome) {
        throw outcome;
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  // ==========================================================================
  // Messaging
  // ==========================================================================

  /**
   * Post a message to the mailbox
   *
   * @throws CancelledError if the agent is not running and the mailbox refused the message
   */
  async post(message: T): Promise<void> {
    try {
      await this.mailbox.post(message);
    } catch (err) {
      throw this.translateFailure(err);
    }
  }

  /**
   * Post a message built around a fresh ReplyChannel and wait for the body
   * to answer through it
   *
   * @param build - Builds the message from the reply channel
   * @param timeout - Milliseconds to wait, defaults to defaultTimeout
   * @throws TimedOutError if no reply arrives in time
   * @throws CancelledError if the agent's signal fires first
   */
  async postAndReply<R>(build: (channel: ReplyChannel<R>) => T, timeout?: number): Promise<R> {
    const effectiveTimeout = timeout ?? this.replyTimeout;
    const scope = createLinkedScope(this.signal, effectiveTimeout);
    const slot = new ReplySlot<R>();

    const detach = onAbort(scope.signal, () => {
      const reason: unknown = scope.signal.reason;
      const error = reason instanceof TimedOutError
        ? reason
        : new CancelledError(`Agent '${this.config.name}' cancelled while awaiting reply`, {
            name: this.config.name,
          });
      slot.trySet({ ok: false, error });
    });

    try {
      if (!slot.isSettled) {
        const message = build(createReplyChannel(slot));
        this.post(message).catch((err: unknown) => {
          slot.trySet({ ok: false, error: toError(err) });
        });
      }

      const outcome = await slot.outcome;
      if (!outcome.ok) {
        throw outcome.error;
      }
      return outcome.value;
    } finally {
      detach();
      scope.dispose();
    }
  }

  /**
   * Wait for the next message
   *
   * @throws CancelledError once the agent has stopped or been cancelled
   */
  async receive(): Promise<T> {
    try {
      return await this.mailbox.receive();
    } catch (err) {
      throw this.translateFailure(err);
    }
  }

  /**
   * Take the next message if one is queued, without waiting
   */
  tryReceive(): TryReceiveResult<T> {
    return this.mailbox.tryReceive();
  }

  /**
   * Publish an error to `errors` subscribers
   */
  reportError(error: unknown): void {
    this.errorStream.emit(toError(error));
  }

  // ==========================================================================
  // State Query
  // ==========================================================================

  /**
   * Faults escaping the body, and errors passed to reportError()
   */
  get errors(): Observable<Error> {
    return this.errorStream;
  }

  /**
   * True while a worker runs and the agent's signal has not fired
   */
  get isRunning(): boolean {
    return this.lifecycle === AgentState.RUNNING && !this.signal.aborted;
  }

  get state(): AgentState {
    return this.lifecycle;
  }

  get signal(): AbortSignal {
    return this.mailbox.signal;
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Messages queued in the mailbox
   */
  get pendingCount(): number {
    return this.mailbox.size;
  }

  /**
   * The running worker, undefined once it has finished
   */
  get workerTask(): Promise<void> | undefined {
    return this.worker;
  }

  /**
   * Default reply timeout for postAndReply() in milliseconds
   */
  get defaultTimeout(): number {
    return this.replyTimeout;
  }

  set defaultTimeout(timeout: number) {
    assertValidTimeout(timeout);
    this.replyTimeout = timeout;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async runBody(run: number): Promise<void> {
    await yieldToEventLoop();

    if (this.signal.aborted) {
      throw new CancelledError(`Agent '${this.config.name}' cancelled before its body ran`, {
        name: this.config.name,
      });
    }
    if (run !== this.runs || this.lifecycle !== AgentState.RUNNING) {
      throw new CancelledError(`Agent '${this.config.name}' stopped before its body ran`, {
        name: this.config.name,
      });
    }

    try {
      await this.body(this);
    } catch (err) {
      const error = toError(err);
      // Cancellations are only expected once this run has been stopped; a
      // timeout or cancellation from inside a live run is a fault
      const stopped = run !== this.runs || !this.isRunning;
      if (isCancellationError(error) && stopped) {
        this.logger.debug('Agent body cancelled', { name: this.config.name, error: error.message });
      } else {
        this.logger.error('Agent body failed', { name: this.config.name, error: error.message });
        this.errorStream.emit(error);
      }
      throw error;
    }
  }

  private onWorkerFinished(task: Promise<void>, err: unknown): void {
    // A stale worker must not reset a newer run
    if (this.worker !== task) {
      return;
    }

    this.worker = undefined;
    this.lifecycle = AgentState.IDLE;

    const outcome = err === undefined ? 'completed' : isCancellationError(err) ? 'cancelled' : 'faulted';
    this.logger.info('Agent stopped', { name: this.config.name, outcome });
  }

  /**
   * While stopped, every mailbox failure reads as a cancellation; while
   * running, the original error surfaces unchanged.
   */
  private translateFailure(err: unknown): unknown {
    if (this.isRunning || isCancellationError(err)) {
      return err;
    }
    return new CancelledError(`Agent '${this.config.name}' is not running`, {
      name: this.config.name,
      cause: toError(err).message,
    });
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a new, idle Agent
 */
export function createAgent<T>(body: AgentBody<T>, options?: AgentOptions): Agent<T> {
  return new Agent<T>(body, options);
}

/**
 * Create an Agent and start it
 */
export function startAgent<T>(body: AgentBody<T>, options?: AgentOptions): Agent<T> {
  const agent = new Agent<T>(body, options);
  agent.start();
  return agent;
}
