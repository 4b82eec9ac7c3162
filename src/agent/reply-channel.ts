// reply-channel.ts - One-shot reply channels for request/reply messaging
//
// A poster embeds a ReplyChannel in its message; the agent body answers
// through it while processing that message. The poster awaits the matching
// ReplySlot. Only the first write to a slot counts.
//
// Copyright 2026 baaaht project

/**
 * ReplyChannel is the capability a message carries to answer its poster
 */
export interface ReplyChannel<R> {
  /**
   * Deliver the reply. Ignored if the request already completed.
   */
  reply(value: R): void;

  /**
   * Complete the request with an error instead of a value.
   * Ignored if the request already completed.
   */
  fail(error: Error): void;
}

/**
 * Outcome of a request/reply exchange
 */
export type ReplyOutcome<R> = { ok: true; value: R } | { ok: false; error: Error };

/**
 * ReplySlot is a write-once cell. Its promise never rejects: failures travel
 * in the outcome.
 */
export class ReplySlot<R> {
  readonly outcome: Promise<ReplyOutcome<R>>;
  private settled = false;
  private resolveOutcome: (outcome: ReplyOutcome<R>) => void = () => undefined;

  constructor() {
    this.outcome = new Promise<ReplyOutcome<R>>((resolve) => {
      this.resolveOutcome = resolve;
    });
  }

  /**
   * Write the outcome if the slot is still empty
   *
   * @returns True if this call filled the slot
   */
  trySet(outcome: ReplyOutcome<R>): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;
    this.resolveOutcome(outcome);
    return true;
  }

  get isSettled(): boolean {
    return this.settled;
  }
}

/**
 * Create a channel that writes into `slot`
 */
export function createReplyChannel<R>(slot: ReplySlot<R>): ReplyChannel<R> {
  return {
    reply(value: R): void {
      slot.trySet({ ok: true, value });
    },
    fail(error: Error): void {
      slot.trySet({ ok: false, error });
    },
  };
}
