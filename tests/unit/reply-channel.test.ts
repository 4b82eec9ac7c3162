// reply-channel.test.ts - Unit tests for reply slots and channels
//
// Copyright 2026 baaaht project

import { describe, it, expect } from '@jest/globals';
import { ReplySlot, createReplyChannel } from '../../src/agent/reply-channel.js';

describe('ReplySlot', () => {
  it('should start empty', () => {
    const slot = new ReplySlot<number>();
    expect(slot.isSettled).toBe(false);
  });

  it('should resolve with the first outcome written', async () => {
    const slot = new ReplySlot<number>();

    expect(slot.trySet({ ok: true, value: 1 })).toBe(true);
    expect(slot.trySet({ ok: true, value: 2 })).toBe(false);

    expect(slot.isSettled).toBe(true);
    await expect(slot.outcome).resolves.toEqual({ ok: true, value: 1 });
  });

  it('should carry failures in the outcome instead of rejecting', async () => {
    const slot = new ReplySlot<number>();
    const error = new Error('no answer');

    slot.trySet({ ok: false, error });

    await expect(slot.outcome).resolves.toEqual({ ok: false, error });
  });
});

describe('createReplyChannel', () => {
  it('should write replies into the slot', async () => {
    const slot = new ReplySlot<string>();
    const channel = createReplyChannel(slot);

    channel.reply('pong');

    await expect(slot.outcome).resolves.toEqual({ ok: true, value: 'pong' });
  });

  it('should ignore writes after the first', async () => {
    const slot = new ReplySlot<string>();
    const channel = createReplyChannel(slot);

    channel.reply('first');
    channel.reply('second');
    channel.fail(new Error('too late'));

    await expect(slot.outcome).resolves.toEqual({ ok: true, value: 'first' });
  });

  it('should complete the slot with an error on fail', async () => {
    const slot = new ReplySlot<string>();
    const channel = createReplyChannel(slot);
    const error = new Error('rejected');

    channel.fail(error);
    channel.reply('ignored');

    const outcome = await slot.outcome;
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBe(error);
    }
  });
});
