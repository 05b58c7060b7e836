import { describe, expect, it, vi } from 'vitest';
import { env } from './config.js';
import { deliverReply, naturalDelayMs, replyDelayFromEnv, type ReplyDelay } from './delivery.js';
import type { Messenger } from './whatsapp.js';

const ON: ReplyDelay = { enabled: true, baseMs: 400, perWordMs: 60, maxMs: 3000 };

function fakeMessenger() {
  return {
    sendText: vi.fn<Messenger['sendText']>(async () => ({ status: 'sent', messageId: 'wamid.1' })),
    markAsRead: vi.fn<Messenger['markAsRead']>(async () => ({ status: 'sent' })),
  } satisfies Messenger;
}

describe('naturalDelayMs', () => {
  it('is zero when disabled', () => {
    expect(naturalDelayMs('one two three', { ...ON, enabled: false })).toBe(0);
  });

  it('grows with the word count', () => {
    expect(naturalDelayMs('one two three', ON)).toBe(580);
    expect(naturalDelayMs('  spaced\n\nout  ', ON)).toBe(520);
    expect(naturalDelayMs('', ON)).toBe(400);
  });

  it('is capped', () => {
    expect(naturalDelayMs('word '.repeat(100), ON)).toBe(3000);
  });

  it('is off by default', () => {
    expect(replyDelayFromEnv(env).enabled).toBe(false);
  });
});

describe('deliverReply', () => {
  it('sends straight away without a delay', async () => {
    const messenger = fakeMessenger();
    const wait = vi.fn(async () => undefined);
    const result = await deliverReply(messenger, '15550001111', 'hello', { wait });
    expect(wait).not.toHaveBeenCalled();
    expect(messenger.sendText).toHaveBeenCalledWith('15550001111', 'hello');
    expect(result).toEqual({ status: 'sent', messageId: 'wamid.1' });
  });

  it('waits before sending when pacing is on', async () => {
    const messenger = fakeMessenger();
    const calls: string[] = [];
    const wait = vi.fn(async (ms: number) => {
      calls.push(`wait:${ms}`);
    });
    messenger.sendText.mockImplementationOnce(async () => {
      calls.push('send');
      return { status: 'mock' };
    });

    await deliverReply(messenger, '15550001111', 'two words', { delay: ON, wait });
    expect(calls).toEqual(['wait:520', 'send']);
  });
});
