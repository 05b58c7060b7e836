// src/delivery.ts
// Reply pacing: an optional "typing" pause before each outbound message.

import { setTimeout as sleep } from 'node:timers/promises';
import type { Env } from './config.js';
import type { DeliveryResult, Messenger } from './whatsapp.js';

export interface ReplyDelay {
  enabled: boolean;
  baseMs: number;
  perWordMs: number;
  maxMs: number;
}

export const NO_DELAY: ReplyDelay = { enabled: false, baseMs: 0, perWordMs: 0, maxMs: 0 };

export function replyDelayFromEnv(e: Env): ReplyDelay {
  return {
    enabled: e.REPLY_DELAY_ENABLED,
    baseMs: e.REPLY_DELAY_BASE_MS,
    perWordMs: e.REPLY_DELAY_PER_WORD_MS,
    maxMs: e.REPLY_DELAY_MAX_MS,
  };
}

/**
 * base + words * perWord, capped at max.
 * Example: naturalDelayMs('one two three', { enabled: true, baseMs: 400, perWordMs: 60, maxMs: 3000 }) = 580
 */
export function naturalDelayMs(text: string, delay: ReplyDelay): number {
  if (!delay.enabled) return 0;
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.min(delay.maxMs, delay.baseMs + words * delay.perWordMs);
}

export interface DeliverOptions {
  delay?: ReplyDelay;
  wait?: (ms: number) => Promise<unknown>;
}

export async function deliverReply(
  messenger: Messenger,
  to: string,
  text: string,
  opts: DeliverOptions = {}
): Promise<DeliveryResult> {
  const ms = naturalDelayMs(text, opts.delay ?? NO_DELAY);
  if (ms > 0) await (opts.wait ?? sleep)(ms);
  return messenger.sendText(to, text);
}
