// src/whatsapp.ts
// WhatsApp Cloud API helpers: text replies, read receipts, webhook signature check.

import { createHmac, timingSafeEqual } from 'node:crypto';
import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { moduleLogger, type Logger } from './logger.js';

const GRAPH_BASE = 'https://graph.facebook.com';

export type DeliveryResult =
  | { status: 'sent'; messageId?: string }
  | { status: 'mock' }
  | { status: 'failed'; httpStatus?: number; error: string };

export interface Messenger {
  sendText(to: string, body: string): Promise<DeliveryResult>;
  markAsRead(messageId: string): Promise<DeliveryResult>;
}

export interface CloudMessengerOptions {
  token: string;
  phoneNumberId: string;
  graphVersion?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

const SendResponse = z.object({
  messages: z.array(z.object({ id: z.string() })).optional(),
});

function messageIdOf(text: string): string | undefined {
  try {
    const parsed = SendResponse.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.messages?.[0]?.id : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Messenger backed by the Graph API. Without credentials it falls back to the
 * mock messenger, which only logs what would have been sent.
 */
export function createCloudMessenger(opts: CloudMessengerOptions): Messenger {
  const log = opts.logger ?? moduleLogger('whatsapp');
  if (!opts.token || !opts.phoneNumberId) {
    log.warn('WHATSAPP_TOKEN / PHONE_NUMBER_ID missing; replies will be logged, not sent');
    return createMockMessenger(log);
  }

  const url = `${GRAPH_BASE}/${opts.graphVersion ?? 'v19.0'}/${opts.phoneNumberId}/messages`;
  const timeoutMs = opts.timeoutMs ?? 30_000;

  async function post(payload: Record<string, unknown>): Promise<DeliveryResult> {
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${opts.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ messaging_product: 'whatsapp', ...payload }),
        signal: AbortSignal.timeout(timeoutMs),
        dispatcher: opts.dispatcher,
      });
      const text = await res.text();
      if (!res.ok) {
        log.error({ status: res.status, body: text }, 'WhatsApp API error');
        return { status: 'failed', httpStatus: res.status, error: text || `HTTP ${res.status}` };
      }
      return { status: 'sent', messageId: messageIdOf(text) };
    } catch (err) {
      log.error({ err }, 'WhatsApp API unreachable');
      return { status: 'failed', error: err instanceof Error ? err.message : String(err) };
    }
  }

  return {
    async sendText(to, body) {
      const result = await post({ to, type: 'text', text: { preview_url: false, body } });
      if (result.status === 'sent') log.info({ to, messageId: result.messageId }, 'reply sent');
      return result;
    },
    markAsRead(messageId) {
      return post({ status: 'read', message_id: messageId });
    },
  };
}

export function createMockMessenger(log: Logger = moduleLogger('whatsapp')): Messenger {
  return {
    async sendText(to, body) {
      log.info({ to, body }, '[mock] outgoing message');
      return { status: 'mock' };
    },
    async markAsRead(messageId) {
      log.debug({ messageId }, '[mock] mark as read');
      return { status: 'mock' };
    },
  };
}

/* --------------------------- Signature verification ------------------------ */

/** Checks an `X-Hub-Signature-256` header ("sha256=<hex>") against the raw request body. */
export function verifySignature(rawBody: string | Buffer, header: string | undefined, secret: string): boolean {
  if (!header || !secret) return false;
  const expected = `sha256=${createHmac('sha256', secret).update(rawBody).digest('hex')}`;
  const a = Buffer.from(header);
  const b = Buffer.from(expected);
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
