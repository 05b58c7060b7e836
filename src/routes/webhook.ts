// src/routes/webhook.ts
import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { deliverReply, type ReplyDelay } from '../delivery.js';
import { moduleLogger, type Logger } from '../logger.js';
import { verifySignature, type Messenger } from '../whatsapp.js';

/* -------------------------------------------------------------------------- */
/*                              Inbound payload                               */
/* -------------------------------------------------------------------------- */

const InboundMessage = z.object({
  from: z.string().optional(),
  id: z.string().optional(),
  type: z.string().optional(),
  text: z.object({ body: z.string().optional() }).optional(),
});

const WebhookPayload = z.object({
  object: z.string().optional(),
  entry: z
    .array(
      z.object({
        changes: z
          .array(
            z.object({
              value: z.object({ messages: z.array(InboundMessage).optional() }).optional(),
            })
          )
          .optional(),
      })
    )
    .optional(),
});

export type WebhookPayload = z.infer<typeof WebhookPayload>;

export interface InboundText {
  from: string;
  messageId?: string;
  body: string;
}

/** Text messages in arrival order; anything without a sender or a text body is dropped. */
export function inboundTexts(payload: WebhookPayload): InboundText[] {
  const out: InboundText[] = [];
  for (const entry of payload.entry ?? []) {
    for (const change of entry.changes ?? []) {
      for (const msg of change.value?.messages ?? []) {
        const body = msg.text?.body;
        if (!msg.from || body === undefined) continue;
        out.push({ from: msg.from, messageId: msg.id, body });
      }
    }
  }
  return out;
}

/* -------------------------------------------------------------------------- */
/*                                   Routes                                   */
/* -------------------------------------------------------------------------- */

export interface WebhookDeps {
  engine: { handleIncoming(userId: string, text: string): Promise<string> };
  messenger: Messenger;
  verifyToken: string;
  /** When set, POSTs must carry a valid X-Hub-Signature-256. */
  appSecret?: string;
  delay?: ReplyDelay;
  wait?: (ms: number) => Promise<unknown>;
  logger?: Logger;
}

export function webhookRoutes(deps: WebhookDeps): Router {
  const log = deps.logger ?? moduleLogger('webhook');
  const webhook = Router();

  webhook.get('/webhook', (req: Request, res: Response) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];
    if (mode === 'subscribe' && deps.verifyToken && token === deps.verifyToken) {
      log.info('webhook verified');
      return res.status(200).send(typeof challenge === 'string' ? challenge : '');
    }
    log.warn({ mode }, 'webhook verification failed');
    return res.sendStatus(403);
  });

  webhook.post('/webhook', async (req: Request, res: Response) => {
    if (deps.appSecret) {
      const sig = req.header('x-hub-signature-256');
      if (!verifySignature(req.rawBody ?? '', sig, deps.appSecret)) {
        log.warn({ hasSignature: Boolean(sig) }, 'signature check failed');
        return res.sendStatus(401);
      }
    }

    const parsed = WebhookPayload.safeParse(req.body);
    if (!parsed.success || parsed.data.object !== 'whatsapp_business_account') {
      return res.status(200).json({ status: 'ignored' });
    }

    try {
      for (const msg of inboundTexts(parsed.data)) {
        log.info({ from: msg.from, text: msg.body }, 'incoming message');
        if (msg.messageId) await deps.messenger.markAsRead(msg.messageId);
        const reply = await deps.engine.handleIncoming(msg.from, msg.body);
        await deliverReply(deps.messenger, msg.from, reply, { delay: deps.delay, wait: deps.wait });
      }
      return res.status(200).json({ status: 'ok' });
    } catch (err) {
      log.error({ err }, 'webhook error');
      // 200 so WhatsApp doesn't disable the webhook
      return res.status(200).json({ status: 'error' });
    }
  });

  return webhook;
}
