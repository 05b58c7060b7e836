// src/server.ts
import { HttpAdvisoryClient } from './advisory.js';
import { createApp } from './app.js';
import { env, missingEnv } from './config.js';
import { replyDelayFromEnv } from './delivery.js';
import { ConversationEngine } from './engine.js';
import { logger } from './logger.js';
import { SessionStore } from './store.js';
import { createCloudMessenger } from './whatsapp.js';

const store = new SessionStore({ ttlMs: env.SESSION_TTL_MINUTES * 60_000 });

const advisory = new HttpAdvisoryClient({
  baseUrl: env.BACKEND_BASE_URL,
  timeoutMs: env.BACKEND_TIMEOUT_MS,
});

const engine = new ConversationEngine({ store, advisory });

const messenger = createCloudMessenger({
  token: env.WHATSAPP_TOKEN,
  phoneNumberId: env.PHONE_NUMBER_ID,
  graphVersion: env.GRAPH_API_VERSION,
});

const app = createApp({
  store,
  engine,
  messenger,
  verifyToken: env.VERIFY_TOKEN,
  appSecret: env.APP_SECRET || undefined,
  delay: replyDelayFromEnv(env),
});

/** boot */
const missing = missingEnv(['WHATSAPP_TOKEN', 'PHONE_NUMBER_ID', 'VERIFY_TOKEN']);
if (missing.length) logger.warn({ missing }, 'missing env; some features are disabled');

const sweep = setInterval(() => {
  const evicted = store.sweep();
  if (evicted) logger.info({ evicted, remaining: store.size }, 'idle sessions evicted');
}, env.SESSION_SWEEP_INTERVAL_MS);
sweep.unref();

app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, backend: env.BACKEND_BASE_URL }, 'listening');
});
