import 'dotenv/config';
import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

/**
 * Centralized environment validation.
 * - APP_SECRET: when set, inbound webhook POSTs must carry a valid X-Hub-Signature-256.
 * - SESSION_TTL_MINUTES: 0 keeps sessions for the process lifetime.
 * - REPLY_DELAY_*: "typing" delay before each reply, off by default.
 */
const Schema = z.object({
  // Server / Meta (WhatsApp Cloud)
  PORT: z.coerce.number().default(3000),
  VERIFY_TOKEN: z.string().default(''),
  WHATSAPP_TOKEN: z.string().default(''),
  PHONE_NUMBER_ID: z.string().default(''),
  APP_SECRET: z.string().default(''),
  GRAPH_API_VERSION: z.string().default('v19.0'),

  // Advisory backend
  BACKEND_BASE_URL: z.string().url().default('http://localhost:8000'),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Sessions
  SESSION_TTL_MINUTES: z.coerce.number().min(0).default(1440),
  SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),

  // Reply pacing
  REPLY_DELAY_ENABLED: flag,
  REPLY_DELAY_BASE_MS: z.coerce.number().min(0).default(400),
  REPLY_DELAY_PER_WORD_MS: z.coerce.number().min(0).default(60),
  REPLY_DELAY_MAX_MS: z.coerce.number().min(0).default(3000),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  TEST_NUMBER: z.string().default(''),
});

export type Env = z.infer<typeof Schema>;

export const env: Env = Schema.parse(process.env);

/**
 * Names of env keys that are set to an empty value.
 * Used at boot to warn without crashing the process:
 *
 *   missingEnv(['WHATSAPP_TOKEN', 'PHONE_NUMBER_ID'])
 */
export function missingEnv(keys: Array<keyof Env>, source: Env = env): Array<keyof Env> {
  return keys.filter((k) => {
    const v = source[k];
    return v === undefined || v === null || v === '';
  });
}
