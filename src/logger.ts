import { pino, type Logger } from 'pino';
import { env } from './config.js';

export type { Logger };

export const logger: Logger = pino({
  name: 'water-advisory-bot',
  level: env.LOG_LEVEL,
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
