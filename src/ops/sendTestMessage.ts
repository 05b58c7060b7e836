// src/ops/sendTestMessage.ts
// Send one WhatsApp text with the configured credentials.
//   npm run send-test -- --to 15550001111 --message "hello"
import { parseArgs } from 'node:util';
import { env } from '../config.js';
import { logger } from '../logger.js';
import { createCloudMessenger } from '../whatsapp.js';

(async () => {
  try {
    const { values } = parseArgs({
      options: {
        to: { type: 'string', default: env.TEST_NUMBER },
        message: { type: 'string', default: 'Water advisory bot test' },
      },
    });
    if (!values.to) {
      logger.error('no recipient: pass --to or set TEST_NUMBER');
      process.exit(1);
    }

    const messenger = createCloudMessenger({
      token: env.WHATSAPP_TOKEN,
      phoneNumberId: env.PHONE_NUMBER_ID,
      graphVersion: env.GRAPH_API_VERSION,
    });
    const result = await messenger.sendText(values.to, values.message ?? '');
    logger.info({ result }, 'test message done');
    process.exit(result.status === 'failed' ? 1 : 0);
  } catch (err) {
    logger.error({ err }, 'failed to send test message');
    process.exit(1);
  }
})();
