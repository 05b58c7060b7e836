// src/app.ts
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import './types.js';
import { moduleLogger } from './logger.js';
import { statusRoutes } from './routes/status.js';
import { webhookRoutes, type WebhookDeps } from './routes/webhook.js';
import type { SessionStore } from './store.js';

export interface AppDeps extends WebhookDeps {
  store: SessionStore;
}

export function createApp(deps: AppDeps) {
  const log = deps.logger ?? moduleLogger('server');
  const app = express();
  app.disable('x-powered-by');

  /** capture raw body for signature HMAC */
  app.use(
    express.json({
      limit: '2mb',
      verify: (req: Request, _res, buf) => {
        req.rawBody = buf ? buf.toString('utf8') : '';
      },
    })
  );

  /** basic CORS */
  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'x-hub-signature-256', 'Authorization'],
    })
  );

  app.use((req, _res, next) => {
    if (req.path.startsWith('/webhook')) {
      log.debug(
        {
          method: req.method,
          path: req.path,
          sig: Boolean(req.header('x-hub-signature-256')),
          len: Number(req.headers['content-length'] || 0),
        },
        'webhook request'
      );
    }
    next();
  });

  app.set('trust proxy', 1);

  /** health */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      uptime: Math.round(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  /** routes */
  app.use('/', webhookRoutes(deps));
  app.use('/api', statusRoutes(deps.store));

  /** 404 */
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: 'Not Found' });
  });

  /** errors */
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    log.error({ err }, 'unhandled error');
    res.status(500).json({ ok: false, error: 'Internal Server Error' });
  });

  return app;
}
