// src/routes/status.ts
import { Router, type Request, type Response } from 'express';
import { snapshot } from '../session.js';
import type { SessionStore } from '../store.js';

/**
 * GET /api/sessions           -> { count }
 * GET /api/sessions/:userId   -> session snapshot, or 404
 *
 * NOTE: No auth here; protect at the edge if exposing publicly.
 */
export function statusRoutes(store: SessionStore): Router {
  const status = Router();

  status.get('/sessions', (_req: Request, res: Response) => {
    res.json({ count: store.size });
  });

  status.get('/sessions/:userId', (req: Request, res: Response) => {
    const session = store.peek(req.params.userId);
    if (!session) return res.status(404).json({ ok: false, error: 'Not Found' });
    return res.json(snapshot(session));
  });

  return status;
}
