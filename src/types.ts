// src/types.ts
import 'express';

declare module 'express-serve-static-core' {
  interface Request {
    /** Raw JSON body, captured by express.json({ verify }) for the webhook HMAC. */
    rawBody?: string;
  }
}
