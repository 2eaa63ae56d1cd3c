/**
 * Express application factory for the replica responder.
 *
 * Creates and configures a fully-wired Express app without starting a
 * TCP listener.  `index.ts` binds the port; tests import `createApp()`
 * directly and drive it through supertest.
 *
 * Layers (applied in order):
 *  1. `helmet`          — sets secure HTTP response headers.
 *  2. Greeting routes   — `/` and `/hello` with per-route `cors`,
 *                         405 for other methods.
 *  3. 404 fallback.
 *  4. `errorHandler`    — 500 for anything a handler throws.
 */
import express from 'express';
import helmet from 'helmet';
import type { ResponderConfig } from './config';
import { createGreetingRouter } from './routes/greeting';
import { errorHandler } from './middleware/error-handler';

export function createApp(config: Pick<ResponderConfig, 'serverId'>): express.Application {
  const app = express();

  // ── Security headers ───────────────────────────────────────────────────────
  app.use(helmet());

  // ── Routes ─────────────────────────────────────────────────────────────────
  app.use(createGreetingRouter(config));

  // ── 404 fallback ───────────────────────────────────────────────────────────
  // JSON in place of Express's HTML page; callers only rely on the status.
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ── Errors ─────────────────────────────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
