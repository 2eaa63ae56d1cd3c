/**
 * GET /
 * GET /hello
 *
 * Fixed greeting endpoints.  Each replica answers with the same message and
 * its own `server_id`, so a caller behind a load balancer can see which
 * replica served the request:
 *
 * ```json
 * { "message": "Hello world from Flask!", "server_id": "node-7" }
 * ```
 */
import { Router, Request, Response } from 'express';
import cors, { CorsOptions } from 'cors';
import type { ResponderConfig } from '../config';
import { methodNotAllowed } from '../middleware/method-not-allowed';

export interface GreetingRoute {
  path: string;
  message: string;
}

export interface GreetingBody {
  message: string;
  server_id: string;
}

export const GREETING_ROUTES: readonly GreetingRoute[] = [
  { path: '/', message: 'Hello from Python server!' },
  { path: '/hello', message: 'Hello world from Flask!' },
];

/** HEAD is served by the GET handler. */
const ALLOWED_METHODS = ['GET', 'HEAD'] as const;

/**
 * Dashboards polling several replicas read the responses cross-origin.
 * Mounted per route so preflights on unknown paths still fall through to 404.
 */
const corsOptions: CorsOptions = {
  origin: '*',
  methods: [...ALLOWED_METHODS],
};

export function greetingBody(message: string, serverId: string): GreetingBody {
  return { message, server_id: serverId };
}

/**
 * Build the greeting router for one process run.  Bodies are computed once
 * per route here, not per request.
 */
export function createGreetingRouter(config: Pick<ResponderConfig, 'serverId'>): Router {
  // `/hello/` and `/HELLO` are not greeting routes.
  const router = Router({ strict: true, caseSensitive: true });

  const corsHandler = cors(corsOptions);

  for (const { path, message } of GREETING_ROUTES) {
    const body = greetingBody(message, config.serverId);
    router
      .route(path)
      .all(corsHandler)
      .get((_req: Request, res: Response) => {
        res.json(body);
      })
      .all(methodNotAllowed(ALLOWED_METHODS));
  }

  return router;
}
