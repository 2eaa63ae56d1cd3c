/**
 * Last-resort Express error middleware.
 *
 * Logs the error and answers 500 with a JSON body.  When the response has
 * already started, hands the error to Express's default handler, which
 * closes the connection.
 */
import type { Request, Response, NextFunction } from 'express';

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  console.error('[responder] Unhandled request error:', err);
  res.status(500).json({ error: 'Internal server error' });
}
