/**
 * 405 responder for known paths hit with an unsupported method.
 *
 * Mounted with `route.all()` after the route's real handlers, so it only
 * runs when none of them matched.  Express alone would answer 404 here;
 * the JSON body mirrors the 404 fallback in `app.ts`.
 */
import type { Request, Response } from 'express';

export function methodNotAllowed(allowed: readonly string[]) {
  const allowHeader = allowed.join(', ');

  return (_req: Request, res: Response): void => {
    res.set('Allow', allowHeader);
    res.status(405).json({ error: 'Method not allowed' });
  };
}
