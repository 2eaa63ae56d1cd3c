/**
 * Entry point for the replica responder.
 *
 * Listens on 0.0.0.0:5000.  Exits 1 when the port cannot be bound and 0
 * after a SIGTERM / SIGINT shutdown.
 *
 * Environment variables:
 *   HOSTNAME — reported as `server_id` (default: "unknown").
 */
import { loadConfig } from './config';
import { run } from './main';

run(loadConfig()).catch((err: unknown) => {
  console.error('[responder] Startup failed:', err);
  process.exit(1);
});
