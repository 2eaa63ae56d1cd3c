/**
 * Process lifecycle: bind, log, and exit on bind failure or shutdown signal.
 *
 * `exit` is injectable so tests can observe exit codes without ending the
 * test runner.
 */
import type { Server } from 'node:http';
import type { ResponderConfig } from './config';
import { createApp } from './app';
import { startServer, stopServer } from './server';

export type Exit = (code: number) => void;

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

/**
 * Start the responder on `config.host:config.port`.
 *
 * - Bind failure: logs to stderr, calls `exit(1)`, resolves `undefined`.
 * - SIGTERM / SIGINT: closes the server, then `exit(0)` (`exit(1)` if
 *   closing fails).
 */
export async function run(
  config: Readonly<ResponderConfig>,
  exit: Exit = process.exit
): Promise<Server | undefined> {
  const app = createApp(config);

  const server = await startServer(app, config).catch((err: unknown) => {
    console.error(`[responder] Failed to listen on ${config.host}:${config.port}:`, err);
    return undefined;
  });
  if (server === undefined) {
    exit(1);
    return undefined;
  }

  console.log(`[responder] Listening on ${config.host}:${config.port} as ${config.serverId}`);

  const shutdown = (signal: NodeJS.Signals): void => {
    for (const s of SHUTDOWN_SIGNALS) {
      process.off(s, shutdown);
    }
    console.log(`[responder] Received ${signal}, shutting down`);
    stopServer(server).then(
      () => exit(0),
      (err: unknown) => {
        console.error('[responder] Shutdown failed:', err);
        exit(1);
      }
    );
  };

  for (const s of SHUTDOWN_SIGNALS) {
    process.once(s, shutdown);
  }

  return server;
}
