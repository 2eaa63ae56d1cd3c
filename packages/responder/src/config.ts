/**
 * Process-wide responder configuration.
 *
 * Built once at startup and handed to the route table by closure; request
 * handlers never read the environment themselves.
 *
 * Environment variables:
 *   HOSTNAME — identifier reported as `server_id` in every response
 *              (default: "unknown" when unset or empty).
 */

export const DEFAULT_SERVER_ID = 'unknown';

/** All interfaces. */
export const DEFAULT_HOST = '0.0.0.0';

export const DEFAULT_PORT = 5000;

export interface ListenAddress {
  host: string;
  port: number;
}

export interface ResponderConfig extends ListenAddress {
  serverId: string;
}

/**
 * Read the configuration from `env`.
 * Exposed with an injectable environment for unit testing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ResponderConfig> {
  const hostname = env.HOSTNAME;
  return Object.freeze({
    serverId: hostname !== undefined && hostname !== '' ? hostname : DEFAULT_SERVER_ID,
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
  });
}
