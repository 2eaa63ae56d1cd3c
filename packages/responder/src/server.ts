/**
 * TCP listener lifecycle for the Express app.
 */
import http from 'node:http';
import type { RequestListener } from 'node:http';
import type { ListenAddress } from './config';

/**
 * Bind `app` to `address`.  Resolves once the socket is listening and rejects
 * with the listen error (e.g. `EADDRINUSE`) when the bind fails.
 */
export function startServer(app: RequestListener, address: ListenAddress): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app);

    const onError = (err: Error): void => {
      reject(err);
    };
    server.once('error', onError);

    server.listen(address.port, address.host, () => {
      server.off('error', onError);
      resolve(server);
    });
  });
}

/** Stop accepting connections and resolve once the server has closed. */
export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
