import { serve, type ServerType } from '@hono/node-server';
import type { Hono } from 'hono';
import type { Logger } from '../logging.js';

export function startServer(app: Hono, port: number, logger: Logger): Promise<ServerType> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port }, (info) => {
      server.off('error', reject);
      logger(`Listening on http://localhost:${info.port}`);
      resolve(server);
    });
    // Listen failures such as EADDRINUSE are emitted, not thrown.
    server.once('error', reject);
  });
}

export function stopServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
