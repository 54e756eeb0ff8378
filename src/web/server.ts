/**
 * HTTP server lifecycle
 */

import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Express } from 'express';

/**
 * URL of the address the server is bound to
 */
export function listeningUrl(address: AddressInfo | string | null): string {
  if (address === null) return 'an unknown address';
  if (typeof address === 'string') return address;
  const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
  return `http://${host}:${address.port}`;
}

export function startServer(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);

    server.once('listening', () => {
      console.log(`[ChatServer] Listening on ${listeningUrl(server.address())}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

/**
 * Close the server on SIGINT/SIGTERM
 */
export function handleShutdown(server: Server): void {
  const stop = (signal: string) => {
    console.log(`[ChatServer] ${signal} received, shutting down`);
    server.close(error => {
      if (error) {
        console.error('[ChatServer] Error during shutdown:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}
