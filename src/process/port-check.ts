/**
 * Port Availability
 * @module process/port-check
 */

import { createServer } from 'net';

/**
 * Check whether a TCP port can be bound on the given host
 */
export function isPortFree(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.unref();
    server.once('error', () => resolve(false));
    server.listen({ host, port, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}
