import * as net from 'net';
import { LoginError } from './errors';

export const LOOPBACK_HOST = '127.0.0.1';

function tryBind(port: number, host: string): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.unref();
    server.once('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE' || error.code === 'EACCES') {
        resolve(false);
        return;
      }
      reject(error);
    });
    server.listen({ port, host, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}

/**
 * Find the first port in [rangeStart, rangeEnd] that can be bound on the
 * loopback interface. The test socket is closed before returning; the
 * listener binds the port again.
 *
 * The range is fixed because the authorization server only accepts a small
 * set of loopback redirect ports.
 */
export async function allocatePort(
  rangeStart: number,
  rangeEnd: number,
  host: string = LOOPBACK_HOST,
): Promise<number> {
  for (let port = rangeStart; port <= rangeEnd; port += 1) {
    if (await tryBind(port, host)) {
      return port;
    }
  }
  throw new LoginError(
    'NoPortAvailable',
    `Failed to find an available port between ${rangeStart} and ${rangeEnd}.`,
    { hint: 'Check if you have unnecessary services running on these ports.' },
  );
}

/**
 * The redirect URI registered for a loopback port. The listener and the
 * token exchange must both use this exact string.
 */
export function buildRedirectUri(port: number): string {
  return `http://${LOOPBACK_HOST}:${port}/`;
}
