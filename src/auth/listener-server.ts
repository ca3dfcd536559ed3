import * as crypto from 'crypto';
import * as http from 'http';
import { writeHandoff } from './code-handoff';
import { LISTENER_ENV_VARS, type ListenerEnvironment } from './listener-process';
import { buildRedirectUri, LOOPBACK_HOST } from './port-allocator';

/**
 * The HTTP side of the browser login, run inside the listener child process.
 *
 *   GET /                      -> 302 to the authorization server
 *   GET /?code=...&state=...   -> validate state, hand the code to the CLI
 *   GET /?error=...            -> report the authorization failure
 *
 * The server stops after the first callback, whatever its outcome.
 */

export type ListenerOutcome = 'code-received' | 'state-mismatch' | 'authorization-error' | 'missing-code';

export interface ListenerResult {
  outcome: ListenerOutcome;
  /** One line for the parent's diagnostics; `null` once the code was handed over */
  reason: string | null;
}

export interface ListenerServerOptions {
  env: ListenerEnvironment;
  port: number;
  host?: string;
  /** Called once the socket is bound */
  onListening?: (port: number) => void;
}

/**
 * Read the listener environment from the process env.
 * Throws naming the first missing variable.
 */
export function readListenerEnvironment(source: NodeJS.ProcessEnv = process.env): ListenerEnvironment {
  const read = (name: string): string => {
    const value = source[name];
    if (value === undefined || value === '') {
      throw new Error(`Missing environment variable: ${name}`);
    }
    return value;
  };
  return {
    appName: read(LISTENER_ENV_VARS.appName),
    state: read(LISTENER_ENV_VARS.state),
    authUrl: read(LISTENER_ENV_VARS.authUrl),
    clientId: read(LISTENER_ENV_VARS.clientId),
    codeFile: read(LISTENER_ENV_VARS.codeFile),
  };
}

/**
 * Parse a `--listen` value of the form `host:port`.
 */
export function parseListenAddress(value: string): { host: string; port: number } {
  const match = /^([^:]+):(\d+)$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid listen address: ${value} (expected host:port)`);
  }
  const port = Number.parseInt(match[2], 10);
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid listen address: ${value} (port out of range)`);
  }
  return { host: match[1], port };
}

export function buildAuthorizationUrl(env: ListenerEnvironment, port: number): string {
  const url = new URL(env.authUrl);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('client_id', env.clientId);
  url.searchParams.set('redirect_uri', buildRedirectUri(port));
  url.searchParams.set('state', env.state);
  return url.toString();
}

function statesMatch(expected: string, received: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderPage(title: string, message: string): string {
  return (
    '<!DOCTYPE html><html><head><meta charset="utf-8">' +
    `<title>${escapeHtml(title)}</title></head>` +
    `<body><h3>${escapeHtml(title)}</h3><p>${escapeHtml(message)}</p></body></html>`
  );
}

/**
 * Serve until the first callback, then close.
 *
 * @returns What the callback carried. The code itself is only ever written
 * to the handoff file.
 */
export function runListenerServer(options: ListenerServerOptions): Promise<ListenerResult> {
  const { env, port } = options;
  const host = options.host ?? LOOPBACK_HOST;

  return new Promise((resolve, reject) => {
    let settled = false;

    const closeAfter = (res: http.ServerResponse, done: () => void): void => {
      settled = true;
      res.once('finish', () => {
        server.close(done);
        server.closeAllConnections();
      });
    };

    const finish = (res: http.ServerResponse, outcome: ListenerOutcome, reason: string | null = null): void => {
      if (settled) return;
      closeAfter(res, () => resolve({ outcome, reason }));
    };

    const send = (res: http.ServerResponse, status: number, title: string, message: string): void => {
      res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8', 'Cache-Control': 'no-store' });
      res.end(renderPage(title, message));
    };

    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? '/', `http://${host}:${port}`);
      if (req.method !== 'GET' || url.pathname !== '/') {
        send(res, 404, 'Not found', 'This address only serves the login redirect.');
        return;
      }
      if (settled) {
        send(res, 410, 'Login finished', 'This login attempt has already completed.');
        return;
      }

      const error = url.searchParams.get('error');
      const code = url.searchParams.get('code');
      const state = url.searchParams.get('state');

      if (error !== null) {
        const description = url.searchParams.get('error_description') ?? error;
        finish(res, 'authorization-error', `Authorization failed: ${description}`);
        send(res, 400, 'Login failed', `${env.appName}: ${description}`);
        return;
      }

      if (code === null && state === null) {
        res.writeHead(302, { Location: buildAuthorizationUrl(env, port), 'Cache-Control': 'no-store' });
        res.end();
        return;
      }

      if (state === null || !statesMatch(env.state, state)) {
        finish(res, 'state-mismatch', 'Invalid state parameter');
        send(res, 400, 'Login failed', 'Invalid state parameter. Please try logging in again.');
        return;
      }

      if (code === null || code === '') {
        finish(res, 'missing-code', 'No authorization code was received');
        send(res, 400, 'Login failed', 'No authorization code was received. Please try logging in again.');
        return;
      }

      try {
        writeHandoff(env.codeFile, code);
      } catch (writeError) {
        closeAfter(res, () => reject(writeError));
        send(res, 500, 'Login failed', 'Failed to pass the authorization code to the CLI.');
        return;
      }
      finish(res, 'code-received');
      send(
        res,
        200,
        'Login successful',
        `You have successfully logged in to the ${env.appName}. You can close this window and return to the terminal.`,
      );
    });

    server.once('error', reject);
    server.listen(port, host, () => {
      options.onListening?.(port);
    });
  });
}
