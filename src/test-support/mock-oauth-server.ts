/**
 * Mock authorization server for tests
 *
 * A local HTTP server on 127.0.0.1 that answers the token endpoint
 * (`POST /oauth2/token`) and the accounts API (`GET /api/me`) so the login
 * flow can run end to end without network access.
 */

import * as http from 'http';

export interface MockRequest {
  method: string;
  path: string;
  headers: http.IncomingHttpHeaders;
  /** Raw request body */
  body: string;
  /** Body parsed as application/x-www-form-urlencoded */
  form: Record<string, string>;
}

export interface MockResponse {
  status: number;
  body: string;
  contentType?: string;
}

export interface MockOAuthServerOptions {
  /** Response for the token endpoint */
  tokenResponse?: MockResponse;
  /** Response for GET /api/me */
  accountResponse?: MockResponse;
}

export const TOKEN_PATH = '/oauth2/token';
export const ACCOUNTS_PATH = '/api';

export function jsonResponse(status: number, payload: unknown): MockResponse {
  return { status, body: JSON.stringify(payload), contentType: 'application/json' };
}

/**
 * Creates a mock OAuth2 / accounts server for testing.
 */
export class MockOAuthServer {
  private server: http.Server | null = null;
  private port = 0;
  private readonly captured: MockRequest[] = [];

  public tokenResponse: MockResponse;
  public accountResponse: MockResponse;

  constructor(options: MockOAuthServerOptions = {}) {
    this.tokenResponse =
      options.tokenResponse ??
      jsonResponse(200, {
        access_token: 'test-access-token',
        token_type: 'bearer',
        expires_in: 3600,
        refresh_token: 'test-refresh-token',
      });
    this.accountResponse =
      options.accountResponse ??
      jsonResponse(200, { id: 'u-1', username: 'alice', mail: 'alice@example.com' });
  }

  /**
   * Start the mock server on a random port.
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => this.handleRequest(req, res));
      this.server = server;
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        const addr = server.address();
        if (addr && typeof addr === 'object') {
          this.port = addr.port;
          resolve(this.port);
        } else {
          reject(new Error('Failed to get server port'));
        }
      });
    });
  }

  /**
   * Stop the mock server.
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      this.server = null;
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  getBaseUrl(): string {
    return `http://127.0.0.1:${this.port}`;
  }

  get tokenUrl(): string {
    return `${this.getBaseUrl()}${TOKEN_PATH}`;
  }

  get accountsUrl(): string {
    return `${this.getBaseUrl()}${ACCOUNTS_PATH}`;
  }

  /** Captured requests, oldest first. */
  get requests(): MockRequest[] {
    return [...this.captured];
  }

  reset(): void {
    this.captured.length = 0;
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    let body = '';
    req.setEncoding('utf-8');
    req.on('data', (chunk: string) => {
      body += chunk;
    });
    req.on('end', () => {
      const path = req.url ?? '/';
      this.captured.push({
        method: req.method ?? 'GET',
        path,
        headers: req.headers,
        body,
        form: Object.fromEntries(new URLSearchParams(body)),
      });

      let response: MockResponse;
      if (req.method === 'POST' && path === TOKEN_PATH) {
        response = this.tokenResponse;
      } else if (req.method === 'GET' && path === `${ACCOUNTS_PATH}/me`) {
        response = this.accountResponse;
      } else {
        response = jsonResponse(404, { error: 'Not found' });
      }

      res.writeHead(response.status, { 'Content-Type': response.contentType ?? 'text/plain' });
      res.end(response.body);
    });
  }
}
