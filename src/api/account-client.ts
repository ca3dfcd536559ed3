import { Agent, fetch } from 'undici';

export interface AccountInfo {
  id?: string;
  username: string;
  email: string;
}

/**
 * Non-2xx response from the accounts API.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly body?: string,
  ) {
    super(message);
    this.name = 'ApiError';
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

export interface AccountClientOptions {
  accountsUrl: string;
  accessToken: string;
  skipSsl?: boolean;
  timeoutMs?: number;
}

export function parseAccountInfo(payload: unknown): AccountInfo | null {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return null;
  }
  const record: Record<string, unknown> = { ...payload };
  const username = record.username;
  const email = typeof record.mail === 'string' ? record.mail : record.email;
  if (typeof username !== 'string' || typeof email !== 'string') {
    return null;
  }
  const info: AccountInfo = { username, email };
  if (typeof record.id === 'string') info.id = record.id;
  return info;
}

/**
 * Minimal client for the accounts API, bound to one access token.
 */
export class AccountClient {
  constructor(private readonly options: AccountClientOptions) {}

  async getAccountInfo(): Promise<AccountInfo> {
    const { accountsUrl, accessToken, skipSsl } = this.options;
    const url = `${accountsUrl.replace(/\/+$/, '')}/me`;
    const dispatcher = skipSsl ? new Agent({ connect: { rejectUnauthorized: false } }) : undefined;
    try {
      const response = await fetch(url, {
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${accessToken}`,
        },
        dispatcher,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30000),
      });
      const text = await response.text();
      if (!response.ok) {
        throw new ApiError(`GET ${url} failed: ${response.status}`, response.status, text);
      }
      let payload: unknown;
      try {
        payload = JSON.parse(text);
      } catch {
        throw new ApiError(`GET ${url} returned invalid JSON`, response.status, text);
      }
      const info = parseAccountInfo(payload);
      if (info === null) {
        throw new ApiError(`GET ${url} returned an unexpected account payload`, response.status, text);
      }
      return info;
    } finally {
      await dispatcher?.close();
    }
  }
}
