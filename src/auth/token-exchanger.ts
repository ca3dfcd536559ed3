import { Agent, fetch } from 'undici';
import { LoginError } from './errors';

/**
 * Tokens obtained from the authorization server.
 */
export interface TokenSet {
  readonly accessToken: string;
  readonly tokenType: string;
  /** Absolute expiry, unix seconds */
  readonly expires: number | null;
  readonly refreshToken: string | null;
}

export interface TokenExchangerOptions {
  tokenUrl: string;
  clientId: string;
  /** Disable TLS certificate verification */
  skipSsl?: boolean;
  timeoutMs?: number;
  /** Clock in milliseconds, for expiry computation */
  now?: () => number;
}

const DEFAULT_TIMEOUT_MS = 30000;

function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value !== '' ? value : null;
}

function readNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number.parseInt(value, 10);
  return null;
}

/**
 * Convert a token endpoint response into a TokenSet.
 * An absolute `expires` wins over a relative `expires_in`.
 */
export function parseTokenResponse(payload: unknown, nowMs: number): TokenSet | null {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return null;
  }
  const record: Record<string, unknown> = { ...payload };
  const accessToken = readString(record, 'access_token');
  const tokenType = readString(record, 'token_type');
  if (accessToken === null || tokenType === null) {
    return null;
  }
  const absolute = readNumber(record, 'expires');
  const relative = readNumber(record, 'expires_in');
  const expires =
    absolute !== null ? absolute : relative !== null ? Math.floor(nowMs / 1000) + relative : null;
  return {
    accessToken,
    tokenType,
    expires,
    refreshToken: readString(record, 'refresh_token'),
  };
}

/**
 * Exchanges an authorization code for tokens (public client, no secret).
 * A failed exchange is final: the code is single-use.
 */
export class AuthorizationCodeExchanger {
  private readonly options: TokenExchangerOptions;

  constructor(options: TokenExchangerOptions) {
    this.options = options;
  }

  async exchange(code: string, redirectUri: string): Promise<TokenSet> {
    const { tokenUrl, clientId, skipSsl } = this.options;
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      client_id: clientId,
      redirect_uri: redirectUri,
    }).toString();

    const dispatcher = skipSsl ? new Agent({ connect: { rejectUnauthorized: false } }) : undefined;
    let status: number;
    let text: string;
    try {
      const response = await fetch(tokenUrl, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body,
        dispatcher,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      throw new LoginError(
        'TokenExchangeFailed',
        `Token request to ${tokenUrl} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      await dispatcher?.close();
    }

    if (status < 200 || status >= 300) {
      throw new LoginError('TokenExchangeFailed', `Token request failed with HTTP ${status}`, {
        statusCode: status,
        body: text,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new LoginError('TokenExchangeFailed', 'Token response is not valid JSON', {
        statusCode: status,
        body: text,
      });
    }
    const tokens = parseTokenResponse(payload, (this.options.now ?? Date.now)());
    if (tokens === null) {
      throw new LoginError('TokenExchangeFailed', 'Token response is missing access_token or token_type', {
        statusCode: status,
        body: text,
      });
    }
    return tokens;
  }
}
