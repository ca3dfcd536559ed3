import type { ApiConfig } from '../config/types';
import type { CredentialCache } from '../session/credential-cache';
import type { SessionData, SessionStore } from '../session/session-store';
import { AccountClient, ApiError, type AccountInfo } from './account-client';

/**
 * `unreadable`: a session file exists but cannot be parsed. Logging out
 * removes it.
 */
export type SessionStatus =
  | { state: 'active' }
  | { state: 'none' }
  | { state: 'unreadable'; error: Error };

/**
 * Owns the current session: whether one exists, and logging it out.
 */
export class ApiConnector {
  constructor(private readonly store: SessionStore) {}

  getSession(): SessionData {
    return this.store.load();
  }

  sessionStatus(): SessionStatus {
    let session: SessionData;
    try {
      session = this.store.load();
    } catch (error) {
      return { state: 'unreadable', error: error instanceof Error ? error : new Error(String(error)) };
    }
    return typeof session.accessToken === 'string' && session.accessToken !== ''
      ? { state: 'active' }
      : { state: 'none' };
  }

  /** An unreadable session counts as logged out. */
  isLoggedIn(): boolean {
    return this.sessionStatus().state === 'active';
  }

  logOut(): void {
    this.store.clear();
  }
}

/**
 * Hands out the API client bound to the current credentials, and caches the
 * account lookup in the shared credential cache.
 */
export class ApiClientProvider {
  private client: AccountClient | null = null;

  constructor(
    private readonly api: ApiConfig,
    private readonly connector: ApiConnector,
    private readonly cache: CredentialCache<AccountInfo>,
  ) {}

  /** True when a non-interactive API token is configured. */
  hasApiToken(): boolean {
    return typeof this.api.token === 'string' && this.api.token !== '';
  }

  getClient(): AccountClient {
    if (this.client) {
      return this.client;
    }
    const accessToken = this.hasApiToken() ? this.api.token : this.connector.getSession().accessToken;
    if (!accessToken) {
      throw new ApiError('Not logged in', 401);
    }
    this.client = new AccountClient({
      accountsUrl: this.api.accountsUrl,
      accessToken,
      skipSsl: this.api.skipSsl,
      timeoutMs: this.api.requestTimeoutMs,
    });
    return this.client;
  }

  /** Forget the current client; the next lookup binds to the session anew. */
  reset(): void {
    this.client = null;
  }

  async getMyAccount(refresh = false): Promise<AccountInfo> {
    const key = `account:${this.api.sessionId}`;
    if (!refresh) {
      const cached = this.cache.get(key);
      if (cached) return cached;
    }
    const info = await this.getClient().getAccountInfo();
    this.cache.set(key, info);
    return info;
  }
}
