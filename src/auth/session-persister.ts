import type { SessionData, SessionStore } from '../session/session-store';
import type { TokenSet } from './token-exchanger';

export interface SessionPersisterDeps {
  /** Logs the previous session out */
  connector: { logOut(): void };
  /** Process-wide response/identity cache */
  cache: { flushAll(): void };
  store: SessionStore;
  /** Client factory; reset so the next lookup uses the new session */
  clients: { reset(): void };
}

export function toSessionData(tokens: TokenSet): SessionData {
  const data: SessionData = {
    accessToken: tokens.accessToken,
    tokenType: tokens.tokenType,
  };
  if (tokens.expires !== null) {
    data.expires = tokens.expires;
  }
  if (tokens.refreshToken !== null) {
    data.refreshToken = tokens.refreshToken;
  }
  return data;
}

/**
 * Replaces the active session with a new token set.
 *
 * Order: log out the old session, flush the cache, write the new session,
 * reset the API client. Calls on one instance run one after another.
 */
export class SessionPersister {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly deps: SessionPersisterDeps) {}

  replace(tokens: TokenSet): Promise<void> {
    const run = this.queue.then(() => this.replaceNow(tokens));
    // keep the chain alive after a failure; the caller still sees the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  private replaceNow(tokens: TokenSet): void {
    const { connector, cache, store, clients } = this.deps;
    connector.logOut();
    cache.flushAll();
    store.save(toSessionData(tokens));
    clients.reset();
  }
}
