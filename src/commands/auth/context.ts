import { ApiClientProvider, ApiConnector } from '../../api/connector';
import type { AccountInfo } from '../../api/account-client';
import { SessionPersister } from '../../auth/session-persister';
import { AuthorizationCodeExchanger } from '../../auth/token-exchanger';
import type { CliConfig } from '../../config/types';
import { CredentialCache } from '../../session/credential-cache';
import { FileSessionStore, type SessionStore } from '../../session/session-store';

/**
 * Session-related collaborators shared by the auth commands.
 */
export interface AuthContext {
  store: SessionStore;
  cache: CredentialCache<AccountInfo>;
  connector: ApiConnector;
  clients: ApiClientProvider;
  persister: SessionPersister;
  exchanger: AuthorizationCodeExchanger;
}

export function createAuthContext(config: CliConfig, store?: SessionStore): AuthContext {
  const sessionStore = store ?? new FileSessionStore(config.userDir, config.api.sessionId);
  const cache = new CredentialCache<AccountInfo>();
  const connector = new ApiConnector(sessionStore);
  const clients = new ApiClientProvider(config.api, connector, cache);
  return {
    store: sessionStore,
    cache,
    connector,
    clients,
    persister: new SessionPersister({ connector, cache, store: sessionStore, clients }),
    exchanger: new AuthorizationCodeExchanger({
      tokenUrl: config.api.tokenUrl,
      clientId: config.api.clientId,
      skipSsl: config.api.skipSsl,
      timeoutMs: config.api.requestTimeoutMs,
    }),
  };
}

/**
 * Help text for the non-interactive alternative to browser login.
 */
export function apiTokenHelp(config: CliConfig): string {
  return (
    'To authenticate non-interactively, create an API token and set it in the ' +
    `HOSTCTL_TOKEN environment variable. ${config.application.executable} will use it for every command.`
  );
}
