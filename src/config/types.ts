/**
 * Configuration Type Definitions
 *
 * This module defines the configuration structures for the hostctl CLI.
 * Configuration is resolved from three layers:
 *
 * 1. Built-in defaults (CONFIG_DEFAULTS below)
 * 2. User config: ~/.hostctl/config.json
 *    - Partial overrides of any section
 * 3. Environment variables (HOSTCTL_*)
 *
 * Resolution order: environment overrides the user file, which overrides
 * the defaults.
 */

/**
 * Application identity, used in messages and handed to the login listener.
 */
export interface ApplicationConfig {
  /** Display name (e.g., "Hostctl CLI") */
  name: string;
  /** Executable name used in help text */
  executable: string;
  /** Directory name under the home directory for user state */
  userDirName: string;
}

/**
 * Remote API and OAuth2 endpoints.
 */
export interface ApiConfig {
  /** Browser-facing OAuth2 authorization endpoint */
  authUrl: string;
  /** OAuth2 token endpoint (code-for-token exchange) */
  tokenUrl: string;
  /** Public OAuth2 client identifier (no client secret) */
  clientId: string;
  /** Base URL of the accounts API (`GET /me`) */
  accountsUrl: string;
  /** Disable TLS certificate verification for API requests */
  skipSsl: boolean;
  /** Request timeout in milliseconds */
  requestTimeoutMs: number;
  /** Non-interactive API token. When set, browser login is refused. */
  token?: string;
  /** Session identifier; selects the session file */
  sessionId: string;
}

/**
 * Browser login tuning.
 */
export interface LoginConfig {
  /** First loopback port to try (inclusive) */
  portRangeStart: number;
  /** Last loopback port to try (inclusive) */
  portRangeEnd: number;
  /** Interval between handoff polls */
  pollIntervalMs: number;
  /** Delay before checking that the listener survived startup */
  startupGraceMs: number;
  /**
   * Overall wait for the browser step. `null` waits for as long as the
   * listener process is alive.
   */
  timeoutMs: number | null;
}

/**
 * Fully resolved configuration used by commands.
 */
export interface CliConfig {
  application: ApplicationConfig;
  api: ApiConfig;
  login: LoginConfig;
  /** Absolute path of the writable user directory (~/.hostctl) */
  userDir: string;
  /** Path to the user config file, if one was loaded */
  configPath?: string;
}

/**
 * Shape of ~/.hostctl/config.json. Every section is optional and partial.
 */
export interface UserConfigFile {
  application?: Partial<ApplicationConfig>;
  api?: Partial<ApiConfig>;
  login?: Partial<LoginConfig>;
}

/**
 * Default values for resolved configuration
 */
export const CONFIG_DEFAULTS: Omit<CliConfig, 'userDir' | 'configPath'> = {
  application: {
    name: 'Hostctl CLI',
    executable: 'hostctl',
    userDirName: '.hostctl',
  },
  api: {
    authUrl: 'https://accounts.hostctl.dev/oauth2/authorize',
    tokenUrl: 'https://accounts.hostctl.dev/oauth2/token',
    clientId: 'hostctl-cli',
    accountsUrl: 'https://accounts.hostctl.dev/api',
    skipSsl: false,
    requestTimeoutMs: 30000,
    sessionId: 'default',
  },
  login: {
    portRangeStart: 5000,
    portRangeEnd: 5010,
    pollIntervalMs: 300,
    startupGraceMs: 500,
    timeoutMs: null,
  },
};

/**
 * Environment variables recognised by the loader.
 */
export const CONFIG_ENV = {
  home: 'HOSTCTL_HOME',
  authUrl: 'HOSTCTL_AUTH_URL',
  tokenUrl: 'HOSTCTL_TOKEN_URL',
  clientId: 'HOSTCTL_CLIENT_ID',
  accountsUrl: 'HOSTCTL_ACCOUNTS_URL',
  skipSsl: 'HOSTCTL_SKIP_SSL',
  token: 'HOSTCTL_TOKEN',
  sessionId: 'HOSTCTL_SESSION_ID',
  loginTimeout: 'HOSTCTL_LOGIN_TIMEOUT',
} as const;

/**
 * Name of the user config file inside the user directory.
 */
export const CONFIG_FILENAME = 'config.json';
