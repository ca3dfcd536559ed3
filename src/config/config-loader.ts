import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_DEFAULTS,
  CONFIG_ENV,
  CONFIG_FILENAME,
  type CliConfig,
  type UserConfigFile,
} from './types';

/**
 * Raised when the config file or an environment override is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Home directory used to locate the user directory (default: os.homedir()) */
  homeDir?: string;
}

/**
 * Resolve the writable user directory.
 * - HOSTCTL_HOME when set
 * - otherwise ~/.hostctl
 *
 * This is where sessions and the temporary login listener directory live,
 * so it must never point inside the installed package.
 */
export function resolveUserDir(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): string {
  const override = env[CONFIG_ENV.home];
  if (override && override.trim() !== '') {
    return path.resolve(override.trim());
  }
  return path.join(homeDir, CONFIG_DEFAULTS.application.userDirName);
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(section: Section, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}.${key} must be a string`);
  }
  return value;
}

function pickNumber(section: Section, key: string, where: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${where}.${key} must be a number`);
  }
  return value;
}

/** A millisecond setting; `min` is 1 unless zero means "none". */
function pickDuration(section: Section, key: string, where: string, min = 1): number | undefined {
  const value = pickNumber(section, key, where);
  if (value !== undefined && value < min) {
    throw new ConfigError(`${where}.${key} must be at least ${min}`);
  }
  return value;
}

function pickBoolean(section: Section, key: string, where: string): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${where}.${key} must be a boolean`);
  }
  return value;
}

function sectionOf(root: Section, key: string, filePath: string): Section {
  const value = root[key];
  if (value === undefined) return {};
  if (!isSection(value)) {
    throw new ConfigError(`${filePath}: "${key}" must be an object`);
  }
  return value;
}

/**
 * Read ~/.hostctl/config.json.
 *
 * @returns The validated file, or `null` when it does not exist.
 */
export function readUserConfigFile(filePath: string): UserConfigFile | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (!isSection(parsed)) {
    throw new ConfigError(`Failed to parse ${filePath}: expected a JSON object`);
  }

  const application = sectionOf(parsed, 'application', filePath);
  const api = sectionOf(parsed, 'api', filePath);
  const login = sectionOf(parsed, 'login', filePath);

  const timeoutMs = login.timeoutMs === null ? null : pickDuration(login, 'timeoutMs', 'login');

  return {
    application: {
      name: pickString(application, 'name', 'application'),
      executable: pickString(application, 'executable', 'application'),
    },
    api: {
      authUrl: pickString(api, 'authUrl', 'api'),
      tokenUrl: pickString(api, 'tokenUrl', 'api'),
      clientId: pickString(api, 'clientId', 'api'),
      accountsUrl: pickString(api, 'accountsUrl', 'api'),
      skipSsl: pickBoolean(api, 'skipSsl', 'api'),
      requestTimeoutMs: pickDuration(api, 'requestTimeoutMs', 'api'),
      token: pickString(api, 'token', 'api'),
      sessionId: pickString(api, 'sessionId', 'api'),
    },
    login: {
      portRangeStart: pickNumber(login, 'portRangeStart', 'login'),
      portRangeEnd: pickNumber(login, 'portRangeEnd', 'login'),
      pollIntervalMs: pickDuration(login, 'pollIntervalMs', 'login'),
      startupGraceMs: pickDuration(login, 'startupGraceMs', 'login', 0),
      timeoutMs,
    },
  };
}

function parseBooleanEnv(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  throw new ConfigError(`Invalid boolean value for ${name}: ${value}`);
}

/**
 * Parse a positive number of seconds into milliseconds.
 */
export function parseTimeoutSeconds(label: string, value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) <= 0) {
    throw new ConfigError(`Invalid ${label} value: ${value} (expected a positive number of seconds)`);
  }
  return Number.parseInt(trimmed, 10) * 1000;
}

function validatePort(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new ConfigError(`Invalid ${label}: ${value}`);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Load the effective CLI configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): CliConfig {
  const env = options.env ?? process.env;
  const userDir = resolveUserDir(env, options.homeDir);
  const configPath = path.join(userDir, CONFIG_FILENAME);
  const file = readUserConfigFile(configPath);

  const fileApp = file?.application ?? {};
  const fileApi = file?.api ?? {};
  const fileLogin = file?.login ?? {};
  const defaults = CONFIG_DEFAULTS;

  const config: CliConfig = {
    application: {
      name: fileApp.name ?? defaults.application.name,
      executable: fileApp.executable ?? defaults.application.executable,
      userDirName: defaults.application.userDirName,
    },
    api: {
      authUrl: fileApi.authUrl ?? defaults.api.authUrl,
      tokenUrl: fileApi.tokenUrl ?? defaults.api.tokenUrl,
      clientId: fileApi.clientId ?? defaults.api.clientId,
      accountsUrl: fileApi.accountsUrl ?? defaults.api.accountsUrl,
      skipSsl: fileApi.skipSsl ?? defaults.api.skipSsl,
      requestTimeoutMs: fileApi.requestTimeoutMs ?? defaults.api.requestTimeoutMs,
      token: fileApi.token,
      sessionId: fileApi.sessionId ?? defaults.api.sessionId,
    },
    login: {
      portRangeStart: fileLogin.portRangeStart ?? defaults.login.portRangeStart,
      portRangeEnd: fileLogin.portRangeEnd ?? defaults.login.portRangeEnd,
      pollIntervalMs: fileLogin.pollIntervalMs ?? defaults.login.pollIntervalMs,
      startupGraceMs: fileLogin.startupGraceMs ?? defaults.login.startupGraceMs,
      timeoutMs: fileLogin.timeoutMs !== undefined ? fileLogin.timeoutMs : defaults.login.timeoutMs,
    },
    userDir,
    configPath: file ? configPath : undefined,
  };

  const authUrl = nonEmpty(env[CONFIG_ENV.authUrl]);
  if (authUrl) config.api.authUrl = authUrl;
  const tokenUrl = nonEmpty(env[CONFIG_ENV.tokenUrl]);
  if (tokenUrl) config.api.tokenUrl = tokenUrl;
  const clientId = nonEmpty(env[CONFIG_ENV.clientId]);
  if (clientId) config.api.clientId = clientId;
  const accountsUrl = nonEmpty(env[CONFIG_ENV.accountsUrl]);
  if (accountsUrl) config.api.accountsUrl = accountsUrl;
  const token = nonEmpty(env[CONFIG_ENV.token]);
  if (token) config.api.token = token;
  const sessionId = nonEmpty(env[CONFIG_ENV.sessionId]);
  if (sessionId) config.api.sessionId = sessionId;

  const skipSsl = env[CONFIG_ENV.skipSsl];
  if (skipSsl !== undefined) {
    config.api.skipSsl = parseBooleanEnv(CONFIG_ENV.skipSsl, skipSsl);
  }
  const loginTimeout = nonEmpty(env[CONFIG_ENV.loginTimeout]);
  if (loginTimeout) {
    config.login.timeoutMs = parseTimeoutSeconds(CONFIG_ENV.loginTimeout, loginTimeout);
  }

  validatePort('login.portRangeStart', config.login.portRangeStart);
  validatePort('login.portRangeEnd', config.login.portRangeEnd);
  if (config.login.portRangeStart > config.login.portRangeEnd) {
    throw new ConfigError(
      `Invalid login port range: ${config.login.portRangeStart}-${config.login.portRangeEnd}`
    );
  }
  if (!/^[A-Za-z0-9_-]+$/.test(config.api.sessionId)) {
    throw new ConfigError(`Invalid session id: ${config.api.sessionId}`);
  }

  return config;
}
