import { CONFIG_DEFAULTS, type ApiConfig, type CliConfig } from '../config/types';

/**
 * Defaults with fast login polling, rooted at `userDir`.
 */
export function testConfig(userDir: string, api: Partial<ApiConfig> = {}): CliConfig {
  return {
    application: { ...CONFIG_DEFAULTS.application },
    api: { ...CONFIG_DEFAULTS.api, ...api },
    login: { ...CONFIG_DEFAULTS.login, pollIntervalMs: 10, startupGraceMs: 0 },
    userDir,
  };
}
