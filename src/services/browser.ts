import open from 'open';

export interface BrowserLaunchContext {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
}

const BROWSER_BLOCKLIST = new Set(['www-browser', 'none', 'false', '0']);
const DISPLAY_ENV_VARS = ['DISPLAY', 'WAYLAND_DISPLAY', 'MIR_SOCKET'] as const;

/**
 * Whether launching a browser has any chance of reaching the operator.
 */
export function shouldAttemptBrowserLaunch(
  context: BrowserLaunchContext = { env: process.env, platform: process.platform }
): boolean {
  const browserEnv = context.env.BROWSER;
  if (browserEnv && BROWSER_BLOCKLIST.has(browserEnv.trim().toLowerCase())) {
    return false;
  }
  if (context.env.CI || context.env.DEBIAN_FRONTEND === 'noninteractive') {
    return false;
  }
  if (context.platform === 'linux') {
    return DISPLAY_ENV_VARS.some((name) => Boolean(context.env[name]));
  }
  // Remote shells on macOS/Windows cannot open the local desktop browser.
  return !context.env.SSH_CONNECTION;
}

export type OpenUrl = (url: string) => Promise<boolean>;

export interface BrowserOpenerOptions {
  /** Browser to launch instead of the default one; `0` never opens one. */
  browser?: string;
  /** Write the URL to stdout instead of opening it. */
  pipe?: boolean;
  context?: BrowserLaunchContext;
  writeUrl?: (url: string) => void;
}

/**
 * Open `url` in a browser without waiting for it.
 *
 * @returns false when no browser was launched; the caller then prints
 * the URL instead.
 */
export function createBrowserOpener(
  onError: (error: Error) => void,
  options: BrowserOpenerOptions = {},
): OpenUrl {
  const writeUrl = options.writeUrl ?? ((url: string) => console.log(url));
  return async (url: string) => {
    if (options.pipe) {
      writeUrl(url);
      return false;
    }
    if (options.browser === '0' || !shouldAttemptBrowserLaunch(options.context)) {
      return false;
    }
    try {
      const child = options.browser
        ? await open(url, { app: { name: options.browser } })
        : await open(url);
      child.once('error', onError);
      return true;
    } catch (error) {
      onError(error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  };
}
