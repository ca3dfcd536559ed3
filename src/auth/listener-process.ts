import { spawn, type ChildProcess } from 'child_process';
import { LOOPBACK_HOST } from './port-allocator';

/**
 * Values handed to the listener child. They travel through the child's
 * environment only, so the state and client id never show up in process
 * listings.
 */
export interface ListenerEnvironment {
  readonly appName: string;
  readonly state: string;
  readonly authUrl: string;
  readonly clientId: string;
  readonly codeFile: string;
}

export const LISTENER_ENV_VARS = {
  appName: 'CLI_OAUTH_APP_NAME',
  state: 'CLI_OAUTH_STATE',
  authUrl: 'CLI_OAUTH_AUTH_URL',
  clientId: 'CLI_OAUTH_CLIENT_ID',
  codeFile: 'CLI_OAUTH_FILE',
} as const;

/**
 * How to launch the listener. `--listen <host:port>` is appended to `args`.
 */
export interface ListenerLauncher {
  readonly command: string;
  readonly args: readonly string[];
}

/**
 * Re-run this CLI's own entry point with the hidden listener command.
 * `execArgv` is forwarded so loaders (e.g. when running from sources) apply
 * to the child as well.
 */
export function defaultListenerLauncher(): ListenerLauncher {
  return {
    command: process.execPath,
    args: [...process.execArgv, process.argv[1], 'auth', 'oauth-listener'],
  };
}

export function toChildEnv(
  env: ListenerEnvironment,
  baseEnv: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  return {
    ...baseEnv,
    [LISTENER_ENV_VARS.appName]: env.appName,
    [LISTENER_ENV_VARS.state]: env.state,
    [LISTENER_ENV_VARS.authUrl]: env.authUrl,
    [LISTENER_ENV_VARS.clientId]: env.clientId,
    [LISTENER_ENV_VARS.codeFile]: env.codeFile,
  };
}

/**
 * A running (or exited) local listener child process.
 */
export class ListenerProcess {
  private exited = false;
  private stderr = '';
  private readonly exitPromise: Promise<void>;

  private constructor(
    private readonly child: ChildProcess,
    public readonly commandLine: string,
  ) {
    this.exitPromise = new Promise((resolve) => {
      child.once('close', () => {
        this.exited = true;
        resolve();
      });
      child.once('error', (error) => {
        // spawn failures (ENOENT, EACCES) never emit 'exit'
        this.exited = true;
        this.stderr += error.message;
        resolve();
      });
    });
    child.once('exit', () => {
      this.exited = true;
    });
    child.stderr?.on('data', (data: Buffer) => {
      this.stderr += data.toString();
    });
  }

  /**
   * Launch the listener bound to 127.0.0.1:<port>.
   */
  static start(
    env: ListenerEnvironment,
    port: number,
    launcher: ListenerLauncher = defaultListenerLauncher(),
    baseEnv: NodeJS.ProcessEnv = process.env,
  ): ListenerProcess {
    const args = [...launcher.args, '--listen', `${LOOPBACK_HOST}:${port}`];
    const child = spawn(launcher.command, args, {
      env: toChildEnv(env, baseEnv),
      stdio: ['ignore', 'ignore', 'pipe'],
    });
    return new ListenerProcess(child, [launcher.command, ...args].join(' '));
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isRunning(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  /** Everything the child wrote to stderr so far, trimmed. */
  errorOutput(): string {
    return this.stderr.trim();
  }

  /**
   * Ask the child to terminate. Does not wait; calling it again, or after
   * the child has exited, is a no-op.
   */
  stop(): void {
    if (!this.isRunning()) {
      return;
    }
    this.child.kill('SIGTERM');
  }

  /** Resolves once the child has exited and its streams are closed. */
  waitForExit(): Promise<void> {
    return this.exitPromise;
  }
}
