import chalk from 'chalk';
import * as crypto from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import type { OpenUrl } from '../services/browser';
import type { Output } from '../services/output';
import { closeHandoff, createHandoff, pollHandoff, type HandoffHandle } from './code-handoff';
import { LoginError } from './errors';
import { ListenerProcess, type ListenerEnvironment, type ListenerLauncher } from './listener-process';
import { allocatePort, buildRedirectUri } from './port-allocator';
import type { TokenSet } from './token-exchanger';

export type LoginState =
  | 'Idle'
  | 'PortAllocated'
  | 'ListenerStarted'
  | 'AwaitingCode'
  | 'CodeReceived'
  | 'TokenExchanged'
  | 'SessionSaved'
  | 'Failed';

/**
 * The parts of a listener process the orchestrator relies on.
 */
export interface ListenerHandle {
  readonly commandLine: string;
  isRunning(): boolean;
  errorOutput(): string;
  stop(): void;
}

export interface LoginSettings {
  appName: string;
  executable: string;
  authUrl: string;
  clientId: string;
  portRangeStart: number;
  portRangeEnd: number;
  pollIntervalMs: number;
  startupGraceMs: number;
  /** `null` waits for as long as the listener lives */
  timeoutMs: number | null;
  /** Writable directory that receives the private handoff directory */
  handoffParentDir: string;
}

export interface LoginOrchestratorDeps {
  settings: LoginSettings;
  exchanger: { exchange(code: string, redirectUri: string): Promise<TokenSet> };
  persister: { replace(tokens: TokenSet): Promise<void> };
  openUrl: OpenUrl;
  output: Output;
  /** Defaults to spawning a ListenerProcess with `launcher` */
  startListener?: (env: ListenerEnvironment, port: number) => ListenerHandle;
  launcher?: ListenerLauncher;
  allocatePort?: (rangeStart: number, rangeEnd: number) => Promise<number>;
  generateState?: () => string;
  onStateChange?: (state: LoginState) => void;
  now?: () => number;
}

/** 128 random bytes, hex encoded. */
export function generateState(): string {
  return crypto.randomBytes(128).toString('hex');
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function cancelled(): LoginError {
  return new LoginError('LoginCancelled', 'Login cancelled.');
}

async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (isAbortError(error)) {
      throw cancelled();
    }
    throw error;
  }
}

/**
 * Browser login:
 *
 *   Idle -> PortAllocated -> ListenerStarted -> AwaitingCode
 *        -> CodeReceived -> TokenExchanged -> SessionSaved
 *
 * with a transition to Failed from any state. The listener is stopped and
 * the handoff directory removed exactly once, before the token exchange,
 * whichever way the wait for the code ends.
 */
export class LoginOrchestrator {
  private state: LoginState = 'Idle';

  constructor(private readonly deps: LoginOrchestratorDeps) {}

  get currentState(): LoginState {
    return this.state;
  }

  async login(signal?: AbortSignal): Promise<TokenSet> {
    this.transition('Idle');
    try {
      return await this.run(signal);
    } catch (error) {
      this.transition('Failed');
      throw error;
    }
  }

  private transition(state: LoginState): void {
    this.state = state;
    this.deps.output.debug(`login state: ${state}`);
    this.deps.onStateChange?.(state);
  }

  private async run(signal?: AbortSignal): Promise<TokenSet> {
    const { settings, output } = this.deps;
    if (signal?.aborted) {
      throw cancelled();
    }

    const port = await (this.deps.allocatePort ?? allocatePort)(settings.portRangeStart, settings.portRangeEnd);
    this.transition('PortAllocated');
    const redirectUri = buildRedirectUri(port);

    const handoff = createHandoff(settings.handoffParentDir);
    let listener: ListenerHandle | null = null;
    let code: string;
    try {
      listener = this.spawnListener(
        {
          appName: settings.appName,
          state: (this.deps.generateState ?? generateState)(),
          authUrl: settings.authUrl,
          clientId: settings.clientId,
          codeFile: handoff.file,
        },
        port,
      );
      output.debug(`Starting local web server with command: ${listener.commandLine}`);

      // give the listener time to bind before checking on it
      await wait(settings.startupGraceMs, signal);
      if (!listener.isRunning()) {
        throw new LoginError('ListenerStartFailed', 'Failed to start local web server.', {
          details: listener.errorOutput(),
        });
      }
      this.transition('ListenerStarted');

      await this.announce(redirectUri);
      this.transition('AwaitingCode');
      code = await this.waitForCode(handoff, listener, signal);
      this.transition('CodeReceived');
    } finally {
      listener?.stop();
      closeHandoff(handoff);
    }

    const tokens = await this.deps.exchanger.exchange(code, redirectUri);
    this.transition('TokenExchanged');
    await this.deps.persister.replace(tokens);
    this.transition('SessionSaved');
    return tokens;
  }

  private spawnListener(env: ListenerEnvironment, port: number): ListenerHandle {
    if (this.deps.startListener) {
      return this.deps.startListener(env, port);
    }
    return ListenerProcess.start(env, port, this.deps.launcher);
  }

  private async announce(url: string): Promise<void> {
    const { output, settings } = this.deps;
    if (await this.deps.openUrl(url)) {
      output.info(`Opened URL: ${chalk.cyan(url)}`);
      output.info('Please use the browser to log in.');
    } else {
      output.info('Please open the following URL in a browser and log in:');
      output.info(chalk.cyan(url));
    }
    output.blank();
    output.info(chalk.bold('Help:'));
    output.info('  Use Ctrl+C to quit this process.');
    output.info(`  For more info, quit and run: ${chalk.cyan(`${settings.executable} auth login --help`)}`);
    output.blank();
  }

  private async waitForCode(
    handoff: HandoffHandle,
    listener: ListenerHandle,
    signal?: AbortSignal,
  ): Promise<string> {
    const { settings } = this.deps;
    const now = this.deps.now ?? Date.now;
    const deadline = settings.timeoutMs === null ? null : now() + settings.timeoutMs;

    for (;;) {
      const polled = pollHandoff(handoff);
      if (polled.status === 'ready') {
        return polled.code;
      }
      if (polled.status === 'missing') {
        throw new LoginError('HandoffMissing', `File not found: ${handoff.file}`);
      }
      if (!listener.isRunning()) {
        // the listener may have written the code just before exiting
        const last = pollHandoff(handoff);
        if (last.status === 'ready') {
          return last.code;
        }
        throw new LoginError('NoCodeReceived', 'Failed to get an authorization code. Please try again.', {
          details: listener.errorOutput() || undefined,
        });
      }
      if (deadline !== null && now() >= deadline) {
        throw new LoginError('LoginTimedOut', 'Timed out waiting for the browser login. Please try again.');
      }
      await wait(settings.pollIntervalMs, signal);
    }
  }
}
