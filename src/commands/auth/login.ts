/**
 * hostctl auth login
 *
 * Purpose:
 *   Authenticate the operator in a web browser (OAuth2 authorization code
 *   flow with a loopback redirect) and store the resulting tokens in the
 *   local session.
 *
 * Local state:
 *   - Reads/Writes: ~/.hostctl/.session/sess-cli-<id>.json
 *   - Creates and removes: ~/.hostctl/oauth-listener-XXXXXX/ (per attempt)
 *
 * Security:
 *   - Tokens and the authorization code are never printed
 *   - The state and client id reach the listener through its environment only
 */

import { confirm, isCancel } from '@clack/prompts';
import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { ApiError } from '../../api/account-client';
import type { ApiClientProvider, ApiConnector } from '../../api/connector';
import { LoginError } from '../../auth/errors';
import type { ListenerLauncher } from '../../auth/listener-process';
import {
  LoginOrchestrator,
  type LoginOrchestratorDeps,
  type LoginState,
} from '../../auth/login-orchestrator';
import type { TokenSet } from '../../auth/token-exchanger';
import { ConfigError, loadConfig, parseTimeoutSeconds } from '../../config/config-loader';
import type { CliConfig } from '../../config/types';
import { createBrowserOpener, type OpenUrl } from '../../services/browser';
import { ConsoleOutput, type Output } from '../../services/output';
import { apiTokenHelp, createAuthContext } from './context';
import { reportError } from './report-error';

export interface LoginOptions {
  force?: boolean;
  /** false with --no-interaction */
  interaction?: boolean;
  /** Overall wait for the browser step, in seconds */
  timeout?: string;
  verbose?: boolean;
  /** Browser to launch; `0` never opens one */
  browser?: string;
  /** Print the URL to stdout instead of opening a browser */
  pipe?: boolean;
}

/** The part of an ora spinner the login command drives. */
export interface Spinner {
  start(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
}

export interface LoginDeps {
  config: CliConfig;
  output: Output;
  connector: ApiConnector;
  clients: ApiClientProvider;
  exchanger: { exchange(code: string, redirectUri: string): Promise<TokenSet> };
  persister: { replace(tokens: TokenSet): Promise<void> };
  openUrl: OpenUrl;
  confirm: (message: string) => Promise<boolean>;
  isInteractive: boolean;
  signal?: AbortSignal;
  launcher?: ListenerLauncher;
  startListener?: LoginOrchestratorDeps['startListener'];
  allocatePort?: LoginOrchestratorDeps['allocatePort'];
  /** Spinner factory for the verification step */
  spinner?: (text: string) => Spinner;
}

async function checkExistingSession(deps: LoginDeps): Promise<boolean> {
  const { clients, output } = deps;
  try {
    // also proves the stored token still works
    const account = await clients.getMyAccount(true);
    output.info(`You are already logged in as ${chalk.bold(account.username)} (${account.email}).`);
    return deps.confirm('Log in anyway?');
  } catch (error) {
    if (error instanceof ApiError && (error.statusCode === 400 || error.statusCode === 401)) {
      output.debug('Already logged in, but a test request failed. Continuing with login.');
      return true;
    }
    throw error;
  }
}

/**
 * Run the login command.
 *
 * @returns Exit status (0 on success).
 */
export async function runLogin(options: LoginOptions, deps: LoginDeps): Promise<number> {
  const { config, output, connector, clients } = deps;
  const createSpinner = deps.spinner ?? ((text: string): Spinner => ora({ text, stream: process.stderr }));
  let spinner: Spinner | null = null;

  try {
    if (clients.hasApiToken()) {
      throw new LoginError('AlreadyAuthenticated', 'Cannot log in: an API token is set');
    }
    if (!deps.isInteractive) {
      throw new LoginError('NonInteractive', 'Non-interactive login is not supported.', {
        hint: apiTokenHelp(config),
      });
    }

    const timeoutMs =
      options.timeout !== undefined ? parseTimeoutSeconds('--timeout', options.timeout) : config.login.timeoutMs;

    const session = connector.sessionStatus();
    if (session.state === 'unreadable') {
      output.warn('The stored session could not be read. It will be replaced by this login.');
      output.debug(session.error.message);
    } else if (session.state === 'active' && !options.force) {
      if (!(await checkExistingSession(deps))) {
        return 1;
      }
    }

    const onStateChange = (state: LoginState): void => {
      if (state === 'CodeReceived') {
        spinner = createSpinner('Login information received. Verifying...').start();
      } else if (state === 'SessionSaved') {
        spinner?.succeed('Login verified');
        spinner = null;
      } else if (state === 'Failed') {
        spinner?.fail('Login failed');
        spinner = null;
      }
    };

    const orchestrator = new LoginOrchestrator({
      settings: {
        appName: config.application.name,
        executable: config.application.executable,
        authUrl: config.api.authUrl,
        clientId: config.api.clientId,
        portRangeStart: config.login.portRangeStart,
        portRangeEnd: config.login.portRangeEnd,
        pollIntervalMs: config.login.pollIntervalMs,
        startupGraceMs: config.login.startupGraceMs,
        timeoutMs,
        handoffParentDir: config.userDir,
      },
      exchanger: deps.exchanger,
      persister: deps.persister,
      openUrl: deps.openUrl,
      output,
      launcher: deps.launcher,
      startListener: deps.startListener,
      allocatePort: deps.allocatePort,
      onStateChange,
    });

    await orchestrator.login(deps.signal);
    output.success('You are logged in.');

    const info = await clients.getMyAccount(true);
    output.blank();
    output.info(`Username: ${chalk.green(info.username)}`);
    output.info(`Email address: ${chalk.green(info.email)}`);
    return 0;
  } catch (error) {
    reportError(error, output, config.application.executable);
    return 1;
  }
}

/** The URL opener for the login command's --browser and --pipe options. */
export function createLoginBrowserOpener(
  options: Pick<LoginOptions, 'browser' | 'pipe'>,
  output: Output,
  writeUrl?: (url: string) => void,
): OpenUrl {
  return createBrowserOpener((error) => output.debug(`Failed to open browser: ${error.message}`), {
    browser: options.browser,
    pipe: options.pipe,
    writeUrl,
  });
}

async function confirmPrompt(message: string): Promise<boolean> {
  const answer = await confirm({ message, initialValue: false });
  return !isCancel(answer) && answer;
}

function configureLoginCommand(command: Command): Command {
  return command
    .description('Log in via a browser')
    .option('-f, --force', 'Log in again, even if already logged in')
    .option('--no-interaction', 'Do not ask any interactive questions')
    .option('--timeout <seconds>', 'Give up if the browser login takes longer than this')
    .option('--browser <browser>', 'Browser to open the login URL with (0 to never open one)')
    .option('--pipe', 'Print the login URL to stdout instead of opening a browser')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: LoginOptions) => {
      const output = new ConsoleOutput(Boolean(options.verbose));
      let config: CliConfig;
      try {
        config = loadConfig();
      } catch (error) {
        output.error(error instanceof ConfigError ? error.message : String(error));
        process.exit(1);
      }
      const context = createAuthContext(config);
      const controller = new AbortController();
      const onSignal = (): void => controller.abort();
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      let status: number;
      try {
        status = await runLogin(options, {
          config,
          output,
          connector: context.connector,
          clients: context.clients,
          exchanger: context.exchanger,
          persister: context.persister,
          openUrl: createLoginBrowserOpener(options, output),
          confirm: confirmPrompt,
          isInteractive: options.interaction !== false && Boolean(process.stdin.isTTY),
          signal: controller.signal,
        });
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
      process.exit(status);
    });
}

/**
 * Register `auth login` and its top-level alias `login`.
 */
export function registerAuthLoginCommand(program: Command): Command {
  const authCmd = program.commands.find((cmd) => cmd.name() === 'auth')
    ?? program.command('auth').description('Authentication commands');

  configureLoginCommand(authCmd.command('login'));
  configureLoginCommand(program.command('login'));

  return program;
}
