/**
 * hostctl auth whoami
 *
 * Purpose:
 *   Display the account behind the current session (or API token).
 *   Helps users verify which identity they are operating under.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { ApiError } from '../../api/account-client';
import type { ApiClientProvider, ApiConnector } from '../../api/connector';
import { loadConfig } from '../../config/config-loader';
import { ConsoleOutput, type Output } from '../../services/output';
import { createAuthContext } from './context';
import { reportError } from './report-error';

export interface WhoamiOptions {
  json?: boolean;
}

export async function runWhoami(
  options: WhoamiOptions,
  deps: { connector: ApiConnector; clients: ApiClientProvider; executable: string },
  output: Output,
): Promise<number> {
  if (!deps.clients.hasApiToken() && !deps.connector.isLoggedIn()) {
    output.error(`Not logged in. Run: ${deps.executable} auth login`);
    return 1;
  }
  try {
    const info = await deps.clients.getMyAccount();
    if (options.json) {
      console.log(JSON.stringify(info, null, 2));
    } else {
      console.log(`Username: ${chalk.green(info.username)}`);
      console.log(`Email address: ${chalk.green(info.email)}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof ApiError && error.statusCode === 401) {
      output.error(`Your session is no longer valid. Run: ${deps.executable} auth login`);
      return 1;
    }
    reportError(error, output, deps.executable);
    return 1;
  }
}

/**
 * Register the `auth whoami` command with the CLI program
 */
export function registerAuthWhoamiCommand(program: Command): Command {
  const authCmd = program.commands.find((cmd) => cmd.name() === 'auth')
    ?? program.command('auth').description('Authentication commands');

  authCmd
    .command('whoami')
    .description('Display the current authenticated account')
    .option('--json', 'Output as JSON')
    .action(async (options: WhoamiOptions) => {
      const output = new ConsoleOutput();
      try {
        const config = loadConfig();
        const context = createAuthContext(config);
        process.exit(
          await runWhoami(
            options,
            { connector: context.connector, clients: context.clients, executable: config.application.executable },
            output,
          ),
        );
      } catch (error) {
        reportError(error, output);
        process.exit(1);
      }
    });

  return program;
}
