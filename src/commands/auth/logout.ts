/**
 * hostctl auth logout
 *
 * Purpose:
 *   Clear the local session and cached identity.
 *
 * Local state:
 *   - Deletes: ~/.hostctl/.session/sess-cli-<id>.json
 */

import { Command } from 'commander';
import { loadConfig } from '../../config/config-loader';
import { ConsoleOutput, type Output } from '../../services/output';
import type { AuthContext } from './context';
import { createAuthContext } from './context';
import { reportError } from './report-error';

export function runLogout(context: Pick<AuthContext, 'connector' | 'cache' | 'clients'>, output: Output): number {
  const session = context.connector.sessionStatus();
  context.connector.logOut();
  context.cache.flushAll();
  context.clients.reset();

  if (session.state === 'active') {
    output.success('You are now logged out.');
  } else if (session.state === 'unreadable') {
    output.debug(session.error.message);
    output.success('Removed an unreadable session file. You are now logged out.');
  } else {
    output.info('You were not logged in.');
  }
  if (context.clients.hasApiToken()) {
    output.warn('An API token is set. It stays in use until HOSTCTL_TOKEN is unset.');
  }
  return 0;
}

/**
 * Register the `auth logout` command with the CLI program
 */
export function registerAuthLogoutCommand(program: Command): Command {
  const authCmd = program.commands.find((cmd) => cmd.name() === 'auth')
    ?? program.command('auth').description('Authentication commands');

  authCmd
    .command('logout')
    .description('Log out and clear the local session')
    .action(() => {
      const output = new ConsoleOutput();
      try {
        process.exit(runLogout(createAuthContext(loadConfig()), output));
      } catch (error) {
        reportError(error, output);
        process.exit(1);
      }
    });

  return program;
}
