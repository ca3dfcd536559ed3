import { Command } from 'commander';
import {
  parseListenAddress,
  readListenerEnvironment,
  runListenerServer,
} from '../../auth/listener-server';

/**
 * Serve one browser callback on `listen`.
 *
 * @returns Exit status. Anything but a handed-over code is 1, with the
 * reason on stderr for the parent to show.
 */
export async function runListener(listen: string, source: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const { host, port } = parseListenAddress(listen);
    const result = await runListenerServer({ env: readListenerEnvironment(source), host, port });
    if (result.reason !== null) {
      console.error(result.reason);
      return 1;
    }
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

/**
 * Hidden `auth oauth-listener` command: the child process started by
 * `auth login`. Reads its secrets from the environment, serves one browser
 * callback and exits.
 */
export function registerAuthListenerCommand(program: Command): Command {
  const authCmd = program.commands.find((cmd) => cmd.name() === 'auth')
    ?? program.command('auth').description('Authentication commands');

  authCmd
    .command('oauth-listener', { hidden: true })
    .description('Serve the local OAuth2 redirect (internal)')
    .requiredOption('--listen <address>', 'Address to bind, as host:port')
    .action(async (options: { listen: string }) => {
      process.exit(await runListener(options.listen));
    });

  return program;
}
