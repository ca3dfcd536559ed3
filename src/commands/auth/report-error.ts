import chalk from 'chalk';
import { LoginError } from '../../auth/errors';
import type { Output } from '../../services/output';

/**
 * Print a failure the way every auth command does: one red line, then any
 * captured detail and the remediation hint.
 */
export function reportError(error: unknown, output: Output, executable = 'hostctl'): void {
  if (error instanceof LoginError) {
    output.error(error.message);
    if (error.details) {
      output.info(error.details);
    }
    if (error.hint) {
      output.info(error.hint);
    }
    if (error.kind === 'NoPortAvailable') {
      output.info(`For more options, run: ${chalk.cyan(`${executable} auth login --help`)}`);
    }
    if (error.kind === 'TokenExchangeFailed' && error.body) {
      output.debug(`Token endpoint response: ${error.body}`);
    }
    return;
  }
  output.error(error instanceof Error ? error.message : String(error));
}
