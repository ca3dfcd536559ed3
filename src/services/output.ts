import chalk from 'chalk';

/**
 * Diagnostics for the operator. Everything goes to stderr so command output
 * on stdout stays machine-readable.
 */
export interface Output {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Shown only in verbose mode */
  debug(message: string): void;
  blank(): void;
}

export class ConsoleOutput implements Output {
  constructor(private readonly verbose = false) {}

  info(message: string): void {
    console.error(message);
  }

  success(message: string): void {
    console.error(chalk.green('✓ ') + message);
  }

  warn(message: string): void {
    console.error(chalk.yellow(message));
  }

  error(message: string): void {
    console.error(chalk.red('✗ ' + message));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(chalk.gray(`[debug] ${message}`));
    }
  }

  blank(): void {
    console.error('');
  }
}
