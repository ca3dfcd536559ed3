import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { registerAuthListenerCommand } from './commands/auth/listener';
import { registerAuthLoginCommand } from './commands/auth/login';
import { registerAuthLogoutCommand } from './commands/auth/logout';
import { registerAuthWhoamiCommand } from './commands/auth/whoami';

/**
 * Version from the nearest package.json. The compiled entry sits one level
 * deeper than the source one, so walk up instead of using a fixed path.
 */
export function readPackageVersion(startDir: string = __dirname): string {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('hostctl')
    .description('Command line client for the hostctl platform')
    .version(readPackageVersion());

  registerAuthLoginCommand(program);
  registerAuthLogoutCommand(program);
  registerAuthWhoamiCommand(program);
  registerAuthListenerCommand(program);

  return program;
}
