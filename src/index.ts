#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram, readPackageVersion } from './cli';

const program = createProgram();

// Show help if no command provided
if (process.argv.length <= 2) {
  console.log(chalk.blue(`Hostctl CLI v${readPackageVersion()}`));
  console.log('Usage: hostctl <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  auth login   - Log in via a browser (alias: login)');
  console.log('  auth logout  - Log out and clear the local session');
  console.log('  auth whoami  - Display the current authenticated account');
  console.log('');
  console.log('Use \'hostctl <command> --help\' for more information');
  process.exit(0);
}

program.parse();
