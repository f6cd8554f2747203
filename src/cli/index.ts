#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { describeError } from '../lib/errors';
import { registerInstallCommands } from './commands/install';
import { registerSSHCommands } from './commands/ssh';

const program = new Command();

program
  .name('rsr')
  .description('Remote Script Runner - render script templates and run them locally or over SSH');

registerInstallCommands(program);
registerSSHCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`✗ Error: ${describeError(error)}`));
  process.exit(1);
});
