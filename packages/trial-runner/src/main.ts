#!/usr/bin/env node
import 'reflect-metadata';
import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { createListCommand } from './cli/list.command';
import { createRunCommand } from './cli/run.command';
import { EXIT_SETUP_FAILED } from './cli/exit-codes';
import { describeError } from './errors/trial-errors';

const program = new Command();

program
  .name('depth-trials')
  .description('Drive a chat application through batches of depth-estimation trials')
  .version('0.1.0');

program.addCommand(createRunCommand());
program.addCommand(createListCommand());

program.exitOverride();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander has already printed usage errors; help and version exit with 0
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode === 0 ? 0 : EXIT_SETUP_FAILED;
      return;
    }
    console.error(chalk.red(`\nError: ${describeError(error)}`));
    process.exitCode = EXIT_SETUP_FAILED;
  }
}

void main();
