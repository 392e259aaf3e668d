import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import chalk from 'chalk';
import { Command } from 'commander';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { formatSummary, summarizeOutcomes, TrialOutcome } from '@depth-trials/shared';
import { AppModule } from '../app.module';
import { BatchRunnerService } from '../batch/batch-runner.service';
import { parseRunOptions, RunOptionsDto, toConfigOverrides } from '../config/run-options.dto';
import { DatasetService } from '../dataset/dataset.service';
import { describeError, SetupError } from '../errors/trial-errors';
import { EXIT_CANCELLED, EXIT_OK, EXIT_SETUP_FAILED } from './exit-codes';

/**
 * Runs a whole batch and resolves to the process exit code. Sample failures
 * do not change the exit code; only setup problems and cancellation do.
 */
export async function executeRun(raw: object, signal: AbortSignal): Promise<number> {
  let options: RunOptionsDto;
  try {
    options = await parseRunOptions(raw);
  } catch (error) {
    console.error(chalk.red(describeError(error)));
    return EXIT_SETUP_FAILED;
  }

  let app: INestApplicationContext | undefined;
  try {
    app = await NestFactory.createApplicationContext(
      AppModule.register(toConfigOverrides(options)),
      { bufferLogs: true },
    );
    app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

    const samples = await app.get(DatasetService).load({
      source: options.dataset,
      groundTruthDir: options.groundTruth,
      limit: options.limit,
      seed: options.seed,
      templateId: options.template,
    });

    console.log(chalk.bold.blue(`\nRunning ${samples.length} samples\n`));
    const outcomes = await app.get(BatchRunnerService).run(samples, {
      resume: options.resume,
      signal,
    });

    printOutcomes(outcomes);
    const summary = summarizeOutcomes(outcomes, signal.aborted);
    console.log(chalk.bold(`\n${formatSummary(summary)}`));
    return summary.cancelled ? EXIT_CANCELLED : EXIT_OK;
  } catch (error) {
    if (error instanceof SetupError) {
      console.error(chalk.red(`\nSetup failed: ${error.message}`));
      return EXIT_SETUP_FAILED;
    }
    throw error;
  } finally {
    await app?.close();
  }
}

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`;

function printOutcomes(outcomes: readonly TrialOutcome[]): void {
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'succeeded':
        console.log(chalk.green('✓'), outcome.sampleId, chalk.gray(`(${plural(outcome.attempts, 'attempt')})`));
        break;
      case 'skipped':
        console.log(chalk.gray('-'), outcome.sampleId, chalk.gray('(already stored)'));
        break;
      case 'failed':
        console.log(chalk.red('✗'), outcome.sampleId, chalk.red(outcome.failureReason ?? 'failed'));
        break;
    }
  }
}

export function createRunCommand(): Command {
  return new Command('run')
    .description('Run every sample of a dataset through the chat application')
    .requiredOption('--dataset <path>', 'Image folder or JSON manifest')
    .requiredOption('--output <dir>', 'Results directory')
    .option('--max-retries <n>', 'Attempts per sample')
    .option('--max-wait <seconds>', 'Longest wait for a response per attempt')
    .option('--resume', 'Skip samples that already have a stored result')
    .option('--limit <n>', 'Run a random subset of this many samples')
    .option('--seed <n>', 'Seed for the random subset')
    .option('--template <id>', 'Prompt template id')
    .option('--prompts <dir>', 'Prompt template directory')
    .option('--ground-truth <dir>', 'Folder of ground-truth depth maps paired by file name')
    .option('--app <name>', 'Target chat application')
    .option('--mode <mode>', 'Expected depth map mode (grayscale or colormap)')
    .action(async (options: Record<string, unknown>) => {
      const controller = new AbortController();
      const onSigint = () => {
        console.error(chalk.yellow('\nCancelling after the current step...'));
        controller.abort();
      };
      process.once('SIGINT', onSigint);
      try {
        process.exitCode = await executeRun(options, controller.signal);
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}
