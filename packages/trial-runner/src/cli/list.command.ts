import chalk from 'chalk';
import { Command } from 'commander';
import { buildRunnerConfig } from '../config/runner.config';
import { ResultStoreService } from '../results/result-store.service';

export async function listResults(outputDir: string): Promise<void> {
  const store = new ResultStoreService(buildRunnerConfig(process.env, { outputDir }));
  const [results, failures] = await Promise.all([store.listResults(), store.listFailures()]);

  console.log(chalk.bold.blue(`\nResults in ${store.getRoot()}\n`));
  for (const { sampleId, metadata } of results) {
    const { width, height, channels, source } = metadata.artifact;
    console.log(
      chalk.green('✓'),
      chalk.white(sampleId),
      chalk.gray(`${width}x${height}x${channels} via ${source}, attempts: ${metadata.attempts}`),
    );
  }
  for (const failure of failures) {
    console.log(chalk.red('✗'), chalk.white(failure.sampleId), chalk.red(failure.failureReason));
  }
  console.log(chalk.bold(`\n${results.length} stored, ${failures.length} failed\n`));
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List stored results')
    .requiredOption('--output <dir>', 'Results directory')
    .action(async (options: { output: string }) => {
      await listResults(options.output);
    });
}
