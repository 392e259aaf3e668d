jest.mock('@nut-tree-fork/nut-js', () => ({
  keyboard: { config: { autoDelayMs: 0 } },
  mouse: { config: { autoDelayMs: 0 } },
  screen: {},
  Key: {},
  Button: { LEFT: 0, MIDDLE: 1, RIGHT: 2 },
  Point: class {},
  Region: class {},
}));

import chalk from 'chalk';
import { Command } from 'commander';
import { EXIT_SETUP_FAILED } from './exit-codes';
import { createRunCommand, executeRun } from './run.command';

describe('run command', () => {
  let error: jest.SpyInstance;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    error.mockRestore();
  });

  it('rejects invalid options before starting anything', async () => {
    const code = await executeRun(
      { dataset: './images', output: './results', maxRetries: 'many' },
      new AbortController().signal,
    );

    expect(code).toBe(EXIT_SETUP_FAILED);
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining('maxRetries must be an integer number'),
    );
  });

  it('declares the dataset and output folders as required', () => {
    const command = createRunCommand();
    const required = command.options
      .filter((option) => option.mandatory)
      .map((option) => option.long);

    expect(command.name()).toBe('run');
    expect(required).toEqual(['--dataset', '--output']);
  });

  it('maps kebab-case flags onto option names', () => {
    const program = new Command().exitOverride();
    const run = createRunCommand().exitOverride();
    let captured: Record<string, unknown> = {};
    run.action((options: Record<string, unknown>) => {
      captured = options;
    });
    program.addCommand(run);

    program.parse(
      ['run', '--dataset', 'd', '--output', 'o', '--max-wait', '30', '--ground-truth', 'gt', '--resume'],
      { from: 'user' },
    );

    expect(captured).toEqual({
      dataset: 'd',
      output: 'o',
      maxWait: '30',
      groundTruth: 'gt',
      resume: true,
    });
  });
});
