import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DepthMode,
  formatSummary,
  PromptBundle,
  Sample,
  summarizeOutcomes,
  TrialOutcome,
} from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { CancelledError, describeError, SetupError } from '../errors/trial-errors';
import { UI_DRIVER, UiDriver } from '../nut/ui-automation.types';
import { PROMPT_SOURCE, PromptSource } from '../prompts/prompt-template.service';
import { ResultStoreService } from '../results/result-store.service';
import { UiSession } from '../session/ui-session.service';
import { TrialStateMachineService } from '../trials/trial-state-machine.service';
import { CLOCK, Clock } from '../utils/clock';

export interface BatchRunOptions {
  resume?: boolean;
  maxRetries?: number;
  maxWaitMs?: number;
  mode?: DepthMode;
  signal?: AbortSignal;
}

/**
 * Runs samples strictly one after another against the single UI session.
 * Setup failures abort before the first sample; cancellation stops at the
 * next sample boundary after the in-flight sample has been recorded.
 */
@Injectable()
export class BatchRunnerService {
  private readonly logger = new Logger(BatchRunnerService.name);

  constructor(
    private readonly session: UiSession,
    @Inject(UI_DRIVER) private readonly ui: UiDriver,
    private readonly trials: TrialStateMachineService,
    private readonly store: ResultStoreService,
    @Inject(PROMPT_SOURCE) private readonly prompts: PromptSource,
    @Inject(RUNNER_CONFIG) private readonly config: RunnerConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async run(
    samples: readonly Sample[],
    options: BatchRunOptions = {},
  ): Promise<TrialOutcome[]> {
    const outcomes: TrialOutcome[] = [];
    for await (const outcome of this.iterate(samples, options)) {
      outcomes.push(outcome);
    }
    return outcomes;
  }

  async *iterate(
    samples: readonly Sample[],
    options: BatchRunOptions = {},
  ): AsyncGenerator<TrialOutcome, void, undefined> {
    const { signal } = options;
    const outcomes: TrialOutcome[] = [];

    const prompts = await this.setup(samples);
    let cancelled = false;

    try {
      let previousRan = false;
      for (const [index, sample] of samples.entries()) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }

        const position = `[${index + 1}/${samples.length}]`;

        if (options.resume && (await this.store.hasResult(sample.id))) {
          const now = new Date(this.clock.now()).toISOString();
          const skipped: TrialOutcome = {
            sampleId: sample.id,
            status: 'skipped',
            attempts: 0,
            startedAt: now,
            endedAt: now,
          };
          this.logger.log(`${position} ${sample.id}: skipped (already stored)`);
          outcomes.push(skipped);
          yield skipped;
          continue;
        }

        if (previousRan && this.config.pacingMs > 0) {
          try {
            await this.clock.sleep(this.config.pacingMs, signal);
          } catch (error) {
            if (error instanceof CancelledError) {
              cancelled = true;
              break;
            }
            throw error;
          }
        }

        const prompt = prompts.get(sample.templateId);
        if (!prompt) {
          throw new SetupError(`No prompt loaded for template ${sample.templateId}`);
        }

        const { outcome } = await this.trials.runSample(sample, prompt, {
          maxRetries: options.maxRetries,
          maxWaitMs: options.maxWaitMs,
          mode: options.mode,
          signal,
        });
        previousRan = true;
        this.logOutcome(position, outcome);
        outcomes.push(outcome);
        yield outcome;

        if (outcome.failureClass === 'cancelled') {
          cancelled = true;
          break;
        }
      }
    } finally {
      this.session.release();
      const summary = summarizeOutcomes(outcomes, cancelled || Boolean(signal?.aborted));
      this.logger.log(`Run finished: ${formatSummary(summary)}`);
    }
  }

  /**
   * Acquires the session, brings the target app up and loads every prompt
   * template the batch needs. Anything failing here becomes a SetupError.
   */
  private async setup(samples: readonly Sample[]): Promise<Map<string, PromptBundle>> {
    try {
      await this.session.acquire();
    } catch (error) {
      throw this.asSetupError(error);
    }

    try {
      await this.ui.ensureTargetRunning();
      await this.ui.focusTarget();

      const prompts = new Map<string, PromptBundle>();
      for (const sample of samples) {
        if (!prompts.has(sample.templateId)) {
          prompts.set(sample.templateId, await this.prompts.resolve(sample.templateId));
        }
      }

      this.logger.log(
        `Starting run of ${samples.length} samples against ${this.config.targetApp.name}`,
      );
      return prompts;
    } catch (error) {
      this.session.release();
      throw this.asSetupError(error);
    }
  }

  private asSetupError(error: unknown): SetupError {
    if (error instanceof SetupError) {
      return error;
    }
    return new SetupError(`Run setup failed: ${describeError(error)}`, { cause: error });
  }

  private logOutcome(position: string, outcome: TrialOutcome): void {
    const attempts = `${outcome.attempts} attempt${outcome.attempts === 1 ? '' : 's'}`;
    if (outcome.status === 'succeeded') {
      this.logger.log(`${position} ${outcome.sampleId}: succeeded after ${attempts}`);
    } else {
      this.logger.warn(
        `${position} ${outcome.sampleId}: ${outcome.status} after ${attempts} (${outcome.failureReason ?? 'unknown'})`,
      );
    }
  }
}
