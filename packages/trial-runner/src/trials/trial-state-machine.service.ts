import { Inject, Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import {
  backoffDelay,
  DepthMode,
  isImagePayload,
  isTextPayload,
  PromptBundle,
  ResumePoint,
  RetryPolicy,
  Sample,
  TrialFailure,
  TrialOutcome,
  TrialRecord,
} from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { CLIPBOARD_BRIDGE, ClipboardBridge } from '../clipboard/clipboard.types';
import {
  DetectionResult,
  ResponseDetectorService,
  WaitBaseline,
} from '../detection/response-detector.service';
import {
  CancelledError,
  describeError,
  SetupError,
  StalledWaitError,
} from '../errors/trial-errors';
import { ExtractionSource } from '../extraction/extraction.types';
import { ImageExtractorService } from '../extraction/image-extractor.service';
import { UI_DRIVER, UiDriver } from '../nut/ui-automation.types';
import { ARTIFACT_FILE, ResultStoreService } from '../results/result-store.service';
import { CLOCK, Clock } from '../utils/clock';
import { ActiveTrial } from './active-trial';
import { classifyFailure, RETRY_STRATEGY, RetryStrategy } from './retry-strategy';

export interface TrialRunOptions {
  maxRetries?: number;
  maxWaitMs?: number;
  mode?: DepthMode;
  signal?: AbortSignal;
}

export interface SampleRunResult {
  outcome: TrialOutcome;
  trials: TrialRecord[];
}

type Detected = Extract<DetectionResult, { state: 'detected' }>;

interface SampleRun {
  sample: Sample;
  prompt: PromptBundle;
  policy: RetryPolicy;
  maxWaitMs: number;
  mode: DepthMode;
  signal?: AbortSignal;
  startedAt: string;
  trials: TrialRecord[];
  // Survives retries that resume from the wait
  baseline: WaitBaseline | null;
  // Latest text reply the clipboard showed
  responseText?: string;
}

/**
 * Drives one sample through submit → wait → capture → validate → persist,
 * retrying with exponential backoff until it succeeds or runs out of attempts.
 * Every per-attempt failure is classified here; only setup failures escape.
 */
@Injectable()
export class TrialStateMachineService {
  private readonly logger = new Logger(TrialStateMachineService.name);

  constructor(
    @Inject(UI_DRIVER) private readonly ui: UiDriver,
    @Inject(CLIPBOARD_BRIDGE) private readonly clipboard: ClipboardBridge,
    private readonly detector: ResponseDetectorService,
    private readonly extractor: ImageExtractorService,
    private readonly store: ResultStoreService,
    @Inject(RETRY_STRATEGY) private readonly retryStrategy: RetryStrategy,
    @Inject(RUNNER_CONFIG) private readonly config: RunnerConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async runSample(
    sample: Sample,
    prompt: PromptBundle,
    options: TrialRunOptions = {},
  ): Promise<SampleRunResult> {
    const run: SampleRun = {
      sample,
      prompt,
      policy: {
        ...this.config.retry,
        maxRetries: Math.max(1, options.maxRetries ?? this.config.retry.maxRetries),
      },
      maxWaitMs: options.maxWaitMs ?? this.config.detection.maxWaitMs,
      mode: options.mode ?? this.config.expectedMode,
      signal: options.signal,
      startedAt: this.timestamp(),
      trials: [],
      baseline: null,
    };

    let resumeFrom: ResumePoint = 'submit';

    for (let attempt = 1; ; attempt++) {
      const trial = new ActiveTrial(sample.id, attempt, resumeFrom, this.timestamp());
      run.trials.push(trial.record);
      this.logger.log(
        `Sample ${sample.id}: attempt ${attempt}/${run.policy.maxRetries} (from ${resumeFrom})`,
      );

      const result = await this.tryAttempt(run, trial, resumeFrom);
      if ('outcome' in result) {
        return result;
      }
      const failure = result;

      if (failure.class === 'cancelled' || failure.class === 'persistence') {
        trial.transition('failed');
        return this.finishFailed(run, failure);
      }

      trial.transition('retrying');
      if (attempt >= run.policy.maxRetries) {
        trial.transition('failed');
        this.logger.warn(
          `Sample ${sample.id}: giving up after ${attempt} attempts (${failure.class}: ${failure.message})`,
        );
        return this.finishFailed(run, failure);
      }

      resumeFrom = this.retryStrategy.decide(failure);
      if (resumeFrom === 'wait' && !run.baseline) {
        resumeFrom = 'submit';
      }
      const delay = backoffDelay(attempt, run.policy);
      this.logger.warn(
        `Sample ${sample.id}: attempt ${attempt} failed (${failure.class}: ${failure.message}); retrying from ${resumeFrom} in ${delay}ms`,
      );

      try {
        await this.clock.sleep(delay, run.signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          trial.transition('failed');
          return this.finishFailed(run, classifyFailure(error));
        }
        throw error;
      }
    }
  }

  private async tryAttempt(
    run: SampleRun,
    trial: ActiveTrial,
    resumeFrom: ResumePoint,
  ): Promise<SampleRunResult | TrialFailure> {
    try {
      return await this.attempt(run, trial, resumeFrom);
    } catch (error) {
      const failure = classifyFailure(error);
      trial.fail(failure, this.timestamp());
      if (error instanceof SetupError) {
        throw error;
      }
      return failure;
    }
  }

  private async attempt(
    run: SampleRun,
    trial: ActiveTrial,
    resumeFrom: ResumePoint,
  ): Promise<SampleRunResult> {
    const { sample } = run;

    const baseline =
      resumeFrom === 'wait' && run.baseline
        ? run.baseline
        : await this.submit(run, trial, resumeFrom);

    trial.transition('waiting');
    const detection = await this.detector.waitForResponse(baseline, {
      maxWaitMs: run.maxWaitMs,
      signal: run.signal,
    });
    if (detection.state === 'stalled') {
      throw new StalledWaitError(detection.change, detection.elapsedMs);
    }
    if (detection.via === 'clipboard' && isTextPayload(detection.payload)) {
      run.responseText = detection.payload.text;
    }

    trial.transition('capturing');
    const source = await this.capture(detection, run.signal);

    trial.transition('validating');
    const artifact = await this.extractor.extract(source, run.mode);

    const endedAt = this.timestamp();
    const artifactPath = join(this.store.sampleDirectory(sample.id), ARTIFACT_FILE);
    const trials = run.trials.map((record) =>
      record === trial.record ? trial.succeededRecord(endedAt, artifactPath) : record,
    );
    await this.store.save(
      sample.id,
      artifact,
      {
        attempts: trial.record.attempt,
        startedAt: run.startedAt,
        endedAt,
        imagePath: sample.imagePath,
        groundTruthPath: sample.groundTruthPath,
        templateId: sample.templateId,
        trials,
      },
      run.responseText,
    );
    trial.succeed(endedAt, artifactPath);

    return {
      outcome: {
        sampleId: sample.id,
        status: 'succeeded',
        attempts: trial.record.attempt,
        startedAt: run.startedAt,
        endedAt,
        artifactPath,
      },
      trials: run.trials,
    };
  }

  private async submit(
    run: SampleRun,
    trial: ActiveTrial,
    resumeFrom: ResumePoint,
  ): Promise<WaitBaseline> {
    trial.transition('submitting');
    if (resumeFrom === 'submit' && this.config.targetApp.newConversationPerSample) {
      await this.ui.startNewConversation();
    }
    await this.ui.submitImageAndPrompt(run.sample.imagePath, run.prompt.text, {
      fromStep: resumeFrom === 'send' ? 'send' : undefined,
      attachments: run.prompt.examples.flatMap((example) => [
        example.imagePath,
        example.depthPath,
      ]),
    });
    run.baseline = await this.detector.captureBaseline();
    return run.baseline;
  }

  /**
   * Clipboard image when the response already landed there, otherwise copy the
   * rendered image through its context menu, falling back to the captured pane.
   */
  private async capture(
    detection: Detected,
    signal?: AbortSignal,
  ): Promise<ExtractionSource> {
    if (detection.via === 'clipboard' && isImagePayload(detection.payload)) {
      return { from: 'clipboard', payload: detection.payload };
    }

    const { captureSource, copyImage } = this.config;
    if (captureSource !== 'region' && copyImage.enabled) {
      const before = await this.clipboard.get();
      await this.ui.copyResponseImage();
      const change = await this.clipboard.waitForChange(
        before.hash,
        this.config.clipboardTimeoutMs,
        signal,
      );
      if (change.changed && isImagePayload(change.payload)) {
        return { from: 'clipboard', payload: change.payload };
      }
      if (captureSource === 'clipboard') {
        return { from: 'clipboard', payload: change.changed ? change.payload : before };
      }
      this.logger.debug('Copy image did not reach the clipboard, using the captured region');
    } else if (captureSource === 'clipboard') {
      return { from: 'clipboard', payload: await this.clipboard.get() };
    }

    const frame =
      detection.via === 'region'
        ? detection.frame
        : await this.ui.captureRegion(this.config.region);
    return { from: 'region', frame };
  }

  private async finishFailed(
    run: SampleRun,
    failure: TrialFailure,
  ): Promise<SampleRunResult> {
    const endedAt = this.timestamp();
    const failureReason = failure.class === 'cancelled' ? 'cancelled' : failure.message;

    try {
      await this.store.recordFailure(
        run.sample.id,
        {
          attempts: run.trials.length,
          startedAt: run.startedAt,
          endedAt,
          imagePath: run.sample.imagePath,
          groundTruthPath: run.sample.groundTruthPath,
          templateId: run.sample.templateId,
          failureReason,
          trials: run.trials,
        },
        run.responseText,
      );
    } catch (error) {
      this.logger.error(
        `Sample ${run.sample.id}: could not record failure: ${describeError(error)}`,
      );
    }

    return {
      outcome: {
        sampleId: run.sample.id,
        status: 'failed',
        attempts: run.trials.length,
        startedAt: run.startedAt,
        endedAt,
        failureReason,
        failureClass: failure.class,
      },
      trials: run.trials,
    };
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
