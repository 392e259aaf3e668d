import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  ClipboardPayload,
  RawFrame,
  StallChange,
} from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { CLIPBOARD_BRIDGE, ClipboardBridge } from '../clipboard/clipboard.types';
import { throwIfAborted } from '../errors/trial-errors';
import { UI_DRIVER, UiDriver } from '../nut/ui-automation.types';
import { CLOCK, Clock } from '../utils/clock';
import {
  hashFrame,
  isStabilized,
  observeFrame,
  startWindow,
  StabilityWindow,
} from './stability';

export type DetectorState = 'submitted' | 'polling' | 'detected' | 'stalled';

// Clipboard and response-pane state right after submission
export interface WaitBaseline {
  clipboardHash: string;
  regionHash: string;
}

export type DetectionResult =
  | {
      state: 'detected';
      via: 'clipboard';
      payload: ClipboardPayload;
      elapsedMs: number;
      polls: number;
    }
  | {
      state: 'detected';
      via: 'region';
      frame: RawFrame;
      elapsedMs: number;
      polls: number;
    }
  | {
      state: 'stalled';
      change: StallChange;
      elapsedMs: number;
      polls: number;
    };

export interface WaitOptions {
  maxWaitMs?: number;
  signal?: AbortSignal;
}

@Injectable()
export class ResponseDetectorService {
  private readonly logger = new Logger(ResponseDetectorService.name);

  constructor(
    @Inject(CLIPBOARD_BRIDGE) private readonly clipboard: ClipboardBridge,
    @Inject(UI_DRIVER) private readonly ui: UiDriver,
    @Inject(RUNNER_CONFIG) private readonly config: RunnerConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async captureBaseline(): Promise<WaitBaseline> {
    const payload = await this.clipboard.get();
    const frame = await this.ui.captureRegion(this.config.region);
    return { clipboardHash: payload.hash, regionHash: hashFrame(frame) };
  }

  /**
   * Polls clipboard and response pane until a response is detected or
   * `maxWaitMs` passes. Every tick starts with a cancellation check.
   */
  async waitForResponse(
    baseline: WaitBaseline,
    options: WaitOptions = {},
  ): Promise<DetectionResult> {
    const { pollIntervalMs, stablePolls } = this.config.detection;
    const maxWaitMs = options.maxWaitMs ?? this.config.detection.maxWaitMs;
    const startedAt = this.clock.now();
    let window: StabilityWindow = startWindow(baseline.regionHash);
    let polls = 0;

    this.transition('submitted', 'polling');

    for (;;) {
      throwIfAborted(options.signal);
      polls += 1;

      const payload = await this.clipboard.get();
      if (payload.hash !== baseline.clipboardHash) {
        const elapsedMs = this.clock.now() - startedAt;
        this.transition('polling', 'detected', `clipboard changed after ${elapsedMs}ms`);
        return { state: 'detected', via: 'clipboard', payload, elapsedMs, polls };
      }

      const frame = await this.ui.captureRegion(this.config.region);
      window = observeFrame(window, hashFrame(frame), stablePolls);
      if (isStabilized(window, stablePolls)) {
        const elapsedMs = this.clock.now() - startedAt;
        this.transition('polling', 'detected', `region stable after ${elapsedMs}ms`);
        return { state: 'detected', via: 'region', frame, elapsedMs, polls };
      }

      const elapsedMs = this.clock.now() - startedAt;
      if (elapsedMs >= maxWaitMs) {
        const change: StallChange = window.changed ? 'partial' : 'none';
        this.transition('polling', 'stalled', `${change} change after ${elapsedMs}ms`);
        return { state: 'stalled', change, elapsedMs, polls };
      }

      await this.clock.sleep(
        Math.min(pollIntervalMs, maxWaitMs - elapsedMs),
        options.signal,
      );
    }
  }

  private transition(from: DetectorState, to: DetectorState, detail?: string): void {
    this.logger.debug(`Detector ${from} → ${to}${detail ? ` (${detail})` : ''}`);
  }
}
