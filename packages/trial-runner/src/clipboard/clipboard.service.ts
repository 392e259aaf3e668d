import { Inject, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import {
  ClipboardPayload,
  ClipboardWrite,
  describePayload,
} from '@depth-trials/shared';
import {
  ClipboardUnavailableError,
  describeError,
  throwIfAborted,
  TrialRunnerError,
} from '../errors/trial-errors';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { UiSession } from '../session/ui-session.service';
import { CLOCK, Clock } from '../utils/clock';
import {
  CLIPBOARD_BACKEND,
  ClipboardBackend,
  ClipboardBridge,
  ClipboardChange,
} from './clipboard.types';

export function hashClipboardContent(
  kind: ClipboardPayload['kind'],
  data: Buffer = Buffer.alloc(0),
): string {
  return createHash('sha256').update(`${kind}:`).update(data).digest('hex');
}

@Injectable()
export class ClipboardService implements ClipboardBridge {
  private readonly logger = new Logger(ClipboardService.name);

  constructor(
    private readonly session: UiSession,
    @Inject(CLIPBOARD_BACKEND) private readonly backend: ClipboardBackend,
    @Inject(RUNNER_CONFIG) private readonly config: RunnerConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async set(payload: ClipboardWrite): Promise<void> {
    this.session.assertActive();
    try {
      if (payload.kind === 'image') {
        await this.backend.writeImage(payload.data);
        this.logger.debug(`Clipboard set to image (${payload.data.length} bytes)`);
      } else {
        await this.backend.writeText(payload.text);
        this.logger.debug(`Clipboard set to text (${payload.text.length} chars)`);
      }
    } catch (error) {
      throw this.unavailable('write', error);
    }
  }

  async get(): Promise<ClipboardPayload> {
    this.session.assertActive();
    try {
      const image = await this.backend.readImage();
      if (image && image.length > 0) {
        return { kind: 'image', data: image, hash: hashClipboardContent('image', image) };
      }

      const text = await this.backend.readText();
      if (text) {
        return {
          kind: 'text',
          text,
          hash: hashClipboardContent('text', Buffer.from(text, 'utf8')),
        };
      }

      return { kind: 'empty', hash: hashClipboardContent('empty') };
    } catch (error) {
      throw this.unavailable('read', error);
    }
  }

  /**
   * Polls until the clipboard hash differs from `baselineHash`.
   */
  async waitForChange(
    baselineHash: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<ClipboardChange> {
    const deadline = this.clock.now() + timeoutMs;

    for (;;) {
      throwIfAborted(signal);

      const payload = await this.get();
      if (payload.hash !== baselineHash) {
        this.logger.debug(`Clipboard changed: ${describePayload(payload)}`);
        return { changed: true, payload };
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return { changed: false, reason: 'timeout' };
      }
      await this.clock.sleep(
        Math.min(this.config.clipboardPollIntervalMs, remaining),
        signal,
      );
    }
  }

  private unavailable(operation: 'read' | 'write', error: unknown): Error {
    if (error instanceof TrialRunnerError) {
      return error;
    }
    this.logger.warn(`Clipboard ${operation} failed: ${describeError(error)}`);
    return new ClipboardUnavailableError(
      `Clipboard ${operation} failed: ${describeError(error)}`,
      { cause: error },
    );
  }
}
