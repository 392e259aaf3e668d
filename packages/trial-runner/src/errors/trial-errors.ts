import type { StallChange, SubmissionStep } from '@depth-trials/shared';
import type { ExtractionFailureReason } from '../extraction/extraction.types';

/**
 * Base class for every error the runner raises on purpose.
 * `code` is stable and ends up in logs and failure metadata.
 */
export abstract class TrialRunnerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Failures of the UI session that a later attempt may not see again.
export abstract class TransientUiError extends TrialRunnerError {}

export class SubmissionFailedError extends TransientUiError {
  readonly code = 'SUBMISSION_FAILED';

  constructor(
    readonly step: SubmissionStep,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Submission failed at ${step}: ${message}`, options);
  }
}

export class ClipboardUnavailableError extends TransientUiError {
  readonly code = 'CLIPBOARD_UNAVAILABLE';
}

export class StalledWaitError extends TransientUiError {
  readonly code = 'STALLED';

  constructor(
    readonly change: StallChange,
    readonly waitedMs: number,
  ) {
    super(
      change === 'none'
        ? `No response activity after ${waitedMs}ms`
        : `Response stopped changing without stabilizing after ${waitedMs}ms`,
    );
  }
}

export class ExtractionFailedError extends TrialRunnerError {
  readonly code = 'EXTRACTION_FAILED';

  constructor(
    readonly reason: ExtractionFailureReason,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Extraction failed (${reason}): ${message}`, options);
  }
}

// Aborts the whole run before (or instead of) processing samples.
export class SetupError extends TrialRunnerError {
  readonly code: string = 'SETUP_FAILED';
}

export class TargetNotFoundError extends SetupError {
  readonly code = 'TARGET_NOT_FOUND';
}

export class PersistenceError extends TrialRunnerError {
  readonly code = 'PERSISTENCE_FAILED';
}

export class CancelledError extends TrialRunnerError {
  readonly code = 'CANCELLED';

  constructor(message = 'Run cancelled') {
    super(message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
