import { Injectable } from '@nestjs/common';
import type { ResumePoint, TrialFailure } from '@depth-trials/shared';
import {
  CancelledError,
  ClipboardUnavailableError,
  describeError,
  ExtractionFailedError,
  PersistenceError,
  StalledWaitError,
  SubmissionFailedError,
} from '../errors/trial-errors';

export const RETRY_STRATEGY = Symbol('RETRY_STRATEGY');

/**
 * Decides where the next attempt resumes after a retryable failure.
 */
export interface RetryStrategy {
  decide(failure: TrialFailure): ResumePoint;
}

/**
 * A stall with no change at all most likely means the submission never went
 * through, so it is submitted again. A stall after partial change is a
 * truncated or slow render, so only the wait is repeated. A failed send key
 * is retried on its own.
 */
@Injectable()
export class StallAwareRetryStrategy implements RetryStrategy {
  decide(failure: TrialFailure): ResumePoint {
    switch (failure.class) {
      case 'stall-partial':
        return 'wait';
      case 'submission':
        return failure.step === 'send' ? 'send' : 'submit';
      default:
        return 'submit';
    }
  }
}

export function classifyFailure(error: unknown): TrialFailure {
  const message = describeError(error);

  if (error instanceof SubmissionFailedError) {
    return { class: 'submission', message, step: error.step };
  }
  if (error instanceof StalledWaitError) {
    return { class: error.change === 'none' ? 'stall-none' : 'stall-partial', message };
  }
  if (error instanceof ClipboardUnavailableError) {
    return { class: 'clipboard', message };
  }
  if (error instanceof ExtractionFailedError) {
    return { class: 'extraction', message };
  }
  if (error instanceof PersistenceError) {
    return { class: 'persistence', message };
  }
  if (error instanceof CancelledError) {
    return { class: 'cancelled', message };
  }
  return { class: 'unexpected', message };
}
