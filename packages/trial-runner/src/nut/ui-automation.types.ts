import type {
  RawFrame,
  ScreenRegion,
  SubmissionStep,
} from '@depth-trials/shared';

export const UI_DRIVER = Symbol('UI_DRIVER');

export const SUBMISSION_STEPS: readonly SubmissionStep[] = [
  'focus',
  'paste-image',
  'paste-prompt',
  'send',
];

export interface SubmissionOptions {
  // Restart the submission at this step instead of from the beginning
  fromStep?: SubmissionStep;
  // Extra images pasted ahead of the sample image (few-shot examples)
  attachments?: string[];
}

/**
 * Low-level actions against the chat application. Knows nothing about trials.
 */
export interface UiDriver {
  ensureTargetRunning(): Promise<void>;
  focusTarget(): Promise<void>;
  startNewConversation(): Promise<boolean>;
  submitImageAndPrompt(
    imagePath: string,
    promptText: string,
    options?: SubmissionOptions,
  ): Promise<void>;
  captureRegion(region: ScreenRegion): Promise<RawFrame>;
  copyResponseImage(): Promise<void>;
}
