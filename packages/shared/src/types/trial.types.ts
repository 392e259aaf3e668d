export type TrialPhase =
  | "init"
  | "submitting"
  | "waiting"
  | "capturing"
  | "validating"
  | "retrying"
  | "succeeded"
  | "failed";

export type TrialStatus = "pending" | "succeeded" | "stalled" | "failed";

export type SubmissionStep = "focus" | "paste-image" | "paste-prompt" | "send";

export type StallChange = "none" | "partial";

export type FailureClass =
  | "submission"
  | "clipboard"
  | "stall-none"
  | "stall-partial"
  | "extraction"
  | "persistence"
  | "cancelled"
  | "unexpected";

export type TrialFailure = {
  class: FailureClass;
  message: string;
  step?: SubmissionStep;
};

/**
 * Where the next attempt picks up after a failure.
 * "submit" restarts from a fresh paste, "send" only presses send again,
 * "wait" keeps the submitted conversation and waits once more.
 */
export type ResumePoint = "submit" | "send" | "wait";

export type TrialRecord = {
  sampleId: string;
  attempt: number;
  startedAt: string;
  endedAt?: string;
  status: TrialStatus;
  phases: TrialPhase[];
  resumedFrom: ResumePoint;
  failure?: TrialFailure;
  artifactPath?: string;
};

export type SampleStatus = "succeeded" | "failed" | "skipped";

export type TrialOutcome = {
  sampleId: string;
  status: SampleStatus;
  attempts: number;
  startedAt: string;
  endedAt: string;
  failureReason?: string;
  failureClass?: FailureClass;
  artifactPath?: string;
};

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
};

export type RunSummary = {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
};
