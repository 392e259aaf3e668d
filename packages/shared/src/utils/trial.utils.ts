import {
  RetryPolicy,
  RunSummary,
  SampleStatus,
  TrialOutcome,
  TrialPhase,
} from "../types/trial.types";

/**
 * Allowed phase transitions of a single trial.
 */
export const TRIAL_TRANSITIONS: Readonly<Record<TrialPhase, readonly TrialPhase[]>> = {
  init: ["submitting", "waiting", "failed"],
  submitting: ["waiting", "retrying", "failed"],
  waiting: ["capturing", "retrying", "failed"],
  capturing: ["validating", "retrying", "failed"],
  validating: ["succeeded", "retrying", "failed"],
  retrying: ["failed"],
  succeeded: [],
  failed: [],
};

export function canTransition(from: TrialPhase, to: TrialPhase): boolean {
  return TRIAL_TRANSITIONS[from].includes(to);
}

export function isTerminalPhase(phase: TrialPhase): boolean {
  return TRIAL_TRANSITIONS[phase].length === 0;
}

/**
 * Delay before the attempt that follows `attempt` (1-based):
 * base * factor^(attempt - 1), capped at maxDelayMs.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = policy.baseDelayMs * Math.pow(policy.factor, exponent);
  return Math.min(policy.maxDelayMs, Math.round(delay));
}

export function summarizeOutcomes(
  outcomes: readonly TrialOutcome[],
  cancelled = false,
): RunSummary {
  const count = (status: SampleStatus) =>
    outcomes.filter((outcome) => outcome.status === status).length;

  return {
    total: outcomes.length,
    succeeded: count("succeeded"),
    failed: count("failed"),
    skipped: count("skipped"),
    cancelled,
  };
}

export function formatSummary(summary: RunSummary): string {
  const parts = [
    `${summary.succeeded} succeeded`,
    `${summary.failed} failed`,
  ];
  if (summary.skipped > 0) {
    parts.push(`${summary.skipped} skipped`);
  }
  const suffix = summary.cancelled ? " (cancelled)" : "";
  return `${summary.total} samples: ${parts.join(", ")}${suffix}`;
}
