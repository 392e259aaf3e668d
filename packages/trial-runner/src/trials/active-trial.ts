import {
  canTransition,
  ResumePoint,
  TrialFailure,
  TrialPhase,
  TrialRecord,
} from '@depth-trials/shared';

/**
 * One attempt at a sample. Phase changes are checked against TRIAL_TRANSITIONS.
 */
export class ActiveTrial {
  readonly record: TrialRecord;
  private current: TrialPhase = 'init';

  constructor(
    sampleId: string,
    attempt: number,
    resumedFrom: ResumePoint,
    startedAt: string,
  ) {
    this.record = {
      sampleId,
      attempt,
      startedAt,
      status: 'pending',
      phases: ['init'],
      resumedFrom,
    };
  }

  get phase(): TrialPhase {
    return this.current;
  }

  transition(next: TrialPhase): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal trial transition ${this.current} → ${next}`);
    }
    this.current = next;
    this.record.phases.push(next);
  }

  fail(failure: TrialFailure, endedAt: string): void {
    this.record.failure = failure;
    this.record.status =
      failure.class === 'stall-none' || failure.class === 'stall-partial'
        ? 'stalled'
        : 'failed';
    this.record.endedAt = endedAt;
  }

  // Snapshot of the record as it reads once the result is stored
  succeededRecord(endedAt: string, artifactPath: string): TrialRecord {
    return {
      ...this.record,
      status: 'succeeded',
      phases: [...this.record.phases, 'succeeded'],
      endedAt,
      artifactPath,
    };
  }

  succeed(endedAt: string, artifactPath: string): void {
    this.transition('succeeded');
    this.record.status = 'succeeded';
    this.record.endedAt = endedAt;
    this.record.artifactPath = artifactPath;
  }
}
