import { createHash } from 'crypto';
import type { RawFrame } from '@depth-trials/shared';

/**
 * Rolling view over the region hashes observed since submission.
 */
export interface StabilityWindow {
  readonly baseline: string;
  readonly changed: boolean;
  readonly recent: readonly string[];
}

export function hashFrame(frame: RawFrame): string {
  return createHash('sha256')
    .update(`${frame.width}x${frame.height}x${frame.channels}:`)
    .update(frame.data)
    .digest('hex');
}

export function startWindow(baseline: string): StabilityWindow {
  return { baseline, changed: false, recent: [] };
}

export function observeFrame(
  window: StabilityWindow,
  hash: string,
  stablePolls: number,
): StabilityWindow {
  return {
    baseline: window.baseline,
    changed: window.changed || hash !== window.baseline,
    recent: [...window.recent, hash].slice(-Math.max(1, stablePolls)),
  };
}

/**
 * True once the region has changed at least once since submission and the
 * last `stablePolls` observations are identical (and not the baseline).
 * Partial renders keep changing the hash, so they never satisfy this.
 */
export function isStabilized(
  window: StabilityWindow,
  stablePolls: number,
): boolean {
  const required = Math.max(1, stablePolls);
  if (!window.changed || window.recent.length < required) {
    return false;
  }
  const [latest] = window.recent.slice(-1);
  return (
    latest !== window.baseline &&
    window.recent.slice(-required).every((hash) => hash === latest)
  );
}
