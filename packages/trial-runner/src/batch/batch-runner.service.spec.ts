import { promises as fs } from 'fs';
import * as path from 'path';
import type { ResultMetadata } from '@depth-trials/shared';
import { SetupError } from '../errors/trial-errors';
import { ARTIFACT_FILE, METADATA_FILE } from '../results/result-store.service';
import { grayscalePng } from '../__tests__/fakes';
import { createHarness, Harness, makeTempDir, samplesOf } from '../__tests__/harness';

describe('BatchRunnerService', () => {
  let root: string;
  let harness: Harness;
  let png: Buffer;

  beforeEach(async () => {
    root = await makeTempDir();
    harness = createHarness(root);
    png = await grayscalePng();
  });

  it('runs every sample in order and stores an artifact for each', async () => {
    harness.driver.enqueue({ kind: 'image', png }, { kind: 'image', png }, { kind: 'image', png });

    const outcomes = await harness.batch.run(samplesOf('a', 'b', 'c'));

    expect(outcomes.map((o) => [o.sampleId, o.status, o.attempts])).toEqual([
      ['a', 'succeeded', 1],
      ['b', 'succeeded', 1],
      ['c', 'succeeded', 1],
    ]);
    for (const id of ['a', 'b', 'c']) {
      expect(await harness.store.hasResult(id)).toBe(true);
    }
    expect(harness.driver.calls.slice(0, 2)).toEqual(['ensureTargetRunning', 'focusTarget']);
    expect(harness.driver.submissions.map((s) => s.imagePath)).toEqual([
      '/data/images/a.jpg',
      '/data/images/b.jpg',
      '/data/images/c.jpg',
    ]);
    expect(harness.prompts.requested).toEqual(['grayscale_depth']);
    expect(harness.clock.sleeps).toEqual([2000, 1000, 2000, 1000, 2000]);
    expect(harness.session.active).toBe(false);
  });

  it('retries a stalled sample and records the attempt count', async () => {
    harness.driver.enqueue(
      { kind: 'image', png },
      { kind: 'none' },
      { kind: 'image', png },
      { kind: 'image', png },
    );

    const outcomes = await harness.batch.run(samplesOf('a', 'b', 'c'));

    expect(outcomes.map((o) => o.attempts)).toEqual([1, 2, 1]);
    expect(outcomes.every((o) => o.status === 'succeeded')).toBe(true);

    const metadata: ResultMetadata = JSON.parse(
      await fs.readFile(path.join(root, 'b', METADATA_FILE), 'utf8'),
    );
    expect(metadata.attempts).toBe(2);
    expect(metadata.trials.map((trial) => trial.status)).toEqual(['stalled', 'succeeded']);
  });

  it('resubmits a sample whose first submission failed', async () => {
    harness.driver.enqueue(
      { kind: 'image', png },
      { kind: 'submit-error', step: 'paste-image' },
      { kind: 'image', png },
      { kind: 'image', png },
    );

    const outcomes = await harness.batch.run(samplesOf('a', 'b', 'c'));

    expect(outcomes.map((o) => [o.status, o.attempts])).toEqual([
      ['succeeded', 1],
      ['succeeded', 2],
      ['succeeded', 1],
    ]);
    const metadata: ResultMetadata = JSON.parse(
      await fs.readFile(path.join(root, 'b', METADATA_FILE), 'utf8'),
    );
    expect(metadata.attempts).toBe(2);
    expect(metadata.trials[0]).toMatchObject({
      status: 'failed',
      failure: { class: 'submission', step: 'paste-image' },
    });
    expect(metadata.trials[1].resumedFrom).toBe('submit');
  });

  it('completes the run when one sample never responds', async () => {
    harness.driver.enqueue(
      { kind: 'image', png },
      { kind: 'image', png },
      { kind: 'none' },
      { kind: 'none' },
      { kind: 'none' },
    );

    const outcomes = await harness.batch.run(samplesOf('a', 'b', 'c'));

    expect(outcomes.map((o) => o.status)).toEqual(['succeeded', 'succeeded', 'failed']);
    expect(outcomes[2]).toMatchObject({ attempts: 3, failureClass: 'stall-none' });
    await expect(fs.access(path.join(root, 'c', ARTIFACT_FILE))).rejects.toThrow();
    expect(harness.session.active).toBe(false);
  });

  it('stops after the in-flight sample when cancelled mid-wait', async () => {
    const controller = new AbortController();
    harness.driver.enqueue({ kind: 'image', png }, { kind: 'image', png }, { kind: 'image', png });
    harness.clock.onSleep = () => {
      if (harness.driver.submissions.length === 2) {
        controller.abort();
      }
    };

    const outcomes = await harness.batch.run(samplesOf('a', 'b', 'c'), {
      signal: controller.signal,
    });

    expect(outcomes).toHaveLength(2);
    expect(outcomes[0].status).toBe('succeeded');
    expect(outcomes[1]).toMatchObject({
      sampleId: 'b',
      status: 'failed',
      failureReason: 'cancelled',
    });
    expect(harness.driver.submissions.map((s) => s.imagePath)).not.toContain('/data/images/c.jpg');
    expect(await harness.store.hasResult('b')).toBe(false);
    expect(harness.session.active).toBe(false);
  });

  it('skips samples that already have a stored result when resuming', async () => {
    harness.driver.enqueue({ kind: 'image', png });
    await harness.batch.run(samplesOf('a'));

    const resumed = createHarness(root);
    resumed.driver.enqueue({ kind: 'image', png });
    const outcomes = await resumed.batch.run(samplesOf('a', 'b'), { resume: true });

    expect(outcomes).toEqual([
      {
        sampleId: 'a',
        status: 'skipped',
        attempts: 0,
        startedAt: '2026-01-05T09:00:00.000Z',
        endedAt: '2026-01-05T09:00:00.000Z',
      },
      expect.objectContaining({ sampleId: 'b', status: 'succeeded', attempts: 1 }),
    ]);
    expect(resumed.driver.submissions).toHaveLength(1);
    // No pacing before the first sample that actually runs
    expect(resumed.clock.sleeps).toEqual([2000]);
  });

  it('reruns stored samples without resume', async () => {
    harness.driver.enqueue({ kind: 'image', png }, { kind: 'image', png });
    await harness.batch.run(samplesOf('a'));

    const outcomes = await harness.batch.run(samplesOf('a'));

    expect(outcomes[0]).toMatchObject({ status: 'succeeded', attempts: 1 });
    expect(harness.driver.submissions).toHaveLength(2);
  });

  it('fails setup before any sample when the target app cannot start', async () => {
    harness.driver.setupError = new Error('ChatGPT is not installed');

    await expect(harness.batch.run(samplesOf('a', 'b'))).rejects.toThrow(
      new SetupError('Run setup failed: ChatGPT is not installed'),
    );
    expect(harness.driver.submissions).toHaveLength(0);
    expect(harness.prompts.requested).toEqual([]);
    expect(harness.session.active).toBe(false);
  });

  it('fails setup when the clipboard is unavailable', async () => {
    harness.backend.availabilityError = new SetupError('xclip is not installed');

    await expect(harness.batch.run(samplesOf('a'))).rejects.toThrow('xclip is not installed');
    expect(harness.driver.calls).toEqual([]);
  });

  it('yields outcomes as samples finish', async () => {
    harness.driver.enqueue({ kind: 'image', png }, { kind: 'image', png });
    const seen: string[] = [];

    for await (const outcome of harness.batch.iterate(samplesOf('a', 'b'))) {
      seen.push(`${outcome.sampleId}:${harness.driver.submissions.length}`);
    }

    expect(seen).toEqual(['a:1', 'b:2']);
  });
});
