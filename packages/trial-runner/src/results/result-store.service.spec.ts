import { promises as fs } from 'fs';
import * as path from 'path';
import type { CapturedArtifact } from '@depth-trials/shared';
import { PersistenceError } from '../errors/trial-errors';
import { grayscalePng, testConfig } from '../__tests__/fakes';
import { makeTempDir } from '../__tests__/harness';
import {
  ARTIFACT_FILE,
  FAILURE_FILE,
  METADATA_FILE,
  RESPONSE_FILE,
  ResultStoreService,
  sanitizeSampleId,
  SaveMetadata,
} from './result-store.service';

const metadata = (attempts = 1): SaveMetadata => ({
  attempts,
  startedAt: '2026-01-05T09:00:00.000Z',
  endedAt: '2026-01-05T09:00:04.000Z',
  imagePath: '/data/images/kitchen.jpg',
  templateId: 'grayscale_depth',
  trials: [],
});

describe('ResultStoreService', () => {
  let root: string;
  let store: ResultStoreService;
  let artifact: CapturedArtifact;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new ResultStoreService(testConfig({ outputDir: root }));
    artifact = {
      data: await grayscalePng(),
      width: 4,
      height: 4,
      channels: 1,
      mode: 'grayscale',
      source: 'clipboard',
      valid: true,
    };
  });

  it('writes the artifact and its metadata under the sample directory', async () => {
    await store.save('kitchen', artifact, metadata(2));

    const directory = path.join(root, 'kitchen');
    expect((await fs.readdir(directory)).sort()).toEqual([ARTIFACT_FILE, METADATA_FILE]);
    expect(await fs.readFile(path.join(directory, ARTIFACT_FILE))).toEqual(artifact.data);

    const written = JSON.parse(await fs.readFile(path.join(directory, METADATA_FILE), 'utf8'));
    expect(written).toEqual({
      ...metadata(2),
      sampleId: 'kitchen',
      outcome: 'succeeded',
      artifact: {
        file: ARTIFACT_FILE,
        width: 4,
        height: 4,
        channels: 1,
        mode: 'grayscale',
        source: 'clipboard',
      },
    });
  });

  it('overwrites an earlier result', async () => {
    await store.save('kitchen', artifact, metadata(1));
    await store.save('kitchen', artifact, metadata(3));

    expect((await store.getResult('kitchen'))?.attempts).toBe(3);
  });

  it('knows which samples are done', async () => {
    expect(await store.hasResult('kitchen')).toBe(false);

    await store.save('kitchen', artifact, metadata());

    expect(await store.hasResult('kitchen')).toBe(true);
  });

  it('does not credit a result to another id that shares its directory', async () => {
    await store.save('a_b', artifact, metadata());

    expect(await store.hasResult('a b')).toBe(false);
    expect(await store.getResult('a b')).toBeNull();
    expect(await store.hasResult('a_b')).toBe(true);
  });

  it('does not count a result whose artifact went missing', async () => {
    await store.save('kitchen', artifact, metadata());
    await fs.rm(path.join(root, 'kitchen', ARTIFACT_FILE));

    expect(await store.hasResult('kitchen')).toBe(false);
  });

  it('keeps failures apart from results', async () => {
    await store.recordFailure('garden', { ...metadata(3), failureReason: 'No response activity' });

    expect(await store.hasResult('garden')).toBe(false);
    expect(await store.listResults()).toEqual([]);
    expect(await store.listFailures()).toEqual([
      expect.objectContaining({ sampleId: 'garden', outcome: 'failed', attempts: 3 }),
    ]);
  });

  it('clears the failure record once the sample succeeds', async () => {
    await store.recordFailure('garden', { ...metadata(3), failureReason: 'cancelled' });
    await store.save('garden', artifact, metadata());

    await expect(fs.access(path.join(root, 'garden', FAILURE_FILE))).rejects.toThrow();
    expect(await store.listFailures()).toEqual([]);
  });

  it('writes the text reply with a failure and drops it on a later save without one', async () => {
    await store.recordFailure(
      'garden',
      { ...metadata(3), failureReason: 'No response activity' },
      'I cannot produce an image.',
    );

    const reply = path.join(root, 'garden', RESPONSE_FILE);
    expect(await fs.readFile(reply, 'utf8')).toBe('I cannot produce an image.');
    expect(await store.listFailures()).toEqual([
      expect.objectContaining({ sampleId: 'garden', responseFile: RESPONSE_FILE }),
    ]);

    const saved = await store.save('garden', artifact, metadata());

    expect(saved.responseFile).toBeUndefined();
    await expect(fs.access(reply)).rejects.toThrow();
  });

  it('records the reply file in the result metadata', async () => {
    const saved = await store.save('garden', artifact, metadata(), 'Depth map attached.');

    expect(saved.responseFile).toBe(RESPONSE_FILE);
    expect(await fs.readFile(path.join(root, 'garden', RESPONSE_FILE), 'utf8')).toBe(
      'Depth map attached.',
    );
    expect(await store.getResult('garden')).toMatchObject({ responseFile: RESPONSE_FILE });
  });

  it('lists results sorted by sample id and skips unreadable metadata', async () => {
    await store.save('street', artifact, metadata());
    await store.save('attic', artifact, metadata());
    await fs.mkdir(path.join(root, 'broken'));
    await fs.writeFile(path.join(root, 'broken', METADATA_FILE), '{ not json');

    const results = await store.listResults();

    expect(results.map((result) => result.sampleId)).toEqual(['attic', 'street']);
  });

  it('lists nothing when the output directory does not exist yet', async () => {
    const empty = new ResultStoreService(testConfig({ outputDir: path.join(root, 'missing') }));

    expect(await empty.listResults()).toEqual([]);
  });

  it('raises PersistenceError when the output cannot be written', async () => {
    const blocked = path.join(root, 'blocked');
    await fs.writeFile(blocked, 'a file, not a directory');
    const broken = new ResultStoreService(testConfig({ outputDir: blocked }));

    await expect(broken.save('kitchen', artifact, metadata())).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });
});

describe('sanitizeSampleId', () => {
  it.each([
    ['kitchen_01', 'kitchen_01'],
    ['nyu/kitchen 01', 'nyu_kitchen_01'],
    ['..', 'sample'],
    ['   ', 'sample'],
  ])('maps %p to %p', (input, expected) => {
    expect(sanitizeSampleId(input)).toBe(expected);
  });
});
