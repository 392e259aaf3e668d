import { ClipboardUnavailableError, SetupError } from '../errors/trial-errors';
import { UiSession } from '../session/ui-session.service';
import { FakeClipboardBackend, FakeClock, linuxHost, testConfig } from '../__tests__/fakes';
import { ClipboardService, hashClipboardContent } from './clipboard.service';

describe('ClipboardService', () => {
  let backend: FakeClipboardBackend;
  let session: UiSession;
  let clock: FakeClock;
  let service: ClipboardService;

  beforeEach(async () => {
    backend = new FakeClipboardBackend();
    session = new UiSession(backend, linuxHost);
    clock = new FakeClock();
    service = new ClipboardService(
      session,
      backend,
      testConfig({ clipboardPollIntervalMs: 250 }),
      clock,
    );
    await session.acquire();
  });

  it('refuses to touch the clipboard without an acquired session', async () => {
    session.release();

    await expect(service.get()).rejects.toBeInstanceOf(SetupError);
  });

  it('reports an image before any text', async () => {
    backend.image = Buffer.from([1, 2, 3]);

    const payload = await service.get();

    expect(payload).toEqual({
      kind: 'image',
      data: Buffer.from([1, 2, 3]),
      hash: hashClipboardContent('image', Buffer.from([1, 2, 3])),
    });
  });

  it('tags text and empty contents', async () => {
    expect((await service.get()).kind).toBe('empty');

    await service.set({ kind: 'text', text: 'hello' });
    const payload = await service.get();

    expect(payload.kind).toBe('text');
    expect(payload.hash).toBe(hashClipboardContent('text', Buffer.from('hello')));
  });

  it('hashes the same bytes differently per kind', () => {
    const bytes = Buffer.from('abc');

    expect(hashClipboardContent('image', bytes)).not.toBe(hashClipboardContent('text', bytes));
  });

  it('wraps backend failures as ClipboardUnavailableError', async () => {
    backend.readError = new Error('xclip: cannot open display');

    await expect(service.get()).rejects.toThrow(ClipboardUnavailableError);
    await expect(service.get()).rejects.toThrow('Clipboard read failed: xclip: cannot open display');
  });

  it('returns the new payload once the hash moves away from the baseline', async () => {
    backend.text = 'before';
    const baseline = await service.get();
    clock.onSleep = () => {
      backend.text = 'after';
    };

    const change = await service.waitForChange(baseline.hash, 1000);

    expect(change).toEqual({
      changed: true,
      payload: { kind: 'text', text: 'after', hash: hashClipboardContent('text', Buffer.from('after')) },
    });
    expect(clock.sleeps).toEqual([250]);
  });

  it('times out when nothing changes', async () => {
    const baseline = await service.get();

    const change = await service.waitForChange(baseline.hash, 1000);

    expect(change).toEqual({ changed: false, reason: 'timeout' });
    expect(clock.sleeps).toEqual([250, 250, 250, 250]);
  });

  it('stops waiting when the run is cancelled', async () => {
    const baseline = await service.get();
    const controller = new AbortController();
    clock.onSleep = () => controller.abort();

    await expect(
      service.waitForChange(baseline.hash, 1000, controller.signal),
    ).rejects.toThrow('Run cancelled');
  });
});
