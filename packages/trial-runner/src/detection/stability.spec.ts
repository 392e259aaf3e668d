import { solidFrame } from '../__tests__/fakes';
import { hashFrame, isStabilized, observeFrame, startWindow } from './stability';

describe('stability window', () => {
  const observeAll = (baseline: string, hashes: string[], stablePolls = 2) =>
    hashes.reduce(
      (window, hash) => observeFrame(window, hash, stablePolls),
      startWindow(baseline),
    );

  it('hashes identical frames identically', () => {
    expect(hashFrame(solidFrame(5))).toBe(hashFrame(solidFrame(5)));
    expect(hashFrame(solidFrame(5))).not.toBe(hashFrame(solidFrame(6)));
  });

  it('includes the frame geometry in the hash', () => {
    const wide = { data: Buffer.alloc(12), width: 4, height: 1, channels: 3 };
    const tall = { data: Buffer.alloc(12), width: 1, height: 4, channels: 3 };

    expect(hashFrame(wide)).not.toBe(hashFrame(tall));
  });

  it('is not stable while nothing has changed', () => {
    const window = observeAll('base', ['base', 'base', 'base']);

    expect(window.changed).toBe(false);
    expect(isStabilized(window, 2)).toBe(false);
  });

  it('stabilizes after a change followed by identical polls', () => {
    expect(isStabilized(observeAll('base', ['a']), 2)).toBe(false);
    expect(isStabilized(observeAll('base', ['a', 'a']), 2)).toBe(true);
  });

  it('keeps waiting while the region keeps changing', () => {
    const window = observeAll('base', ['a', 'b', 'c', 'd']);

    expect(window.changed).toBe(true);
    expect(isStabilized(window, 2)).toBe(false);
  });

  it('does not count a return to the baseline as a response', () => {
    const window = observeAll('base', ['a', 'base', 'base']);

    expect(window.changed).toBe(true);
    expect(isStabilized(window, 2)).toBe(false);
  });

  it('only keeps the last stablePolls hashes', () => {
    expect(observeAll('base', ['a', 'b', 'c'], 2).recent).toEqual(['b', 'c']);
    expect(isStabilized(observeAll('base', ['a', 'b', 'b', 'b'], 3), 3)).toBe(true);
  });
});
