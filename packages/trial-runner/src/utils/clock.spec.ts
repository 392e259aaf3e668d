import { CancelledError } from '../errors/trial-errors';
import { SystemClock } from './clock';

describe('SystemClock', () => {
  const clock = new SystemClock();

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves after the delay', async () => {
    const sleeping = clock.sleep(500);

    jest.advanceTimersByTime(500);

    await expect(sleeping).resolves.toBeUndefined();
  });

  it('rejects as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const sleeping = clock.sleep(60000, controller.signal);

    controller.abort();

    await expect(sleeping).rejects.toBeInstanceOf(CancelledError);
  });

  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(clock.sleep(10, controller.signal)).rejects.toThrow('Run cancelled');
  });
});
