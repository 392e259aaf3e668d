const mockDesktop = {
  windows: ['ChatGPT'],
  active: 'ChatGPT',
};

jest.mock('@nut-tree-fork/nut-js', () => ({
  keyboard: {
    config: { autoDelayMs: 0 },
    pressKey: jest.fn().mockResolvedValue(undefined),
    releaseKey: jest.fn().mockResolvedValue(undefined),
    type: jest.fn().mockResolvedValue(undefined),
  },
  mouse: {
    config: { autoDelayMs: 0 },
    setPosition: jest.fn().mockResolvedValue(undefined),
    click: jest.fn().mockResolvedValue(undefined),
  },
  screen: {
    grabRegion: jest.fn(async () => ({
      toRGB: async () => ({
        data: Buffer.alloc(2 * 2 * 4, 7),
        width: 2,
        height: 2,
        channels: 4,
      }),
    })),
  },
  getWindows: jest.fn(async () =>
    mockDesktop.windows.map((title) => ({ title: Promise.resolve(title) })),
  ),
  getActiveWindow: jest.fn(async () => ({ title: Promise.resolve(mockDesktop.active) })),
  Point: class {
    constructor(
      public x: number,
      public y: number,
    ) {}
  },
  Region: class {
    constructor(
      public left: number,
      public top: number,
      public width: number,
      public height: number,
    ) {}
  },
  Button: { LEFT: 0, MIDDLE: 1, RIGHT: 2 },
  Key: {
    Enter: 100,
    LeftControl: 101,
    LeftMeta: 102,
    LeftShift: 103,
    LeftAlt: 104,
    LeftSuper: 105,
    N: 106,
    V: 107,
  },
}));

import { promises as fs } from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import { Button, Key, keyboard, mouse, screen } from '@nut-tree-fork/nut-js';
import { ClipboardService } from '../clipboard/clipboard.service';
import { RunnerConfigOverrides } from '../config/runner.config';
import { SetupError, SubmissionFailedError, TargetNotFoundError } from '../errors/trial-errors';
import { UiSession } from '../session/ui-session.service';
import {
  FakeClipboardBackend,
  FakeClock,
  FakeCommandRunner,
  linuxHost,
  testConfig,
} from '../__tests__/fakes';
import { makeTempDir } from '../__tests__/harness';
import { HostEnvironment, Platform } from '../utils/platform';
import { UiAutomationService } from './ui-automation.service';

describe('UiAutomationService', () => {
  let backend: FakeClipboardBackend;
  let session: UiSession;
  let clock: FakeClock;
  let runner: FakeCommandRunner;
  let imagePath: string;

  const createService = (
    overrides: RunnerConfigOverrides = {},
    host: HostEnvironment = linuxHost,
  ): UiAutomationService => {
    const config = testConfig(overrides);
    const clipboard = new ClipboardService(session, backend, config, clock);
    return new UiAutomationService(session, clipboard, runner, config, clock, host);
  };

  beforeAll(async () => {
    const dir = await makeTempDir();
    imagePath = path.join(dir, 'living_room.png');
    await fs.writeFile(
      imagePath,
      await sharp({
        create: { width: 3, height: 3, channels: 3, background: { r: 10, g: 20, b: 30 } },
      })
        .png()
        .toBuffer(),
    );
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    mockDesktop.windows = ['ChatGPT'];
    mockDesktop.active = 'ChatGPT';
    backend = new FakeClipboardBackend();
    session = new UiSession(backend, linuxHost);
    clock = new FakeClock();
    runner = new FakeCommandRunner();
    await session.acquire();
  });

  describe('submitImageAndPrompt', () => {
    it('focuses, pastes the image and the prompt, then sends', async () => {
      const service = createService();

      await service.submitImageAndPrompt(imagePath, 'Estimate depth.');

      expect(runner.calls.map((call) => [call.command, ...call.args])).toEqual([
        ['wmctrl', '-a', 'ChatGPT'],
      ]);
      expect(jest.mocked(keyboard.pressKey).mock.calls).toEqual([
        [Key.LeftControl, Key.V],
        [Key.LeftControl, Key.V],
        [Key.Enter],
      ]);
      expect(backend.text).toBe('Estimate depth.');
    });

    it('types the prompt when configured to', async () => {
      const service = createService({ promptInput: 'type' });

      await service.submitImageAndPrompt(imagePath, 'Estimate depth.');

      expect(keyboard.type).toHaveBeenCalledWith('Estimate depth.');
      expect(backend.text).toBeNull();
    });

    it('pastes example attachments before the sample image', async () => {
      const service = createService();
      const written: Buffer[] = [];
      const writeImage = backend.writeImage.bind(backend);
      backend.writeImage = async (png) => {
        written.push(png);
        await writeImage(png);
      };

      await service.submitImageAndPrompt(imagePath, 'Estimate depth.', {
        attachments: [imagePath, imagePath],
      });

      expect(written).toHaveLength(3);
    });

    it('resumes at the send step without touching anything else', async () => {
      const service = createService();

      await service.submitImageAndPrompt(imagePath, 'Estimate depth.', { fromStep: 'send' });

      expect(runner.calls).toHaveLength(0);
      expect(jest.mocked(keyboard.pressKey).mock.calls).toEqual([[Key.Enter]]);
    });

    it('reports the step that failed', async () => {
      const service = createService();

      const error = await service
        .submitImageAndPrompt(path.join(path.dirname(imagePath), 'missing.png'), 'prompt')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SubmissionFailedError);
      expect(error).toMatchObject({ step: 'paste-image', code: 'SUBMISSION_FAILED' });
    });

    it('fails the focus step when another window stays in front', async () => {
      mockDesktop.active = 'Terminal';
      const service = createService();

      await expect(service.submitImageAndPrompt(imagePath, 'prompt')).rejects.toMatchObject({
        step: 'focus',
      });
      expect(keyboard.pressKey).not.toHaveBeenCalled();
    });

    it('requires an acquired session', async () => {
      session.release();
      const service = createService();

      await expect(service.submitImageAndPrompt(imagePath, 'prompt')).rejects.toBeInstanceOf(
        SetupError,
      );
    });
  });

  describe('ensureTargetRunning', () => {
    it('does nothing when the window exists', async () => {
      const service = createService();

      await service.ensureTargetRunning();

      expect(runner.launched).toHaveLength(0);
    });

    it('launches the configured command and waits for its window', async () => {
      mockDesktop.windows = [];
      runner.respondWith(() => {
        mockDesktop.windows = ['ChatGPT'];
        return {};
      });
      const service = createService({ targetApp: { launchCommand: 'chatgpt-desktop --new' } });

      await service.ensureTargetRunning();

      expect(runner.launched).toEqual([
        { command: 'chatgpt-desktop', args: ['--new'], options: { env: linuxHost.env } },
      ]);
      expect(runner.calls).toHaveLength(0);
      expect(clock.sleeps).toEqual([1000]);
    });

    it('opens the app by name on macOS', async () => {
      mockDesktop.windows = [];
      runner.respondWith(() => {
        mockDesktop.windows = ['ChatGPT'];
        return {};
      });
      const service = createService({}, { platform: Platform.MACOS, env: {} });

      await service.ensureTargetRunning();

      expect(runner.launched[0]).toMatchObject({ command: 'open', args: ['-a', 'ChatGPT'] });
    });

    it('gives up after the launch timeout', async () => {
      mockDesktop.windows = [];
      const service = createService({
        targetApp: { launchCommand: 'chatgpt-desktop', launchTimeoutMs: 3000 },
      });

      await expect(service.ensureTargetRunning()).rejects.toBeInstanceOf(TargetNotFoundError);
      expect(clock.sleeps).toEqual([1000, 1000, 1000]);
    });

    it('fails on Linux when there is nothing to launch', async () => {
      mockDesktop.windows = [];
      const service = createService();

      await expect(service.ensureTargetRunning()).rejects.toThrow('no launch command configured');
    });
  });

  it('starts a new conversation with the platform shortcut', async () => {
    const service = createService({}, { platform: Platform.MACOS, env: {} });

    await expect(service.startNewConversation()).resolves.toBe(true);

    expect(keyboard.pressKey).toHaveBeenCalledWith(Key.LeftMeta, Key.N);
    expect(runner.calls[0].command).toBe('osascript');
  });

  it('keeps going in the current conversation when the shortcut fails', async () => {
    mockDesktop.windows = [];
    const service = createService();

    await expect(service.startNewConversation()).resolves.toBe(false);
    expect(keyboard.pressKey).not.toHaveBeenCalled();
  });

  it('captures the configured region as RGB pixels', async () => {
    const service = createService();

    const frame = await service.captureRegion({ x: 10, y: 20, width: 2, height: 2 });

    expect(screen.grabRegion).toHaveBeenCalledWith(
      expect.objectContaining({ left: 10, top: 20, width: 2, height: 2 }),
    );
    expect(frame).toEqual({ data: Buffer.alloc(16, 7), width: 2, height: 2, channels: 4 });
  });

  it('copies the response image through the context menu', async () => {
    const service = createService();

    await service.copyResponseImage();

    expect(jest.mocked(mouse.setPosition).mock.calls).toEqual([
      [expect.objectContaining({ x: 518, y: 580 })],
      [expect.objectContaining({ x: 548, y: 580 })],
    ]);
    expect(jest.mocked(mouse.click).mock.calls).toEqual([[Button.RIGHT], [Button.LEFT]]);
  });
});
