import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  Button,
  getActiveWindow,
  getWindows,
  Key,
  keyboard,
  mouse,
  Point,
  Region,
  screen,
  Window,
} from '@nut-tree-fork/nut-js';
import sharp from 'sharp';
import type { RawFrame, ScreenRegion, SubmissionStep } from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import {
  CancelledError,
  describeError,
  SubmissionFailedError,
  TargetNotFoundError,
} from '../errors/trial-errors';
import { CLIPBOARD_BRIDGE, ClipboardBridge } from '../clipboard/clipboard.types';
import { UiSession } from '../session/ui-session.service';
import { CLOCK, Clock } from '../utils/clock';
import { COMMAND_RUNNER, CommandRunner } from '../utils/command-runner';
import {
  getPlatformShortcut,
  HOST_ENVIRONMENT,
  HostEnvironment,
  Platform,
} from '../utils/platform';
import { parseShortcut } from './key-parser';
import {
  SUBMISSION_STEPS,
  SubmissionOptions,
  UiDriver,
} from './ui-automation.types';

const LAUNCH_POLL_MS = 1000;

@Injectable()
export class UiAutomationService implements UiDriver {
  private readonly logger = new Logger(UiAutomationService.name);

  constructor(
    private readonly session: UiSession,
    @Inject(CLIPBOARD_BRIDGE) private readonly clipboard: ClipboardBridge,
    @Inject(COMMAND_RUNNER) private readonly runner: CommandRunner,
    @Inject(RUNNER_CONFIG) private readonly config: RunnerConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(HOST_ENVIRONMENT) private readonly host: HostEnvironment,
  ) {
    mouse.config.autoDelayMs = 100;
    keyboard.config.autoDelayMs = 100;
  }

  /**
   * Launches the chat application when no matching window exists and waits for it.
   */
  async ensureTargetRunning(): Promise<void> {
    this.session.assertActive();
    const { name, windowTitle, launchTimeoutMs } = this.config.targetApp;

    if (await this.findTargetWindow()) {
      return;
    }

    const launch = this.launchCommand();
    if (!launch) {
      throw new TargetNotFoundError(
        `No window titled "${windowTitle}" and no launch command configured`,
      );
    }

    this.logger.log(`${name} is not running, launching: ${launch.join(' ')}`);
    const [command, ...args] = launch;
    const pid = await this.runner.launch(command, args, this.host.env);
    this.logger.debug(`${name} launcher started (pid ${pid})`);

    const deadline = this.clock.now() + launchTimeoutMs;
    while (this.clock.now() < deadline) {
      await this.clock.sleep(LAUNCH_POLL_MS);
      if (await this.findTargetWindow()) {
        this.logger.log(`${name} launched`);
        return;
      }
    }

    throw new TargetNotFoundError(
      `${name} did not open a window within ${launchTimeoutMs}ms`,
    );
  }

  async focusTarget(): Promise<void> {
    this.session.assertActive();
    const { name, windowTitle } = this.config.targetApp;

    if (!(await this.findTargetWindow())) {
      throw new TargetNotFoundError(`${name} is not running`);
    }

    const activation = this.activationCommand();
    const result = await this.runner.run(activation[0], activation.slice(1));
    if (result.code !== 0) {
      this.logger.warn(`Window activation exited with ${result.code}: ${result.stderr}`);
    }
    await this.clock.sleep(this.config.stepDelayMs);

    const activeTitle = await this.activeWindowTitle();
    if (!activeTitle.includes(windowTitle)) {
      throw new TargetNotFoundError(
        `${name} did not come to the foreground (active window: "${activeTitle}")`,
      );
    }
  }

  async startNewConversation(): Promise<boolean> {
    const shortcut = this.config.targetApp.newConversationShortcut;
    try {
      await this.focusTarget();
      await this.pressShortcut(shortcut);
      await this.clock.sleep(this.config.stepDelayMs * 2);
      this.logger.log('New conversation started');
      return true;
    } catch (error) {
      this.logger.warn(
        `Failed to start a new conversation (${shortcut}), continuing in the current one: ${describeError(error)}`,
      );
      return false;
    }
  }

  /**
   * Pastes the image, enters the prompt and sends it. A failing step raises
   * SubmissionFailedError carrying the step so a retry can resume from it.
   */
  async submitImageAndPrompt(
    imagePath: string,
    promptText: string,
    options: SubmissionOptions = {},
  ): Promise<void> {
    this.session.assertActive();
    const firstStep = SUBMISSION_STEPS.indexOf(options.fromStep ?? 'focus');

    for (const step of SUBMISSION_STEPS.slice(firstStep)) {
      try {
        await this.runStep(step, imagePath, promptText, options.attachments ?? []);
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        this.logger.warn(`Submission step ${step} failed: ${describeError(error)}`);
        throw new SubmissionFailedError(step, describeError(error), { cause: error });
      }
    }
  }

  async captureRegion(region: ScreenRegion): Promise<RawFrame> {
    this.session.assertActive();
    const grabbed = await screen.grabRegion(
      new Region(region.x, region.y, region.width, region.height),
    );
    const image = await grabbed.toRGB();

    return {
      data: image.data,
      width: image.width,
      height: image.height,
      channels: image.channels,
    };
  }

  /**
   * Right-clicks the rendered response image and picks "Copy Image" from the context menu.
   */
  async copyResponseImage(): Promise<void> {
    this.session.assertActive();
    const { point, menuOffset, settleMs } = this.config.copyImage;

    this.logger.debug(`Copying response image at (${point.x}, ${point.y})`);
    await mouse.setPosition(new Point(point.x, point.y));
    await mouse.click(Button.RIGHT);
    await this.clock.sleep(this.config.stepDelayMs);
    await mouse.setPosition(
      new Point(point.x + menuOffset.x, point.y + menuOffset.y),
    );
    await mouse.click(Button.LEFT);
    await this.clock.sleep(settleMs);
  }

  private async runStep(
    step: SubmissionStep,
    imagePath: string,
    promptText: string,
    attachments: string[],
  ): Promise<void> {
    switch (step) {
      case 'focus':
        await this.focusTarget();
        break;
      case 'paste-image':
        for (const attachment of attachments) {
          await this.pasteImage(attachment);
        }
        await this.pasteImage(imagePath);
        break;
      case 'paste-prompt':
        if (this.config.promptInput === 'paste') {
          await this.clipboard.set({ kind: 'text', text: promptText });
          await this.pressShortcut('Mod+V');
        } else {
          await keyboard.type(promptText);
        }
        await this.clock.sleep(this.config.stepDelayMs);
        break;
      case 'send':
        await keyboard.pressKey(Key.Enter);
        await keyboard.releaseKey(Key.Enter);
        await this.clock.sleep(this.config.stepDelayMs);
        break;
    }
  }

  private async pasteImage(imagePath: string): Promise<void> {
    const png = await sharp(imagePath).png().toBuffer();
    await this.clipboard.set({ kind: 'image', data: png });
    await this.pressShortcut('Mod+V');
    await this.clock.sleep(this.config.imageUploadDelayMs);
  }

  private async pressShortcut(shortcut: string): Promise<void> {
    const keys = parseShortcut(getPlatformShortcut(shortcut, this.host.platform));
    await keyboard.pressKey(...keys);
    await keyboard.releaseKey(...keys);
  }

  private async findTargetWindow(): Promise<Window | null> {
    const { windowTitle } = this.config.targetApp;
    const windows = await getWindows();

    for (const window of windows) {
      try {
        const title = await window.title;
        if (title.includes(windowTitle)) {
          return window;
        }
      } catch (error) {
        this.logger.debug(`Skipping window without a readable title: ${describeError(error)}`);
      }
    }
    return null;
  }

  private async activeWindowTitle(): Promise<string> {
    const active = await getActiveWindow();
    return active.title;
  }

  private launchCommand(): string[] | null {
    const { launchCommand, name } = this.config.targetApp;
    if (launchCommand) {
      return launchCommand.split(/\s+/).filter((part) => part.length > 0);
    }
    switch (this.host.platform) {
      case Platform.MACOS:
        return ['open', '-a', name];
      case Platform.WINDOWS:
        return ['cmd', '/c', 'start', '', name];
      default:
        return null;
    }
  }

  private activationCommand(): string[] {
    const { name, windowTitle } = this.config.targetApp;
    switch (this.host.platform) {
      case Platform.MACOS:
        return ['osascript', '-e', `tell application "${name.replace(/"/g, '\\"')}" to activate`];
      case Platform.WINDOWS:
        return [
          'powershell',
          '-NoProfile',
          '-Command',
          `(New-Object -ComObject WScript.Shell).AppActivate('${windowTitle.replace(/'/g, "''")}')`,
        ];
      default:
        return ['wmctrl', '-a', windowTitle];
    }
  }
}
