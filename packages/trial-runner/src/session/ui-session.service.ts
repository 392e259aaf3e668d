import { Inject, Injectable, Logger } from '@nestjs/common';
import { SetupError } from '../errors/trial-errors';
import { CLIPBOARD_BACKEND, ClipboardBackend } from '../clipboard/clipboard.types';
import {
  HOST_ENVIRONMENT,
  HostEnvironment,
  logPlatformInfo,
  Platform,
} from '../utils/platform';

/**
 * Handle on the single desktop session (target window, clipboard, screen)
 * a run drives. Acquired once at run start and released at run end; the
 * clipboard and UI services refuse to act while it is not held.
 */
@Injectable()
export class UiSession {
  private readonly logger = new Logger(UiSession.name);
  private acquiredAt: number | null = null;

  constructor(
    @Inject(CLIPBOARD_BACKEND) private readonly clipboardBackend: ClipboardBackend,
    @Inject(HOST_ENVIRONMENT) private readonly host: HostEnvironment,
  ) {}

  get active(): boolean {
    return this.acquiredAt !== null;
  }

  async acquire(): Promise<void> {
    if (this.active) {
      throw new SetupError('UI session is already acquired by another run');
    }

    const { platform, env } = this.host;
    logPlatformInfo(this.logger, platform);

    if (platform === Platform.UNKNOWN) {
      throw new SetupError('Unsupported platform for desktop automation');
    }
    if (platform === Platform.LINUX && !env.DISPLAY && !env.WAYLAND_DISPLAY) {
      throw new SetupError('No display available (DISPLAY is not set)');
    }

    await this.clipboardBackend.checkAvailable();

    this.acquiredAt = Date.now();
    this.logger.log(`UI session acquired (clipboard: ${this.clipboardBackend.name})`);
  }

  release(): void {
    if (!this.active) {
      return;
    }
    this.acquiredAt = null;
    this.logger.log('UI session released');
  }

  assertActive(): void {
    if (!this.active) {
      throw new SetupError('UI session has not been acquired');
    }
  }
}
