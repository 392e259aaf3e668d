import { Module } from '@nestjs/common';
import { UiSession } from '../session/ui-session.service';
import { COMMAND_RUNNER, CommandRunner } from '../utils/command-runner';
import { HOST_ENVIRONMENT, HostEnvironment } from '../utils/platform';
import { createClipboardBackend } from './clipboard-backends';
import { ClipboardService } from './clipboard.service';
import { CLIPBOARD_BACKEND, CLIPBOARD_BRIDGE } from './clipboard.types';

@Module({
  providers: [
    {
      provide: CLIPBOARD_BACKEND,
      useFactory: (runner: CommandRunner, host: HostEnvironment) =>
        createClipboardBackend(host.platform, runner),
      inject: [COMMAND_RUNNER, HOST_ENVIRONMENT],
    },
    UiSession,
    ClipboardService,
    { provide: CLIPBOARD_BRIDGE, useExisting: ClipboardService },
  ],
  exports: [UiSession, CLIPBOARD_BRIDGE],
})
export class ClipboardModule {}
