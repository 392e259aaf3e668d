import { Module } from '@nestjs/common';
import { ClipboardModule } from '../clipboard/clipboard.module';
import { UiAutomationService } from './ui-automation.service';
import { UI_DRIVER } from './ui-automation.types';

@Module({
  imports: [ClipboardModule],
  providers: [
    UiAutomationService,
    { provide: UI_DRIVER, useExisting: UiAutomationService },
  ],
  exports: [UI_DRIVER],
})
export class NutModule {}
