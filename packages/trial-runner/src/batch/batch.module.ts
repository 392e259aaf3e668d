import { Module } from '@nestjs/common';
import { ClipboardModule } from '../clipboard/clipboard.module';
import { DatasetService } from '../dataset/dataset.service';
import { NutModule } from '../nut/nut.module';
import { PROMPT_SOURCE, PromptTemplateService } from '../prompts/prompt-template.service';
import { ResultsModule } from '../results/results.module';
import { TrialsModule } from '../trials/trials.module';
import { BatchRunnerService } from './batch-runner.service';

@Module({
  imports: [ClipboardModule, NutModule, ResultsModule, TrialsModule],
  providers: [
    BatchRunnerService,
    DatasetService,
    PromptTemplateService,
    { provide: PROMPT_SOURCE, useExisting: PromptTemplateService },
  ],
  exports: [BatchRunnerService, DatasetService, ResultsModule],
})
export class BatchModule {}
