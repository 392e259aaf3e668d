import { Module } from '@nestjs/common';
import { ClipboardModule } from '../clipboard/clipboard.module';
import { ResponseDetectorService } from '../detection/response-detector.service';
import { ImageExtractorService } from '../extraction/image-extractor.service';
import { NutModule } from '../nut/nut.module';
import { ResultsModule } from '../results/results.module';
import { RETRY_STRATEGY, StallAwareRetryStrategy } from './retry-strategy';
import { TrialStateMachineService } from './trial-state-machine.service';

@Module({
  imports: [ClipboardModule, NutModule, ResultsModule],
  providers: [
    ResponseDetectorService,
    ImageExtractorService,
    { provide: RETRY_STRATEGY, useClass: StallAwareRetryStrategy },
    TrialStateMachineService,
  ],
  exports: [TrialStateMachineService],
})
export class TrialsModule {}
