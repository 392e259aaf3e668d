import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { CLOCK, SystemClock } from '../utils/clock';
import { COMMAND_RUNNER, SpawnCommandRunner } from '../utils/command-runner';
import { currentHost, HOST_ENVIRONMENT } from '../utils/platform';

@Global()
@Module({
  providers: [
    {
      provide: RUNNER_CONFIG,
      useFactory: (config: ConfigService) => config.getOrThrow<RunnerConfig>('runner'),
      inject: [ConfigService],
    },
    { provide: CLOCK, useClass: SystemClock },
    { provide: COMMAND_RUNNER, useClass: SpawnCommandRunner },
    { provide: HOST_ENVIRONMENT, useFactory: currentHost },
  ],
  exports: [RUNNER_CONFIG, CLOCK, COMMAND_RUNNER, HOST_ENVIRONMENT],
})
export class RuntimeModule {}
