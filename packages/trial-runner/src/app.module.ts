import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BatchModule } from './batch/batch.module';
import { RuntimeModule } from './common/runtime.module';
import { buildRunnerConfig, RunnerConfigOverrides } from './config/runner.config';
import { LoggerModule } from './logger/logger.module';

@Module({})
export class AppModule {
  static register(
    overrides: RunnerConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
  ): DynamicModule {
    const runner = buildRunnerConfig(env, overrides);

    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ runner })],
        }),
        LoggerModule.forRoot(runner.logDir),
        RuntimeModule,
        BatchModule,
      ],
    };
  }
}
