import { DynamicModule, Module } from '@nestjs/common';
import { WinstonModule } from 'nest-winston';
import { createWinstonLogger } from './winston-logger.service';

@Module({})
export class LoggerModule {
  static forRoot(logDir?: string): DynamicModule {
    return {
      module: LoggerModule,
      imports: [
        WinstonModule.forRoot({
          instance: createWinstonLogger(logDir),
        }),
      ],
      exports: [WinstonModule],
    };
  }
}
