import { plainToInstance, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Min,
  validate,
} from 'class-validator';
import type { DepthMode } from '@depth-trials/shared';
import { SetupError } from '../errors/trial-errors';
import type { RunnerConfigOverrides } from './runner.config';

export class RunOptionsDto {
  @IsNotEmpty()
  @IsString()
  dataset!: string;

  @IsNotEmpty()
  @IsString()
  output!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  maxRetries?: number;

  // Seconds
  @IsOptional()
  @Type(() => Number)
  @IsPositive()
  maxWait?: number;

  @IsOptional()
  @IsBoolean()
  resume?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  seed?: number;

  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z0-9_-]+$/, { message: 'template must be a plain template id' })
  template?: string;

  @IsOptional()
  @IsString()
  prompts?: string;

  @IsOptional()
  @IsString()
  groundTruth?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  app?: string;

  @IsOptional()
  @IsIn(['grayscale', 'colormap'])
  mode?: DepthMode;
}

/**
 * Turns raw CLI flags into a validated RunOptionsDto, throwing a SetupError
 * listing every violated constraint.
 */
export async function parseRunOptions(raw: object): Promise<RunOptionsDto> {
  const options = plainToInstance(RunOptionsDto, raw);
  const errors = await validate(options);
  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new SetupError(`Invalid options: ${messages.join('; ')}`);
  }
  return options;
}

export function toConfigOverrides(options: RunOptionsDto): RunnerConfigOverrides {
  return {
    outputDir: options.output,
    promptDir: options.prompts,
    templateId: options.template,
    datasetLimit: options.limit,
    expectedMode: options.mode,
    targetApp:
      options.app === undefined
        ? undefined
        : { name: options.app, windowTitle: options.app },
    detection: {
      maxWaitMs: options.maxWait === undefined ? undefined : Math.round(options.maxWait * 1000),
    },
    retry: { maxRetries: options.maxRetries },
  };
}
