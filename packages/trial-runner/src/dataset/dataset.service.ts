import { Inject, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Sample } from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { describeError, SetupError } from '../errors/trial-errors';
import { sanitizeSampleId } from '../results/result-store.service';
import { createRandom, pickRandom } from '../utils/random';
import { ManifestEntryDto } from './dto/manifest-entry.dto';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.gif', '.tiff'];

export interface DatasetOptions {
  // Image folder or JSON manifest
  source: string;
  groundTruthDir?: string;
  limit?: number;
  seed?: number;
  templateId?: string;
}

const isImageFile = (name: string): boolean =>
  !name.startsWith('.') && IMAGE_EXTENSIONS.includes(path.extname(name).toLowerCase());

const stem = (file: string): string => path.basename(file, path.extname(file));

@Injectable()
export class DatasetService {
  private readonly logger = new Logger(DatasetService.name);

  constructor(@Inject(RUNNER_CONFIG) private readonly config: RunnerConfig) {}

  async load(options: DatasetOptions): Promise<Sample[]> {
    const source = path.resolve(options.source);
    const templateId = options.templateId ?? this.config.templateId;

    const stat = await fs.stat(source).catch((error: unknown) => {
      throw new SetupError(`Dataset ${source} is not readable: ${describeError(error)}`, {
        cause: error,
      });
    });

    let samples = stat.isDirectory()
      ? await this.fromFolder(source, templateId)
      : await this.fromManifest(source, templateId);

    if (options.groundTruthDir) {
      samples = await this.pairGroundTruth(samples, path.resolve(options.groundTruthDir));
    }

    this.assertUniqueIds(samples);
    if (samples.length === 0) {
      throw new SetupError(`Dataset ${source} contains no images`);
    }

    const limit = options.limit ?? this.config.datasetLimit;
    if (limit !== undefined && limit < samples.length) {
      const chosen = new Set(pickRandom(samples, limit, createRandom(options.seed)));
      // Back to dataset order
      samples = samples.filter((sample) => chosen.has(sample));
      this.logger.log(`Using a random subset of ${samples.length} samples`);
    }

    this.logger.log(`Loaded ${samples.length} samples from ${source}`);
    return samples;
  }

  private async fromFolder(folder: string, templateId: string): Promise<Sample[]> {
    const entries = await fs.readdir(folder, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && isImageFile(entry.name))
      .map((entry) => entry.name)
      .sort()
      .map((name) => ({
        id: stem(name),
        imagePath: path.join(folder, name),
        templateId,
      }));
  }

  private async fromManifest(file: string, templateId: string): Promise<Sample[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(file, 'utf8'));
    } catch (error) {
      throw new SetupError(`Manifest ${file} is not valid JSON: ${describeError(error)}`, {
        cause: error,
      });
    }
    if (!Array.isArray(parsed)) {
      throw new SetupError(`Manifest ${file} must be a JSON array`);
    }

    const rawEntries: unknown[] = parsed;
    const baseDir = path.dirname(file);
    const samples: Sample[] = [];
    for (const [index, raw] of rawEntries.entries()) {
      if (typeof raw !== 'object' || raw === null) {
        throw new SetupError(`Manifest entry ${index} must be an object`);
      }
      const entry = plainToInstance(ManifestEntryDto, raw);
      const errors = await validate(entry);
      if (errors.length > 0) {
        const constraints = errors
          .flatMap((error) => Object.values(error.constraints ?? {}))
          .join(', ');
        throw new SetupError(`Manifest entry ${index} is invalid: ${constraints}`);
      }

      samples.push({
        id: entry.id ?? stem(entry.image),
        imagePath: path.resolve(baseDir, entry.image),
        groundTruthPath: entry.groundTruth
          ? path.resolve(baseDir, entry.groundTruth)
          : undefined,
        templateId: entry.templateId ?? templateId,
      });
    }
    return samples;
  }

  private async pairGroundTruth(samples: Sample[], folder: string): Promise<Sample[]> {
    let names: string[];
    try {
      names = await fs.readdir(folder);
    } catch (error) {
      throw new SetupError(
        `Ground-truth folder ${folder} is not readable: ${describeError(error)}`,
        { cause: error },
      );
    }

    const byStem = new Map<string, string>();
    for (const name of names.filter(isImageFile).sort()) {
      if (!byStem.has(stem(name))) {
        byStem.set(stem(name), path.join(folder, name));
      }
    }

    let missing = 0;
    const paired = samples.map((sample) => {
      if (sample.groundTruthPath) {
        return sample;
      }
      const match = byStem.get(stem(sample.imagePath));
      if (!match) {
        missing++;
        return sample;
      }
      return { ...sample, groundTruthPath: match };
    });
    if (missing > 0) {
      this.logger.warn(`${missing} samples have no ground-truth depth map in ${folder}`);
    }
    return paired;
  }

  // Ids must stay distinct after sanitizing, since each one names a result directory
  private assertUniqueIds(samples: readonly Sample[]): void {
    const byDirectory = new Map<string, string>();
    for (const sample of samples) {
      const directory = sanitizeSampleId(sample.id);
      const other = byDirectory.get(directory);
      if (other === sample.id) {
        throw new SetupError(`Duplicate sample id "${sample.id}" in dataset`);
      }
      if (other !== undefined) {
        throw new SetupError(
          `Sample ids "${other}" and "${sample.id}" both map to result directory "${directory}"`,
        );
      }
      byDirectory.set(directory, sample.id);
    }
  }
}
