import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { promises as fsPromises } from 'fs';
import { join, resolve } from 'path';
import type {
  CapturedArtifact,
  FailureMetadata,
  ResultMetadata,
} from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { describeError, PersistenceError } from '../errors/trial-errors';

export const ARTIFACT_FILE = 'depth_map.png';
export const METADATA_FILE = 'metadata.json';
export const FAILURE_FILE = 'failure.json';
export const RESPONSE_FILE = 'response.txt';

export type SaveMetadata = Omit<
  ResultMetadata,
  'sampleId' | 'outcome' | 'artifact' | 'responseFile'
>;
export type FailureDetails = Omit<FailureMetadata, 'sampleId' | 'outcome' | 'responseFile'>;

export interface StoredResult {
  sampleId: string;
  metadata: ResultMetadata;
}

export function sanitizeSampleId(sampleId: string): string {
  const safe = sampleId.trim().replace(/[^a-zA-Z0-9._-]/g, '_').slice(0, 200);
  return safe.length === 0 || /^\.+$/.test(safe) ? 'sample' : safe;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isResultMetadata(value: unknown): value is ResultMetadata {
  return (
    isObject(value) &&
    typeof value.sampleId === 'string' &&
    value.outcome === 'succeeded' &&
    typeof value.attempts === 'number' &&
    isObject(value.artifact) &&
    typeof value.artifact.file === 'string' &&
    Array.isArray(value.trials)
  );
}

function isFailureMetadata(value: unknown): value is FailureMetadata {
  return (
    isObject(value) &&
    typeof value.sampleId === 'string' &&
    value.outcome === 'failed' &&
    typeof value.failureReason === 'string'
  );
}

/**
 * One directory per sample: depth_map.png plus metadata.json on success,
 * failure.json when the sample ended failed, and response.txt holding the
 * chat's text reply when there was one. Every file is written to a
 * temporary name and renamed into place.
 */
@Injectable()
export class ResultStoreService {
  private readonly logger = new Logger(ResultStoreService.name);
  private readonly root: string;

  constructor(@Inject(RUNNER_CONFIG) config: RunnerConfig) {
    this.root = resolve(config.outputDir);
  }

  getRoot(): string {
    return this.root;
  }

  sampleDirectory(sampleId: string): string {
    return join(this.root, sanitizeSampleId(sampleId));
  }

  async save(
    sampleId: string,
    artifact: CapturedArtifact,
    metadata: SaveMetadata,
    responseText?: string,
  ): Promise<ResultMetadata> {
    const directory = this.sampleDirectory(sampleId);
    const record: ResultMetadata = {
      ...metadata,
      sampleId,
      outcome: 'succeeded',
      artifact: {
        file: ARTIFACT_FILE,
        width: artifact.width,
        height: artifact.height,
        channels: artifact.channels,
        mode: artifact.mode,
        source: artifact.source,
      },
      ...(responseText !== undefined && { responseFile: RESPONSE_FILE }),
    };

    try {
      await fsPromises.mkdir(directory, { recursive: true });
      await this.writeAtomic(join(directory, ARTIFACT_FILE), artifact.data);
      await this.writeResponse(directory, responseText);
      // metadata.json last: its presence marks the sample complete
      await this.writeAtomic(
        join(directory, METADATA_FILE),
        JSON.stringify(record, null, 2),
      );
      await fsPromises.rm(join(directory, FAILURE_FILE), { force: true });
    } catch (error) {
      throw new PersistenceError(
        `Failed to save result for ${sampleId}: ${describeError(error)}`,
        { cause: error },
      );
    }

    this.logger.log(`Saved ${sampleId} → ${join(directory, ARTIFACT_FILE)}`);
    return record;
  }

  async recordFailure(
    sampleId: string,
    details: FailureDetails,
    responseText?: string,
  ): Promise<void> {
    const directory = this.sampleDirectory(sampleId);
    const record: FailureMetadata = {
      ...details,
      sampleId,
      outcome: 'failed',
      ...(responseText !== undefined && { responseFile: RESPONSE_FILE }),
    };

    try {
      await fsPromises.mkdir(directory, { recursive: true });
      if (responseText !== undefined) {
        await this.writeResponse(directory, responseText);
      }
      await this.writeAtomic(
        join(directory, FAILURE_FILE),
        JSON.stringify(record, null, 2),
      );
    } catch (error) {
      throw new PersistenceError(
        `Failed to record failure for ${sampleId}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  async hasResult(sampleId: string): Promise<boolean> {
    const directory = this.sampleDirectory(sampleId);
    const metadata = await this.readJson(join(directory, METADATA_FILE));
    // Another id may sanitize to the same directory
    if (!isResultMetadata(metadata) || metadata.sampleId !== sampleId) {
      return false;
    }
    return this.exists(join(directory, metadata.artifact.file));
  }

  async getResult(sampleId: string): Promise<ResultMetadata | null> {
    const metadata = await this.readJson(
      join(this.sampleDirectory(sampleId), METADATA_FILE),
    );
    return isResultMetadata(metadata) && metadata.sampleId === sampleId ? metadata : null;
  }

  async listResults(): Promise<StoredResult[]> {
    const results: StoredResult[] = [];
    for (const directory of await this.sampleDirectories()) {
      const metadata = await this.readJson(join(directory, METADATA_FILE));
      if (isResultMetadata(metadata)) {
        results.push({ sampleId: metadata.sampleId, metadata });
      }
    }
    return results.sort((a, b) => a.sampleId.localeCompare(b.sampleId));
  }

  async listFailures(): Promise<FailureMetadata[]> {
    const failures: FailureMetadata[] = [];
    for (const directory of await this.sampleDirectories()) {
      const metadata = await this.readJson(join(directory, FAILURE_FILE));
      if (isFailureMetadata(metadata)) {
        failures.push(metadata);
      }
    }
    return failures.sort((a, b) => a.sampleId.localeCompare(b.sampleId));
  }

  private async sampleDirectories(): Promise<string[]> {
    try {
      const entries = await fsPromises.readdir(this.root, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => join(this.root, entry.name));
    } catch (error) {
      if (isObject(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  // A save without a reply drops the one left by an earlier run
  private async writeResponse(directory: string, responseText?: string): Promise<void> {
    const target = join(directory, RESPONSE_FILE);
    if (responseText === undefined) {
      await fsPromises.rm(target, { force: true });
      return;
    }
    await this.writeAtomic(target, responseText);
  }

  private async writeAtomic(target: string, data: string | Buffer): Promise<void> {
    const temporary = `${target}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fsPromises.writeFile(temporary, data);
      await fsPromises.rename(temporary, target);
    } catch (error) {
      await fsPromises.rm(temporary, { force: true });
      throw error;
    }
  }

  private async readJson(file: string): Promise<unknown> {
    let content: string;
    try {
      content = await fsPromises.readFile(file, 'utf8');
    } catch {
      return null;
    }
    try {
      return JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable ${file}: ${describeError(error)}`);
      return null;
    }
  }

  private async exists(target: string): Promise<boolean> {
    try {
      await fsPromises.access(target);
      return true;
    } catch {
      return false;
    }
  }
}
