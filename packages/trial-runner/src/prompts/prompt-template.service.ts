import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { PromptBundle } from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { describeError, SetupError } from '../errors/trial-errors';

export const PROMPT_SOURCE = Symbol('PROMPT_SOURCE');

export interface PromptSource {
  resolve(templateId: string): Promise<PromptBundle>;
}

const TEMPLATE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Loads `<promptDir>/<templateId>.txt`. Bundles are cached for the lifetime
 * of the run, so every sample of a template gets the same text.
 */
@Injectable()
export class PromptTemplateService implements PromptSource {
  private readonly logger = new Logger(PromptTemplateService.name);
  private readonly cache = new Map<string, PromptBundle>();

  constructor(@Inject(RUNNER_CONFIG) private readonly config: RunnerConfig) {}

  async resolve(templateId: string): Promise<PromptBundle> {
    const cached = this.cache.get(templateId);
    if (cached) {
      return cached;
    }

    if (!TEMPLATE_ID_PATTERN.test(templateId)) {
      throw new SetupError(`Invalid prompt template id "${templateId}"`);
    }

    const file = path.join(path.resolve(this.config.promptDir), `${templateId}.txt`);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      throw new SetupError(
        `Prompt template "${templateId}" could not be read from ${file}: ${describeError(error)}`,
        { cause: error },
      );
    }

    const text = raw.trim();
    if (!text) {
      throw new SetupError(`Prompt template "${templateId}" is empty`);
    }

    const bundle: PromptBundle = { templateId, text, examples: [] };
    this.cache.set(templateId, bundle);
    this.logger.debug(`Loaded prompt template ${templateId} (${text.length} chars)`);
    return bundle;
  }
}
