import type {
  DepthMode,
  RetryPolicy,
  ScreenPoint,
  ScreenRegion,
} from '@depth-trials/shared';

export const RUNNER_CONFIG = Symbol('RUNNER_CONFIG');

export type CaptureSource = 'auto' | 'clipboard' | 'region';
export type PromptInput = 'paste' | 'type';

export interface TargetAppConfig {
  name: string;
  // Substring matched against window titles
  windowTitle: string;
  launchCommand?: string;
  launchTimeoutMs: number;
  newConversationShortcut: string;
  newConversationPerSample: boolean;
}

export interface DetectionConfig {
  pollIntervalMs: number;
  stablePolls: number;
  maxWaitMs: number;
}

export interface CopyImageConfig {
  enabled: boolean;
  point: ScreenPoint;
  // Offset from the right-click point to the "Copy Image" menu entry
  menuOffset: ScreenPoint;
  settleMs: number;
}

export interface RunnerConfig {
  targetApp: TargetAppConfig;
  promptInput: PromptInput;
  stepDelayMs: number;
  imageUploadDelayMs: number;
  region: ScreenRegion;
  copyImage: CopyImageConfig;
  captureSource: CaptureSource;
  detection: DetectionConfig;
  retry: RetryPolicy;
  pacingMs: number;
  clipboardPollIntervalMs: number;
  clipboardTimeoutMs: number;
  expectedMode: DepthMode;
  // Largest max-min spread across r, g, b that still counts as a neutral pixel
  maxChannelSpread: number;
  outputDir: string;
  promptDir: string;
  templateId: string;
  datasetLimit?: number;
  logDir?: string;
}

export type RunnerConfigOverrides = Partial<
  Omit<RunnerConfig, 'targetApp' | 'detection' | 'retry' | 'copyImage'>
> & {
  targetApp?: Partial<TargetAppConfig>;
  detection?: Partial<DetectionConfig>;
  retry?: Partial<RetryPolicy>;
  copyImage?: Partial<CopyImageConfig>;
};

type Env = Record<string, string | undefined>;

const int = (env: Env, key: string, fallback: number): number => {
  const parsed = parseInt(env[key] ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const float = (env: Env, key: string, fallback: number): number => {
  const parsed = parseFloat(env[key] ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
};

function oneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
}

/**
 * Reads DEPTH_TRIALS_* variables and applies CLI overrides on top.
 */
export function buildRunnerConfig(
  env: Env = process.env,
  overrides: RunnerConfigOverrides = {},
): RunnerConfig {
  const appName = env.DEPTH_TRIALS_APP ?? 'ChatGPT';

  const base: RunnerConfig = {
    targetApp: {
      name: appName,
      windowTitle: env.DEPTH_TRIALS_WINDOW_TITLE ?? appName,
      launchCommand: env.DEPTH_TRIALS_LAUNCH_COMMAND,
      launchTimeoutMs: int(env, 'DEPTH_TRIALS_LAUNCH_TIMEOUT', 15000),
      newConversationShortcut: env.DEPTH_TRIALS_NEW_CHAT_SHORTCUT ?? 'Mod+N',
      newConversationPerSample: env.DEPTH_TRIALS_NEW_CHAT !== 'false',
    },
    promptInput: oneOf(env.DEPTH_TRIALS_PROMPT_INPUT, ['paste', 'type'], 'paste'),
    stepDelayMs: int(env, 'DEPTH_TRIALS_STEP_DELAY', 500),
    imageUploadDelayMs: int(env, 'DEPTH_TRIALS_UPLOAD_DELAY', 5000),
    region: {
      x: int(env, 'DEPTH_TRIALS_REGION_X', 300),
      y: int(env, 'DEPTH_TRIALS_REGION_Y', 150),
      width: int(env, 'DEPTH_TRIALS_REGION_WIDTH', 900),
      height: int(env, 'DEPTH_TRIALS_REGION_HEIGHT', 800),
    },
    copyImage: {
      enabled: env.DEPTH_TRIALS_COPY_IMAGE !== 'false',
      point: {
        x: int(env, 'DEPTH_TRIALS_COPY_X', 518),
        y: int(env, 'DEPTH_TRIALS_COPY_Y', 580),
      },
      menuOffset: {
        x: int(env, 'DEPTH_TRIALS_COPY_OFFSET_X', 30),
        y: int(env, 'DEPTH_TRIALS_COPY_OFFSET_Y', 0),
      },
      settleMs: int(env, 'DEPTH_TRIALS_COPY_SETTLE', 500),
    },
    captureSource: oneOf(
      env.DEPTH_TRIALS_CAPTURE_SOURCE,
      ['auto', 'clipboard', 'region'],
      'auto',
    ),
    detection: {
      pollIntervalMs: int(env, 'DEPTH_TRIALS_POLL_INTERVAL', 2000),
      stablePolls: int(env, 'DEPTH_TRIALS_STABLE_POLLS', 2),
      maxWaitMs: int(env, 'DEPTH_TRIALS_MAX_WAIT', 120000),
    },
    retry: {
      maxRetries: int(env, 'DEPTH_TRIALS_MAX_RETRIES', 3),
      baseDelayMs: int(env, 'DEPTH_TRIALS_BACKOFF_BASE', 3000),
      factor: float(env, 'DEPTH_TRIALS_BACKOFF_FACTOR', 2),
      maxDelayMs: int(env, 'DEPTH_TRIALS_BACKOFF_CAP', 30000),
    },
    pacingMs: int(env, 'DEPTH_TRIALS_PACING', 1000),
    clipboardPollIntervalMs: int(env, 'DEPTH_TRIALS_CLIPBOARD_POLL', 250),
    clipboardTimeoutMs: int(env, 'DEPTH_TRIALS_CLIPBOARD_TIMEOUT', 4000),
    expectedMode: oneOf(
      env.DEPTH_TRIALS_DEPTH_MODE,
      ['grayscale', 'colormap'],
      'grayscale',
    ),
    maxChannelSpread: int(env, 'DEPTH_TRIALS_CHANNEL_SPREAD', 4),
    outputDir: env.DEPTH_TRIALS_OUTPUT_DIR ?? './data/results',
    promptDir: env.DEPTH_TRIALS_PROMPT_DIR ?? './prompts',
    templateId: env.DEPTH_TRIALS_TEMPLATE ?? 'grayscale_depth',
    datasetLimit: env.DEPTH_TRIALS_LIMIT
      ? int(env, 'DEPTH_TRIALS_LIMIT', 100)
      : undefined,
    logDir: env.DEPTH_TRIALS_LOG_DIR,
  };

  const { targetApp, detection, retry, copyImage, ...flat } = overrides;
  return {
    ...mergeDefined(base, flat),
    targetApp: mergeDefined(base.targetApp, targetApp),
    detection: mergeDefined(base.detection, detection),
    retry: mergeDefined(base.retry, retry),
    copyImage: mergeDefined(base.copyImage, copyImage),
  };
}

// Unset CLI flags arrive as explicit undefined and must not clear a default.
function mergeDefined<T extends object>(base: T, overrides?: Partial<T>): T {
  const merged = { ...base };
  if (!overrides) {
    return merged;
  }
  for (const key in base) {
    const value = overrides[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}
