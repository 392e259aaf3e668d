import { Inject, Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import {
  ArtifactSource,
  CapturedArtifact,
  ClipboardPayload,
  DepthMode,
  isEmptyPayload,
  isImagePayload,
  RawFrame,
} from '@depth-trials/shared';
import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { describeError, ExtractionFailedError } from '../errors/trial-errors';
import { ExtractionSource } from './extraction.types';

type Channels = 1 | 2 | 3 | 4;

interface Raster {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

const CHANNEL_COUNTS: readonly Channels[] = [1, 2, 3, 4];

function toChannels(value: number): Channels {
  const channels = CHANNEL_COUNTS.find((count) => count === value);
  if (channels === undefined) {
    throw new ExtractionFailedError('decode-error', `Unsupported channel count ${value}`);
  }
  return channels;
}

// Largest max-min spread across r, g, b of any pixel in a 3-channel raster
function channelSpread(raster: Raster): number {
  let widest = 0;
  for (let offset = 0; offset < raster.data.length; offset += 3) {
    const r = raster.data[offset];
    const g = raster.data[offset + 1];
    const b = raster.data[offset + 2];
    widest = Math.max(widest, Math.max(r, g, b) - Math.min(r, g, b));
  }
  return widest;
}

function meanChannel(raster: Raster): Buffer {
  const gray = Buffer.alloc(raster.width * raster.height);
  for (let pixel = 0; pixel < gray.length; pixel++) {
    const offset = pixel * raster.channels;
    gray[pixel] = Math.round(
      (raster.data[offset] + raster.data[offset + 1] + raster.data[offset + 2]) / 3,
    );
  }
  return gray;
}

/**
 * Turns a clipboard payload or captured pixels into a validated PNG depth map.
 */
@Injectable()
export class ImageExtractorService {
  private readonly logger = new Logger(ImageExtractorService.name);

  constructor(@Inject(RUNNER_CONFIG) private readonly config: RunnerConfig) {}

  async extract(source: ExtractionSource, mode: DepthMode): Promise<CapturedArtifact> {
    const origin: ArtifactSource = source.from;
    const raster =
      source.from === 'clipboard'
        ? await this.decodePayload(source.payload)
        : await this.decodeFrame(source.frame);

    const normalized = this.matchMode(raster, mode);
    const data = await sharp(normalized.data, {
      raw: {
        width: normalized.width,
        height: normalized.height,
        channels: toChannels(normalized.channels),
      },
    })
      .png()
      .toBuffer();

    this.logger.debug(
      `Extracted ${mode} depth map ${normalized.width}x${normalized.height} from ${origin}`,
    );

    return {
      data,
      width: normalized.width,
      height: normalized.height,
      channels: normalized.channels,
      mode,
      source: origin,
      valid: true,
    };
  }

  private async decodePayload(payload: ClipboardPayload): Promise<Raster> {
    if (isEmptyPayload(payload)) {
      throw new ExtractionFailedError('empty', 'Clipboard is empty');
    }
    if (!isImagePayload(payload)) {
      throw new ExtractionFailedError('wrong-type', `Clipboard holds ${payload.kind}, not an image`);
    }
    if (payload.data.length === 0) {
      throw new ExtractionFailedError('empty', 'Clipboard image has no bytes');
    }

    let width: number | undefined;
    let height: number | undefined;
    try {
      ({ width, height } = await sharp(payload.data).metadata());
    } catch (error) {
      throw new ExtractionFailedError('decode-error', describeError(error), { cause: error });
    }
    if (!width || !height) {
      throw new ExtractionFailedError('zero-size', 'Decoded image has no area');
    }

    return this.flatten(sharp(payload.data));
  }

  private async decodeFrame(frame: RawFrame): Promise<Raster> {
    if (frame.width <= 0 || frame.height <= 0) {
      throw new ExtractionFailedError(
        'zero-size',
        `Captured region is ${frame.width}x${frame.height}`,
      );
    }
    if (frame.data.length < frame.width * frame.height * frame.channels) {
      throw new ExtractionFailedError('decode-error', 'Captured pixel buffer is truncated');
    }

    return this.flatten(
      sharp(frame.data, {
        raw: {
          width: frame.width,
          height: frame.height,
          channels: toChannels(frame.channels),
        },
      }),
    );
  }

  private async flatten(image: sharp.Sharp): Promise<Raster> {
    try {
      const { data, info } = await image
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
      return { data, width: info.width, height: info.height, channels: info.channels };
    } catch (error) {
      throw new ExtractionFailedError('decode-error', describeError(error), { cause: error });
    }
  }

  /**
   * Grayscale maps must be single-channel or neutral RGB (reduced to one
   * channel); colormaps must be RGB with at least one non-neutral pixel.
   * A pixel is neutral when its channels differ by at most
   * `maxChannelSpread`, so encoder noise on a gray render still passes.
   */
  private matchMode(raster: Raster, mode: DepthMode): Raster {
    if (raster.channels === 1) {
      if (mode === 'grayscale') {
        return raster;
      }
      throw new ExtractionFailedError('channel-mismatch', 'Expected a colormap, got a single-channel image');
    }

    if (raster.channels !== 3) {
      throw new ExtractionFailedError(
        'channel-mismatch',
        `Unexpected channel count ${raster.channels}`,
      );
    }

    const neutral = channelSpread(raster) <= this.config.maxChannelSpread;
    if (mode === 'grayscale') {
      if (!neutral) {
        throw new ExtractionFailedError('channel-mismatch', 'Expected a grayscale map, got a colour image');
      }
      return { ...raster, data: meanChannel(raster), channels: 1 };
    }

    if (neutral) {
      throw new ExtractionFailedError('channel-mismatch', 'Expected a colormap, got a grayscale image');
    }
    return raster;
  }
}
