// src/inference/image-transform.service.ts
import { Injectable } from '@nestjs/common';
import sharp from 'sharp';

import type {
  InputSpecDto,
  NormalizationDto,
} from '../model/dto/model-manifest.dto';
import type { Tensor } from '../model/model-network';
import { messageOf } from '../common/error-message';
import { InvalidImageError } from './inference.errors';

/** Formats we accept from clients; anything else sharp can read is refused */
export const SUPPORTED_FORMATS: ReadonlySet<string> = new Set([
  'jpeg',
  'png',
  'webp',
  'gif',
  'tiff',
  'avif',
  'heif',
]);

// Decompression-bomb guard, on top of the upload byte limit
const MAX_INPUT_PIXELS = 64 * 1024 * 1024;

/**
 * Uploaded bytes -> model input tensor.
 *
 * Decode, resize and colour conversion run inside sharp (libuv thread pool),
 * so a large JPEG does not stall other requests on the event loop. Only the
 * final normalization pass runs in JS.
 */
@Injectable()
export class ImageTransformService {
  async transform(
    bytes: Buffer,
    input: Readonly<InputSpecDto>,
    normalization: Readonly<NormalizationDto>,
  ): Promise<Tensor> {
    if (!bytes || bytes.length === 0) {
      throw new InvalidImageError('Image payload is empty');
    }

    const pixels = await this.decode(bytes, input);

    const { height, width, channels } = input;
    const expected = height * width * channels;
    if (pixels.length !== expected) {
      // sharp gave back a different layout than we asked for
      throw new Error(
        `Decoded ${pixels.length} bytes, ` +
          `expected ${expected} (${height}x${width}x${channels})`,
      );
    }

    const bgr = input.channelOrder === 'bgr';
    return {
      shape: [height, width, channels],
      data: normalize(pixels, channels, bgr, normalization),
    };
  }

  /** Format sharp detects, or null when it can't read the header */
  async sniffFormat(bytes: Buffer): Promise<string | null> {
    try {
      const meta = await sharp(bytes, {
        limitInputPixels: MAX_INPUT_PIXELS,
      }).metadata();
      return meta.format ?? null;
    } catch {
      return null;
    }
  }

  /* ------------------------------- Helpers ------------------------------ */

  private async decode(
    bytes: Buffer,
    input: Readonly<InputSpecDto>,
  ): Promise<Buffer> {
    const format = await this.sniffFormat(bytes);
    if (!format) {
      throw new InvalidImageError('Payload is not a decodable image');
    }
    if (!SUPPORTED_FORMATS.has(format)) {
      throw new InvalidImageError(`Unsupported image format: ${format}`);
    }

    let decoded: { data: Buffer; info: sharp.OutputInfo };
    try {
      let pipeline = sharp(bytes, {
        limitInputPixels: MAX_INPUT_PIXELS,
        failOn: 'truncated',
      })
        .resize(input.width, input.height, {
          fit: 'fill',
          kernel: input.resizeKernel,
        })
        .removeAlpha();

      pipeline =
        input.channels === 1
          ? pipeline.greyscale()
          : pipeline.toColourspace('srgb');
      decoded = await pipeline.raw().toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw new InvalidImageError(
        `Image could not be decoded: ${messageOf(error)}`,
        { cause: error },
      );
    }

    if (decoded.info.channels !== input.channels) {
      throw new Error(
        `sharp produced ${decoded.info.channels} channels, ` +
          `expected ${input.channels}`,
      );
    }
    return decoded.data;
  }
}

/**
 * (pixel / scale - mean[c]) / std[c], reordering RGB -> BGR when asked.
 * Always returns a fresh buffer owned by the caller.
 */
export function normalize(
  pixels: Uint8Array,
  channels: number,
  bgr: boolean,
  { scale, mean, std }: Readonly<NormalizationDto>,
): Float32Array {
  const out = new Float32Array(pixels.length);
  for (let i = 0; i < pixels.length; i += channels) {
    for (let c = 0; c < channels; c++) {
      const src = bgr && channels === 3 ? 2 - c : c;
      out[i + c] = (pixels[i + src] / scale - mean[c]) / std[c];
    }
  }
  return out;
}
