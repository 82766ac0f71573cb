import sharp from 'sharp';
import { DecodeError } from '../api/errors.js';
import type { MediaItemRef } from '../api/types.js';

/**
 * Sizing applied to a downloaded image.
 *
 * - `original`: decode only
 * - `fixed_size`: fit inside width × height, or with `crop` fill the box and
 *   centre-crop the overflow so the output is exactly width × height
 * - `scale_to_size`: the longer edge becomes `size`; `crop` is accepted but has
 *   no effect, since there is no target rectangle to crop to
 * - `fill_to_size`: fit inside, then pad with black to exactly width × height
 */
export type TransformSpec =
  | { mode: 'original' }
  | { mode: 'fixed_size'; width: number; height: number; crop: boolean }
  | { mode: 'scale_to_size'; size: number; crop?: boolean }
  | { mode: 'fill_to_size'; width: number; height: number };

/**
 * Decoded image: RGB, row-major height × width × channel, values in [0, 1].
 */
export interface ImageTensor {
  readonly width: number;
  readonly height: number;
  readonly channels: 3;
  readonly data: Float32Array;
}

const BLACK = { r: 0, g: 0, b: 0, alpha: 1 };

function applySizing(image: sharp.Sharp, spec: TransformSpec): sharp.Sharp {
  switch (spec.mode) {
    case 'original':
      return image;
    case 'fixed_size':
      return image.resize({
        width: spec.width,
        height: spec.height,
        fit: spec.crop ? 'cover' : 'inside',
        position: 'centre',
      });
    case 'scale_to_size':
      return image.resize({ width: spec.size, height: spec.size, fit: 'inside' });
    case 'fill_to_size':
      return image.resize({
        width: spec.width,
        height: spec.height,
        fit: 'contain',
        position: 'centre',
        background: BLACK,
      });
  }
}

/**
 * Expands 1–4 channel 8-bit pixels to normalized RGB floats; alpha is dropped.
 */
function toRgbFloat(pixels: Buffer, width: number, height: number, channels: number): Float32Array {
  const out = new Float32Array(width * height * 3);
  const hasColour = channels >= 3;
  for (let i = 0, o = 0; i < width * height; i++, o += 3) {
    const base = i * channels;
    const r = pixels[base];
    out[o] = r / 255;
    out[o + 1] = (hasColour ? pixels[base + 1] : r) / 255;
    out[o + 2] = (hasColour ? pixels[base + 2] : r) / 255;
  }
  return out;
}

/**
 * Decodes `bytes` and applies `spec`.
 *
 * @throws DecodeError when the bytes are not a readable image
 */
export async function transform(bytes: Buffer, spec: TransformSpec): Promise<ImageTensor> {
  try {
    const { data, info } = await applySizing(sharp(bytes), spec)
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      channels: 3,
      data: toRgbFloat(data, info.width, info.height, info.channels),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DecodeError(`Could not decode image (${bytes.length} bytes): ${message}`, error);
  }
}

/**
 * Stable identifier of a transform, used in image cache keys.
 */
export function transformKey(spec: TransformSpec): string {
  switch (spec.mode) {
    case 'original':
      return 'original';
    case 'fixed_size':
      return `fixed_${spec.width}x${spec.height}_${spec.crop ? 'crop' : 'fit'}`;
    case 'scale_to_size':
      return `scale_${spec.size}`;
    case 'fill_to_size':
      return `fill_${spec.width}x${spec.height}`;
  }
}

/**
 * Capability URL with a server-side sizing suffix, so the download is no
 * larger than the transform needs.
 */
export function sizedUrl(item: MediaItemRef, spec: TransformSpec): string {
  switch (spec.mode) {
    case 'original':
      return item.width && item.height ? `${item.baseUrl}=w${item.width}-h${item.height}` : `${item.baseUrl}=d`;
    case 'fixed_size':
      return `${item.baseUrl}=w${spec.width}-h${spec.height}${spec.crop ? '-c' : ''}`;
    case 'scale_to_size':
      return `${item.baseUrl}=w${spec.size}-h${spec.size}`;
    case 'fill_to_size':
      return `${item.baseUrl}=w${spec.width}-h${spec.height}`;
  }
}

/**
 * Encodes a tensor as PNG, for hosts that pass images around as files.
 */
export async function encodePng(tensor: ImageTensor): Promise<Buffer> {
  const pixels = Buffer.alloc(tensor.width * tensor.height * 3);
  for (let i = 0; i < pixels.length; i++) {
    pixels[i] = Math.round(Math.min(1, Math.max(0, tensor.data[i])) * 255);
  }
  return sharp(pixels, { raw: { width: tensor.width, height: tensor.height, channels: 3 } })
    .png()
    .toBuffer();
}
