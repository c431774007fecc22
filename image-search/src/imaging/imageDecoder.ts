import sharp from 'sharp';
import { InvalidImageError, errorMessage } from '../errors';

export interface ImageInfo {
  format: string;
  width: number;
  height: number;
  channels: number;
  hasAlpha: boolean;
}

export interface RgbImage {
  /** Interleaved 8-bit RGB pixels, row-major. */
  data: Buffer;
  width: number;
  height: number;
}

const FLATTEN_BACKGROUND = { r: 255, g: 255, b: 255 };

/**
 * Fully decodes the bytes to confirm they are a loadable image.
 * Every pixel is read, so a truncated file with a valid header fails.
 */
export async function verifyImage(bytes: Buffer): Promise<ImageInfo> {
  try {
    const metadata = await sharp(bytes).metadata();
    const { info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });
    return {
      format: metadata.format ?? 'unknown',
      width: info.width,
      height: info.height,
      channels: info.channels,
      hasAlpha: metadata.hasAlpha ?? false,
    };
  } catch (err) {
    throw new InvalidImageError(`invalid or corrupted image file: ${errorMessage(err)}`, { cause: err });
  }
}

/** Alpha flattened onto white, sRGB, three channels. */
export async function decodeRgb(bytes: Buffer): Promise<RgbImage> {
  const { data, info } = await sharp(bytes)
    .flatten({ background: FLATTEN_BACKGROUND })
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 3) {
    throw new InvalidImageError(`expected 3 channels after normalisation, got ${info.channels}`);
  }
  return { data, width: info.width, height: info.height };
}

/** Re-encodes as a baseline RGB JPEG. */
export async function toRgbJpeg(bytes: Buffer, quality = 90): Promise<Buffer> {
  return sharp(bytes)
    .flatten({ background: FLATTEN_BACKGROUND })
    .toColourspace('srgb')
    .jpeg({ quality })
    .toBuffer();
}
