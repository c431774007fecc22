import sharp from 'sharp';
import type { CaptionEngine } from '../types';
import { decodeRgb, type RgbImage } from '../imaging/imageDecoder';

export interface NamedColour {
  name: string;
  rgb: [number, number, number];
}

export const PALETTE: NamedColour[] = [
  { name: 'black', rgb: [0, 0, 0] },
  { name: 'white', rgb: [255, 255, 255] },
  { name: 'grey', rgb: [128, 128, 128] },
  { name: 'light grey', rgb: [200, 200, 200] },
  { name: 'red', rgb: [255, 0, 0] },
  { name: 'orange', rgb: [255, 165, 0] },
  { name: 'yellow', rgb: [255, 255, 0] },
  { name: 'cream', rgb: [255, 250, 205] },
  { name: 'green', rgb: [0, 160, 0] },
  { name: 'light green', rgb: [144, 238, 144] },
  { name: 'teal', rgb: [0, 128, 128] },
  { name: 'blue', rgb: [0, 0, 255] },
  { name: 'light blue', rgb: [173, 216, 230] },
  { name: 'navy', rgb: [0, 0, 128] },
  { name: 'purple', rgb: [128, 0, 128] },
  { name: 'lavender', rgb: [200, 180, 230] },
  { name: 'pink', rgb: [255, 160, 200] },
  { name: 'brown', rgb: [139, 69, 19] },
];

export interface ColourSummary {
  /** Centre of the most populated bin of sharp's 16x16x16 colour histogram. */
  dominant: [number, number, number];
  /** Mean of the brightest channel, 0-255. */
  brightness: number;
}

export async function summarizeColours(image: RgbImage): Promise<ColourSummary> {
  const { dominant, channels } = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 3 },
  }).stats();
  return {
    dominant: [dominant.r, dominant.g, dominant.b],
    brightness: Math.max(...channels.map((channel) => channel.mean)),
  };
}

export function nearestColourName(rgb: [number, number, number]): string {
  let bestName = PALETTE[0].name;
  let bestDistance = Infinity;
  for (const colour of PALETTE) {
    const d =
      (rgb[0] - colour.rgb[0]) ** 2 + (rgb[1] - colour.rgb[1]) ** 2 + (rgb[2] - colour.rgb[2]) ** 2;
    if (d < bestDistance) {
      bestDistance = d;
      bestName = colour.name;
    }
  }
  return bestName;
}

export function orientationOf(width: number, height: number): 'square' | 'wide' | 'tall' {
  if (width === height) return 'square';
  return width > height ? 'wide' : 'tall';
}

/**
 * Offline caption engine that describes an image from its pixel statistics,
 * e.g. "a bright square image with mostly red tones".
 */
export class LocalCaptionEngine implements CaptionEngine {
  readonly name = 'local-colour-stats';
  readonly concurrentInference = true;

  async caption(image: Buffer): Promise<string> {
    const rgb = await decodeRgb(image);
    const { dominant, brightness } = await summarizeColours(rgb);

    const parts = ['a'];
    if (brightness < 64) parts.push('dark');
    else if (brightness > 192) parts.push('bright');
    parts.push(orientationOf(rgb.width, rgb.height), 'image with mostly', nearestColourName(dominant), 'tones');
    return parts.join(' ');
  }
}
