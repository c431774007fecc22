import { ModelFailure } from '../errors';
import type { CaptionEngine } from '../types';

export { LocalCaptionEngine } from './localCaption';
export { HttpCaptionEngine } from './httpCaptionEngine';

/** Runs the engine and guarantees a non-empty, trimmed caption. */
export async function captionChecked(engine: CaptionEngine, image: Buffer): Promise<string> {
  let caption: string;
  try {
    caption = await engine.caption(image);
  } catch (err) {
    throw ModelFailure.wrap('caption', err);
  }
  const trimmed = caption.trim();
  if (!trimmed) {
    throw new ModelFailure('caption', `${engine.name} returned an empty caption`);
  }
  return trimmed;
}
