/**
 * Frame emission: hands each viewport to the renderer in frame order.
 */

import type { FrameRenderer, Viewport } from './types.js';
import { FlyoverError, describeError, isFlyoverError } from './errors.js';

export type FrameCallback = (frameIndex: number, total: number) => void;

/**
 * Render every viewport, strictly in index order. A failed frame aborts the
 * run; frames are never skipped or replaced.
 */
export function emitFrames<TFrame>(
  viewports: readonly Viewport[],
  renderer: FrameRenderer<TFrame>,
  outputWidth: number,
  outputHeight: number,
  onFrame?: FrameCallback
): TFrame[] {
  const frames: TFrame[] = [];

  for (const [i, viewport] of viewports.entries()) {
    try {
      frames.push(renderer.render(viewport, i, outputWidth, outputHeight));
    } catch (err) {
      if (isFlyoverError(err) && err.code === 'RENDER_FAILURE') throw err;
      throw new FlyoverError(
        `Rendering frame ${i} failed: ${describeError(err)}`,
        'RENDER_FAILURE',
        { frameIndex: i },
        { cause: err }
      );
    }
    onFrame?.(i + 1, viewports.length);
  }

  return frames;
}

/**
 * Progress logger that reports every `every` frames, plus the last one.
 */
export function progressEvery(every: number, log: (message: string) => void): FrameCallback {
  return (done, total) => {
    if (done % every === 0 || done === total) {
      log(`  generated frames: ${done}/${total}`);
    }
  };
}
