/**
 * Viewport resolution: camera state → integer crop rectangle that always
 * lies fully inside the source image.
 *
 * Usage:
 *   const vp = resolveViewport({ x: 50, y: 400, zoom: 1.4 }, 1000, 800);
 *   // → { x: 0, y: 115, width: 714, height: 571 }
 *   generateViewportFilter(vp, 1000, 800);
 *   // → "crop=714:571:0:115,scale=1000:800:flags=lanczos"
 */

import type { CameraState, Viewport } from './types.js';
import { FlyoverError } from './errors.js';

/**
 * Size is floor(W/zoom) x floor(H/zoom), at least 1x1. The top-left is
 * clamped to 0 first and to W - width second, so with width <= W the
 * rectangle ends up inside the image either way.
 */
export function resolveViewport(state: CameraState, width: number, height: number): Viewport {
  if (!(state.zoom >= 1)) {
    throw new FlyoverError(
      `Zoom ${state.zoom} would produce a viewport larger than the image`,
      'INVALID_CONFIGURATION',
      { zoom: state.zoom }
    );
  }

  const vw = Math.max(1, Math.floor(width / state.zoom));
  const vh = Math.max(1, Math.floor(height / state.zoom));

  let x0 = state.x - Math.floor(vw / 2);
  let y0 = state.y - Math.floor(vh / 2);
  if (x0 < 0) x0 = 0;
  if (y0 < 0) y0 = 0;
  if (x0 + vw > width) x0 = width - vw;
  if (y0 + vh > height) y0 = height - vh;

  return Object.freeze({ x: x0, y: y0, width: vw, height: vh });
}

export function resolveViewports(
  states: readonly CameraState[],
  width: number,
  height: number
): readonly Viewport[] {
  return Object.freeze(states.map((state) => resolveViewport(state, width, height)));
}

export function isContained(viewport: Viewport, width: number, height: number): boolean {
  return (
    viewport.width >= 1 &&
    viewport.height >= 1 &&
    viewport.x >= 0 &&
    viewport.y >= 0 &&
    viewport.x + viewport.width <= width &&
    viewport.y + viewport.height <= height
  );
}

/**
 * ImageMagick geometry string, e.g. "714x571+0+29".
 */
export function toGeometry(viewport: Viewport): string {
  return `${viewport.width}x${viewport.height}+${viewport.x}+${viewport.y}`;
}

/**
 * FFmpeg crop+scale filter that renders one viewport at output resolution.
 */
export function generateViewportFilter(
  viewport: Viewport,
  outputWidth: number,
  outputHeight: number
): string {
  return `crop=${viewport.width}:${viewport.height}:${viewport.x}:${viewport.y},scale=${outputWidth}:${outputHeight}:flags=lanczos`;
}
