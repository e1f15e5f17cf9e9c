/**
 * Waypoint selection: start at the image center, visit the top-K detail
 * cells in descending score order, then return to the center.
 */

import type { Cell, ImageInfo, Waypoint } from './types.js';

/** Zoom at the start and end of the tour (full frame). */
export const OVERVIEW_ZOOM = 1.0;

/**
 * Score descending; equal scores go to the lower cell index.
 */
export function compareCells(a: Cell, b: Cell): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.index - b.index;
}

export function rankCells(cells: readonly Cell[]): Cell[] {
  return [...cells].sort(compareCells);
}

/**
 * Pick the k best cells. Asking for more cells than the grid has is not an
 * error: k is clamped to the cell count and every cell is visited.
 */
export function selectTopCells(cells: readonly Cell[], k: number): Cell[] {
  const count = Math.max(0, Math.min(k, cells.length));
  return rankCells(cells).slice(0, count);
}

export function imageCenter(image: Pick<ImageInfo, 'width' | 'height'>): Waypoint {
  return Object.freeze({
    x: Math.floor(image.width / 2),
    y: Math.floor(image.height / 2),
    zoom: OVERVIEW_ZOOM,
  });
}

/**
 * [center, ...selected, center]. Interior stops all share zoomMedium; the
 * selected cells are visited in the order given.
 */
export function buildWaypoints(
  image: Pick<ImageInfo, 'width' | 'height'>,
  selected: readonly Cell[],
  zoomMedium: number
): readonly Waypoint[] {
  const center = imageCenter(image);
  const stops = selected.map((cell) =>
    Object.freeze({ x: cell.centerX, y: cell.centerY, zoom: zoomMedium })
  );
  return Object.freeze([center, ...stops, center]);
}

export function formatWaypoint(waypoint: Waypoint, index: number): string {
  return `WP${index} -> x=${waypoint.x} y=${waypoint.y} zoom=${waypoint.zoom}`;
}
