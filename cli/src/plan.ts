/**
 * Flight planning: chains grid scoring, waypoint selection, interpolation
 * and viewport resolution into one immutable FlightPlan.
 *
 * Usage:
 *   import { planFlyover } from 'flyover-cli';
 *   const plan = planFlyover(image, DEFAULT_FLYOVER_CONFIG, scorer);
 *   // plan.viewports[i] is the crop rectangle for frame i
 */

import type { Cell, DetailScorer, FlightPlan, FlyoverConfig, ImageInfo } from './types.js';
import { assertGridFitsImage, assertValidConfig, assertValidImage } from './config.js';
import { scoreGrid } from './grid.js';
import { buildWaypoints, selectTopCells } from './waypoints.js';
import { interpolatePath } from './interpolate.js';
import { resolveViewports } from './viewport.js';

/**
 * Plan from cells that already carry their scores.
 */
export function planFromCells(
  image: ImageInfo,
  config: FlyoverConfig,
  cells: readonly Cell[]
): FlightPlan {
  const selected = selectTopCells(cells, config.topK);
  const waypoints = buildWaypoints(image, selected, config.zoomMedium);
  const states = interpolatePath(waypoints, config.framesPerSegment);
  const viewports = resolveViewports(states, image.width, image.height);

  return Object.freeze({
    image: Object.freeze({ ...image }),
    config: Object.freeze({ ...config }),
    cells,
    waypoints,
    states,
    viewports,
  });
}

/**
 * Validate, score the grid through the scorer, then plan. Nothing is scored
 * until the config and image have been checked; a scorer factory is only
 * called after that.
 */
export function planFlyover(
  image: ImageInfo,
  config: FlyoverConfig,
  scorer: DetailScorer | ((image: ImageInfo) => DetailScorer)
): FlightPlan {
  assertValidImage(image);
  assertValidConfig(config);
  assertGridFitsImage(config.grid, image);

  const detail = typeof scorer === 'function' ? scorer(image) : scorer;
  const cells = scoreGrid(image, config.grid, detail);
  return planFromCells(image, config, cells);
}

export function summarizePlan(plan: FlightPlan): {
  waypoints: number;
  segments: number;
  frames: number;
  durationSec: number;
} {
  const segments = Math.max(0, plan.waypoints.length - 1);
  const frames = plan.viewports.length;
  return {
    waypoints: plan.waypoints.length,
    segments,
    frames,
    durationSec: frames / plan.config.fps,
  };
}
