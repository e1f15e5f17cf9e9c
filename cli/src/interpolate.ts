/**
 * Path interpolation between waypoints.
 *
 * Motion is strictly piecewise-linear: each segment A→B is sampled at
 * t = f/(F-1) for f = 0..F-1. Positions snap to whole pixels, zoom does not.
 */

import type { CameraState, Waypoint } from './types.js';
import { FlyoverError } from './errors.js';

function lerp(a: number, b: number, t: number): number {
  // t = 1 must land on b exactly, a + (b - a) * 1 does not always do that
  if (t === 1) return b;
  return a + (b - a) * t;
}

/**
 * Sample parameter for frame f of a segment with F frames.
 * A single-frame segment only ever shows its start.
 */
export function segmentT(frame: number, framesPerSegment: number): number {
  if (framesPerSegment <= 1) return 0;
  return frame / (framesPerSegment - 1);
}

export function interpolateState(a: Waypoint, b: Waypoint, t: number): CameraState {
  return Object.freeze({
    x: Math.round(lerp(a.x, b.x, t)),
    y: Math.round(lerp(a.y, b.y, t)),
    zoom: lerp(a.zoom, b.zoom, t),
  });
}

export function interpolateSegment(
  a: Waypoint,
  b: Waypoint,
  framesPerSegment: number
): CameraState[] {
  return Array.from({ length: framesPerSegment }, (_, f) =>
    interpolateState(a, b, segmentT(f, framesPerSegment))
  );
}

/**
 * All camera states for the tour, (N-1) * F of them.
 */
export function interpolatePath(
  waypoints: readonly Waypoint[],
  framesPerSegment: number
): readonly CameraState[] {
  const states: CameraState[] = [];
  for (let seg = 0; seg < waypoints.length - 1; seg++) {
    for (const state of interpolateSegment(waypoints[seg], waypoints[seg + 1], framesPerSegment)) {
      states.push(state);
    }
  }
  return Object.freeze(states);
}

export function countFrames(waypointCount: number, framesPerSegment: number): number {
  return Math.max(0, waypointCount - 1) * framesPerSegment;
}

/**
 * Camera state for a single frame, without building the whole path.
 * Matches interpolatePath(waypoints, F)[frameIndex].
 */
export function cameraStateAt(
  waypoints: readonly Waypoint[],
  framesPerSegment: number,
  frameIndex: number
): CameraState {
  const total = countFrames(waypoints.length, framesPerSegment);
  if (!Number.isInteger(frameIndex) || frameIndex < 0 || frameIndex >= total) {
    throw new FlyoverError(
      `Frame ${frameIndex} is outside the path (0..${total - 1})`,
      'INVALID_CONFIGURATION',
      { frameIndex, total }
    );
  }

  const seg = Math.floor(frameIndex / framesPerSegment);
  const f = frameIndex % framesPerSegment;
  return interpolateState(waypoints[seg], waypoints[seg + 1], segmentT(f, framesPerSegment));
}
