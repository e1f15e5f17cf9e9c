/**
 * Core types for the flyover planner.
 * Everything here is plain data; the planning stages pass these between
 * pure functions and never mutate them after creation.
 */

// --- Image ---

export interface ImageInfo {
  /** Source width in pixels */
  width: number;
  /** Source height in pixels */
  height: number;
  /** Opaque handle to the source, passed through to the adapters */
  path: string;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// --- Grid ---

export interface Cell extends Rect {
  /** Row-major position in the grid */
  index: number;
  column: number;
  row: number;
  centerX: number;
  centerY: number;
  /** Mean detail intensity (0-1) */
  score: number;
}

// --- Path ---

export interface Waypoint {
  x: number;
  y: number;
  /** Magnification, 1.0 = full frame */
  zoom: number;
}

/** Interpolated camera position for a single frame. */
export type CameraState = Waypoint;

/** Pixel rectangle of the source visible in one frame, before rescaling. */
export type Viewport = Rect;

// --- Config ---

export interface FlyoverConfig {
  /** Grid side length (GRID x GRID cells) */
  grid: number;
  /** How many top-detail cells to visit */
  topK: number;
  /** Frames interpolated per segment between two waypoints */
  framesPerSegment: number;
  /** Output frame rate, only used by the encoder */
  fps: number;
  /** Zoom factor at interior waypoints */
  zoomMedium: number;
}

export interface FlightPlan {
  image: ImageInfo;
  config: FlyoverConfig;
  cells: readonly Cell[];
  waypoints: readonly Waypoint[];
  states: readonly CameraState[];
  viewports: readonly Viewport[];
}

// --- Ports ---

export interface ImageProbe {
  probe(path: string): ImageInfo;
}

export interface DetailScorer {
  /** Mean detail intensity of a region, expected in 0-1. */
  score(rect: Rect): number;
}

export interface FrameRenderer<TFrame> {
  render(viewport: Viewport, frameIndex: number, outputWidth: number, outputHeight: number): TFrame;
}

export interface VideoEncoder<TFrame> {
  /** Returns the path of the encoded video. */
  encode(frames: readonly TFrame[], fps: number): string;
}

export type Logger = (message: string) => void;
