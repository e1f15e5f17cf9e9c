/**
 * Library exports for programmatic use.
 *
 * import { planFlyover, resolveViewport, runFlyover, ... } from 'flyover-cli';
 */

// Types
export type {
  ImageInfo,
  Rect,
  Cell,
  Waypoint,
  CameraState,
  Viewport,
  FlyoverConfig,
  FlightPlan,
  ImageProbe,
  DetailScorer,
  FrameRenderer,
  VideoEncoder,
  Logger,
} from './types.js';

// Errors
export { FlyoverError, isFlyoverError, describeError } from './errors.js';
export type { FlyoverErrorCode } from './errors.js';

// Config
export {
  DEFAULT_FLYOVER_CONFIG,
  validateConfig,
  assertValidConfig,
  assertValidImage,
  assertGridFitsImage,
  parseConfigOverrides,
  applyOverrides,
} from './config.js';

// Planning
export { computeGridCells, scoreGrid, cellsFromScores } from './grid.js';
export {
  OVERVIEW_ZOOM,
  compareCells,
  rankCells,
  selectTopCells,
  imageCenter,
  buildWaypoints,
  formatWaypoint,
} from './waypoints.js';
export {
  segmentT,
  interpolateState,
  interpolateSegment,
  interpolatePath,
  countFrames,
  cameraStateAt,
} from './interpolate.js';
export {
  resolveViewport,
  resolveViewports,
  isContained,
  toGeometry,
  generateViewportFilter,
} from './viewport.js';
export { planFlyover, planFromCells, summarizePlan } from './plan.js';

// Rendering
export { emitFrames, progressEvery } from './frames.js';
export type { FrameCallback } from './frames.js';

// Adapters
export { runCommand, commandExists, toShellCommand, CommandError } from './exec.js';
export type { CommandRunner } from './exec.js';
export {
  MAGICK_V6,
  MAGICK_V7,
  CANNY_PARAMS,
  FRAME_PATTERN,
  detectMagick,
  framePath,
  buildIdentifyCommand,
  buildEdgeMapCommand,
  buildCellScoreCommand,
  buildFrameCommand,
  parseDimensions,
  createMagickProbe,
  generateEdgeMap,
  createMagickScorer,
  createMagickRenderer,
} from './magick.js';
export type { MagickTool } from './magick.js';
export { EVEN_SCALE_FILTER, detectFfmpeg, buildEncodeCommand, createFfmpegEncoder } from './encode.js';

// Pipeline
export {
  planThrough,
  runFlyoverWith,
  runFlyover,
  dryRunFlyover,
  framesDirFor,
  buildFlyoverSteps,
  pipelineToShellCommands,
} from './pipeline.js';
export type {
  PipelineStep,
  FlyoverPorts,
  FlyoverResult,
  FlyoverRunOptions,
  FlyoverDryRunResult,
} from './pipeline.js';
