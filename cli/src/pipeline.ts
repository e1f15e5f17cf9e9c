/**
 * Pipeline runner: image → edge map → scored grid → flight plan → frames → video.
 *
 * Usage:
 *   import { runFlyover } from 'flyover-cli';
 *   const { plan, outputPath } = runFlyover({ inputPath: 'photo.jpg', outputPath: 'out.mp4', config });
 *
 * runFlyoverWith() takes the ports directly and holds no resources itself;
 * runFlyover() wires the ImageMagick/FFmpeg adapters and owns the temp dir.
 */

import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, parse } from 'node:path';
import type {
  DetailScorer,
  FlightPlan,
  FlyoverConfig,
  FrameRenderer,
  ImageInfo,
  ImageProbe,
  Logger,
  VideoEncoder,
} from './types.js';
import { assertValidConfig } from './config.js';
import { planFlyover, summarizePlan } from './plan.js';
import { emitFrames, progressEvery } from './frames.js';
import { formatWaypoint } from './waypoints.js';
import { commandExists, runCommand, toShellCommand, type CommandRunner } from './exec.js';
import {
  buildFrameCommand,
  createMagickProbe,
  createMagickRenderer,
  createMagickScorer,
  detectMagick,
  framePath,
  generateEdgeMap,
  type MagickTool,
} from './magick.js';
import { buildEncodeCommand, createFfmpegEncoder, detectFfmpeg } from './encode.js';

const PROGRESS_EVERY = 50;

export interface PipelineStep {
  description: string;
  args: string[];
}

export interface FlyoverPorts<TFrame> {
  probe: ImageProbe;
  /** Called once the image is known, e.g. to build its edge map. */
  scorerFor(image: ImageInfo): DetailScorer;
  renderer: FrameRenderer<TFrame>;
  encoder: VideoEncoder<TFrame>;
}

export interface FlyoverResult {
  plan: FlightPlan;
  outputPath: string;
}

const silent: Logger = () => {};

function logPlan(plan: FlightPlan, log: Logger): void {
  const { waypoints, frames } = summarizePlan(plan);
  log(`Waypoints: ${waypoints} (start + top${plan.config.topK} + return)`);
  plan.waypoints.forEach((wp, i) => log(`  ${formatWaypoint(wp, i)}`));
  log(`Frames planned: ${frames}`);
}

/**
 * Probe the image and plan through the scorer it gets from `scorerFor`.
 * The config is checked before the image is even opened, and `scorerFor`
 * is not called until planFlyover has accepted the image.
 */
export function planThrough(
  inputPath: string,
  config: FlyoverConfig,
  ports: Pick<FlyoverPorts<unknown>, 'probe' | 'scorerFor'>,
  log: Logger = silent
): FlightPlan {
  assertValidConfig(config);

  const image = ports.probe.probe(inputPath);
  log(`Image size: ${image.width}x${image.height}`);

  const plan = planFlyover(image, config, (probed) => ports.scorerFor(probed));
  logPlan(plan, log);
  return plan;
}

/**
 * Probe, score, plan, render and encode through the given ports.
 */
export function runFlyoverWith<TFrame>(
  inputPath: string,
  config: FlyoverConfig,
  ports: FlyoverPorts<TFrame>,
  log: Logger = silent
): FlyoverResult {
  const plan = planThrough(inputPath, config, ports, log);
  const { image } = plan;

  log('Generating frames...');
  const frames = emitFrames(
    plan.viewports,
    ports.renderer,
    image.width,
    image.height,
    progressEvery(PROGRESS_EVERY, log)
  );
  log(`Total frames generated: ${frames.length}`);

  log(`Encoding at ${config.fps} fps...`);
  const outputPath = ports.encoder.encode(frames, config.fps);
  log(`Done. Output: ${outputPath}`);

  return { plan, outputPath };
}

// ─── ImageMagick + FFmpeg ─────────────────────────────────────────────────

export interface FlyoverRunOptions {
  inputPath: string;
  outputPath: string;
  config: FlyoverConfig;
  /** Write frames here and keep them; otherwise they live in a temp dir. */
  keepFramesDir?: string;
  tool?: MagickTool;
  run?: CommandRunner;
  isAvailable?: (cmd: string) => boolean;
  log?: Logger;
}

export interface FlyoverDryRunResult {
  plan: FlightPlan;
  steps: PipelineStep[];
}

/**
 * Default frame directory beside the output, e.g. out.mp4 → out_frames.
 */
export function framesDirFor(outputPath: string): string {
  const { dir, name } = parse(outputPath);
  return join(dir, `${name}_frames`);
}

interface Toolchain {
  tool: MagickTool;
  run: CommandRunner;
  log: Logger;
}

function resolveToolchain(options: FlyoverRunOptions): Toolchain {
  const isAvailable = options.isAvailable ?? commandExists;
  const tool = options.tool ?? detectMagick(isAvailable);
  detectFfmpeg(isAvailable);
  return { tool, run: options.run ?? runCommand, log: options.log ?? silent };
}

function magickPorts(
  options: FlyoverRunOptions,
  chain: Toolchain,
  workDir: string,
  frameDir: string
): FlyoverPorts<string> {
  const { tool, run, log } = chain;
  return {
    probe: createMagickProbe(tool, run),
    scorerFor: (image) => {
      const edgeMap = generateEdgeMap(tool, image.path, join(workDir, 'edges.png'), run);
      log('Edge map generated.');
      return createMagickScorer(tool, edgeMap, run);
    },
    renderer: createMagickRenderer(tool, options.inputPath, frameDir, run),
    encoder: createFfmpegEncoder(frameDir, options.outputPath, run),
  };
}

/**
 * Full run with ImageMagick and FFmpeg. The temp dir (edge map and, unless
 * keepFramesDir is set, the frames) is removed whether or not the run succeeds.
 */
export function runFlyover(options: FlyoverRunOptions): FlyoverResult {
  assertValidConfig(options.config);
  const chain = resolveToolchain(options);
  const workDir = mkdtempSync(join(tmpdir(), 'flyover-'));
  chain.log(`Temporary dir: ${workDir}`);

  try {
    const frameDir = options.keepFramesDir ?? join(workDir, 'frames');
    mkdirSync(frameDir, { recursive: true });
    const ports = magickPorts(options, chain, workDir, frameDir);
    return runFlyoverWith(options.inputPath, options.config, ports, chain.log);
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}

/**
 * Score and plan for real, but only return the render and encode commands.
 * Nothing is written outside the temp dir.
 */
export function dryRunFlyover(options: FlyoverRunOptions): FlyoverDryRunResult {
  assertValidConfig(options.config);
  const chain = resolveToolchain(options);
  const workDir = mkdtempSync(join(tmpdir(), 'flyover-'));

  try {
    const frameDir = options.keepFramesDir ?? framesDirFor(options.outputPath);
    const ports = magickPorts(options, chain, workDir, frameDir);
    const plan = planThrough(options.inputPath, options.config, ports, chain.log);
    return { plan, steps: buildFlyoverSteps(plan, chain.tool, frameDir, options.outputPath) };
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}

/**
 * Create the frame directory, render each frame, then encode.
 */
export function buildFlyoverSteps(
  plan: FlightPlan,
  tool: MagickTool,
  frameDir: string,
  outputPath: string
): PipelineStep[] {
  const { image } = plan;
  const total = plan.viewports.length;

  const steps: PipelineStep[] = [
    { description: `Create frame directory ${frameDir}`, args: ['mkdir', '-p', frameDir] },
  ];

  plan.viewports.forEach((viewport, i) => {
    steps.push({
      description: `Render frame ${i + 1}/${total}`,
      args: buildFrameCommand(tool, image.path, viewport, image.width, image.height, framePath(frameDir, i)),
    });
  });

  steps.push({
    description: `Encode ${total} frames at ${plan.config.fps} fps`,
    args: buildEncodeCommand(frameDir, total, plan.config.fps, outputPath),
  });

  return steps;
}

/**
 * Shell-quoted command lines for the steps.
 */
export function pipelineToShellCommands(steps: PipelineStep[]): string[] {
  return steps.map((step) => toShellCommand(step.args));
}
