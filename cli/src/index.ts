#!/usr/bin/env node

/**
 * flyover CLI: turns a still image into a drone-style flyover video.
 *
 * Finds the most detailed regions of the image, tours them with a zooming
 * camera and renders the path with ImageMagick + FFmpeg. The planning
 * commands work without either tool installed.
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import type { FlyoverConfig } from './types.js';
import {
  DEFAULT_FLYOVER_CONFIG,
  applyOverrides,
  assertGridFitsImage,
  assertValidConfig,
  assertValidImage,
  parseConfigOverrides,
} from './config.js';
import { FlyoverError, describeError, isFlyoverError } from './errors.js';
import { cellsFromScores } from './grid.js';
import { planFromCells, summarizePlan } from './plan.js';
import { dryRunFlyover, pipelineToShellCommands, runFlyover } from './pipeline.js';
import { generateViewportFilter, resolveViewport } from './viewport.js';

const program = new Command();

program
  .name('flyover')
  .description('Plan and render a drone-style flyover video over a single still image.')
  .version('1.0.0');

/** Commander passes (value, previous); keep the radix out of it. */
const toNumber = (value: string): number => Number(value);

function withConfigOptions(cmd: Command): Command {
  return cmd
    .option('-g, --grid <number>', `Grid side length (default ${DEFAULT_FLYOVER_CONFIG.grid})`, toNumber)
    .option('-k, --top-k <number>', `Detail regions to visit (default ${DEFAULT_FLYOVER_CONFIG.topK})`, toNumber)
    .option(
      '-f, --frames-per-seg <number>',
      `Frames per segment (default ${DEFAULT_FLYOVER_CONFIG.framesPerSegment})`,
      toNumber
    )
    .option('--fps <number>', `Output frame rate (default ${DEFAULT_FLYOVER_CONFIG.fps})`, toNumber)
    .option('-z, --zoom <number>', `Zoom at each region (default ${DEFAULT_FLYOVER_CONFIG.zoomMedium})`, toNumber)
    .option('-c, --config <json>', 'JSON config object or path to a JSON file');
}

interface ConfigFlags {
  grid?: number;
  topK?: number;
  framesPerSeg?: number;
  fps?: number;
  zoom?: number;
  config?: string;
}

function resolveConfig(opts: ConfigFlags): FlyoverConfig {
  const base = opts.config ? parseConfigOverrides(parseJsonArg(opts.config)) : DEFAULT_FLYOVER_CONFIG;
  const config = applyOverrides(base, {
    grid: opts.grid,
    topK: opts.topK,
    framesPerSegment: opts.framesPerSeg,
    fps: opts.fps,
    zoomMedium: opts.zoom,
  });
  assertValidConfig(config);
  return config;
}

// ─── render ────────────────────────────────────────────────────────────────

withConfigOptions(
  program
    .command('render')
    .description('Analyse an image and render the flyover video')
    .argument('<input>', 'Input image path')
    .argument('[output]', 'Output video path', 'drone_output.mp4')
)
  .option('--keep-frames <dir>', 'Write the rendered frames to this directory and keep them')
  .option('--dry-run', 'Plan the path, then print the render/encode commands without running them')
  .action((input: string, output: string, opts: ConfigFlags & { keepFrames?: string; dryRun?: boolean }) => {
    const config = resolveConfig(opts);
    const log = (message: string) => console.error(message);
    const options = {
      inputPath: input,
      outputPath: output,
      config,
      keepFramesDir: opts.keepFrames,
      log,
    };

    if (opts.dryRun) {
      const { steps } = dryRunFlyover(options);
      const cmds = pipelineToShellCommands(steps);
      for (const [i, cmd] of cmds.entries()) {
        console.log(`# Step ${i + 1}: ${steps[i].description}`);
        console.log(cmd);
      }
      return;
    }

    runFlyover(options);
  });

// ─── plan ──────────────────────────────────────────────────────────────────

withConfigOptions(
  program
    .command('plan')
    .description('Plan a path from precomputed cell scores and print it as JSON')
    .requiredOption('--width <number>', 'Image width', toNumber)
    .requiredOption('--height <number>', 'Image height', toNumber)
    .requiredOption('-s, --scores <json>', 'Row-major JSON array of GRID*GRID scores, or path to a JSON file')
)
  .option('--waypoints-only', 'Only print the waypoints')
  .action((opts: ConfigFlags & { width: number; height: number; scores: string; waypointsOnly?: boolean }) => {
    const config = resolveConfig(opts);
    const image = { width: opts.width, height: opts.height, path: '' };
    assertValidImage(image);
    assertGridFitsImage(config.grid, image);

    const scores = parseJsonArg(opts.scores);
    if (!Array.isArray(scores) || !scores.every((s): s is number => typeof s === 'number')) {
      throw new FlyoverError('Scores must be a JSON array of numbers', 'SCORING_FAILURE');
    }

    const plan = planFromCells(image, config, cellsFromScores(image, config.grid, scores));

    if (opts.waypointsOnly) {
      console.log(JSON.stringify(plan.waypoints, null, 2));
      return;
    }

    console.log(
      JSON.stringify(
        { summary: summarizePlan(plan), waypoints: plan.waypoints, viewports: plan.viewports },
        null,
        2
      )
    );
  });

// ─── viewport ──────────────────────────────────────────────────────────────

program
  .command('viewport')
  .description('Resolve one camera state to a clamped crop rectangle')
  .requiredOption('--cx <number>', 'Camera center X (pixels)', toNumber)
  .requiredOption('--cy <number>', 'Camera center Y (pixels)', toNumber)
  .requiredOption('-z, --zoom <number>', 'Zoom factor (>= 1)', toNumber)
  .requiredOption('--width <number>', 'Image width', toNumber)
  .requiredOption('--height <number>', 'Image height', toNumber)
  .option('--filter-only', 'Only print the FFmpeg filter string')
  .action((opts: { cx: number; cy: number; zoom: number; width: number; height: number; filterOnly?: boolean }) => {
    assertValidImage({ width: opts.width, height: opts.height, path: '' });
    const viewport = resolveViewport({ x: opts.cx, y: opts.cy, zoom: opts.zoom }, opts.width, opts.height);
    const filter = generateViewportFilter(viewport, opts.width, opts.height);

    if (opts.filterOnly) {
      console.log(filter);
      return;
    }

    console.log(JSON.stringify(viewport));
    console.log(filter);
  });

// ─── defaults ──────────────────────────────────────────────────────────────

program
  .command('defaults')
  .description('Print the default configuration as JSON')
  .action(() => {
    console.log(JSON.stringify(DEFAULT_FLYOVER_CONFIG, null, 2));
  });

// ─── helpers ───────────────────────────────────────────────────────────────

function parseJsonArg(arg: string): unknown {
  let text = arg;
  if (existsSync(arg)) {
    text = readFileSync(arg, 'utf-8');
  } else if (arg.endsWith('.json')) {
    throw new FlyoverError(`File not found: ${arg}`, 'INVALID_CONFIGURATION');
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new FlyoverError(`Could not parse JSON from ${arg}: ${describeError(err)}`, 'INVALID_CONFIGURATION');
  }
}

try {
  program.parse();
} catch (err) {
  if (isFlyoverError(err)) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else {
    console.error(`Error: ${describeError(err)}`);
  }
  process.exit(1);
}
