/**
 * ImageMagick adapters for the probe, scorer and renderer ports.
 *
 * Each adapter builds an argument list and runs it through a CommandRunner,
 * so the commands can be printed (--dry-run) or faked in tests.
 *
 * Usage:
 *   const tool = detectMagick();
 *   const image = createMagickProbe(tool).probe('photo.jpg');
 *   generateEdgeMap(tool, image.path, '/tmp/edges.png');
 *   const scorer = createMagickScorer(tool, '/tmp/edges.png');
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { DetailScorer, FrameRenderer, ImageInfo, ImageProbe, Rect, Viewport } from './types.js';
import { FlyoverError, describeError } from './errors.js';
import { commandExists, runCommand, type CommandRunner } from './exec.js';
import { toGeometry } from './viewport.js';

export interface MagickTool {
  name: 'magick' | 'convert';
  /** Prefix for image-processing commands */
  convert: readonly string[];
  /** Prefix for metadata queries */
  identify: readonly string[];
}

/** ImageMagick 7 single binary. */
export const MAGICK_V7: MagickTool = { name: 'magick', convert: ['magick'], identify: ['magick', 'identify'] };

/** ImageMagick 6 separate binaries. */
export const MAGICK_V6: MagickTool = { name: 'convert', convert: ['convert'], identify: ['identify'] };

/** Canny parameters tuned for general photos. */
export const CANNY_PARAMS = '0x1+10%+30%';

export const FRAME_PATTERN = 'frame_%05d.jpg';

export function detectMagick(isAvailable: (cmd: string) => boolean = commandExists): MagickTool {
  if (isAvailable('magick')) return MAGICK_V7;
  if (isAvailable('convert')) return MAGICK_V6;
  throw new FlyoverError('ImageMagick not found. Install it (magick or convert on PATH).', 'INVALID_IMAGE');
}

export function framePath(dir: string, index: number): string {
  return join(dir, `frame_${String(index).padStart(5, '0')}.jpg`);
}

// ─── commands ─────────────────────────────────────────────────────────────

export function buildIdentifyCommand(tool: MagickTool, imagePath: string): string[] {
  return [...tool.identify, '-format', '%w %h\n', imagePath];
}

export function buildEdgeMapCommand(tool: MagickTool, inputPath: string, outputPath: string): string[] {
  return [...tool.convert, inputPath, '-colorspace', 'Gray', '-canny', CANNY_PARAMS, outputPath];
}

/**
 * Mean intensity of one region of the edge map. fx:mean is already 0-1,
 * unlike %[mean] which reports in quantum units.
 */
export function buildCellScoreCommand(tool: MagickTool, edgeMapPath: string, rect: Rect): string[] {
  return [...tool.convert, edgeMapPath, '-crop', toGeometry(rect), '+repage', '-format', '%[fx:mean]', 'info:'];
}

/**
 * Crop one viewport and resize it back to output resolution. The `!` forces
 * the exact size, so every frame matches even when the viewport aspect
 * drifts by a pixel.
 */
export function buildFrameCommand(
  tool: MagickTool,
  sourcePath: string,
  viewport: Viewport,
  outputWidth: number,
  outputHeight: number,
  outputPath: string
): string[] {
  return [
    ...tool.convert,
    sourcePath,
    '-crop', toGeometry(viewport),
    '+repage',
    '-resize', `${outputWidth}x${outputHeight}!`,
    outputPath,
  ];
}

// ─── adapters ─────────────────────────────────────────────────────────────

export function parseDimensions(output: string, imagePath: string): ImageInfo {
  const match = /^\s*(\d+)\s+(\d+)/.exec(output);
  if (!match) {
    throw new FlyoverError(`Could not read dimensions of ${imagePath} from "${output.trim()}"`, 'INVALID_IMAGE');
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width < 1 || height < 1) {
    throw new FlyoverError(`Image has zero area: ${imagePath} (${width}x${height})`, 'INVALID_IMAGE', {
      width,
      height,
    });
  }
  return { width, height, path: imagePath };
}

export function createMagickProbe(tool: MagickTool, run: CommandRunner = runCommand): ImageProbe {
  return {
    probe(imagePath) {
      if (!existsSync(imagePath)) {
        throw new FlyoverError(`Input file not found: ${imagePath}`, 'INVALID_IMAGE');
      }
      let output: string;
      try {
        output = run(buildIdentifyCommand(tool, imagePath));
      } catch (err) {
        throw new FlyoverError(`Unreadable image ${imagePath}: ${describeError(err)}`, 'INVALID_IMAGE', undefined, {
          cause: err,
        });
      }
      return parseDimensions(output, imagePath);
    },
  };
}

export function generateEdgeMap(
  tool: MagickTool,
  inputPath: string,
  outputPath: string,
  run: CommandRunner = runCommand
): string {
  try {
    run(buildEdgeMapCommand(tool, inputPath, outputPath));
  } catch (err) {
    throw new FlyoverError(`Edge map generation failed: ${describeError(err)}`, 'SCORING_FAILURE', undefined, {
      cause: err,
    });
  }
  return outputPath;
}

/**
 * Scores cells of a precomputed edge map. Errors are left to the grid
 * scorer, which wraps them with the failing cell.
 */
export function createMagickScorer(
  tool: MagickTool,
  edgeMapPath: string,
  run: CommandRunner = runCommand
): DetailScorer {
  return {
    score(rect) {
      const output = run(buildCellScoreCommand(tool, edgeMapPath, rect)).trim();
      return output === '' ? Number.NaN : Number(output);
    },
  };
}

export function createMagickRenderer(
  tool: MagickTool,
  sourcePath: string,
  frameDir: string,
  run: CommandRunner = runCommand
): FrameRenderer<string> {
  return {
    render(viewport, frameIndex, outputWidth, outputHeight) {
      const outputPath = framePath(frameDir, frameIndex);
      run(buildFrameCommand(tool, sourcePath, viewport, outputWidth, outputHeight, outputPath));
      return outputPath;
    },
  };
}
