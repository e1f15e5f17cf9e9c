/**
 * FFmpeg encoder adapter: muxes the numbered JPEG frames into an MP4.
 *
 * Usage:
 *   const encoder = createFfmpegEncoder('/tmp/frames', 'out.mp4');
 *   encoder.encode(frames, 30);
 */

import { join } from 'node:path';
import type { VideoEncoder } from './types.js';
import { FlyoverError, describeError } from './errors.js';
import { commandExists, runCommand, type CommandRunner } from './exec.js';
import { FRAME_PATTERN } from './magick.js';

/** libx264 + yuv420p needs even dimensions, so round odd sizes down. */
export const EVEN_SCALE_FILTER = 'scale=trunc(iw/2)*2:trunc(ih/2)*2';

export function detectFfmpeg(isAvailable: (cmd: string) => boolean = commandExists): string {
  if (!isAvailable('ffmpeg')) {
    throw new FlyoverError('ffmpeg not found. Install it and make sure it is on PATH.', 'ENCODING_FAILURE');
  }
  return 'ffmpeg';
}

/** `-frames:v` caps the pattern read at frameCount, leftovers in frameDir are ignored. */
export function buildEncodeCommand(
  frameDir: string,
  frameCount: number,
  fps: number,
  outputPath: string
): string[] {
  return [
    'ffmpeg', '-y',
    '-framerate', String(fps),
    '-i', join(frameDir, FRAME_PATTERN),
    '-frames:v', String(frameCount),
    '-vf', `${EVEN_SCALE_FILTER},format=yuv420p`,
    '-c:v', 'libx264', '-preset', 'fast', '-crf', '18',
    '-pix_fmt', 'yuv420p',
    outputPath,
  ];
}

/**
 * Encodes frames rendered by the ImageMagick renderer into `frameDir`.
 * FFmpeg reads them by pattern, capped at the length of the frame list.
 */
export function createFfmpegEncoder(
  frameDir: string,
  outputPath: string,
  run: CommandRunner = runCommand
): VideoEncoder<string> {
  return {
    encode(frames, fps) {
      if (frames.length === 0) {
        throw new FlyoverError('No frames to encode', 'ENCODING_FAILURE');
      }
      try {
        run(buildEncodeCommand(frameDir, frames.length, fps, outputPath));
      } catch (err) {
        throw new FlyoverError(`Encoding failed: ${describeError(err)}`, 'ENCODING_FAILURE', { outputPath }, {
          cause: err,
        });
      }
      return outputPath;
    },
  };
}
