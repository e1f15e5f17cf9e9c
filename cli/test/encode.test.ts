import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { buildEncodeCommand, createFfmpegEncoder, detectFfmpeg } from '../src/encode.js';
import type { CommandRunner } from '../src/exec.js';
import { catchFlyoverError } from './helpers.js';

describe('buildEncodeCommand', () => {
  it('encodes the numbered frames with libx264/yuv420p', () => {
    expect(buildEncodeCommand('frames', 360, 30, 'out.mp4')).toEqual([
      'ffmpeg', '-y',
      '-framerate', '30',
      '-i', join('frames', 'frame_%05d.jpg'),
      '-frames:v', '360',
      '-vf', 'scale=trunc(iw/2)*2:trunc(ih/2)*2,format=yuv420p',
      '-c:v', 'libx264', '-preset', 'fast', '-crf', '18',
      '-pix_fmt', 'yuv420p',
      'out.mp4',
    ]);
  });
});

describe('detectFfmpeg', () => {
  it('fails when ffmpeg is missing', () => {
    expect(detectFfmpeg(() => true)).toBe('ffmpeg');
    expect(catchFlyoverError(() => detectFfmpeg(() => false)).code).toBe('ENCODING_FAILURE');
  });
});

describe('createFfmpegEncoder', () => {
  it('runs ffmpeg once and returns the output path', () => {
    const calls: string[][] = [];
    const run: CommandRunner = (args) => {
      calls.push([...args]);
      return '';
    };

    const out = createFfmpegEncoder('frames', 'out.mp4', run).encode(['a.jpg', 'b.jpg'], 24);

    expect(out).toBe('out.mp4');
    expect(calls).toEqual([buildEncodeCommand('frames', 2, 24, 'out.mp4')]);
  });

  it('caps the read at the frames it was given', () => {
    const calls: string[][] = [];
    const encoder = createFfmpegEncoder('kept', 'out.mp4', (args) => {
      calls.push([...args]);
      return '';
    });

    encoder.encode(['f0.jpg', 'f1.jpg', 'f2.jpg'], 30);

    const at = calls[0].indexOf('-frames:v');
    expect(calls[0].slice(at, at + 2)).toEqual(['-frames:v', '3']);
  });

  it('refuses to encode zero frames', () => {
    const encoder = createFfmpegEncoder('frames', 'out.mp4', () => '');
    expect(catchFlyoverError(() => encoder.encode([], 30)).code).toBe('ENCODING_FAILURE');
  });

  it('reports ffmpeg errors as ENCODING_FAILURE', () => {
    const encoder = createFfmpegEncoder('frames', 'out.mp4', () => {
      throw new Error('ffmpeg failed with exit code 1: Invalid argument');
    });
    const err = catchFlyoverError(() => encoder.encode(['a.jpg'], 30));

    expect(err.code).toBe('ENCODING_FAILURE');
    expect(err.message).toBe('Encoding failed: ffmpeg failed with exit code 1: Invalid argument');
  });
});
