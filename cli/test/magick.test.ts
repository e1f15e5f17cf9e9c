import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  MAGICK_V6,
  MAGICK_V7,
  buildCellScoreCommand,
  buildEdgeMapCommand,
  buildFrameCommand,
  buildIdentifyCommand,
  createMagickProbe,
  createMagickRenderer,
  createMagickScorer,
  detectMagick,
  framePath,
  generateEdgeMap,
  parseDimensions,
} from '../src/magick.js';
import type { CommandRunner } from '../src/exec.js';
import { catchFlyoverError } from './helpers.js';

function recordingRunner(output: string): CommandRunner & { calls: string[][] } {
  const calls: string[][] = [];
  const run = (args: readonly string[]) => {
    calls.push([...args]);
    return output;
  };
  return Object.assign(run, { calls });
}

const failing: CommandRunner = () => {
  throw new Error('exit code 1');
};

describe('detectMagick', () => {
  it('prefers the ImageMagick 7 binary', () => {
    expect(detectMagick(() => true)).toBe(MAGICK_V7);
  });

  it('falls back to convert', () => {
    expect(detectMagick((cmd) => cmd === 'convert')).toBe(MAGICK_V6);
  });

  it('fails when neither is installed', () => {
    expect(catchFlyoverError(() => detectMagick(() => false)).code).toBe('INVALID_IMAGE');
  });
});

describe('command builders', () => {
  it('builds identify for both ImageMagick versions', () => {
    expect(buildIdentifyCommand(MAGICK_V7, 'in.jpg')).toEqual(['magick', 'identify', '-format', '%w %h\n', 'in.jpg']);
    expect(buildIdentifyCommand(MAGICK_V6, 'in.jpg')).toEqual(['identify', '-format', '%w %h\n', 'in.jpg']);
  });

  it('builds the canny edge map', () => {
    expect(buildEdgeMapCommand(MAGICK_V6, 'in.jpg', 'edges.png')).toEqual([
      'convert', 'in.jpg', '-colorspace', 'Gray', '-canny', '0x1+10%+30%', 'edges.png',
    ]);
  });

  it('measures the mean of one cell', () => {
    expect(buildCellScoreCommand(MAGICK_V7, 'edges.png', { x: 100, y: 80, width: 100, height: 80 })).toEqual([
      'magick', 'edges.png', '-crop', '100x80+100+80', '+repage', '-format', '%[fx:mean]', 'info:',
    ]);
  });

  it('crops and resizes a frame to the exact output size', () => {
    const viewport = { x: 0, y: 115, width: 714, height: 571 };
    expect(buildFrameCommand(MAGICK_V7, 'in.jpg', viewport, 1000, 800, 'frame_00003.jpg')).toEqual([
      'magick', 'in.jpg', '-crop', '714x571+0+115', '+repage', '-resize', '1000x800!', 'frame_00003.jpg',
    ]);
  });

  it('numbers frames with five digits', () => {
    expect(framePath('frames', 7)).toBe(join('frames', 'frame_00007.jpg'));
    expect(framePath('frames', 12345)).toBe(join('frames', 'frame_12345.jpg'));
  });
});

describe('parseDimensions', () => {
  it('reads "W H" output', () => {
    expect(parseDimensions('1000 800\n', 'in.jpg')).toEqual({ width: 1000, height: 800, path: 'in.jpg' });
  });

  it('rejects unreadable and zero-area output', () => {
    expect(catchFlyoverError(() => parseDimensions('no such image', 'in.jpg')).code).toBe('INVALID_IMAGE');
    expect(catchFlyoverError(() => parseDimensions('0 800', 'in.jpg')).code).toBe('INVALID_IMAGE');
  });
});

describe('createMagickProbe', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'flyover-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the image size through identify', () => {
    const input = join(dir, 'in.jpg');
    writeFileSync(input, 'not really a jpeg');
    const run = recordingRunner('640 480\n');

    expect(createMagickProbe(MAGICK_V7, run).probe(input)).toEqual({ width: 640, height: 480, path: input });
    expect(run.calls).toEqual([['magick', 'identify', '-format', '%w %h\n', input]]);
  });

  it('fails on a missing file without running anything', () => {
    const run = recordingRunner('640 480');
    const err = catchFlyoverError(() => createMagickProbe(MAGICK_V7, run).probe(join(dir, 'missing.jpg')));

    expect(err.code).toBe('INVALID_IMAGE');
    expect(run.calls).toEqual([]);
  });

  it('fails when identify cannot read the file', () => {
    const input = join(dir, 'broken.jpg');
    writeFileSync(input, '');
    expect(catchFlyoverError(() => createMagickProbe(MAGICK_V7, failing).probe(input)).code).toBe('INVALID_IMAGE');
  });
});

describe('generateEdgeMap', () => {
  it('returns the edge map path', () => {
    const run = recordingRunner('');
    expect(generateEdgeMap(MAGICK_V7, 'in.jpg', 'edges.png', run)).toBe('edges.png');
    expect(run.calls).toHaveLength(1);
  });

  it('reports failures as SCORING_FAILURE', () => {
    expect(catchFlyoverError(() => generateEdgeMap(MAGICK_V7, 'in.jpg', 'edges.png', failing)).code).toBe(
      'SCORING_FAILURE'
    );
  });
});

describe('createMagickScorer', () => {
  it('parses the fx:mean output', () => {
    const run = recordingRunner('0.25\n');
    const scorer = createMagickScorer(MAGICK_V6, 'edges.png', run);

    expect(scorer.score({ x: 0, y: 0, width: 10, height: 10 })).toBe(0.25);
    expect(run.calls[0]).toEqual(['convert', 'edges.png', '-crop', '10x10+0+0', '+repage', '-format', '%[fx:mean]', 'info:']);
  });

  it('turns empty output into NaN for the grid scorer to reject', () => {
    const scorer = createMagickScorer(MAGICK_V6, 'edges.png', recordingRunner('  \n'));
    expect(scorer.score({ x: 0, y: 0, width: 10, height: 10 })).toBeNaN();
  });
});

describe('createMagickRenderer', () => {
  it('writes numbered frames into the frame directory', () => {
    const run = recordingRunner('');
    const renderer = createMagickRenderer(MAGICK_V7, 'in.jpg', 'frames', run);
    const out = renderer.render({ x: 1, y: 2, width: 3, height: 4 }, 42, 30, 40);

    expect(out).toBe(join('frames', 'frame_00042.jpg'));
    expect(run.calls).toEqual([
      ['magick', 'in.jpg', '-crop', '3x4+1+2', '+repage', '-resize', '30x40!', join('frames', 'frame_00042.jpg')],
    ]);
  });
});
