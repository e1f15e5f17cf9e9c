import { describe, expect, it } from 'vitest';
import { cellsFromScores, computeGridCells, scoreGrid } from '../src/grid.js';
import type { Rect } from '../src/types.js';
import { catchFlyoverError } from './helpers.js';

const image = { width: 1000, height: 800, path: 'test.jpg' };

describe('computeGridCells', () => {
  it('splits an evenly divisible image into uniform cells', () => {
    const cells = computeGridCells(1000, 800, 10);

    expect(cells).toHaveLength(100);
    expect(cells.every((c) => c.width === 100 && c.height === 80)).toBe(true);
    expect(cells[0]).toMatchObject({ index: 0, column: 0, row: 0, x: 0, y: 0, centerX: 50, centerY: 40 });
    expect(cells[99]).toMatchObject({ index: 99, column: 9, row: 9, x: 900, y: 720, centerX: 950, centerY: 760 });
  });

  it('gives the remainder to the last column and row only', () => {
    const cells = computeGridCells(1003, 805, 4);

    expect(cells.slice(0, 4).map((c) => c.width)).toEqual([250, 250, 250, 253]);
    expect(cells.filter((c) => c.column === 0).map((c) => c.height)).toEqual([201, 201, 201, 202]);
    expect(cells[15]).toMatchObject({ x: 750, y: 603, width: 253, height: 202, centerX: 876, centerY: 704 });
  });

  it('tiles the image exactly for awkward sizes', () => {
    for (const [w, h, grid] of [
      [1000, 800, 10],
      [1003, 805, 4],
      [17, 13, 5],
      [640, 480, 1],
      [7, 7, 7],
    ]) {
      const cells = computeGridCells(w, h, grid);
      expect(cells).toHaveLength(grid * grid);

      for (let r = 0; r < grid; r++) {
        const row = cells.filter((c) => c.row === r);
        expect(row.reduce((sum, c) => sum + c.width, 0)).toBe(w);
        row.forEach((c, i) => {
          if (i > 0) expect(c.x).toBe(row[i - 1].x + row[i - 1].width);
        });
      }
      for (let col = 0; col < grid; col++) {
        const column = cells.filter((c) => c.column === col);
        expect(column.reduce((sum, c) => sum + c.height, 0)).toBe(h);
        column.forEach((c, i) => {
          if (i > 0) expect(c.y).toBe(column[i - 1].y + column[i - 1].height);
        });
      }
    }
  });
});

describe('scoreGrid', () => {
  it('scores each cell once in row-major order', () => {
    const seen: Rect[] = [];
    const cells = scoreGrid(image, 2, {
      score: (rect) => {
        seen.push(rect);
        return seen.length / 10;
      },
    });

    expect(seen).toEqual([
      { x: 0, y: 0, width: 500, height: 400 },
      { x: 500, y: 0, width: 500, height: 400 },
      { x: 0, y: 400, width: 500, height: 400 },
      { x: 500, y: 400, width: 500, height: 400 },
    ]);
    expect(cells.map((c) => c.score)).toEqual([0.1, 0.2, 0.3, 0.4]);
  });

  it('returns frozen cells', () => {
    const cells = scoreGrid(image, 2, { score: () => 0.5 });
    expect(Object.isFrozen(cells)).toBe(true);
    expect(Object.isFrozen(cells[0])).toBe(true);
  });

  it('fails the whole pass when the scorer throws', () => {
    let calls = 0;
    const err = catchFlyoverError(() =>
      scoreGrid(image, 3, {
        score: () => {
          calls++;
          if (calls === 4) throw new Error('identify crashed');
          return 0.5;
        },
      })
    );

    expect(err.code).toBe('SCORING_FAILURE');
    expect(err.details).toEqual({ cell: 3 });
    expect(err.message).toBe('Scoring failed for cell 3 (333x266+0+266): identify crashed');
    expect(calls).toBe(4);
  });

  it('rejects non-finite scores', () => {
    let calls = 0;
    const err = catchFlyoverError(() =>
      scoreGrid(image, 2, {
        score: () => {
          calls++;
          return calls === 2 ? Number.NaN : 0.5;
        },
      })
    );

    expect(err.code).toBe('SCORING_FAILURE');
    expect(err.details).toMatchObject({ cell: 1 });
    expect(calls).toBe(2);
  });

  it('rejects scores outside 0-1', () => {
    const err = catchFlyoverError(() => scoreGrid(image, 2, { score: () => 1.5 }));
    expect(err.code).toBe('SCORING_FAILURE');
    expect(err.details).toEqual({ cell: 0, score: 1.5 });
  });
});

describe('cellsFromScores', () => {
  it('attaches row-major scores', () => {
    const cells = cellsFromScores(image, 2, [0.4, 0.3, 0.2, 0.1]);
    expect(cells.map((c) => [c.index, c.score])).toEqual([
      [0, 0.4],
      [1, 0.3],
      [2, 0.2],
      [3, 0.1],
    ]);
  });

  it('rejects a score list of the wrong length', () => {
    const err = catchFlyoverError(() => cellsFromScores(image, 2, [0.1, 0.2, 0.3]));
    expect(err.code).toBe('SCORING_FAILURE');
    expect(err.details).toEqual({ expected: 4, actual: 3 });
  });
});
