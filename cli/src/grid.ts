/**
 * Detail grid: splits the image into GRID x GRID cells and attaches one
 * detail score per cell.
 *
 * Usage:
 *   const cells = scoreGrid(image, 10, scorer);
 *   // → 100 cells, row-major, each with a score in 0-1
 */

import type { Cell, DetailScorer, ImageInfo, Rect } from './types.js';
import { FlyoverError, describeError } from './errors.js';

/**
 * Cell geometry only (score 0). Every cell is floor(W/GRID) x floor(H/GRID);
 * the last column and row take whatever pixels are left over.
 */
export function computeGridCells(width: number, height: number, grid: number): Cell[] {
  const cellW = Math.floor(width / grid);
  const cellH = Math.floor(height / grid);

  return Array.from({ length: grid * grid }, (_, index) => {
    const column = index % grid;
    const row = Math.floor(index / grid);
    const x = column * cellW;
    const y = row * cellH;
    const w = column === grid - 1 ? width - x : cellW;
    const h = row === grid - 1 ? height - y : cellH;

    return Object.freeze({
      index,
      column,
      row,
      x,
      y,
      width: w,
      height: h,
      centerX: x + Math.floor(w / 2),
      centerY: y + Math.floor(h / 2),
      score: 0,
    });
  });
}

function checkedScore(cell: Cell, read: (rect: Rect) => number): Cell {
  const rect: Rect = { x: cell.x, y: cell.y, width: cell.width, height: cell.height };
  const where = `cell ${cell.index} (${cell.width}x${cell.height}+${cell.x}+${cell.y})`;

  let score: number;
  try {
    score = read(rect);
  } catch (err) {
    throw new FlyoverError(
      `Scoring failed for ${where}: ${describeError(err)}`,
      'SCORING_FAILURE',
      { cell: cell.index },
      { cause: err }
    );
  }

  if (!Number.isFinite(score) || score < 0 || score > 1) {
    throw new FlyoverError(
      `Scorer returned ${score} for ${where}; expected a number in 0-1`,
      'SCORING_FAILURE',
      { cell: cell.index, score }
    );
  }

  return Object.freeze({ ...cell, score });
}

/**
 * Score every cell once, in row-major order. The first bad score aborts the
 * whole pass.
 */
export function scoreGrid(image: ImageInfo, grid: number, scorer: DetailScorer): readonly Cell[] {
  const cells = computeGridCells(image.width, image.height, grid);
  return Object.freeze(cells.map((cell) => checkedScore(cell, (rect) => scorer.score(rect))));
}

/**
 * Attach precomputed scores (row-major) to the grid. Used when the scores
 * come from somewhere other than a live scorer, e.g. `flyover plan --scores`.
 */
export function cellsFromScores(
  image: ImageInfo,
  grid: number,
  scores: readonly number[]
): readonly Cell[] {
  if (scores.length !== grid * grid) {
    throw new FlyoverError(
      `Expected ${grid * grid} scores for a ${grid}x${grid} grid, got ${scores.length}`,
      'SCORING_FAILURE',
      { expected: grid * grid, actual: scores.length }
    );
  }
  const cells = computeGridCells(image.width, image.height, grid);
  return Object.freeze(cells.map((cell) => checkedScore(cell, () => scores[cell.index])));
}
