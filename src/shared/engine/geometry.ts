import {
  BOARD_SIZE,
  Direction,
  Square,
  TOTAL_SQUARES,
  squareFromIndex,
  squareToString,
} from '../types/game';
import { EngineError, EngineErrorCode } from './errors';

/**
 * Pure coordinate helpers for the 8x8 board. Nothing here reads a board;
 * adjacency always includes diagonals (Chebyshev distance 1).
 */

/**
 * Canonical 8-direction Moore neighbourhood.
 */
export const MOORE_DIRECTIONS: ReadonlyArray<Direction> = [
  { df: 1, dr: 0 }, // E
  { df: 1, dr: 1 }, // NE
  { df: 0, dr: 1 }, // N
  { df: -1, dr: 1 }, // NW
  { df: -1, dr: 0 }, // W
  { df: -1, dr: -1 }, // SW
  { df: 0, dr: -1 }, // S
  { df: 1, dr: -1 }, // SE
];

/** Every square in index order: a1, b1, ..., h1, a2, ..., h8. */
export const ALL_SQUARES: ReadonlyArray<Square> = Array.from({ length: TOTAL_SQUARES }, (_, i) =>
  squareFromIndex(i)
);

export function inBounds(sq: Square): boolean {
  return sq.file >= 0 && sq.file < BOARD_SIZE && sq.rank >= 0 && sq.rank < BOARD_SIZE;
}

export function adjacent(p: Square, q: Square): boolean {
  const df = Math.abs(p.file - q.file);
  const dr = Math.abs(p.rank - q.rank);
  return df <= 1 && dr <= 1 && df + dr > 0;
}

/**
 * Reflect `active` through `center`: `center + (center - active)` per axis.
 * The result may lie off the board; callers check {@link inBounds}.
 */
export function reflect(active: Square, center: Square): Square {
  return {
    file: 2 * center.file - active.file,
    rank: 2 * center.rank - active.rank,
  };
}

/**
 * Unit step from `from` towards the adjacent square `to`.
 */
export function direction(from: Square, to: Square): Direction {
  if (!adjacent(from, to)) {
    throw new EngineError(
      EngineErrorCode.BOARD_NOT_ADJACENT,
      `direction() requires adjacent squares, got ${squareToString(from)} and ${squareToString(to)}`,
      { from: squareToString(from), to: squareToString(to) },
      'Geometry'
    );
  }
  return { df: to.file - from.file, dr: to.rank - from.rank };
}

export function offset(sq: Square, dir: Direction, steps: number = 1): Square {
  return { file: sq.file + dir.df * steps, rank: sq.rank + dir.dr * steps };
}

/**
 * On-board squares adjacent to `sq`, in {@link MOORE_DIRECTIONS} order.
 */
export function neighbors(sq: Square): Square[] {
  return MOORE_DIRECTIONS.map((dir) => offset(sq, dir)).filter(inBounds);
}
