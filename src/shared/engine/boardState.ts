import {
  BoardState,
  Color,
  HOME_SQUARES,
  MutableBoardState,
  OBJECTIVE_SQUARES,
  Square,
  Stone,
  TOTAL_SQUARES,
  squareFromIndex,
  squareIndex,
} from '../types/game';
import { inBounds } from './geometry';

/**
 * Board queries and the single mutation primitive.
 *
 * Nothing in this module checks play legality; that belongs to the
 * validators and move generators. Reads accept any {@link BoardState};
 * writes require a {@link MutableBoardState}, which callers obtain through
 * {@link cloneBoard} so a published board is never written to.
 */

export function createEmptyBoard(): MutableBoardState {
  return { cells: new Array<Stone>(TOTAL_SQUARES).fill(null) };
}

export function cloneBoard(board: BoardState): MutableBoardState {
  return { cells: [...board.cells] };
}

/**
 * Stone on `sq`, or null when the square is empty. Off-board squares read as
 * empty; they never alias an on-board index.
 */
export function stoneAt(board: BoardState, sq: Square): Stone {
  if (!inBounds(sq)) {
    return null;
  }
  return board.cells[squareIndex(sq)] ?? null;
}

export function setStone(board: MutableBoardState, sq: Square, stone: Stone): void {
  board.cells[squareIndex(sq)] = stone;
}

export function isEmpty(board: BoardState, sq: Square): boolean {
  return stoneAt(board, sq) === null;
}

/**
 * Home squares of `color` that hold no stone, in home order.
 */
export function emptyHomeSquares(board: BoardState, color: Color): Square[] {
  return HOME_SQUARES[color].filter((sq) => isEmpty(board, sq));
}

export function isObjectiveOwnedBy(board: BoardState, color: Color): boolean {
  return OBJECTIVE_SQUARES.every((sq) => stoneAt(board, sq) === color);
}

export function squaresOf(board: BoardState, color: Color): Square[] {
  const result: Square[] = [];
  board.cells.forEach((stone, index) => {
    if (stone === color) {
      result.push(squareFromIndex(index));
    }
  });
  return result;
}

export function countStones(board: BoardState, color: Color): number {
  return board.cells.filter((stone) => stone === color).length;
}
