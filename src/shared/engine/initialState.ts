import { BoardState, Color, GameState, PlayEffects } from '../types/game';
import { createEmptyBoard, setStone } from './boardState';
import { parseSquare } from './notation';

/**
 * Starting layout. The two sides are point-symmetric about the board
 * center; the objective squares start empty.
 */
export const INITIAL_LAYOUT: Readonly<Record<Color, ReadonlyArray<string>>> = {
  white: ['a1', 'b1', 'c1', 'd1', 'a2', 'b2', 'c2', 'a3', 'b3', 'a4'],
  black: ['h8', 'g8', 'f8', 'e8', 'h7', 'g7', 'f7', 'h6', 'g6', 'h5'],
};

export const NO_EFFECTS: PlayEffects = { suffocated: [], converted: [] };

/**
 * Build a board from square labels, e.g.
 * `boardFromLayout({ white: ['a1', 'c2'], black: ['e3'] })`.
 * A label listed for both colours ends up black.
 */
export function boardFromLayout(layout: Partial<Record<Color, ReadonlyArray<string>>>): BoardState {
  const board = createEmptyBoard();
  for (const label of layout.white ?? []) {
    setStone(board, parseSquare(label), 'white');
  }
  for (const label of layout.black ?? []) {
    setStone(board, parseSquare(label), 'black');
  }
  return board;
}

/**
 * Creates a pristine GameState for a new game: the fixed starting layout
 * with White to move.
 */
export function createInitialGameState(): GameState {
  return {
    board: boardFromLayout(INITIAL_LAYOUT),
    currentPlayer: 'white',
    ply: 0,
    lastPlay: null,
    lastEffects: NO_EFFECTS,
    result: null,
  };
}

/**
 * Creates an in-progress GameState around an arbitrary board. Intended for
 * tests, puzzles and hosts that restore a position from their own format.
 */
export function createGameStateFromBoard(
  board: BoardState,
  currentPlayer: Color = 'white',
  ply: number = 0
): GameState {
  return {
    board: { cells: [...board.cells] },
    currentPlayer,
    ply,
    lastPlay: null,
    lastEffects: NO_EFFECTS,
    result: null,
  };
}
