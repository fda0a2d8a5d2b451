import {
  BoardState,
  Color,
  MutableBoardState,
  PlayEffects,
  Square,
  opponentOf,
  squareIndex,
} from '../types/game';
import { setStone, stoneAt } from './boardState';
import { direction, inBounds, neighbors, offset } from './geometry';

/**
 * Capture effects of a movement.
 *
 * Both effects look only at the stones adjacent to the moved stone's
 * target square, and both are decided against one frozen snapshot of the
 * board as it stands right after the relocation. Nothing is written until
 * both sets are known, so removing a suffocated stone can never change
 * whether another stone is suffocated or converted.
 *
 * - Suffocation: an adjacent opponent stone with no empty on-board
 *   neighbour is removed.
 * - Conversion: an adjacent opponent stone with a mover stone directly
 *   behind it (target, opponent, mover in a straight line, no gap) becomes
 *   a mover stone.
 *
 * The mover's own stones never qualify for either set.
 */

function snapshotOf(board: BoardState): BoardState {
  return { cells: Object.freeze([...board.cells]) };
}

function isSuffocated(snapshot: BoardState, sq: Square): boolean {
  return neighbors(sq).every((n) => stoneAt(snapshot, n) !== null);
}

function isFlanked(snapshot: BoardState, target: Square, sq: Square, mover: Color): boolean {
  const beyond = offset(target, direction(target, sq), 2);
  return inBounds(beyond) && stoneAt(snapshot, beyond) === mover;
}

/**
 * Decide suffocated and converted squares around `target`, where the
 * mover's stone has just landed. Both lists are in square index order.
 */
export function resolveEffects(board: BoardState, target: Square, mover: Color): PlayEffects {
  const snapshot = snapshotOf(board);
  const opponent = opponentOf(mover);

  const candidates = neighbors(target)
    .filter((sq) => stoneAt(snapshot, sq) === opponent)
    .sort((a, b) => squareIndex(a) - squareIndex(b));

  return {
    suffocated: candidates.filter((sq) => isSuffocated(snapshot, sq)),
    converted: candidates.filter((sq) => isFlanked(snapshot, target, sq, mover)),
  };
}

/**
 * Write resolved effects: every suffocated stone is removed first, then
 * every converted square receives a mover stone. A square in both lists
 * therefore ends up holding the mover's colour.
 */
export function applyEffects(board: MutableBoardState, effects: PlayEffects, mover: Color): void {
  for (const sq of effects.suffocated) {
    setStone(board, sq, null);
  }
  for (const sq of effects.converted) {
    setStone(board, sq, mover);
  }
}
