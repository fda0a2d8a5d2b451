import { MovementPlay, Square, squareIndex } from '../types/game';
import { GameState } from './types';
import { squaresOf, stoneAt } from './boardState';
import { inBounds, neighbors, reflect } from './geometry';

/**
 * Target square of a movement: the active stone reflected through the
 * center stone.
 */
export function movementTarget(play: MovementPlay): Square {
  return reflect(play.active, play.center);
}

/**
 * Enumerate every legal movement for the player to move.
 *
 * A movement needs two of the mover's stones on adjacent squares (active
 * and center) and an on-board, empty target. Plays are ordered by active
 * square index, then center square index (index = rank * 8 + file), so
 * a1 comes before b1 and h1 before a2.
 *
 * Returns an empty list once the game has a result.
 */
export function enumerateLegalMovements(state: GameState): MovementPlay[] {
  if (state.result !== null) {
    return [];
  }

  const mover = state.currentPlayer;
  const moves: MovementPlay[] = [];

  for (const active of squaresOf(state.board, mover)) {
    const centers = neighbors(active)
      .filter((sq) => stoneAt(state.board, sq) === mover)
      .sort((a, b) => squareIndex(a) - squareIndex(b));

    for (const center of centers) {
      const target = reflect(active, center);
      if (inBounds(target) && stoneAt(state.board, target) === null) {
        moves.push({ type: 'movement', active, center });
      }
    }
  }

  return moves;
}

export function hasAnyLegalMovement(state: GameState): boolean {
  return enumerateLegalMovements(state).length > 0;
}
