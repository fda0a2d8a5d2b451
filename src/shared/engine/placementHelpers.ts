import { PlacementPlay } from '../types/game';
import { GameState } from './types';
import { emptyHomeSquares } from './boardState';

/**
 * The one placement available to the player to move, or null.
 *
 * A placement always fills every empty home square at once, so there is
 * never more than one. It is unavailable when all four home squares are
 * occupied or the game is over.
 */
export function getLegalPlacement(state: GameState): PlacementPlay | null {
  if (state.result !== null) {
    return null;
  }

  const squares = emptyHomeSquares(state.board, state.currentPlayer);
  if (squares.length === 0) {
    return null;
  }

  return { type: 'placement', squares };
}
