import { PlacementPlay, Square, squareIndex, squareToString } from '../../types/game';
import { GameState, VALID, ValidationResult, invalidResult } from '../types';
import { emptyHomeSquares } from '../boardState';
import { EngineErrorCode } from '../errors';
import { inBounds } from '../geometry';

function labels(squares: ReadonlyArray<Square>): string[] {
  return squares.map(squareToString);
}

/**
 * A placement must name exactly the mover's empty home squares: all of
 * them, nothing else, and each once. Order does not matter.
 */
export function validatePlacement(state: GameState, play: PlacementPlay): ValidationResult {
  const mover = state.currentPlayer;

  if (state.result !== null) {
    return invalidResult(EngineErrorCode.RULES_GAME_OVER, 'turn', 'The game is already over', {
      player: mover,
      winner: state.result.winner,
    });
  }

  const required = emptyHomeSquares(state.board, mover);
  const context = {
    player: mover,
    offered: labels(play.squares),
    required: labels(required),
  };

  if (required.length === 0) {
    return invalidResult(
      EngineErrorCode.RULES_NO_EMPTY_HOME,
      'home_occupancy',
      `Every ${mover} home square is occupied; placement is not available`,
      context
    );
  }

  const requiredIndices = new Set(required.map(squareIndex));
  const offeredIndices = new Set<number>();
  for (const sq of play.squares) {
    const index = squareIndex(sq);
    if (!inBounds(sq) || !requiredIndices.has(index) || offeredIndices.has(index)) {
      return invalidResult(
        EngineErrorCode.RULES_HOME_MISMATCH,
        'home_occupancy',
        `Placement squares must be exactly the empty ${mover} home squares`,
        context
      );
    }
    offeredIndices.add(index);
  }

  if (offeredIndices.size !== requiredIndices.size) {
    return invalidResult(
      EngineErrorCode.RULES_HOME_MISMATCH,
      'home_occupancy',
      `Placement must fill all ${required.length} empty ${mover} home squares`,
      context
    );
  }

  return VALID;
}
