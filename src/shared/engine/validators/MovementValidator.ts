import { MovementPlay, squareToString, squaresEqual } from '../../types/game';
import { GameState, VALID, ValidationResult, invalidResult } from '../types';
import { stoneAt } from '../boardState';
import { EngineErrorCode } from '../errors';
import { adjacent, inBounds, reflect } from '../geometry';

/**
 * Checks a movement against the ownership, distance and space rules, in
 * that order, reporting the first rule broken.
 *
 * Accepts exactly the plays that enumerateLegalMovements produces.
 */
export function validateMovement(state: GameState, play: MovementPlay): ValidationResult {
  const mover = state.currentPlayer;
  const target = reflect(play.active, play.center);
  const context = {
    player: mover,
    active: squareToString(play.active),
    center: squareToString(play.center),
    target: squareToString(target),
  };

  // 1. Game still running
  if (state.result !== null) {
    return invalidResult(EngineErrorCode.RULES_GAME_OVER, 'turn', 'The game is already over', {
      ...context,
      winner: state.result.winner,
    });
  }

  // 2. Both squares on the board
  if (!inBounds(play.active) || !inBounds(play.center)) {
    return invalidResult(
      EngineErrorCode.RULES_OFF_BOARD,
      'ownership',
      'Active and center squares must be on the board',
      context
    );
  }

  // 3. Ownership
  if (stoneAt(state.board, play.active) !== mover) {
    return invalidResult(
      EngineErrorCode.RULES_OWNERSHIP,
      'ownership',
      `Active square ${context.active} does not hold a ${mover} stone`,
      context
    );
  }
  if (stoneAt(state.board, play.center) !== mover) {
    return invalidResult(
      EngineErrorCode.RULES_OWNERSHIP,
      'ownership',
      `Center square ${context.center} does not hold a ${mover} stone`,
      context
    );
  }

  // 4. Distance: the target must be reflected over a neighbouring stone
  if (squaresEqual(play.active, play.center) || !adjacent(play.active, play.center)) {
    return invalidResult(
      EngineErrorCode.RULES_DISTANCE,
      'distance',
      `Active ${context.active} and center ${context.center} must be distinct adjacent squares`,
      context
    );
  }

  // 5. Space
  if (!inBounds(target)) {
    return invalidResult(
      EngineErrorCode.RULES_SPACE,
      'space',
      `Target ${context.target} is off the board`,
      context
    );
  }
  if (stoneAt(state.board, target) !== null) {
    return invalidResult(
      EngineErrorCode.RULES_SPACE,
      'space',
      `Target square ${context.target} is occupied`,
      context
    );
  }

  return VALID;
}
