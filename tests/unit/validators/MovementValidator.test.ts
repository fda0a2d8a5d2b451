/**
 * MovementValidator: ownership, distance and space checks, reported in that
 * order.
 */

import { validateMovement } from '../../../src/shared/engine/validators/MovementValidator';
import { EngineErrorCode } from '../../../src/shared/engine/errors';
import { createInitialGameState } from '../../../src/shared/engine/initialState';
import type { GameState, MovementPlay } from '../../../src/shared/types/game';
import { movement, stateFromLayout } from '../../helpers/quorumTestUtils';

function failure(state: GameState, play: MovementPlay) {
  const result = validateMovement(state, play);
  if (result.valid) {
    throw new Error('expected the movement to be rejected');
  }
  return result;
}

describe('MovementValidator', () => {
  const start = createInitialGameState();

  it('should accept a legal opening movement', () => {
    expect(validateMovement(start, movement('a3', 'a4'))).toEqual({ valid: true });
  });

  it('should reject an empty active square', () => {
    const result = failure(start, movement('e3', 'd3'));
    expect(result.code).toBe(EngineErrorCode.RULES_OWNERSHIP);
    expect(result.rule).toBe('ownership');
    expect(result.reason).toBe('Active square e3 does not hold a white stone');
  });

  it('should reject a center that is not the mover stone', () => {
    const result = failure(start, movement('d1', 'e2'));
    expect(result.code).toBe(EngineErrorCode.RULES_OWNERSHIP);
    expect(result.reason).toBe('Center square e2 does not hold a white stone');
  });

  it('should check ownership for the player to move', () => {
    const blackToMove = stateFromLayout({ white: ['b1', 'c2'] }, 'black');
    expect(failure(blackToMove, movement('b1', 'c2')).code).toBe(EngineErrorCode.RULES_OWNERSHIP);
  });

  it('should reject a non-adjacent center even when the target is free', () => {
    const result = failure(start, movement('a1', 'c2'));
    expect(result.code).toBe(EngineErrorCode.RULES_DISTANCE);
    expect(result.rule).toBe('distance');
    expect(result.context).toEqual({ player: 'white', active: 'a1', center: 'c2', target: 'e3' });
  });

  it('should reject a center equal to the active square', () => {
    expect(failure(start, movement('b2', 'b2')).code).toBe(EngineErrorCode.RULES_DISTANCE);
  });

  it('should reject an occupied target of either colour', () => {
    expect(failure(start, movement('a1', 'b1')).code).toBe(EngineErrorCode.RULES_SPACE);

    const state = stateFromLayout({ white: ['c3', 'd4'], black: ['e5'] });
    const result = failure(state, movement('c3', 'd4'));
    expect(result.code).toBe(EngineErrorCode.RULES_SPACE);
    expect(result.reason).toBe('Target square e5 is occupied');
  });

  it('should reject a target off the board', () => {
    const result = failure(start, movement('b1', 'a1'));
    expect(result.code).toBe(EngineErrorCode.RULES_SPACE);
    expect(result.rule).toBe('space');
    expect(result.reason).toBe('Target (-1,0) is off the board');
  });

  it('should reject coordinates outside the board before reading them', () => {
    const result = failure(start, {
      type: 'movement',
      active: { file: 0, rank: 0 },
      center: { file: -1, rank: 0 },
    });
    expect(result.code).toBe(EngineErrorCode.RULES_OFF_BOARD);
  });

  it('should reject any movement once the game is over', () => {
    const finished: GameState = { ...start, result: { winner: 'black', reason: 'no_legal_play' } };
    const result = failure(finished, movement('a3', 'a4'));
    expect(result.code).toBe(EngineErrorCode.RULES_GAME_OVER);
    expect(result.rule).toBe('turn');
    expect(result.context.winner).toBe('black');
  });
});
