import { Play } from '../types/game';
import { GameState } from './types';
import { enumerateLegalMovements, hasAnyLegalMovement } from './movementLogic';
import { getLegalPlacement } from './placementHelpers';

/**
 * Every legal play for the player to move: movements in generator order,
 * then the placement when one is available.
 */
export function enumerateLegalPlays(state: GameState): Play[] {
  const plays: Play[] = enumerateLegalMovements(state);
  const placement = getLegalPlacement(state);
  if (placement) {
    plays.push(placement);
  }
  return plays;
}

/**
 * True when the player to move has at least one legal movement or a legal
 * placement. Placement is checked first since it is the cheaper query.
 */
export function hasAnyLegalPlay(state: GameState): boolean {
  return getLegalPlacement(state) !== null || hasAnyLegalMovement(state);
}
