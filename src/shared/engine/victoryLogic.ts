import { BoardState, Color, GameResult, OBJECTIVE_SQUARES } from '../types/game';
import { GameState } from './types';
import { isObjectiveOwnedBy, stoneAt } from './boardState';
import { hasAnyLegalPlay } from './globalActions';

/**
 * True when every objective square (d4, d5, e4, e5) holds a stone of
 * `color`. Pure; ignores whose turn it is.
 */
export function isWinner(state: GameState, color: Color): boolean {
  return isObjectiveOwnedBy(state.board, color);
}

/**
 * White objective stones minus Black objective stones, from -4 to 4.
 * Either extreme means that colour holds a quorum.
 */
export function objectiveBalance(board: BoardState): number {
  let balance = 0;
  for (const sq of OBJECTIVE_SQUARES) {
    const stone = stoneAt(board, sq);
    if (stone === 'white') balance += 1;
    else if (stone === 'black') balance -= 1;
  }
  return balance;
}

/**
 * Side-effect-free terminal check for the position after `mover` played.
 *
 * `state` must be in progress with the next player already to move.
 *
 * 1. Quorum: the mover owns all four objective squares.
 * 2. No legal play: the next player has neither a movement nor a
 *    placement. The rules leave this open; the stuck player loses.
 */
export function evaluateVictory(state: GameState, mover: Color): GameResult | null {
  if (isWinner(state, mover)) {
    return { winner: mover, reason: 'quorum' };
  }

  if (!hasAnyLegalPlay(state)) {
    return { winner: mover, reason: 'no_legal_play' };
  }

  return null;
}
