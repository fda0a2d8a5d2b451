import type { GameState, Play } from '../types/game';
import { IllegalPlayError } from './errors';
import { createInitialGameState } from './initialState';
import { parsePlay } from './notation';
import { applyPlay } from './turnLogic';

function applyAt(state: GameState, play: Play, plyIndex: number): GameState {
  try {
    return applyPlay(state, play);
  } catch (error) {
    if (error instanceof IllegalPlayError) {
      throw new IllegalPlayError(
        error.code,
        error.rule,
        `Play ${plyIndex + 1}: ${error.message}`,
        { ...error.context, plyIndex },
        'Replay'
      );
    }
    throw error;
  }
}

/**
 * Apply `plays` in order and return every state along the way. The first
 * element is the starting state, so the result is one longer than `plays`.
 *
 * When a play is illegal the IllegalPlayError is rethrown with the
 * zero-based `plyIndex` of the offending play added to its context.
 *
 * @param initial - Starting state; defaults to the standard opening layout.
 */
export function replayPlays(
  plays: ReadonlyArray<Play>,
  initial: GameState = createInitialGameState()
): GameState[] {
  const states: GameState[] = [initial];
  plays.forEach((play, plyIndex) => {
    states.push(applyAt(states[states.length - 1], play, plyIndex));
  });
  return states;
}

/**
 * Replay plays written in notation (`b1-d3`, `++`). Each entry is parsed
 * against the state it applies to, so placements resolve to that moment's
 * empty home squares.
 */
export function replayNotation(
  notation: ReadonlyArray<string>,
  initial: GameState = createInitialGameState()
): GameState[] {
  const states: GameState[] = [initial];
  notation.forEach((text, plyIndex) => {
    const current = states[states.length - 1];
    states.push(applyAt(current, parsePlay(text, current), plyIndex));
  });
  return states;
}
