import {
  Color,
  GameState,
  MovementPlay,
  MutableBoardState,
  PlacementPlay,
  Play,
  PlayEffects,
  opponentOf,
  squareToString,
} from '../types/game';
import { ValidationResult } from './types';
import { cloneBoard, setStone } from './boardState';
import { applyEffects, resolveEffects } from './effectResolution';
import { IllegalPlayError } from './errors';
import { NO_EFFECTS } from './initialState';
import { movementTarget } from './movementLogic';
import { formatPlay } from './notation';
import { evaluateVictory } from './victoryLogic';
import { validateMovement } from './validators/MovementValidator';
import { validatePlacement } from './validators/PlacementValidator';
import { isEffectTraceEnabled } from '../utils/envFlags';
import { logger } from '../utils/logger';

/**
 * Turn sequencing for Quorum.
 *
 * The game has two states: in progress (a colour to move) and over (a
 * winner). {@link applyPlay} is the only transition. Each call:
 *
 * 1. validates the play against the current state, throwing
 *    IllegalPlayError before anything is written;
 * 2. applies it to a private clone of the board (relocation plus
 *    suffocation and conversion for a movement, filling the empty home
 *    squares for a placement);
 * 3. checks for a winner after every play type;
 * 4. otherwise hands the turn to the opponent.
 *
 * The input state is never modified.
 */

export function validatePlay(state: GameState, play: Play): ValidationResult {
  switch (play.type) {
    case 'movement':
      return validateMovement(state, play);
    case 'placement':
      return validatePlacement(state, play);
  }
}

interface MutationOutcome {
  board: MutableBoardState;
  effects: PlayEffects;
}

function mutateMovement(state: GameState, play: MovementPlay, mover: Color): MutationOutcome {
  const board = cloneBoard(state.board);
  const target = movementTarget(play);

  setStone(board, play.active, null);
  setStone(board, target, mover);

  const effects = resolveEffects(board, target, mover);
  applyEffects(board, effects, mover);

  return { board, effects };
}

function mutatePlacement(state: GameState, play: PlacementPlay, mover: Color): MutationOutcome {
  const board = cloneBoard(state.board);
  for (const sq of play.squares) {
    setStone(board, sq, mover);
  }
  return { board, effects: NO_EFFECTS };
}

function applyMutation(state: GameState, play: Play, mover: Color): MutationOutcome {
  switch (play.type) {
    case 'movement':
      return mutateMovement(state, play, mover);
    case 'placement':
      return mutatePlacement(state, play, mover);
  }
}

/**
 * Apply one play and return the resulting state.
 *
 * @throws IllegalPlayError when the play is not legal for `state`,
 *   including any play offered after the game has ended
 */
export function applyPlay(state: GameState, play: Play): GameState {
  const validation = validatePlay(state, play);
  if (!validation.valid) {
    const error = new IllegalPlayError(
      validation.code,
      validation.rule,
      validation.reason,
      validation.context,
      'TurnLogic'
    );
    logger.debug('Rejected play', { ply: state.ply, error: error.toJSON() });
    throw error;
  }

  const mover = state.currentPlayer;
  const { board, effects } = applyMutation(state, play, mover);

  const next: GameState = {
    board,
    currentPlayer: opponentOf(mover),
    ply: state.ply + 1,
    lastPlay: play,
    lastEffects: effects,
    result: null,
  };

  logger.debug('Applied play', {
    ply: next.ply,
    player: mover,
    play: formatPlay(play),
    suffocated: effects.suffocated.length,
    converted: effects.converted.length,
    ...(isEffectTraceEnabled()
      ? {
          suffocatedSquares: effects.suffocated.map(squareToString),
          convertedSquares: effects.converted.map(squareToString),
        }
      : {}),
  });

  const result = evaluateVictory(next, mover);
  if (result === null) {
    return next;
  }

  logger.info('Game over', { ply: next.ply, winner: result.winner, reason: result.reason });

  // A finished game keeps the winner as currentPlayer; nobody moves next.
  return { ...next, currentPlayer: mover, result };
}
