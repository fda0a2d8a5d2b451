import {
  FILE_LABELS,
  GameResult,
  GameState,
  Play,
  RANK_LABELS,
  Square,
  squareToString,
} from '../types/game';
import { emptyHomeSquares } from './boardState';
import { EngineErrorCode, NotationError } from './errors';
import { reflect } from './geometry';

/**
 * Shared play-notation helpers.
 *
 * Squares are written as a file letter and a rank digit (`e3`). A movement
 * is written as its active square and its target square (`b1-d3`); the
 * center is implied as their midpoint. A placement is written `++` since
 * its squares are always the mover's empty home squares.
 */

export const PLACEMENT_TOKEN = '++';

const SQUARE_PATTERN = /^([a-h])([1-8])$/i;
const MOVEMENT_PATTERN = /^([a-h][1-8])-?([a-h][1-8])$/i;

/**
 * Decode a square label. The file letter is case-insensitive.
 */
export function parseSquare(label: string): Square {
  const match = SQUARE_PATTERN.exec(label.trim());
  if (!match) {
    throw new NotationError(
      EngineErrorCode.NOTATION_INVALID_SQUARE,
      `Invalid square "${label}": expected a file a-h followed by a rank 1-8`,
      { label }
    );
  }
  const [, file, rank] = match;
  return {
    file: FILE_LABELS.indexOf(file.toLowerCase()),
    rank: RANK_LABELS.indexOf(rank),
  };
}

export function isSquareLabel(label: string): boolean {
  return SQUARE_PATTERN.test(label.trim());
}

export function formatPlay(play: Play): string {
  switch (play.type) {
    case 'movement':
      return `${squareToString(play.active)}-${squareToString(reflect(play.active, play.center))}`;
    case 'placement':
      return PLACEMENT_TOKEN;
  }
}

/**
 * Decode notation produced by {@link formatPlay}. The separator in a
 * movement is optional (`b1d3` also parses).
 *
 * A placement needs `state` to know which home squares it fills. The
 * result is not checked for legality; `applyPlay` does that.
 */
export function parsePlay(text: string, state?: GameState): Play {
  const trimmed = text.trim();

  if (trimmed === PLACEMENT_TOKEN) {
    if (!state) {
      throw new NotationError(
        EngineErrorCode.NOTATION_INVALID_PLAY,
        'Placement notation needs a game state to resolve its squares',
        { text }
      );
    }
    return {
      type: 'placement',
      squares: emptyHomeSquares(state.board, state.currentPlayer),
    };
  }

  const match = MOVEMENT_PATTERN.exec(trimmed);
  if (!match) {
    throw new NotationError(
      EngineErrorCode.NOTATION_INVALID_PLAY,
      `Invalid play "${text}": expected "++" or "<active>-<target>"`,
      { text }
    );
  }

  const active = parseSquare(match[1]);
  const target = parseSquare(match[2]);
  const df = target.file - active.file;
  const dr = target.rank - active.rank;

  // Odd deltas have no whole-square midpoint, so no center can produce them.
  if (df % 2 !== 0 || dr % 2 !== 0) {
    throw new NotationError(
      EngineErrorCode.NOTATION_INVALID_PLAY,
      `Invalid play "${text}": ${match[2]} is not a reflection of ${match[1]}`,
      { text, active: match[1], target: match[2] }
    );
  }

  return {
    type: 'movement',
    active,
    center: { file: active.file + df / 2, rank: active.rank + dr / 2 },
  };
}

export function formatResult(result: GameResult): string {
  return result.winner === 'white' ? '1-0' : '0-1';
}

/**
 * Render plays as numbered lines, one White/Black pair per line. When a
 * result is given it takes the next slot, e.g.
 *
 *   1. b1-d3 g8-e6
 *   2. c1-e5 0-1
 */
export function formatPlayList(plays: ReadonlyArray<Play>, result?: GameResult | null): string[] {
  const tokens = plays.map(formatPlay);
  if (result) {
    tokens.push(formatResult(result));
  }

  const lines: string[] = [];
  for (let i = 0; i < tokens.length; i += 2) {
    lines.push(`${i / 2 + 1}. ${tokens.slice(i, i + 2).join(' ')}`);
  }
  return lines;
}
