export type Color = 'white' | 'black';

/**
 * Contents of a single board square: a stone of some colour, or nothing.
 */
export type Stone = Color | null;

/**
 * A board coordinate. `file` runs a..h as 0..7 and `rank` runs 1..8 as 0..7,
 * so `{ file: 0, rank: 0 }` is a1 and `{ file: 7, rank: 7 }` is h8.
 */
export interface Square {
  readonly file: number;
  readonly rank: number;
}

/** Unit step between two adjacent squares; each component is -1, 0 or 1. */
export interface Direction {
  readonly df: number;
  readonly dr: number;
}

export const BOARD_SIZE = 8;
export const TOTAL_SQUARES = BOARD_SIZE * BOARD_SIZE;

export const FILE_LABELS = 'abcdefgh';
export const RANK_LABELS = '12345678';

export function opponentOf(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

/**
 * Fixed placement sources for each colour. Membership never changes; only
 * occupancy does.
 */
export const HOME_SQUARES: Readonly<Record<Color, ReadonlyArray<Square>>> = {
  white: [
    { file: 0, rank: 0 }, // a1
    { file: 0, rank: 1 }, // a2
    { file: 1, rank: 0 }, // b1
    { file: 1, rank: 1 }, // b2
  ],
  black: [
    { file: 7, rank: 7 }, // h8
    { file: 7, rank: 6 }, // h7
    { file: 6, rank: 7 }, // g8
    { file: 6, rank: 6 }, // g7
  ],
};

/** d4, d5, e4, e5 */
export const OBJECTIVE_SQUARES: ReadonlyArray<Square> = [
  { file: 3, rank: 3 },
  { file: 3, rank: 4 },
  { file: 4, rank: 3 },
  { file: 4, rank: 4 },
];

export interface BoardState {
  /** Flat, row-major cells indexed by `rank * 8 + file`. Always 64 long. */
  readonly cells: ReadonlyArray<Stone>;
}

/**
 * Board whose cells may be written. Only the turn logic and the effect
 * resolver hold one, and only on a private clone.
 */
export interface MutableBoardState {
  cells: Stone[];
}

export interface MovementPlay {
  readonly type: 'movement';
  /** The stone that relocates. */
  readonly active: Square;
  /** The friendly stone the active stone reflects over. */
  readonly center: Square;
}

export interface PlacementPlay {
  readonly type: 'placement';
  /** Exactly the mover's empty home squares at the time of the play. */
  readonly squares: ReadonlyArray<Square>;
}

export type Play = MovementPlay | PlacementPlay;

export function isMovementPlay(play: Play): play is MovementPlay {
  return play.type === 'movement';
}

export function isPlacementPlay(play: Play): play is PlacementPlay {
  return play.type === 'placement';
}

/**
 * Squares changed by the capture effects of one movement. Placement plays
 * always report two empty lists.
 */
export interface PlayEffects {
  readonly suffocated: ReadonlyArray<Square>;
  readonly converted: ReadonlyArray<Square>;
}

export type VictoryReason = 'quorum' | 'no_legal_play';

export interface GameResult {
  readonly winner: Color;
  readonly reason: VictoryReason;
}

export interface GameState {
  readonly board: BoardState;
  /** Colour to move. On a finished game, the colour that made the last play. */
  readonly currentPlayer: Color;
  /** Number of plays applied since the initial position. */
  readonly ply: number;
  readonly lastPlay: Play | null;
  readonly lastEffects: PlayEffects;
  readonly result: GameResult | null;
}

export const squareToString = (sq: Square): string => {
  const file = FILE_LABELS.charAt(sq.file);
  const rank = RANK_LABELS.charAt(sq.rank);
  // Off-board squares have no label; show the raw pair instead.
  if (!file || !rank) {
    return `(${sq.file},${sq.rank})`;
  }
  return `${file}${rank}`;
};

export const squareIndex = (sq: Square): number => sq.rank * BOARD_SIZE + sq.file;

export const squareFromIndex = (index: number): Square => ({
  file: index % BOARD_SIZE,
  rank: Math.floor(index / BOARD_SIZE),
});

export const squaresEqual = (a: Square, b: Square): boolean =>
  a.file === b.file && a.rank === b.rank;
