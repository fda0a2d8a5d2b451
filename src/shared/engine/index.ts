// =============================================================================
// QUORUM RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (CLIs, renderers, servers, search code) should only import from this
// file. Everything exported here is pure apart from debug logging: state is
// passed in and a new state is returned.
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Color,
  Stone,
  Square,
  Direction,
  BoardState,
  MutableBoardState,
  MovementPlay,
  PlacementPlay,
  Play,
  PlayEffects,
  GameResult,
  GameState,
  VictoryReason,
} from '../types/game';

export {
  BOARD_SIZE,
  TOTAL_SQUARES,
  HOME_SQUARES,
  OBJECTIVE_SQUARES,
  opponentOf,
  isMovementPlay,
  isPlacementPlay,
  squareToString,
  squareIndex,
  squareFromIndex,
  squaresEqual,
} from '../types/game';

export type { ValidationResult } from './types';

// =============================================================================
// GEOMETRY
// =============================================================================

export {
  MOORE_DIRECTIONS,
  ALL_SQUARES,
  adjacent,
  inBounds,
  reflect,
  direction,
  offset,
  neighbors,
} from './geometry';

// =============================================================================
// BOARD STATE
// =============================================================================

export {
  createEmptyBoard,
  cloneBoard,
  stoneAt,
  isEmpty,
  emptyHomeSquares,
  isObjectiveOwnedBy,
  squaresOf,
  countStones,
} from './boardState';

export {
  INITIAL_LAYOUT,
  NO_EFFECTS,
  boardFromLayout,
  createInitialGameState,
  createGameStateFromBoard,
} from './initialState';

// =============================================================================
// MOVE GENERATION & VALIDATION
// =============================================================================

export { enumerateLegalMovements, hasAnyLegalMovement, movementTarget } from './movementLogic';
export { getLegalPlacement } from './placementHelpers';
export { enumerateLegalPlays, hasAnyLegalPlay } from './globalActions';
export { validateMovement } from './validators/MovementValidator';
export { validatePlacement } from './validators/PlacementValidator';

// =============================================================================
// EFFECTS, VICTORY, TURNS
// =============================================================================

export { resolveEffects, applyEffects } from './effectResolution';
export { isWinner, objectiveBalance, evaluateVictory } from './victoryLogic';
export { applyPlay, validatePlay } from './turnLogic';
export { replayPlays, replayNotation } from './replayHelpers';

// =============================================================================
// NOTATION & ERRORS
// =============================================================================

export {
  PLACEMENT_TOKEN,
  parseSquare,
  isSquareLabel,
  formatPlay,
  parsePlay,
  formatResult,
  formatPlayList,
} from './notation';

export {
  EngineErrorCode,
  EngineError,
  IllegalPlayError,
  NotationError,
  isEngineError,
  isIllegalPlayError,
  isNotationError,
} from './errors';
export type { EngineErrorJSON, PlayRule } from './errors';

// =============================================================================
// WIRE VALIDATION
// =============================================================================

export { PlayPayloadSchema, parsePlayPayload, toPlayPayload } from '../validation/schemas';
export type { PlayPayload } from '../validation/schemas';
