/**
 * Engine Domain Errors - Structured error types for the Quorum rules engine
 *
 * Error Categories:
 * - **IllegalPlayError**: a play that is not in the legal set for the state
 *   it was offered against. This is the only error `applyPlay` raises.
 * - **NotationError**: malformed textual input at the boundary (square
 *   labels, play notation, wire payloads).
 * - **EngineError**: base class; also raised directly for internal
 *   assertion failures that indicate a bug in a caller.
 *
 * Usage:
 * ```typescript
 * import { IllegalPlayError, EngineErrorCode } from './errors';
 *
 * throw new IllegalPlayError(
 *   EngineErrorCode.RULES_SPACE,
 *   'space',
 *   'Target square e3 is occupied',
 *   { active: 'a1', center: 'c2', target: 'e3' }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: illegal plays
 * - NOTATION_*: malformed textual input
 * - BOARD_*: geometry preconditions
 * - INTERNAL_*: bugs
 */
export enum EngineErrorCode {
  /** The game already has a result; no further plays are accepted */
  RULES_GAME_OVER = 'RULES_GAME_OVER',
  /** A movement coordinate lies outside the 8x8 board */
  RULES_OFF_BOARD = 'RULES_OFF_BOARD',
  /** Active or center square does not hold the mover's stone */
  RULES_OWNERSHIP = 'RULES_OWNERSHIP',
  /** Active and center are identical or not adjacent */
  RULES_DISTANCE = 'RULES_DISTANCE',
  /** Reflected target is off the board or occupied */
  RULES_SPACE = 'RULES_SPACE',
  /** Placement offered while every home square is occupied */
  RULES_NO_EMPTY_HOME = 'RULES_NO_EMPTY_HOME',
  /** Placement squares differ from the mover's empty home squares */
  RULES_HOME_MISMATCH = 'RULES_HOME_MISMATCH',

  /** Square label is not a-h followed by 1-8 */
  NOTATION_INVALID_SQUARE = 'NOTATION_INVALID_SQUARE',
  /** Play text is neither a movement nor a placement */
  NOTATION_INVALID_PLAY = 'NOTATION_INVALID_PLAY',
  /** Structured play payload failed schema validation */
  NOTATION_INVALID_PAYLOAD = 'NOTATION_INVALID_PAYLOAD',

  /** direction() called on squares that are not adjacent */
  BOARD_NOT_ADJACENT = 'BOARD_NOT_ADJACENT',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Illegal play',
  NOTATION_: 'Malformed notation or payload',
  BOARD_: 'Board geometry precondition violated',
  INTERNAL_: 'Internal engine error (bug)',
};

/**
 * Which movement or placement rule a rejected play broke. `turn` covers
 * plays offered after the game has ended.
 */
export type PlayRule = 'ownership' | 'space' | 'distance' | 'home_occupancy' | 'turn';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional JSON-safe context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'TurnLogic', 'Notation') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
  rule?: PlayRule;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Raised by `applyPlay` when the offered play is not legal for the state.
 *
 * `rule` names the broken rule so a host can explain the rejection; the
 * context carries the squares involved as labels (`'a1'`, `'e3'`).
 */
export class IllegalPlayError extends EngineError {
  readonly rule: PlayRule;

  constructor(
    code: EngineErrorCode,
    rule: PlayRule,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'IllegalPlayError';
    this.rule = rule;
    Object.setPrototypeOf(this, IllegalPlayError.prototype);
  }

  override toJSON(): EngineErrorJSON {
    return { ...super.toJSON(), rule: this.rule };
  }
}

/**
 * Raised when textual input (square labels, play notation, play payloads)
 * cannot be decoded. This is a boundary concern: the core never sees it.
 */
export class NotationError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Notation'
  ) {
    super(code, message, context, domain);
    this.name = 'NotationError';
    Object.setPrototypeOf(this, NotationError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isIllegalPlayError(error: unknown): error is IllegalPlayError {
  return error instanceof IllegalPlayError;
}

export function isNotationError(error: unknown): error is NotationError {
  return error instanceof NotationError;
}
