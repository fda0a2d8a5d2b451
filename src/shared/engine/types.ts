import type {
  BoardState,
  Color,
  GameResult,
  GameState,
  MovementPlay,
  PlacementPlay,
  Play,
  PlayEffects,
  Square,
} from '../types/game';
import type { EngineErrorCode, PlayRule } from './errors';

// Re-export types used in the engine interface
export type {
  BoardState,
  Color,
  GameResult,
  GameState,
  MovementPlay,
  PlacementPlay,
  Play,
  PlayEffects,
  Square,
};

/**
 * Validation
 *
 * A failed result carries everything needed to raise an IllegalPlayError:
 * the error code, the rule that was broken, a message and label-form
 * context.
 */
export type ValidationResult =
  | { valid: true }
  | {
      valid: false;
      code: EngineErrorCode;
      rule: PlayRule;
      reason: string;
      context: Record<string, unknown>;
    };

/**
 * Helper to create a failed validation result.
 */
export function invalidResult(
  code: EngineErrorCode,
  rule: PlayRule,
  reason: string,
  context: Record<string, unknown> = {}
): ValidationResult {
  return { valid: false, code, rule, reason, context };
}

export const VALID: ValidationResult = { valid: true };
