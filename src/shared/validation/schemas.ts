import { z } from 'zod';
import { Play, squareToString } from '../types/game';
import { EngineErrorCode, NotationError } from '../engine/errors';
import { parseSquare } from '../engine/notation';

// Square label validation ("a1".."h8", file letter case-insensitive)
export const SquareLabelSchema = z
  .string()
  .trim()
  .regex(/^[a-hA-H][1-8]$/, 'Square must be a file a-h followed by a rank 1-8');

export const MovementPayloadSchema = z.object({
  type: z.literal('movement'),
  active: SquareLabelSchema,
  center: SquareLabelSchema,
});

export const PlacementPayloadSchema = z.object({
  type: z.literal('placement'),
  squares: z.array(SquareLabelSchema).min(1).max(4),
});

// Wire-level play payload. Squares travel as labels; parsePlayPayload turns
// them into the engine's coordinate pairs.
export const PlayPayloadSchema = z.discriminatedUnion('type', [
  MovementPayloadSchema,
  PlacementPayloadSchema,
]);

export type PlayPayload = z.infer<typeof PlayPayloadSchema>;

/**
 * Validate an untrusted payload and convert it to a Play. Legality is not
 * checked here; pass the result to applyPlay.
 *
 * @throws NotationError listing every schema issue
 */
export function parsePlayPayload(input: unknown): Play {
  const result = PlayPayloadSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new NotationError(
      EngineErrorCode.NOTATION_INVALID_PAYLOAD,
      `Invalid play payload: ${issues.map((i) => `${i.path || 'root'}: ${i.message}`).join('; ')}`,
      { issues }
    );
  }

  const payload = result.data;
  switch (payload.type) {
    case 'movement':
      return {
        type: 'movement',
        active: parseSquare(payload.active),
        center: parseSquare(payload.center),
      };
    case 'placement':
      return {
        type: 'placement',
        squares: payload.squares.map(parseSquare),
      };
  }
}

/**
 * Inverse of {@link parsePlayPayload}, for hosts that send plays over a wire.
 */
export function toPlayPayload(play: Play): PlayPayload {
  switch (play.type) {
    case 'movement':
      return {
        type: 'movement',
        active: squareToString(play.active),
        center: squareToString(play.center),
      };
    case 'placement':
      return { type: 'placement', squares: play.squares.map(squareToString) };
  }
}
