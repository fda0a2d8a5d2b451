import {
  PlayPayloadSchema,
  SquareLabelSchema,
  parsePlayPayload,
  toPlayPayload,
} from '../../../src/shared/validation/schemas';
import { EngineErrorCode, NotationError } from '../../../src/shared/engine/errors';
import { movement, sq } from '../../helpers/quorumTestUtils';

describe('PlayPayloadSchema', () => {
  it('should accept a movement payload', () => {
    const result = PlayPayloadSchema.safeParse({ type: 'movement', active: 'b1', center: 'c2' });
    expect(result.success).toBe(true);
  });

  it('should accept a placement payload of up to four squares', () => {
    expect(
      PlayPayloadSchema.safeParse({ type: 'placement', squares: ['a1', 'a2', 'b1', 'b2'] }).success
    ).toBe(true);
    expect(
      PlayPayloadSchema.safeParse({ type: 'placement', squares: ['a1', 'a2', 'b1', 'b2', 'c1'] })
        .success
    ).toBe(false);
    expect(PlayPayloadSchema.safeParse({ type: 'placement', squares: [] }).success).toBe(false);
  });

  it('should reject an unknown play type', () => {
    expect(PlayPayloadSchema.safeParse({ type: 'pass' }).success).toBe(false);
  });

  it('should trim square labels', () => {
    expect(SquareLabelSchema.parse(' e3 ')).toBe('e3');
    expect(SquareLabelSchema.safeParse('e9').success).toBe(false);
  });
});

describe('parsePlayPayload', () => {
  it('should convert a movement payload to engine squares', () => {
    expect(parsePlayPayload({ type: 'movement', active: 'B1', center: 'c2' })).toEqual(
      movement('b1', 'c2')
    );
  });

  it('should convert a placement payload', () => {
    expect(parsePlayPayload({ type: 'placement', squares: ['a2', 'b1'] })).toEqual({
      type: 'placement',
      squares: [sq('a2'), sq('b1')],
    });
  });

  it('should list every issue in a NotationError', () => {
    let caught: unknown;
    try {
      parsePlayPayload({ type: 'movement', active: 'z1', center: 'c9' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NotationError);
    if (caught instanceof NotationError) {
      expect(caught.code).toBe(EngineErrorCode.NOTATION_INVALID_PAYLOAD);
      expect(caught.context.issues).toEqual([
        { path: 'active', message: 'Square must be a file a-h followed by a rank 1-8' },
        { path: 'center', message: 'Square must be a file a-h followed by a rank 1-8' },
      ]);
    }
  });

  it('should reject non-object input', () => {
    expect(() => parsePlayPayload('b1-d3')).toThrow(NotationError);
    expect(() => parsePlayPayload(null)).toThrow(NotationError);
  });
});

describe('toPlayPayload', () => {
  it('should write squares as labels', () => {
    expect(toPlayPayload(movement('h6', 'g6'))).toEqual({
      type: 'movement',
      active: 'h6',
      center: 'g6',
    });
    expect(toPlayPayload({ type: 'placement', squares: [sq('g7')] })).toEqual({
      type: 'placement',
      squares: ['g7'],
    });
  });

  it('should be accepted back by parsePlayPayload', () => {
    const play = movement('a3', 'a4');
    expect(parsePlayPayload(toPlayPayload(play))).toEqual(play);
  });
});
