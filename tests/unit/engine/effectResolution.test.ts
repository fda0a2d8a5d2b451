/**
 * Suffocation and conversion around a landing square. Boards here are built
 * as they stand right after the relocation, with the moved stone already on
 * its target.
 */

import { applyEffects, resolveEffects } from '../../../src/shared/engine/effectResolution';
import { cloneBoard, stoneAt } from '../../../src/shared/engine/boardState';
import { boardFromLayout } from '../../../src/shared/engine/initialState';
import { labels, sq } from '../../helpers/quorumTestUtils';

describe('effectResolution', () => {
  describe('conversion', () => {
    it('should convert an opponent stone flanked by a mover stone', () => {
      const board = boardFromLayout({
        white: ['f6', 'g6', 'd4'],
        black: ['e5', 'e6', 'f5', 'f4'],
      });
      const effects = resolveEffects(board, sq('f6'), 'white');

      expect(labels(effects.converted)).toEqual(['e5']);
      expect(effects.suffocated).toEqual([]);
    });

    it('should convert in every qualifying direction at once', () => {
      const board = boardFromLayout({
        white: ['f6', 'g6', 'd4', 'd6'],
        black: ['e5', 'e6', 'f5', 'f4'],
      });
      expect(labels(resolveEffects(board, sq('f6'), 'white').converted)).toEqual(['e5', 'e6']);
    });

    it('should not convert across a gap or an opponent stone', () => {
      // f5 is backed by black f4; e6 has an empty d6 behind it
      const board = boardFromLayout({ white: ['f6'], black: ['e6', 'f5', 'f4'] });
      expect(resolveEffects(board, sq('f6'), 'white').converted).toEqual([]);
    });

    it('should not convert when the flanking square is off the board', () => {
      const board = boardFromLayout({ white: ['b2'], black: ['a1'] });
      expect(resolveEffects(board, sq('b2'), 'white').converted).toEqual([]);
    });
  });

  describe('suffocation', () => {
    it('should remove an opponent stone with no empty neighbour', () => {
      const board = boardFromLayout({
        white: ['f3', 'g3', 'e2', 'e3', 'e4', 'e5', 'd3', 'd4', 'f2', 'g2'],
        black: ['d5', 'f4', 'f5', 'g4', 'g5'],
      });
      const effects = resolveEffects(board, sq('f3'), 'white');

      expect(labels(effects.suffocated)).toEqual(['f4']);
      expect(effects.converted).toEqual([]);
    });

    it('should treat the board edge as neither empty nor blocking', () => {
      // a1 has three on-board neighbours, all occupied after the move
      const board = boardFromLayout({ white: ['b2', 'a2'], black: ['a1', 'b1'] });
      const effects = resolveEffects(board, sq('b2'), 'white');
      expect(labels(effects.suffocated)).toEqual(['a1']);
    });

    it('should decide every stone against the same snapshot', () => {
      // Removing a1 would free a neighbour of b1; both still go together
      const board = boardFromLayout({
        white: ['b2', 'c3', 'a2', 'c1', 'c2'],
        black: ['a1', 'b1'],
      });
      const effects = resolveEffects(board, sq('b2'), 'white');
      expect(labels(effects.suffocated)).toEqual(['a1', 'b1']);
    });

    it('should leave the mover own stones alone even when enclosed', () => {
      const board = boardFromLayout({
        white: ['a1', 'b2', 'a2'],
        black: ['b1'],
      });
      // a1 (white) is enclosed; b1 (black) still has c1, c2 free
      const effects = resolveEffects(board, sq('b2'), 'white');
      expect(effects.suffocated).toEqual([]);
      expect(effects.converted).toEqual([]);
    });
  });

  it('should report a stone that qualifies for both effects in both lists', () => {
    const board = boardFromLayout({
      white: ['d4', 'c4', 'd3', 'd5', 'e3', 'e5', 'f3', 'f4', 'f5'],
      black: ['e4'],
    });
    const effects = resolveEffects(board, sq('d4'), 'white');

    expect(labels(effects.suffocated)).toEqual(['e4']);
    expect(labels(effects.converted)).toEqual(['e4']);
  });

  it('should not modify the board it inspects', () => {
    const board = boardFromLayout({ white: ['b2', 'a2'], black: ['a1', 'b1'] });
    const before = [...board.cells];
    resolveEffects(board, sq('b2'), 'white');
    expect(board.cells).toEqual(before);
  });

  describe('applyEffects', () => {
    it('should clear suffocated squares and recolour converted ones', () => {
      const board = cloneBoard(boardFromLayout({ white: ['d4'], black: ['e4', 'e5'] }));
      applyEffects(board, { suffocated: [sq('e5')], converted: [sq('e4')] }, 'white');

      expect(stoneAt(board, sq('e5'))).toBeNull();
      expect(stoneAt(board, sq('e4'))).toBe('white');
    });

    it('should leave a square in both lists holding the mover colour', () => {
      const board = cloneBoard(boardFromLayout({ black: ['e4'] }));
      applyEffects(board, { suffocated: [sq('e4')], converted: [sq('e4')] }, 'black');
      expect(stoneAt(board, sq('e4'))).toBe('black');
    });
  });
});
