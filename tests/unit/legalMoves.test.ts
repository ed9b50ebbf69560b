import { BoardState } from '../../src/shared/engine/BoardState';
import { MoveLedger } from '../../src/shared/engine/MoveLedger';
import {
  destinationsFrom,
  enumerateLegalMoves,
  hasAnyLegalMove,
  planBearOff,
  planEntry,
  planMove,
} from '../../src/shared/engine/legalMoves';
import { layout } from '../utils/fixtures';

function ledgerOf(...quanta: number[]): MoveLedger {
  const ledger = new MoveLedger();
  ledger.seed(quanta);
  return ledger;
}

describe('planMove', () => {
  const board = BoardState.standard();

  it('accepts a move paid by a single quantum', () => {
    expect(planMove(board, 'white', ledgerOf(6, 6, 6, 6), 0, 6)).toEqual({
      valid: true,
      data: { kind: 'move', side: 'white', from: 0, to: 6, distance: 6, substituted: false },
    });
  });

  it('checks dice before blocking', () => {
    expect(planMove(board, 'white', ledgerOf(2, 3), 0, 4)).toEqual({
      valid: false,
      code: 'DICE_MISMATCH',
      reason: 'Distance 4 cannot be paid with [2, 3]',
    });
    expect(planMove(board, 'white', ledgerOf(2, 3), 0, 5)).toMatchObject({
      valid: false,
      code: 'POINT_BLOCKED',
    });
  });

  it('checks direction before dice', () => {
    expect(planMove(board, 'black', ledgerOf(2, 3), 12, 14)).toMatchObject({
      code: 'WRONG_DIRECTION',
    });
  });

  it('refuses point moves while a checker waits on the bar', () => {
    const barred = BoardState.fromLayout(layout({ white: { 0: 1 }, bar: { white: 1 } }));
    expect(planMove(barred, 'white', ledgerOf(1, 2), 0, 1)).toMatchObject({
      code: 'BAR_ENTRY_REQUIRED',
    });
  });
});

describe('planEntry', () => {
  const barred = BoardState.fromLayout(
    layout({ white: { 18: 14 }, black: { 3: 2, 23: 13 }, bar: { white: 1 } })
  );

  it('charges the entry distance from a single quantum', () => {
    expect(planEntry(barred, 'white', ledgerOf(3, 5), 4)).toEqual({
      valid: true,
      data: { kind: 'enter', side: 'white', from: 'bar', to: 4, distance: 5, substituted: false },
    });
  });

  it('does not let two quanta combine for an entry', () => {
    expect(planEntry(barred, 'white', ledgerOf(3, 4), 6)).toMatchObject({
      code: 'NOT_IN_ENTRY_RANGE',
    });
    expect(planEntry(barred, 'white', ledgerOf(3, 4), 0)).toEqual({
      valid: false,
      code: 'DICE_MISMATCH',
      reason: 'Entering on 0 needs a 1, remaining [3, 4]',
    });
  });

  it('reports a blocked entry point', () => {
    expect(planEntry(barred, 'white', ledgerOf(4, 1), 3)).toMatchObject({
      code: 'POINT_BLOCKED',
    });
  });

  it('refuses entry when the bar is empty', () => {
    expect(planEntry(barred, 'black', ledgerOf(1, 2), 23)).toMatchObject({
      code: 'NO_CHECKERS_ON_BAR',
    });
  });
});

describe('planBearOff', () => {
  it('pays an exact distance with a combination', () => {
    const board = BoardState.fromLayout(layout({ white: { 19: 1 }, black: { 5: 15 } }));
    expect(planBearOff(board, 'white', ledgerOf(2, 3), 19)).toEqual({
      valid: true,
      data: { kind: 'bear_off', side: 'white', from: 19, to: 'off', distance: 5, substituted: false },
    });
  });

  it('substitutes a larger quantum only from the furthest checker', () => {
    const board = BoardState.fromLayout(layout({ white: { 20: 1, 22: 2 }, black: { 5: 15 } }));
    expect(planBearOff(board, 'white', ledgerOf(6, 1), 20)).toMatchObject({
      valid: false,
      code: 'BEAR_OFF_NOT_FURTHEST',
    });
    expect(planBearOff(board, 'white', ledgerOf(6, 1), 22)).toEqual({
      valid: true,
      data: { kind: 'bear_off', side: 'white', from: 22, to: 'off', distance: 6, substituted: true },
    });
  });

  it('works in mirror image for black', () => {
    const board = BoardState.fromLayout(layout({ white: { 18: 15 }, black: { 2: 1 } }));
    expect(planBearOff(board, 'black', ledgerOf(3, 1), 2)).toMatchObject({
      valid: true,
      data: { distance: 3, substituted: false },
    });
    expect(planBearOff(board, 'black', ledgerOf(5, 1), 2)).toMatchObject({
      valid: true,
      data: { distance: 5, substituted: true },
    });
  });

  it('reports a dice mismatch when no quantum is large enough', () => {
    const board = BoardState.fromLayout(layout({ white: { 18: 1 }, black: { 5: 15 } }));
    expect(planBearOff(board, 'white', ledgerOf(2, 1), 18)).toEqual({
      valid: false,
      code: 'DICE_MISMATCH',
      reason: 'Bearing off from 18 needs 6, remaining [2, 1]',
    });
  });

  it('refuses while a checker is outside the home board', () => {
    expect(planBearOff(BoardState.standard(), 'white', ledgerOf(6, 6, 6, 6), 18)).toMatchObject({
      code: 'NOT_ALL_HOME',
    });
  });
});

describe('enumerateLegalMoves', () => {
  it('lists moves from the opening for doubles sixes', () => {
    expect(enumerateLegalMoves(BoardState.standard(), 'white', ledgerOf(6, 6, 6, 6))).toEqual([
      { kind: 'move', from: 0, to: 6, distance: 6 },
      { kind: 'move', from: 0, to: 18, distance: 18 },
      { kind: 'move', from: 11, to: 17, distance: 6 },
      { kind: 'move', from: 16, to: 22, distance: 6 },
    ]);
  });

  it('lists only entries while on the bar', () => {
    const board = BoardState.fromLayout(
      layout({
        white: { 18: 14 },
        black: { 0: 2, 1: 2, 3: 2, 4: 2, 5: 2, 23: 5 },
        bar: { white: 1 },
      })
    );
    expect(enumerateLegalMoves(board, 'white', ledgerOf(3, 6))).toEqual([
      { kind: 'enter', from: 'bar', to: 2, distance: 3 },
    ]);
  });

  it('is empty when every entry point is blocked', () => {
    const board = BoardState.fromLayout(
      layout({
        white: { 18: 14 },
        black: { 0: 2, 1: 2, 2: 2, 3: 2, 4: 2, 5: 2, 23: 3 },
        bar: { white: 1 },
      })
    );
    const ledger = ledgerOf(3, 4);
    expect(enumerateLegalMoves(board, 'white', ledger)).toEqual([]);
    expect(hasAnyLegalMove(board, 'white', ledger)).toBe(false);
  });

  it('includes bear-offs alongside point moves', () => {
    const board = BoardState.fromLayout(layout({ white: { 20: 1, 22: 2 }, black: { 5: 15 } }));
    expect(enumerateLegalMoves(board, 'white', ledgerOf(6, 1))).toEqual([
      { kind: 'move', from: 20, to: 21, distance: 1 },
      { kind: 'move', from: 22, to: 23, distance: 1 },
      { kind: 'bear_off', from: 22, to: 'off', distance: 6 },
    ]);
  });

  it('is empty once the ledger is spent', () => {
    expect(enumerateLegalMoves(BoardState.standard(), 'white', new MoveLedger())).toEqual([]);
  });

  it('agrees with the planners for every listed move', () => {
    const board = BoardState.standard();
    const ledger = ledgerOf(5, 3);
    for (const move of enumerateLegalMoves(board, 'black', ledger)) {
      expect(typeof move.from).toBe('number');
      expect(typeof move.to).toBe('number');
      if (typeof move.from === 'number' && typeof move.to === 'number') {
        expect(planMove(board, 'black', ledger, move.from, move.to).valid).toBe(true);
      }
    }
  });
});

describe('destinationsFrom', () => {
  it('filters legal moves by origin', () => {
    const board = BoardState.standard();
    expect(destinationsFrom(board, 'black', ledgerOf(1, 2), 5)).toEqual([4, 3, 2]);
    expect(destinationsFrom(board, 'white', ledgerOf(6, 6, 6, 6), 0)).toEqual([6, 18]);
    expect(destinationsFrom(board, 'white', ledgerOf(6, 6, 6, 6), 'bar')).toEqual([]);
  });
});
