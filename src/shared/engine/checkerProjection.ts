/**
 * Per-piece view of the board for renderers.
 *
 * The board only stores counts. Renderers that animate individual checkers
 * want stable identities, so this derives 30 CheckerViews from the counts on
 * demand. The result is disposable: recompute it after every change and
 * never write it back.
 *
 * Id assignment per side (ids `white-0` .. `white-14`):
 * - borne-off checkers take the highest ids,
 * - bar checkers take the lowest ids,
 * - on-board checkers take the ids in between, filling points in
 *   increasing index order.
 */

import type { BoardState } from './BoardState';
import { SIDES, type CheckerView, type Side } from './types';

function checkerId(side: Side, index: number): string {
  return `${side}-${index}`;
}

function projectSide(board: BoardState, side: Side): CheckerView[] {
  const views: CheckerView[] = [];
  const bar = board.capturedCount(side);
  const borneOff = board.borneOffCount(side);
  let next = 0;

  for (let i = 0; i < bar; i++) {
    views.push({ id: checkerId(side, next++), side, status: 'on_bar', point: null });
  }

  board.points().forEach((p, index) => {
    if (p.owner !== side) return;
    for (let i = 0; i < p.count; i++) {
      views.push({ id: checkerId(side, next++), side, status: 'on_board', point: index });
    }
  });

  for (let i = 0; i < borneOff; i++) {
    views.push({ id: checkerId(side, next++), side, status: 'borne_off', point: null });
  }

  return views;
}

export function projectCheckers(board: BoardState): CheckerView[] {
  return SIDES.flatMap((side) => projectSide(board, side));
}

