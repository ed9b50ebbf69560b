/**
 * Property-based TurnEngine tests using fast-check
 *
 * Random games driven only through the public API, checking the board and
 * turn invariants after every command.
 */

import fc from 'fast-check';

import { TurnEngine } from '../../src/shared/engine/TurnEngine';
import { CHECKERS_PER_SIDE, SIDES, type Side } from '../../src/shared/engine/types';

function checkerTotal(engine: TurnEngine, side: Side): number {
  const onBoard = engine
    .points()
    .reduce((sum, p) => (p.owner === side ? sum + p.count : sum), 0);
  return onBoard + engine.capturedCount(side) + engine.borneOffCount(side);
}

function assertBoardInvariants(engine: TurnEngine): void {
  for (const side of SIDES) {
    expect(checkerTotal(engine, side)).toBe(CHECKERS_PER_SIDE);
  }
  for (const point of engine.points()) {
    expect(point.count === 0).toBe(point.owner === null);
  }
  expect(engine.phase).not.toBe('turn_end');
}

/**
 * Play up to `commands` commands, picking legal moves by the given indices.
 */
function playRandomGame(seed: number, picks: number[], commands: number): TurnEngine {
  const engine = new TurnEngine({ seed });
  engine.initialize();
  engine.rollForFirst();
  const borneOff = { white: 0, black: 0 };

  for (let i = 0; i < commands && !engine.isGameOver(); i++) {
    if (engine.phase === 'turn_start') {
      engine.rollForTurn();
    } else {
      const moves = engine.legalMoves();
      expect(moves.length).toBeGreaterThan(0);
      const move = moves[picks[i % picks.length] % moves.length];
      const outcome = engine.attemptMove(move.from, move.to);
      expect(outcome.ok).toBe(true);
    }

    assertBoardInvariants(engine);
    for (const side of SIDES) {
      expect(engine.borneOffCount(side)).toBeGreaterThanOrEqual(borneOff[side]);
      borneOff[side] = engine.borneOffCount(side);
    }
  }
  return engine;
}

describe('TurnEngine properties', () => {
  it('keeps checker conservation and occupancy through random play', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 0x7fffffff }),
        fc.array(fc.nat(50), { minLength: 1, maxLength: 20 }),
        (seed, picks) => {
          playRandomGame(seed, picks, 200);
        }
      ),
      { numRuns: 40 }
    );
  });

  it('only lists moves the engine then accepts, and vice versa', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0x7fffffff }), (seed) => {
        const engine = playRandomGame(seed, [0], 30);
        if (engine.phase !== 'awaiting_move_input') return;

        const listed = engine.legalMoves();
        const before = engine.snapshot();
        for (let from = 0; from < 24; from++) {
          for (let to = 0; to < 24; to++) {
            const isListed = listed.some((m) => m.from === from && m.to === to);
            const probe = TurnEngine.restore(before, { seed: 1 });
            expect(probe.attemptMove(from, to).ok).toBe(isListed);
          }
        }
      }),
      { numRuns: 15 }
    );
  });

  it('round-trips any reachable position through a snapshot', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 0x7fffffff }),
        fc.integer({ min: 1, max: 120 }),
        (seed, commands) => {
          const engine = playRandomGame(seed, [1, 0, 2], commands);
          const restored = TurnEngine.restore(engine.snapshot(), { seed: 1 });
          expect(restored.snapshot()).toEqual(engine.snapshot());
          expect(restored.legalMoves()).toEqual(engine.legalMoves());
        }
      ),
      { numRuns: 40 }
    );
  });

  it('ends with a winner who has borne off every checker', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0x7fffffff }), (seed) => {
        const engine = playRandomGame(seed, [0], 5000);
        if (!engine.isGameOver()) return;
        const winner = engine.winner;
        expect(winner).not.toBeNull();
        if (winner !== null) {
          expect(engine.borneOffCount(winner)).toBe(CHECKERS_PER_SIDE);
        }
      }),
      { numRuns: 5 }
    );
  });
});
