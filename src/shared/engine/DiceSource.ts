/**
 * DiceSource - the only place dice are drawn.
 *
 * Wraps a RandomSource so tests can script exact faces. Faces outside 1..6
 * can only come from a broken source and are treated as an invariant breach.
 */

import type { RandomSource } from '../utils/rng';
import { EngineErrorCode, InvalidState, PreconditionViolation } from './errors';
import { DIE_FACES, MAX_QUANTA, type DiceRoll, type InitialRoll, type InitialRollOutcome } from './types';

export function isValidFace(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= DIE_FACES;
}

export function isDoublesRoll(roll: DiceRoll): boolean {
  return roll.die1 === roll.die2;
}

/** Movement quanta granted by a roll: four copies on doubles, else both faces in order. */
export function quantaFor(roll: DiceRoll): number[] {
  if (isDoublesRoll(roll)) {
    return new Array<number>(MAX_QUANTA).fill(roll.die1);
  }
  return [roll.die1, roll.die2];
}

export function higherInitialRoller(roll: InitialRoll): InitialRollOutcome {
  if (roll.white === roll.black) return 'tie';
  return roll.white > roll.black ? 'white' : 'black';
}

export class DiceSource {
  private readonly random: RandomSource;
  private last: DiceRoll | null = null;

  constructor(random: RandomSource) {
    this.random = random;
  }

  /** Last roll, or null before the first one. */
  get current(): DiceRoll | null {
    return this.last;
  }

  get rolled(): boolean {
    return this.last !== null;
  }

  roll(): DiceRoll {
    const die1 = this.draw();
    const die2 = this.draw();
    this.last = { die1, die2 };
    return this.last;
  }

  /** One die per side. Does not touch the current turn roll. */
  initialRoll(): InitialRoll {
    return { white: this.draw(), black: this.draw() };
  }

  isDoubles(): boolean {
    return isDoublesRoll(this.requireRoll('isDoubles'));
  }

  movesFor(): number[] {
    return quantaFor(this.requireRoll('movesFor'));
  }

  /** Reinstate a persisted last roll (or clear it). */
  restore(roll: DiceRoll | null): void {
    if (roll !== null) {
      for (const value of [roll.die1, roll.die2]) {
        this.assertFace(value);
      }
    }
    this.last = roll === null ? null : { die1: roll.die1, die2: roll.die2 };
  }

  private draw(): number {
    const value = this.random.nextInt(1, DIE_FACES);
    this.assertFace(value);
    return value;
  }

  private assertFace(value: number): void {
    if (!isValidFace(value)) {
      throw new InvalidState(
        EngineErrorCode.STATE_INVALID_DICE_VALUE,
        `Die value must be between 1 and ${DIE_FACES}, got ${value}`,
        { value },
        'DiceSource'
      );
    }
  }

  private requireRoll(operation: string): DiceRoll {
    if (this.last === null) {
      throw new PreconditionViolation(
        EngineErrorCode.PRECONDITION_DICE_NOT_ROLLED,
        `Dice must be rolled before calling ${operation}()`,
        { operation },
        'DiceSource'
      );
    }
    return this.last;
  }
}
