/**
 * Tests for EngineErrors - Structured error types for the rules engine
 * @module tests/unit/EngineErrors.test
 */

import {
  BoardConstraintViolation,
  EngineError,
  EngineErrorCode,
  InvalidState,
  PreconditionViolation,
  invariant,
  isBoardConstraintViolation,
  isEngineError,
  isInvalidState,
  isPreconditionViolation,
  wrapEngineError,
  type EngineErrorJSON,
} from '../../src/shared/engine/errors';

describe('EngineErrors', () => {
  describe('error classes', () => {
    it('should keep the prototype chain for each subclass', () => {
      const precondition = new PreconditionViolation(
        EngineErrorCode.PRECONDITION_GAME_OVER,
        'Game is over'
      );
      const state = new InvalidState(EngineErrorCode.STATE_CONSERVATION_VIOLATED, 'Lost a checker');
      const board = new BoardConstraintViolation(EngineErrorCode.BOARD_INVALID_POINT, 'Bad point');

      expect(precondition).toBeInstanceOf(PreconditionViolation);
      expect(precondition).toBeInstanceOf(EngineError);
      expect(precondition).toBeInstanceOf(Error);
      expect(state).toBeInstanceOf(InvalidState);
      expect(board).toBeInstanceOf(BoardConstraintViolation);
      expect(state).not.toBeInstanceOf(PreconditionViolation);
    });

    it('should set name and default domain per class', () => {
      expect(new PreconditionViolation(EngineErrorCode.PRECONDITION_WRONG_PHASE, 'x')).toMatchObject(
        { name: 'PreconditionViolation', domain: 'Engine' }
      );
      expect(new InvalidState(EngineErrorCode.STATE_INVALID_SNAPSHOT, 'x')).toMatchObject({
        name: 'InvalidState',
        domain: 'State',
      });
      expect(new BoardConstraintViolation(EngineErrorCode.BOARD_INVALID_POINT, 'x')).toMatchObject({
        name: 'BoardConstraintViolation',
        domain: 'Board',
      });
    });

    it('should derive the category from the code prefix', () => {
      expect(new InvalidState(EngineErrorCode.STATE_BORNE_OFF_DECREASED, 'x').category).toBe(
        'Corrupted or unexpected game state'
      );
      expect(new EngineError(EngineErrorCode.FSM_INVALID_TRANSITION, 'x').category).toBe(
        'Invalid state machine transition'
      );
      expect(new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'x').category).toBe(
        'Internal engine error (bug)'
      );
    });
  });

  describe('toJSON', () => {
    it('should serialize every field', () => {
      const error = new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POINT,
        'Invalid point: 24. Points must be between 0-23.',
        { point: 24 }
      );
      const json: EngineErrorJSON = error.toJSON();

      expect(json).toEqual({
        error: true,
        type: 'BoardConstraintViolation',
        code: 'BOARD_INVALID_POINT',
        message: 'Invalid point: 24. Points must be between 0-23.',
        domain: 'Board',
        context: { point: 24 },
        category: 'Board geometry constraint violation',
        timestamp: error.timestamp.toISOString(),
      });
    });
  });

  describe('type guards', () => {
    it('should identify each error type', () => {
      const precondition = new PreconditionViolation(EngineErrorCode.PRECONDITION_UNKNOWN_SIDE, 'x');
      const state = new InvalidState(EngineErrorCode.STATE_INVALID_OCCUPANCY, 'x');
      const board = new BoardConstraintViolation(EngineErrorCode.BOARD_INVALID_POINT, 'x');

      expect(isEngineError(precondition)).toBe(true);
      expect(isEngineError(new Error('plain'))).toBe(false);
      expect(isPreconditionViolation(precondition)).toBe(true);
      expect(isPreconditionViolation(state)).toBe(false);
      expect(isInvalidState(state)).toBe(true);
      expect(isBoardConstraintViolation(board)).toBe(true);
      expect(isBoardConstraintViolation('Board')).toBe(false);
    });
  });

  describe('wrapEngineError', () => {
    it('should pass engine errors through unchanged', () => {
      const original = new InvalidState(EngineErrorCode.STATE_INVALID_DICE_VALUE, 'Bad die');
      expect(wrapEngineError(original)).toBe(original);
    });

    it('should wrap plain errors and other values as internal errors', () => {
      const wrapped = wrapEngineError(new Error('boom'), 'Session', { gameId: 'g1' });
      expect(wrapped.code).toBe(EngineErrorCode.INTERNAL_ASSERTION_FAILED);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.domain).toBe('Session');
      expect(wrapped.context.gameId).toBe('g1');

      expect(wrapEngineError('text failure').message).toBe('text failure');
    });
  });

  describe('invariant', () => {
    it('should throw InvalidState only when the condition fails', () => {
      expect(() => invariant(true, 'fine')).not.toThrow();
      expect(() => invariant(false, 'broken', { at: 1 })).toThrow(InvalidState);
      try {
        invariant(false, 'broken', {}, EngineErrorCode.STATE_BORNE_OFF_DECREASED);
      } catch (err) {
        expect(err).toMatchObject({
          code: EngineErrorCode.STATE_BORNE_OFF_DECREASED,
          domain: 'Invariant',
        });
      }
      expect.assertions(3);
    });
  });
});
