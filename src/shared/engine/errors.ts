/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Rule rejections (blocked point, wrong die, wrong direction, ...) are NOT
 * errors: they come back from commands as `{ ok: false, code, reason }`
 * values and leave state untouched. The classes here are for conditions a
 * correct caller never triggers.
 *
 * Error Categories:
 * - **PreconditionViolation**: API misuse (uninitialized engine, reading dice
 *   before a roll, mutating after game over, unknown side, wrong phase)
 * - **InvalidState**: Invariant breach (checker conservation, dual occupancy,
 *   malformed snapshot)
 * - **BoardConstraintViolation**: Point index outside the board in a query
 *
 * Usage:
 * ```typescript
 * import { PreconditionViolation, EngineErrorCode } from './errors';
 *
 * throw new PreconditionViolation(
 *   EngineErrorCode.PRECONDITION_DICE_NOT_ROLLED,
 *   'Dice must be rolled before reading their values'
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
 * - PRECONDITION_*: Caller broke the API contract
 * - STATE_*: Game state corruption/inconsistency
 * - BOARD_*: Board geometry issues
 * - FSM_*: State machine transition errors
 * - INTERNAL_*: Should never happen in correct code
 */
export enum EngineErrorCode {
  /** Command issued before initialize() */
  PRECONDITION_NOT_INITIALIZED = 'PRECONDITION_NOT_INITIALIZED',
  /** Dice values read before any roll */
  PRECONDITION_DICE_NOT_ROLLED = 'PRECONDITION_DICE_NOT_ROLLED',
  /** Mutating command after the game ended */
  PRECONDITION_GAME_OVER = 'PRECONDITION_GAME_OVER',
  /** Side value outside the two known sides */
  PRECONDITION_UNKNOWN_SIDE = 'PRECONDITION_UNKNOWN_SIDE',
  /** Command not valid in the current turn phase */
  PRECONDITION_WRONG_PHASE = 'PRECONDITION_WRONG_PHASE',
  /** Engine constructed with an unusable option */
  PRECONDITION_INVALID_OPTION = 'PRECONDITION_INVALID_OPTION',

  /** Per-side checker total differs from 15 */
  STATE_CONSERVATION_VIOLATED = 'STATE_CONSERVATION_VIOLATED',
  /** Point owner/count pair is inconsistent */
  STATE_INVALID_OCCUPANCY = 'STATE_INVALID_OCCUPANCY',
  /** Borne-off count decreased */
  STATE_BORNE_OFF_DECREASED = 'STATE_BORNE_OFF_DECREASED',
  /** Random source produced a face outside 1..6 */
  STATE_INVALID_DICE_VALUE = 'STATE_INVALID_DICE_VALUE',
  /** Persisted record failed validation */
  STATE_INVALID_SNAPSHOT = 'STATE_INVALID_SNAPSHOT',

  /** Point index outside 0..23 */
  BOARD_INVALID_POINT = 'BOARD_INVALID_POINT',

  /** Invalid FSM state transition */
  FSM_INVALID_TRANSITION = 'FSM_INVALID_TRANSITION',

  /** Initial roll kept tying past the attempt cap */
  INTERNAL_INITIAL_ROLL_UNRESOLVED = 'INTERNAL_INITIAL_ROLL_UNRESOLVED',
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  PRECONDITION_: 'Engine used outside its contract',
  STATE_: 'Corrupted or unexpected game state',
  BOARD_: 'Board geometry constraint violation',
  FSM_: 'Invalid state machine transition',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'BoardState', 'TurnEngine') */
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
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown when the engine is driven outside its contract: commands before
 * setup or after game over, dice read before a roll, an unknown side, or a
 * command that the current turn phase does not accept.
 */
export class PreconditionViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(code, message, context, domain);
    this.name = 'PreconditionViolation';
    Object.setPrototypeOf(this, PreconditionViolation.prototype);
  }
}

/**
 * Error for corrupted or unexpected game state.
 *
 * Either a bug in the engine or a persisted record that does not describe a
 * reachable position.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for point indices outside the board in query methods.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isPreconditionViolation(error: unknown): error is PreconditionViolation {
  return error instanceof PreconditionViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Throw an internal assertion error when `condition` is false.
 */
export function invariant(
  condition: boolean,
  message: string,
  context: Record<string, unknown> = {},
  code: EngineErrorCode = EngineErrorCode.INTERNAL_ASSERTION_FAILED
): asserts condition {
  if (!condition) {
    throw new InvalidState(code, message, context, 'Invariant');
  }
}
