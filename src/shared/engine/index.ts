// =============================================================================
// BACKGAMMON RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (the server GameSession, renderers, CLIs) should only import from
// this file.
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export {
  BAR,
  OFF,
  SIDES,
  POINT_COUNT,
  CHECKERS_PER_SIDE,
  HOME_SIZE,
  DIE_FACES,
  MAX_QUANTA,
  SNAPSHOT_FORMAT_VERSION,
} from './types';

export type {
  Side,
  BarSentinel,
  OffSentinel,
  PointState,
  PerSide,
  BoardLayout,
  BoardSnapshot,
  BoardEvent,
  DiceRoll,
  InitialRoll,
  InitialRollOutcome,
  MoveRejectionCode,
  ValidationResult,
  ValidationOutcome,
  MoveKind,
  MovePlan,
  LegalMove,
  MoveOutcome,
  CheckerStatus,
  CheckerView,
  LogMeta,
  EngineLogger,
} from './types';

// =============================================================================
// ORCHESTRATION
// =============================================================================

export {
  TurnEngine,
  DEFAULT_MAX_INITIAL_ROLL_ATTEMPTS,
  type TurnEngineOptions,
  type FirstRollResult,
  type TurnRollResult,
  type EngineEvent,
  type EngineListener,
  type EngineView,
} from './TurnEngine';

export { TurnStateMachine, transition, type TurnPhase, type TurnState } from './fsm';

// =============================================================================
// DOMAIN
// =============================================================================

export { BoardState, STANDARD_LAYOUT, BEAR_OFF_PRACTICE_LAYOUT } from './BoardState';
export { DiceSource, higherInitialRoller, quantaFor, isDoublesRoll } from './DiceSource';
export { MoveLedger, findPayment, payableDistances } from './MoveLedger';
export {
  planMove,
  planEntry,
  planBearOff,
  enumerateLegalMoves,
  hasAnyLegalMove,
  destinationsFrom,
} from './legalMoves';
export {
  opponentOf,
  directionOf,
  homeRange,
  entryRange,
  entryDistance,
  bearOffDistance,
} from './sideGeometry';
export { projectCheckers } from './checkerProjection';

// =============================================================================
// PERSISTENCE CONTRACTS
// =============================================================================

export {
  serializeGameToJson,
  deserializeGameFromJson,
  validateSerializedGame,
  parseSerializedGame,
  type SerializedGame,
  type PersistedPhase,
} from './contracts';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  PreconditionViolation,
  InvalidState,
  BoardConstraintViolation,
  isEngineError,
  isPreconditionViolation,
  isInvalidState,
  isBoardConstraintViolation,
  wrapEngineError,
} from './errors';
