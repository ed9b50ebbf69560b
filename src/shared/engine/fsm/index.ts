/**
 * FSM Module - Finite State Machine for backgammon turn phases
 */

export {
  TurnStateMachine,
  transition,
  sideOf,
  type TurnState,
  type TurnPhase,
  type TurnEvent,
  type TransitionResult,
  type TransitionError,
  type Action,
  // Phase states
  type NotStartedState,
  type AwaitingInitialRollState,
  type TurnStartState,
  type AwaitingMoveInputState,
  type TurnEndState,
  type GameOverState,
} from './TurnStateMachine';
