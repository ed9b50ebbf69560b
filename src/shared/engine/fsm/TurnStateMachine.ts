/**
 * TurnStateMachine - Finite State Machine for backgammon turn phases
 *
 * Every valid (state, event) → nextState transition is declared here, with
 * guards for the conditional ones. The machine knows nothing about the
 * board; the TurnEngine feeds it the facts it needs (quanta remaining,
 * whether any legal move exists, the winner) inside the events.
 *
 * Key design principles:
 * - Discriminated unions for states (phase-specific context)
 * - Exhaustive event handling per state
 * - Guards for conditional transitions
 * - Actions for side effects
 *
 * @module TurnStateMachine
 */

import { EngineError, EngineErrorCode } from '../errors';
import type { Side } from '../types';

// ═══════════════════════════════════════════════════════════════════════════
// STATES - Discriminated union with phase-specific context
// ═══════════════════════════════════════════════════════════════════════════

export type TurnState =
  | NotStartedState
  | AwaitingInitialRollState
  | TurnStartState
  | AwaitingMoveInputState
  | TurnEndState
  | GameOverState;

export type TurnPhase = TurnState['phase'];

export interface NotStartedState {
  readonly phase: 'not_started';
}

export interface AwaitingInitialRollState {
  readonly phase: 'awaiting_initial_roll';
}

export interface TurnStartState {
  readonly phase: 'turn_start';
  readonly side: Side;
}

export interface AwaitingMoveInputState {
  readonly phase: 'awaiting_move_input';
  readonly side: Side;
  /** Quanta left in the side's ledger. */
  readonly remaining: number;
  /** Whether any legal move exists for those quanta. */
  readonly canMove: boolean;
}

/**
 * Transient: the engine advances out of it within the same command, so it
 * is never observed between commands nor persisted.
 */
export interface TurnEndState {
  readonly phase: 'turn_end';
  readonly completedSide: Side;
  readonly nextSide: Side;
  readonly winner: Side | null;
}

export interface GameOverState {
  readonly phase: 'game_over';
  readonly winner: Side;
}

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type TurnEvent =
  | { readonly type: 'INITIALIZE' }
  | { readonly type: 'FIRST_SIDE_DECIDED'; readonly side: Side }
  | { readonly type: 'DICE_ROLLED'; readonly remaining: number; readonly canMove: boolean }
  | { readonly type: 'MOVE_APPLIED'; readonly remaining: number; readonly canMove: boolean }
  | { readonly type: 'END_TURN'; readonly winner: Side | null }
  | { readonly type: 'ADVANCE' };

// ═══════════════════════════════════════════════════════════════════════════
// TRANSITION RESULT
// ═══════════════════════════════════════════════════════════════════════════

export type TransitionResult =
  | { readonly ok: true; readonly state: TurnState; readonly actions: Action[] }
  | { readonly ok: false; readonly error: TransitionError };

export interface TransitionError {
  readonly code: 'INVALID_EVENT' | 'GUARD_FAILED';
  readonly message: string;
  readonly currentPhase: string;
  readonly eventType: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTIONS - Side effects to apply after transition
// ═══════════════════════════════════════════════════════════════════════════

export type Action =
  | { readonly type: 'CLEAR_LEDGER'; readonly side: Side }
  | { readonly type: 'SWITCH_SIDE'; readonly from: Side; readonly to: Side }
  | { readonly type: 'DECLARE_WINNER'; readonly winner: Side };

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Pure transition function. Takes current state + event, returns the new
 * state + actions (or an error).
 */
export function transition(state: TurnState, event: TurnEvent): TransitionResult {
  switch (state.phase) {
    case 'not_started':
      return event.type === 'INITIALIZE'
        ? ok<AwaitingInitialRollState>({ phase: 'awaiting_initial_roll' }, [])
        : invalidTransition(state, event);
    case 'awaiting_initial_roll':
      return event.type === 'FIRST_SIDE_DECIDED'
        ? ok<TurnStartState>({ phase: 'turn_start', side: event.side }, [])
        : invalidTransition(state, event);
    case 'turn_start':
      return event.type === 'DICE_ROLLED'
        ? ok<AwaitingMoveInputState>(
            {
              phase: 'awaiting_move_input',
              side: state.side,
              remaining: event.remaining,
              canMove: event.canMove,
            },
            []
          )
        : invalidTransition(state, event);
    case 'awaiting_move_input':
      return handleAwaitingMoveInput(state, event);
    case 'turn_end':
      return handleTurnEnd(state, event);
    case 'game_over':
      return invalidTransition(state, event, 'Game is over - no transitions allowed');
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PHASE HANDLERS
// ═══════════════════════════════════════════════════════════════════════════

function handleAwaitingMoveInput(
  state: AwaitingMoveInputState,
  event: TurnEvent
): TransitionResult {
  switch (event.type) {
    case 'MOVE_APPLIED': {
      if (!state.canMove || state.remaining === 0) {
        return guardFailed(state, event, 'No move can be applied: turn must end');
      }
      return ok<AwaitingMoveInputState>(
        { ...state, remaining: event.remaining, canMove: event.canMove },
        []
      );
    }

    case 'END_TURN': {
      if (state.remaining > 0 && state.canMove) {
        return guardFailed(
          state,
          event,
          `Cannot end turn with ${state.remaining} playable quanta remaining`
        );
      }
      return ok<TurnEndState>(
        {
          phase: 'turn_end',
          completedSide: state.side,
          nextSide: opposite(state.side),
          winner: event.winner,
        },
        [{ type: 'CLEAR_LEDGER', side: state.side }]
      );
    }

    default:
      return invalidTransition(state, event);
  }
}

function handleTurnEnd(state: TurnEndState, event: TurnEvent): TransitionResult {
  if (event.type !== 'ADVANCE') {
    return invalidTransition(state, event);
  }
  if (state.winner !== null) {
    return ok<GameOverState>({ phase: 'game_over', winner: state.winner }, [
      { type: 'DECLARE_WINNER', winner: state.winner },
    ]);
  }
  return ok<TurnStartState>({ phase: 'turn_start', side: state.nextSide }, [
    { type: 'SWITCH_SIDE', from: state.completedSide, to: state.nextSide },
  ]);
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════

function ok<S extends TurnState>(state: S, actions: Action[]): TransitionResult {
  return { ok: true, state, actions };
}

function invalidTransition(state: TurnState, event: TurnEvent, message?: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'INVALID_EVENT',
      message: message || `Event '${event.type}' not valid in phase '${state.phase}'`,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

function guardFailed(state: TurnState, event: TurnEvent, message: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'GUARD_FAILED',
      message,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

function opposite(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}

/** Side whose turn it is (or was, once the game has ended). */
export function sideOf(state: TurnState): Side | null {
  switch (state.phase) {
    case 'turn_start':
    case 'awaiting_move_input':
      return state.side;
    case 'turn_end':
      return state.completedSide;
    case 'game_over':
      return state.winner;
    default:
      return null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE CLASS WRAPPER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * TurnStateMachine class - wraps pure transition function with state management.
 */
export class TurnStateMachine {
  private _state: TurnState;
  private readonly history: Array<{ state: TurnState; event: TurnEvent }> = [];

  constructor(initialState: TurnState = TurnStateMachine.createInitialState()) {
    this._state = initialState;
  }

  get state(): TurnState {
    return this._state;
  }

  get phase(): TurnPhase {
    return this._state.phase;
  }

  get currentSide(): Side | null {
    return sideOf(this._state);
  }

  /**
   * Send an event to the state machine.
   * Returns actions to apply if successful, or throws on invalid transition.
   */
  send(event: TurnEvent): Action[] {
    const result = transition(this._state, event);

    if (result.ok === false) {
      const { code, message, currentPhase, eventType } = result.error;
      throw new EngineError(
        EngineErrorCode.FSM_INVALID_TRANSITION,
        `[FSM] ${code}: ${message} (phase=${currentPhase}, event=${eventType})`,
        { code, currentPhase, eventType },
        'FSM'
      );
    }

    this.history.push({ state: this._state, event });
    this._state = result.state;
    return result.actions;
  }

  /**
   * Check if an event is valid in the current state.
   */
  canSend(event: TurnEvent): boolean {
    return transition(this._state, event).ok;
  }

  /**
   * Get the transition history for debugging.
   */
  getHistory(): ReadonlyArray<{ state: TurnState; event: TurnEvent }> {
    return this.history;
  }

  static createInitialState(): NotStartedState {
    return { phase: 'not_started' };
  }
}
