/**
 * TableState.ts
 * State representation for a heads-up table
 *
 * The engine replaces its TableState wholesale on every transition, so a
 * state object handed out is never mutated afterwards.
 */

import { Card } from './Card';
import { HandEvaluation } from './HandRank';

// ============================================================================
// Types
// ============================================================================

export type PlayerId = 'human' | 'bot';

export type Position = 'button' | 'big-blind';

export type Street = 'preflop' | 'flop' | 'turn' | 'river' | 'showdown';

/**
 * waiting: no hand dealt yet; betting: a seat is to act;
 * complete: the hand is resolved and the next one may start
 */
export type HandPhase = 'waiting' | 'betting' | 'complete';

export interface Seat {
  readonly playerId: PlayerId;
  readonly position: Position;
  readonly stack: number;
  readonly holeCards: readonly Card[];
  /** Chips committed on the current street */
  readonly streetCommitted: number;
  /** Chips committed over the whole hand */
  readonly handCommitted: number;
  readonly folded: boolean;
  /** Voluntarily acted on the current street (blinds do not count) */
  readonly hasActed: boolean;
}

export type Action =
  | { readonly type: 'fold' }
  | { readonly type: 'check' }
  | { readonly type: 'call' }
  | { readonly type: 'bet'; readonly amount: number }
  | { readonly type: 'raise'; readonly amount: number };

export type ActionType = Action['type'];

/**
 * Bet and raise amounts are street totals ("bet to", "raise to")
 */
export type LegalAction =
  | { readonly type: 'fold' }
  | { readonly type: 'check' }
  | { readonly type: 'call'; readonly amount: number; readonly allIn: boolean }
  | { readonly type: 'bet'; readonly min: number; readonly max: number }
  | { readonly type: 'raise'; readonly min: number; readonly max: number };

export interface ActionRecord {
  readonly playerId: PlayerId;
  readonly position: Position;
  readonly street: Street;
  readonly action: Action;
  /** Chips moved from stack to pot by this action */
  readonly chipsAdded: number;
  readonly toCallBefore: number;
  readonly stackAfter: number;
  readonly allIn: boolean;
  /** Bets and raises made on this street before this action */
  readonly aggressionBefore: number;
}

export type HandResolution = 'showdown' | 'fold';

export interface ShowdownHand {
  readonly playerId: PlayerId;
  readonly holeCards: readonly Card[];
  readonly evaluation: HandEvaluation;
}

export interface HandResult {
  readonly handNumber: number;
  readonly resolution: HandResolution;
  /** One winner, or both on a split pot */
  readonly winners: readonly PlayerId[];
  readonly pot: number;
  readonly payouts: Readonly<Record<PlayerId, number>>;
  /** Chips won or lost over the hand, blinds included */
  readonly net: Readonly<Record<PlayerId, number>>;
  readonly showdown: readonly ShowdownHand[];
  readonly board: readonly Card[];
  /** Last street reached before resolution */
  readonly finalStreet: Street;
  readonly button: PlayerId;
  readonly bigBlind: number;
}

export interface TableState {
  readonly handNumber: number;
  readonly phase: HandPhase;
  readonly street: Street;
  readonly button: PlayerId;
  readonly seats: Readonly<Record<PlayerId, Seat>>;
  readonly board: readonly Card[];
  readonly pot: number;
  /** Highest street commitment */
  readonly currentBet: number;
  /** Size of the last full bet or raise this street */
  readonly lastRaiseSize: number;
  readonly toAct: PlayerId | null;
  /** Last player to bet or raise preflop */
  readonly preflopAggressor: PlayerId | null;
  readonly smallBlind: number;
  readonly bigBlind: number;
  readonly totalChips: number;
  readonly actions: readonly ActionRecord[];
  readonly result: HandResult | null;
}

// ============================================================================
// Constants
// ============================================================================

export const PLAYER_IDS: readonly PlayerId[] = ['human', 'bot'];

// ============================================================================
// Factory Functions
// ============================================================================

export function createSeat(playerId: PlayerId, position: Position, stack: number): Seat {
  return {
    playerId,
    position,
    stack,
    holeCards: [],
    streetCommitted: 0,
    handCommitted: 0,
    folded: false,
    hasActed: false,
  };
}

export function createTableState(
  startingStack: number,
  smallBlind: number,
  bigBlind: number
): TableState {
  return {
    handNumber: 0,
    phase: 'waiting',
    street: 'preflop',
    // Flipped by the first startHand so the human opens on the button
    button: 'bot',
    seats: {
      human: createSeat('human', 'big-blind', startingStack),
      bot: createSeat('bot', 'button', startingStack),
    },
    board: [],
    pot: 0,
    currentBet: 0,
    lastRaiseSize: bigBlind,
    toAct: null,
    preflopAggressor: null,
    smallBlind,
    bigBlind,
    totalChips: startingStack * 2,
    actions: [],
    result: null,
  };
}

// ============================================================================
// State Query Functions
// ============================================================================

export function opponentOf(playerId: PlayerId): PlayerId {
  return playerId === 'human' ? 'bot' : 'human';
}

export function getBigBlindPlayer(state: TableState): PlayerId {
  return opponentOf(state.button);
}

export function getCallAmount(state: TableState, playerId: PlayerId): number {
  return Math.max(0, state.currentBet - state.seats[playerId].streetCommitted);
}

export function isAllIn(seat: Seat): boolean {
  return !seat.folded && seat.stack === 0;
}

export function isHandInProgress(state: TableState): boolean {
  return state.phase === 'betting';
}

export function getStackTotal(state: TableState): number {
  return state.seats.human.stack + state.seats.bot.stack;
}

/**
 * Actions made on the given street, in order
 */
export function getStreetActions(state: TableState, street: Street): readonly ActionRecord[] {
  return state.actions.filter(a => a.street === street);
}

/**
 * Bets and raises made on the given street
 */
export function countAggressiveActions(state: TableState, street: Street): number {
  return getStreetActions(state, street).filter(
    a => a.action.type === 'bet' || a.action.type === 'raise'
  ).length;
}

// ============================================================================
// State Update Functions
// ============================================================================

export function updateSeat(
  state: TableState,
  playerId: PlayerId,
  updates: Partial<Omit<Seat, 'playerId'>>
): TableState {
  return {
    ...state,
    seats: {
      ...state.seats,
      [playerId]: { ...state.seats[playerId], ...updates },
    },
  };
}

/**
 * Move chips from a seat's stack into the pot
 */
export function commitChips(state: TableState, playerId: PlayerId, amount: number): TableState {
  const seat = state.seats[playerId];
  const chips = Math.min(amount, seat.stack);
  const updated = updateSeat(state, playerId, {
    stack: seat.stack - chips,
    streetCommitted: seat.streetCommitted + chips,
    handCommitted: seat.handCommitted + chips,
  });
  return {
    ...updated,
    pot: state.pot + chips,
    currentBet: Math.max(state.currentBet, seat.streetCommitted + chips),
  };
}
