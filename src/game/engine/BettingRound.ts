/**
 * BettingRound.ts
 * Betting logic for heads-up No-Limit Hold'em
 *
 * Legal-action computation, action validation and application, and the
 * betting-round closing rule. All functions are pure over TableState.
 */

import {
  TableState,
  PlayerId,
  Action,
  LegalAction,
  ActionRecord,
  getCallAmount,
  countAggressiveActions,
  commitChips,
  opponentOf,
  updateSeat,
} from './TableState';
import { EngineErrorCode, IllegalActionError } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

export interface AppliedAction {
  readonly state: TableState;
  readonly record: ActionRecord;
}

// ============================================================================
// Legal Actions
// ============================================================================

/**
 * Legal actions for the seat to act; empty when nobody is to act
 */
export function getLegalActions(state: TableState): LegalAction[] {
  if (state.phase !== 'betting' || state.toAct === null) {
    return [];
  }

  const seat = state.seats[state.toAct];
  const opponent = state.seats[opponentOf(state.toAct)];
  const toCall = getCallAmount(state, state.toAct);
  const maxTotal = seat.streetCommitted + seat.stack;
  const opponentCanRespond = opponent.stack > 0;

  if (toCall === 0) {
    const actions: LegalAction[] = [{ type: 'check' }];
    if (seat.stack > 0 && opponentCanRespond) {
      if (state.currentBet === 0) {
        actions.push({ type: 'bet', min: Math.min(state.bigBlind, seat.stack), max: seat.stack });
      } else {
        // Big blind's option after a limp
        actions.push({
          type: 'raise',
          min: Math.min(state.currentBet + state.lastRaiseSize, maxTotal),
          max: maxTotal,
        });
      }
    }
    return actions;
  }

  // A partial call is never a raise
  if (seat.stack <= toCall) {
    return [{ type: 'fold' }, { type: 'call', amount: seat.stack, allIn: true }];
  }

  const actions: LegalAction[] = [
    { type: 'fold' },
    { type: 'call', amount: toCall, allIn: false },
  ];
  if (opponentCanRespond) {
    actions.push({
      type: 'raise',
      // All-in below the minimum raise stays legal
      min: Math.min(state.currentBet + state.lastRaiseSize, maxTotal),
      max: maxTotal,
    });
  }
  return actions;
}

export function findLegalAction<T extends LegalAction['type']>(
  legal: readonly LegalAction[],
  type: T
): Extract<LegalAction, { type: T }> | undefined {
  for (const candidate of legal) {
    if (isLegalActionOfType(candidate, type)) {
      return candidate;
    }
  }
  return undefined;
}

function isLegalActionOfType<T extends LegalAction['type']>(
  action: LegalAction,
  type: T
): action is Extract<LegalAction, { type: T }> {
  return action.type === type;
}

// ============================================================================
// Action Validation
// ============================================================================

/**
 * Returns the reason an action is illegal, or null when it may be applied
 */
export function validateAction(
  state: TableState,
  playerId: PlayerId,
  action: Action
): IllegalActionError | null {
  if (state.phase !== 'betting' || state.toAct === null) {
    return new IllegalActionError(EngineErrorCode.NO_ACTIVE_HAND, 'No hand is being played');
  }
  if (state.toAct !== playerId) {
    return new IllegalActionError(
      EngineErrorCode.NOT_YOUR_TURN,
      `It is not ${playerId}'s turn to act`,
      { playerId, toAct: state.toAct }
    );
  }

  const legal = getLegalActions(state);
  const match = findLegalAction(legal, action.type);
  if (!match) {
    return new IllegalActionError(
      EngineErrorCode.ACTION_NOT_AVAILABLE,
      `Cannot ${action.type} now`,
      { action: action.type, legal: legal.map(a => a.type) }
    );
  }

  if (action.type === 'bet' || action.type === 'raise') {
    const range = match.type === 'bet' || match.type === 'raise' ? match : null;
    if (
      range === null ||
      !Number.isInteger(action.amount) ||
      action.amount < range.min ||
      action.amount > range.max
    ) {
      return new IllegalActionError(
        EngineErrorCode.INVALID_AMOUNT,
        `${action.type === 'bet' ? 'Bet' : 'Raise'} amount ${action.amount} must be a whole number between ${range?.min ?? 0} and ${range?.max ?? 0}`,
        { amount: action.amount, min: range?.min, max: range?.max }
      );
    }
  }

  return null;
}

// ============================================================================
// Action Application
// ============================================================================

/**
 * Apply a validated action for the seat to act.
 * Turn passing and round closing are left to the caller.
 */
export function applyAction(state: TableState, playerId: PlayerId, action: Action): AppliedAction {
  const seat = state.seats[playerId];
  const toCallBefore = getCallAmount(state, playerId);
  const aggressionBefore = countAggressiveActions(state, state.street);
  let next: TableState = state;

  switch (action.type) {
    case 'fold':
      next = updateSeat(state, playerId, { folded: true, hasActed: true });
      break;

    case 'check':
      next = updateSeat(state, playerId, { hasActed: true });
      break;

    case 'call':
      next = updateSeat(commitChips(state, playerId, toCallBefore), playerId, { hasActed: true });
      break;

    case 'bet':
    case 'raise': {
      const increment = action.amount - state.currentBet;
      next = commitChips(state, playerId, action.amount - seat.streetCommitted);
      next = updateSeat(next, playerId, { hasActed: true });
      // Reopen the action for the opponent
      next = updateSeat(next, opponentOf(playerId), { hasActed: false });
      next = {
        ...next,
        lastRaiseSize: increment >= state.lastRaiseSize ? increment : state.lastRaiseSize,
        preflopAggressor: state.street === 'preflop' ? playerId : state.preflopAggressor,
      };
      break;
    }
  }

  const after = next.seats[playerId];
  const record: ActionRecord = {
    playerId,
    position: seat.position,
    street: state.street,
    action,
    chipsAdded: seat.stack - after.stack,
    toCallBefore,
    stackAfter: after.stack,
    allIn: after.stack === 0 && !after.folded,
    aggressionBefore,
  };

  return { state: { ...next, actions: [...next.actions, record] }, record };
}

// ============================================================================
// Round Completion
// ============================================================================

export function hasFolded(state: TableState): boolean {
  return state.seats.human.folded || state.seats.bot.folded;
}

/**
 * A betting round is closed when every seat with chips has matched the
 * current bet and has either acted this street or faces an all-in opponent.
 */
export function isBettingRoundClosed(state: TableState): boolean {
  if (hasFolded(state)) {
    return true;
  }

  for (const playerId of ['human', 'bot'] as const) {
    const seat = state.seats[playerId];
    const opponent = state.seats[opponentOf(playerId)];
    if (seat.stack === 0) continue;
    if (seat.streetCommitted < state.currentBet) return false;
    if (!seat.hasActed && opponent.stack > 0) return false;
  }

  return true;
}

/**
 * Chips one seat committed this street beyond what the other matched.
 * Only meaningful once the round is closed.
 */
export function getUncalledBet(state: TableState): { playerId: PlayerId; amount: number } | null {
  const { human, bot } = state.seats;
  if (human.streetCommitted === bot.streetCommitted) {
    return null;
  }
  const over = human.streetCommitted > bot.streetCommitted ? human : bot;
  const under = over === human ? bot : human;
  return { playerId: over.playerId, amount: over.streetCommitted - under.streetCommitted };
}
