/**
 * PlayerView.ts
 * Read-only projection of the table from one seat
 *
 * This is what a decision maker (the bot, or a hint engine) gets to see: its
 * own cards, never the opponent's.
 */

import { Card } from './Card';
import {
  TableState,
  PlayerId,
  Position,
  Street,
  LegalAction,
  ActionRecord,
  getCallAmount,
  opponentOf,
} from './TableState';
import { getLegalActions } from './BettingRound';

export interface PlayerView {
  readonly playerId: PlayerId;
  readonly handNumber: number;
  readonly position: Position;
  readonly street: Street;
  readonly holeCards: readonly Card[];
  readonly board: readonly Card[];
  readonly pot: number;
  readonly stack: number;
  readonly opponentStack: number;
  /** Own chips committed this street */
  readonly committed: number;
  readonly opponentCommitted: number;
  readonly currentBet: number;
  readonly toCall: number;
  readonly bigBlind: number;
  readonly preflopAggressor: PlayerId | null;
  readonly actions: readonly ActionRecord[];
  /** Empty unless this seat is to act */
  readonly legalActions: readonly LegalAction[];
}

export function createPlayerView(state: TableState, playerId: PlayerId): PlayerView {
  const seat = state.seats[playerId];
  const opponent = state.seats[opponentOf(playerId)];

  return {
    playerId,
    handNumber: state.handNumber,
    position: seat.position,
    street: state.street,
    holeCards: seat.holeCards,
    board: state.board,
    pot: state.pot,
    stack: seat.stack,
    opponentStack: opponent.stack,
    committed: seat.streetCommitted,
    opponentCommitted: opponent.streetCommitted,
    currentBet: state.currentBet,
    toCall: getCallAmount(state, playerId),
    bigBlind: state.bigBlind,
    preflopAggressor: state.preflopAggressor,
    actions: state.actions,
    legalActions: state.toAct === playerId ? getLegalActions(state) : [],
  };
}
