/**
 * SessionSnapshot.ts
 * Frozen projection of a session for renderers
 *
 * Shows the human's hole cards always and the bot's only once they were
 * turned over at showdown.
 */

import { Card } from '../engine/Card';
import {
  HandResult,
  LegalAction,
  PlayerId,
  Position,
  Street,
  TableState,
  isAllIn,
} from '../engine/TableState';
import { getLegalActions } from '../engine/BettingRound';
import { StatsSnapshot } from '../stats/StatsTypes';
import { HandHistoryEntry } from './HandHistory';

// ============================================================================
// Types
// ============================================================================

export interface SeatSnapshot {
  readonly playerId: PlayerId;
  readonly position: Position;
  readonly stack: number;
  /** Chips committed on the current street */
  readonly committed: number;
  /** null while hidden */
  readonly holeCards: readonly Card[] | null;
  readonly folded: boolean;
  readonly allIn: boolean;
}

export interface SessionSnapshot {
  readonly handNumber: number;
  readonly street: Street;
  readonly button: PlayerId;
  readonly seats: Readonly<Record<PlayerId, SeatSnapshot>>;
  readonly board: readonly Card[];
  readonly pot: number;
  readonly toAct: PlayerId | null;
  /** The human's options; empty unless the human is to act */
  readonly legalActions: readonly LegalAction[];
  readonly log: readonly HandHistoryEntry[];
  readonly lastLogLine: string | null;
  readonly handResult: HandResult | null;
  readonly stats: StatsSnapshot;
  readonly sessionOver: boolean;
}

export type SnapshotListener = (snapshot: SessionSnapshot) => void;

// ============================================================================
// Projection
// ============================================================================

function isRevealed(state: TableState, playerId: PlayerId): boolean {
  if (playerId === 'human') return true;
  return state.result !== null && state.result.showdown.some(hand => hand.playerId === playerId);
}

function createSeatSnapshot(state: TableState, playerId: PlayerId): SeatSnapshot {
  const seat = state.seats[playerId];
  const dealt = seat.holeCards.length > 0;
  return Object.freeze({
    playerId,
    position: seat.position,
    stack: seat.stack,
    committed: seat.streetCommitted,
    holeCards: dealt && isRevealed(state, playerId) ? seat.holeCards : null,
    folded: seat.folded,
    allIn: dealt && isAllIn(seat),
  });
}

export function createSessionSnapshot(
  state: TableState,
  log: readonly HandHistoryEntry[],
  stats: StatsSnapshot,
  sessionOver: boolean
): SessionSnapshot {
  const toAct = state.phase === 'betting' ? state.toAct : null;
  const last = log[log.length - 1];

  return Object.freeze({
    handNumber: state.handNumber,
    street: state.street,
    button: state.button,
    seats: Object.freeze({
      human: createSeatSnapshot(state, 'human'),
      bot: createSeatSnapshot(state, 'bot'),
    }),
    board: state.board,
    pot: state.pot,
    toAct,
    legalActions: toAct === 'human' ? getLegalActions(state) : [],
    log,
    lastLogLine: last ? last.text : null,
    handResult: state.result,
    stats,
    sessionOver,
  });
}
