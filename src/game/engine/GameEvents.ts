/**
 * GameEvents.ts
 * Events emitted during hand state transitions
 *
 * Events are immutable records of state changes, consumed by the stats
 * aggregator, the hand history log and the session controller.
 */

import { Card } from './Card';
import {
  PlayerId,
  Position,
  Street,
  LegalAction,
  ActionRecord,
  ShowdownHand,
  HandResult,
} from './TableState';

// ============================================================================
// Event Types
// ============================================================================

export type EngineEventType =
  | 'HAND_STARTED'
  | 'BLIND_POSTED'
  | 'HOLE_CARDS_DEALT'
  | 'PLAYER_TO_ACT'
  | 'PLAYER_ACTED'
  | 'UNCALLED_BET_RETURNED'
  | 'STREET_DEALT'
  | 'SHOWDOWN'
  | 'POT_AWARDED'
  | 'HAND_COMPLETED';

// ============================================================================
// Base Event Interface
// ============================================================================

export interface EventMeta {
  readonly handNumber: number;
  readonly sequence: number;
}

export interface BaseEngineEvent extends EventMeta {
  readonly type: EngineEventType;
  readonly timestamp: number;
}

// ============================================================================
// Specific Events
// ============================================================================

export interface HandStartedEvent extends BaseEngineEvent {
  readonly type: 'HAND_STARTED';
  readonly button: PlayerId;
  readonly bigBlindPlayer: PlayerId;
  readonly stacks: Readonly<Record<PlayerId, number>>;
  readonly smallBlind: number;
  readonly bigBlind: number;
}

export interface BlindPostedEvent extends BaseEngineEvent {
  readonly type: 'BLIND_POSTED';
  readonly playerId: PlayerId;
  readonly position: Position;
  readonly amount: number;
  readonly allIn: boolean;
}

/**
 * Carries both seats' cards; consumers showing it to a player must filter
 */
export interface HoleCardsDealtEvent extends BaseEngineEvent {
  readonly type: 'HOLE_CARDS_DEALT';
  readonly holeCards: Readonly<Record<PlayerId, readonly Card[]>>;
}

export interface PlayerToActEvent extends BaseEngineEvent {
  readonly type: 'PLAYER_TO_ACT';
  readonly playerId: PlayerId;
  readonly street: Street;
  readonly toCall: number;
  readonly pot: number;
  readonly legalActions: readonly LegalAction[];
}

export interface PlayerActedEvent extends BaseEngineEvent, ActionRecord {
  readonly type: 'PLAYER_ACTED';
  readonly pot: number;
}

export interface UncalledBetReturnedEvent extends BaseEngineEvent {
  readonly type: 'UNCALLED_BET_RETURNED';
  readonly playerId: PlayerId;
  readonly amount: number;
}

export interface StreetDealtEvent extends BaseEngineEvent {
  readonly type: 'STREET_DEALT';
  readonly street: Street;
  readonly cards: readonly Card[];
  readonly board: readonly Card[];
  readonly pot: number;
  /** Dealt with no betting because a seat is all-in */
  readonly runout: boolean;
}

export interface ShowdownEvent extends BaseEngineEvent {
  readonly type: 'SHOWDOWN';
  readonly hands: readonly ShowdownHand[];
  readonly board: readonly Card[];
}

export interface PotAwardedEvent extends BaseEngineEvent {
  readonly type: 'POT_AWARDED';
  readonly playerId: PlayerId;
  readonly amount: number;
  readonly handDescription: string | null;
}

export interface HandCompletedEvent extends BaseEngineEvent {
  readonly type: 'HAND_COMPLETED';
  readonly result: HandResult;
  readonly stacks: Readonly<Record<PlayerId, number>>;
}

export type EngineEvent =
  | HandStartedEvent
  | BlindPostedEvent
  | HoleCardsDealtEvent
  | PlayerToActEvent
  | PlayerActedEvent
  | UncalledBetReturnedEvent
  | StreetDealtEvent
  | ShowdownEvent
  | PotAwardedEvent
  | HandCompletedEvent;

// ============================================================================
// Event Factories
// ============================================================================

function base<T extends EngineEventType>(type: T, meta: EventMeta): EventMeta & { type: T; timestamp: number } {
  return { type, handNumber: meta.handNumber, sequence: meta.sequence, timestamp: Date.now() };
}

export function createHandStartedEvent(
  meta: EventMeta,
  button: PlayerId,
  bigBlindPlayer: PlayerId,
  stacks: Readonly<Record<PlayerId, number>>,
  smallBlind: number,
  bigBlind: number
): HandStartedEvent {
  return { ...base('HAND_STARTED', meta), button, bigBlindPlayer, stacks, smallBlind, bigBlind };
}

export function createBlindPostedEvent(
  meta: EventMeta,
  playerId: PlayerId,
  position: Position,
  amount: number,
  allIn: boolean
): BlindPostedEvent {
  return { ...base('BLIND_POSTED', meta), playerId, position, amount, allIn };
}

export function createHoleCardsDealtEvent(
  meta: EventMeta,
  holeCards: Readonly<Record<PlayerId, readonly Card[]>>
): HoleCardsDealtEvent {
  return { ...base('HOLE_CARDS_DEALT', meta), holeCards };
}

export function createPlayerToActEvent(
  meta: EventMeta,
  playerId: PlayerId,
  street: Street,
  toCall: number,
  pot: number,
  legalActions: readonly LegalAction[]
): PlayerToActEvent {
  return { ...base('PLAYER_TO_ACT', meta), playerId, street, toCall, pot, legalActions };
}

export function createPlayerActedEvent(
  meta: EventMeta,
  record: ActionRecord,
  pot: number
): PlayerActedEvent {
  return { ...record, ...base('PLAYER_ACTED', meta), pot };
}

export function createUncalledBetReturnedEvent(
  meta: EventMeta,
  playerId: PlayerId,
  amount: number
): UncalledBetReturnedEvent {
  return { ...base('UNCALLED_BET_RETURNED', meta), playerId, amount };
}

export function createStreetDealtEvent(
  meta: EventMeta,
  street: Street,
  cards: readonly Card[],
  board: readonly Card[],
  pot: number,
  runout: boolean
): StreetDealtEvent {
  return { ...base('STREET_DEALT', meta), street, cards, board, pot, runout };
}

export function createShowdownEvent(
  meta: EventMeta,
  hands: readonly ShowdownHand[],
  board: readonly Card[]
): ShowdownEvent {
  return { ...base('SHOWDOWN', meta), hands, board };
}

export function createPotAwardedEvent(
  meta: EventMeta,
  playerId: PlayerId,
  amount: number,
  handDescription: string | null
): PotAwardedEvent {
  return { ...base('POT_AWARDED', meta), playerId, amount, handDescription };
}

export function createHandCompletedEvent(
  meta: EventMeta,
  result: HandResult,
  stacks: Readonly<Record<PlayerId, number>>
): HandCompletedEvent {
  return { ...base('HAND_COMPLETED', meta), result, stacks };
}

// ============================================================================
// Event Emitter
// ============================================================================

export type EngineEventListener = (event: EngineEvent) => void;

export interface EngineEventEmitter {
  on(listener: EngineEventListener): () => void;
  emit(event: EngineEvent): void;
}

export function createEngineEventEmitter(): EngineEventEmitter {
  const listeners: Set<EngineEventListener> = new Set();

  return {
    on(listener: EngineEventListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    emit(event: EngineEvent): void {
      for (const listener of listeners) {
        listener(event);
      }
    },
  };
}
