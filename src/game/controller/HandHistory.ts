/**
 * HandHistory.ts
 * Action log lines for the renderer
 *
 * Every engine event maps to at most one line of text. Lines are collected
 * per hand so a finished hand can be shown or saved as a whole.
 */

import { formatCards } from '../engine/Card';
import { EngineEvent, PlayerActedEvent } from '../engine/GameEvents';
import { PlayerId, Street } from '../engine/TableState';

// ============================================================================
// Types
// ============================================================================

export type LogStyle = 'header' | 'info' | 'action' | 'cards' | 'result';

export interface HandHistoryEntry {
  readonly sequence: number;
  readonly text: string;
  readonly style: LogStyle;
}

export interface HandHistory {
  readonly handNumber: number;
  readonly entries: readonly HandHistoryEntry[];
}

// ============================================================================
// Formatting Functions
// ============================================================================

const PLAYER_NAMES: Record<PlayerId, string> = {
  human: 'You',
  bot: 'Bot',
};

/**
 * "You fold" / "Bot folds"
 */
function conjugate(playerId: PlayerId, verb: string): string {
  if (playerId === 'human') {
    return `You ${verb}`;
  }
  const thirdPerson = verb === 'raise to' ? 'raises to' : `${verb}s`;
  return `${PLAYER_NAMES.bot} ${thirdPerson}`;
}

function streetLabel(street: Street): string {
  return street.charAt(0).toUpperCase() + street.slice(1);
}

function describeAction(event: PlayerActedEvent): string {
  const { action, playerId } = event;
  switch (action.type) {
    case 'fold':
      return conjugate(playerId, 'fold');
    case 'check':
      return conjugate(playerId, 'check');
    case 'call':
      return `${conjugate(playerId, 'call')} ${event.chipsAdded}`;
    case 'bet':
      return `${conjugate(playerId, 'bet')} ${action.amount}`;
    case 'raise':
      return `${conjugate(playerId, 'raise to')} ${action.amount}`;
  }
}

function formatAction(event: PlayerActedEvent): string {
  const text = describeAction(event);
  return event.allIn ? `${text} and is all-in` : text;
}

/**
 * Format an engine event as a log line; null for events with no line
 */
export function formatEngineEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case 'HAND_STARTED':
      return `--- Hand #${event.handNumber} ---`;

    case 'BLIND_POSTED': {
      const blind = event.position === 'button' ? 'small blind' : 'big blind';
      return `${conjugate(event.playerId, 'post')} ${blind} ${event.amount}`;
    }

    case 'HOLE_CARDS_DEALT':
      return `Dealt to you: ${formatCards(event.holeCards.human)}`;

    case 'PLAYER_TO_ACT':
    case 'HAND_COMPLETED':
      return null;

    case 'PLAYER_ACTED':
      return formatAction(event);

    case 'UNCALLED_BET_RETURNED':
      return `Uncalled bet of ${event.amount} returned to ${event.playerId === 'human' ? 'you' : 'Bot'}`;

    case 'STREET_DEALT':
      return `${streetLabel(event.street)}: ${formatCards(event.board)}`;

    case 'SHOWDOWN': {
      const shown = event.hands
        .map(hand => {
          const verb = conjugate(hand.playerId, 'show');
          return `${verb} ${formatCards(hand.holeCards)} (${hand.evaluation.description})`;
        })
        .join(', ');
      return `Showdown: ${shown}`;
    }

    case 'POT_AWARDED': {
      const won = `${conjugate(event.playerId, 'win')} ${event.amount} chips`;
      return event.handDescription === null ? won : `${won} with ${event.handDescription}`;
    }
  }
}

export function getEventStyleType(event: EngineEvent): LogStyle {
  switch (event.type) {
    case 'HAND_STARTED':
      return 'header';
    case 'PLAYER_ACTED':
      return 'action';
    case 'HOLE_CARDS_DEALT':
    case 'STREET_DEALT':
    case 'SHOWDOWN':
      return 'cards';
    case 'POT_AWARDED':
    case 'HAND_COMPLETED':
      return 'result';
    default:
      return 'info';
  }
}

// ============================================================================
// Recorder
// ============================================================================

/**
 * Collects log lines for the current hand and keeps finished hands
 */
export class HandHistoryRecorder {
  private current: HandHistoryEntry[] = [];
  private currentHand = 0;
  private readonly finished: HandHistory[] = [];
  private readonly maxHands: number;

  constructor(maxHands = 50) {
    this.maxHands = maxHands;
  }

  /**
   * Record an event; returns the line it produced, if any
   */
  record(event: EngineEvent): HandHistoryEntry | null {
    if (event.type === 'HAND_STARTED') {
      this.current = [];
      this.currentHand = event.handNumber;
    }

    const text = formatEngineEvent(event);
    const entry: HandHistoryEntry | null =
      text === null ? null : { sequence: event.sequence, text, style: getEventStyleType(event) };
    if (entry) {
      this.current.push(entry);
    }

    if (event.type === 'HAND_COMPLETED') {
      this.finished.push(this.getCurrentHand());
      if (this.finished.length > this.maxHands) {
        this.finished.shift();
      }
    }
    return entry;
  }

  getCurrentHand(): HandHistory {
    return {
      handNumber: this.currentHand,
      entries: [...this.current],
    };
  }

  getLastLine(): string | null {
    const last = this.current[this.current.length - 1];
    return last ? last.text : null;
  }

  getFinishedHands(): readonly HandHistory[] {
    return this.finished;
  }
}
