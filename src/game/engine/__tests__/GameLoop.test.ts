/**
 * GameLoop.test.ts
 * Hand orchestration: blinds, turn order, streets, showdown, fold, all-in runout
 */

import { TableEngine, createTableEngine } from '../GameLoop';
import { EngineEvent, PlayerActedEvent, StreetDealtEvent } from '../GameEvents';
import { EngineError, EngineErrorCode } from '../EngineErrors';
import { Action, LegalAction, PlayerId } from '../TableState';
import { Rng, createSeededRng, randomIntBetween } from '../Random';
import { cardToString } from '../Card';
import { dealOrder, engineWithDecks, seededEngine } from './testUtils';

// ============================================================================
// Helpers
// ============================================================================

function act(engine: TableEngine, playerId: PlayerId, action: Action): readonly EngineEvent[] {
  const result = engine.apply(playerId, action);
  if (!result.success) {
    throw new Error(`Unexpected illegal action: ${result.error.message}`);
  }
  return result.events;
}

function typesOf(events: readonly EngineEvent[]): string[] {
  return events.map(e => e.type);
}

function randomAction(legal: readonly LegalAction[], rng: Rng): Action {
  const choice = legal[Math.floor(rng.next() * legal.length)];
  switch (choice.type) {
    case 'fold':
    case 'check':
    case 'call':
      return { type: choice.type };
    case 'bet':
    case 'raise':
      return { type: choice.type, amount: randomIntBetween(rng, choice.min, choice.max) };
  }
}

// ============================================================================
// Hand Initialization
// ============================================================================

describe('TableEngine', () => {
  describe('Hand Initialization', () => {
    test('posts blinds and gives the button the first action', () => {
      const engine = seededEngine(200, 1);
      const events = engine.startHand();

      expect(typesOf(events)).toEqual([
        'HAND_STARTED',
        'BLIND_POSTED',
        'BLIND_POSTED',
        'HOLE_CARDS_DEALT',
        'PLAYER_TO_ACT',
      ]);

      const state = engine.getState();
      expect(state.button).toBe('human');
      expect(state.seats.human.position).toBe('button');
      expect(state.seats.human.stack).toBe(199);
      expect(state.seats.bot.stack).toBe(198);
      expect(state.pot).toBe(3);
      expect(engine.getCurrentPlayer()).toBe('human');
      expect(state.seats.human.holeCards).toHaveLength(2);
      expect(state.seats.bot.holeCards).toHaveLength(2);
    });

    test('button faces fold, call and raise preflop', () => {
      const engine = seededEngine(200, 1);
      engine.startHand();

      expect(engine.getLegalActions()).toEqual([
        { type: 'fold' },
        { type: 'call', amount: 1, allIn: false },
        { type: 'raise', min: 4, max: 200 },
      ]);
    });

    test('big blind gets an option after a limp', () => {
      const engine = seededEngine(200, 1);
      engine.startHand();
      act(engine, 'human', { type: 'call' });

      expect(engine.getCurrentPlayer()).toBe('bot');
      expect(engine.getLegalActions()).toEqual([
        { type: 'check' },
        { type: 'raise', min: 4, max: 200 },
      ]);
    });

    test('rejects starting a hand while one is running', () => {
      const engine = seededEngine(200, 1);
      engine.startHand();
      expect(() => engine.startHand()).toThrow(EngineError);
    });

    test('rejects a non-positive starting stack', () => {
      expect(() => createTableEngine({ startingStack: 0 })).toThrow('Starting stack');
    });
  });

  // ==========================================================================
  // Illegal Actions
  // ==========================================================================

  describe('Illegal Actions', () => {
    test('acting out of turn leaves the state unchanged', () => {
      const engine = seededEngine(200, 1);
      engine.startHand();
      const before = engine.getState();

      const result = engine.apply('bot', { type: 'check' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.NOT_YOUR_TURN);
      }
      expect(engine.getState()).toBe(before);
    });

    test('check is rejected when facing a bet', () => {
      const engine = seededEngine(200, 1);
      engine.startHand();

      const result = engine.apply('human', { type: 'check' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.ACTION_NOT_AVAILABLE);
        expect(result.error.name).toBe('IllegalActionError');
      }
    });

    test('raise below the minimum or above the stack is rejected', () => {
      const engine = seededEngine(200, 1);
      engine.startHand();

      for (const amount of [3, 201, 4.5]) {
        const result = engine.apply('human', { type: 'raise', amount });
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.code).toBe(EngineErrorCode.INVALID_AMOUNT);
        }
      }
      expect(engine.getState().pot).toBe(3);
    });

    test('actions before any hand are rejected', () => {
      const engine = seededEngine(200, 1);
      const result = engine.apply('human', { type: 'fold' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.NO_ACTIVE_HAND);
      }
    });
  });

  // ==========================================================================
  // Scenarios
  // ==========================================================================

  describe('Showdown after checking down', () => {
    test('button wins with ace high', () => {
      const engine = engineWithDecks(200, [dealOrder('As Ks', '7d 2c', 'Qh 9c 5d 3s Jh')]);
      engine.startHand();

      act(engine, 'human', { type: 'call' });
      act(engine, 'bot', { type: 'check' });
      expect(engine.getStreet()).toBe('flop');
      expect(engine.getCurrentPlayer()).toBe('bot');

      act(engine, 'bot', { type: 'check' });
      act(engine, 'human', { type: 'check' });
      expect(engine.getStreet()).toBe('turn');
      act(engine, 'bot', { type: 'check' });
      act(engine, 'human', { type: 'check' });
      expect(engine.getStreet()).toBe('river');
      act(engine, 'bot', { type: 'check' });
      const events = act(engine, 'human', { type: 'check' });

      expect(typesOf(events)).toEqual(['PLAYER_ACTED', 'SHOWDOWN', 'POT_AWARDED', 'HAND_COMPLETED']);

      const result = engine.getHandResult();
      expect(result).not.toBeNull();
      expect(result?.resolution).toBe('showdown');
      expect(result?.winners).toEqual(['human']);
      expect(result?.pot).toBe(4);
      expect(result?.net).toEqual({ human: 2, bot: -2 });
      expect(result?.showdown.map(h => h.evaluation.description)).toEqual([
        'High Card, Ace',
        'High Card, Queen',
      ]);
      expect(engine.getStacks()).toEqual({ human: 202, bot: 198 });
      expect(engine.isHandComplete()).toBe(true);
    });
  });

  describe('Fold preflop', () => {
    test('button raise and big blind fold returns the uncalled raise', () => {
      const engine = engineWithDecks(200, [dealOrder('As Ks', '7d 2c', 'Qh 9c 5d 3s Jh')]);
      engine.startHand();

      act(engine, 'human', { type: 'raise', amount: 6 });
      const events = act(engine, 'bot', { type: 'fold' });

      expect(typesOf(events)).toEqual([
        'PLAYER_ACTED',
        'UNCALLED_BET_RETURNED',
        'POT_AWARDED',
        'HAND_COMPLETED',
      ]);
      const result = engine.getHandResult();
      expect(result?.resolution).toBe('fold');
      expect(result?.finalStreet).toBe('preflop');
      expect(result?.pot).toBe(4);
      expect(result?.board).toEqual([]);
      expect(engine.getStacks()).toEqual({ human: 202, bot: 198 });
    });
  });

  describe('All-in runout', () => {
    function playToShortBigBlind(engine: TableEngine): void {
      // Hand 1: human folds the button, leaving 199 vs 201
      engine.startHand();
      act(engine, 'human', { type: 'fold' });
      expect(engine.getStacks()).toEqual({ human: 199, bot: 201 });
      engine.startHand();
      expect(engine.getState().button).toBe('bot');
    }

    test('flop shove for less is called and the board runs out', () => {
      const engine = engineWithDecks(200, [
        dealOrder('As Ks', '7d 2c', 'Qh 9c 5d 3s Jh'),
        dealOrder('Kh Kd', 'Qs Qc', '2c 7d 9h 3s 4c'),
      ]);
      playToShortBigBlind(engine);

      act(engine, 'bot', { type: 'call' });
      act(engine, 'human', { type: 'check' });
      expect(engine.getCurrentPlayer()).toBe('human');

      act(engine, 'human', { type: 'bet', amount: 197 });
      expect(engine.getLegalActions()).toEqual([
        { type: 'fold' },
        { type: 'call', amount: 197, allIn: false },
      ]);
      const events = act(engine, 'bot', { type: 'call' });

      expect(typesOf(events)).toEqual([
        'PLAYER_ACTED',
        'STREET_DEALT',
        'STREET_DEALT',
        'SHOWDOWN',
        'POT_AWARDED',
        'HAND_COMPLETED',
      ]);
      const dealt = events.filter((e): e is StreetDealtEvent => e.type === 'STREET_DEALT');
      expect(dealt.map(e => e.street)).toEqual(['turn', 'river']);
      expect(dealt.every(e => e.runout)).toBe(true);
      expect(events.some(e => e.type === 'UNCALLED_BET_RETURNED')).toBe(false);

      const result = engine.getHandResult();
      expect(result?.resolution).toBe('showdown');
      expect(result?.pot).toBe(398);
      expect(result?.winners).toEqual(['bot']);
      expect(result?.board.map(cardToString)).toEqual(['2c', '7d', '9h', '3s', '4c']);
      expect(engine.getStacks()).toEqual({ human: 0, bot: 400 });
      expect(engine.isSessionOver()).toBe(true);
    });

    test('shove covering the opponent returns the excess', () => {
      const engine = engineWithDecks(200, [
        dealOrder('As Ks', '7d 2c', 'Qh 9c 5d 3s Jh'),
        dealOrder('Kh Kd', 'Qs Qc', '2c 7d 9h 3s 4c'),
      ]);
      playToShortBigBlind(engine);

      act(engine, 'bot', { type: 'raise', amount: 201 });
      expect(engine.getLegalActions()).toEqual([
        { type: 'fold' },
        { type: 'call', amount: 197, allIn: true },
      ]);
      const events = act(engine, 'human', { type: 'call' });

      const returned = events.find(e => e.type === 'UNCALLED_BET_RETURNED');
      expect(returned).toMatchObject({ playerId: 'bot', amount: 2 });
      expect(typesOf(events).filter(t => t === 'STREET_DEALT')).toHaveLength(3);
      expect(engine.getHandResult()?.pot).toBe(398);
      expect(engine.getStacks()).toEqual({ human: 0, bot: 400 });
    });

    test('no hand can start once a player is broke', () => {
      const engine = engineWithDecks(200, [
        dealOrder('As Ks', '7d 2c', 'Qh 9c 5d 3s Jh'),
        dealOrder('Kh Kd', 'Qs Qc', '2c 7d 9h 3s 4c'),
      ]);
      playToShortBigBlind(engine);
      act(engine, 'bot', { type: 'raise', amount: 201 });
      act(engine, 'human', { type: 'call' });

      try {
        engine.startHand();
        throw new Error('expected startHand to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(EngineError);
        if (error instanceof EngineError) {
          expect(error.code).toBe(EngineErrorCode.SESSION_OVER);
        }
      }
    });
  });

  describe('Split pot', () => {
    test('board plays and the pot is shared', () => {
      const engine = engineWithDecks(200, [dealOrder('2c 3d', '2h 3s', 'As Ks Qs Js Ts')]);
      engine.startHand();
      act(engine, 'human', { type: 'call' });
      act(engine, 'bot', { type: 'check' });
      for (let street = 0; street < 3; street++) {
        act(engine, 'bot', { type: 'check' });
        act(engine, 'human', { type: 'check' });
      }

      const result = engine.getHandResult();
      expect(result?.winners).toEqual(['human', 'bot']);
      expect(result?.payouts).toEqual({ human: 2, bot: 2 });
      expect(engine.getStacks()).toEqual({ human: 200, bot: 200 });
    });
  });

  describe('Minimum raise', () => {
    test('a re-raise must be at least the size of the last raise', () => {
      const engine = seededEngine(200, 3);
      engine.startHand();
      act(engine, 'human', { type: 'raise', amount: 10 });

      // Last raise was 8 on top of the big blind
      expect(engine.getLegalActions()).toContainEqual({ type: 'raise', min: 18, max: 200 });
    });

    test('postflop the minimum bet is the big blind', () => {
      const engine = seededEngine(200, 3);
      engine.startHand();
      act(engine, 'human', { type: 'call' });
      act(engine, 'bot', { type: 'check' });
      expect(engine.getLegalActions()).toEqual([
        { type: 'check' },
        { type: 'bet', min: 2, max: 198 },
      ]);
    });
  });

  // ==========================================================================
  // Properties over random play
  // ==========================================================================

  describe('Random play', () => {
    test('chips are conserved and turn order holds over many hands', () => {
      const rng = createSeededRng(2024);
      let totalHands = 0;

      for (let seed = 1; seed <= 30; seed++) {
        const engine = seededEngine(100, seed);
        let previousButton: PlayerId | null = null;

        for (let hand = 0; hand < 20 && !engine.isSessionOver(); hand++) {
          engine.startHand();
          totalHands++;
          const state = engine.getState();
          if (previousButton !== null) {
            expect(state.button).not.toBe(previousButton);
          }
          previousButton = state.button;

          const firstActors = new Map<string, PlayerId>();
          while (engine.isHandInProgress()) {
            const current = engine.getCurrentPlayer();
            expect(current).not.toBeNull();
            if (current === null) break;

            const snapshot = engine.getState();
            const legal = engine.getLegalActions();
            expect(legal.length).toBeGreaterThan(0);
            if (snapshot.currentBet > snapshot.seats[current].streetCommitted) {
              expect(legal.some(a => a.type === 'check')).toBe(false);
            }
            if (!firstActors.has(snapshot.street)) {
              firstActors.set(snapshot.street, current);
            }

            const events = act(engine, current, randomAction(legal, rng));
            const after = engine.getState();
            expect(after.seats.human.stack + after.seats.bot.stack + after.pot).toBe(200);
            const acted = events.find((e): e is PlayerActedEvent => e.type === 'PLAYER_ACTED');
            expect(acted?.playerId).toBe(current);
          }

          const bigBlind: PlayerId = state.button === 'human' ? 'bot' : 'human';
          for (const [street, actor] of firstActors) {
            expect(actor).toBe(street === 'preflop' ? state.button : bigBlind);
          }
          expect(engine.getStacks().human + engine.getStacks().bot).toBe(200);
        }
      }

      expect(totalHands).toBeGreaterThanOrEqual(30);
    });
  });
});
