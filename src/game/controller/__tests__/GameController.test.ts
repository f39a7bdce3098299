/**
 * GameController.test.ts
 * Human-vs-bot sessions driven through the controller
 */

import { GameController, openGameSession } from '../GameController';
import { SessionSnapshot } from '../SessionSnapshot';
import { parseGameConfig } from '../../config/GameConfig';
import { Action, LegalAction } from '../../engine/TableState';
import { EngineError } from '../../engine/EngineErrors';
import { createEmptyLifetimeCounters } from '../../stats/StatsTypes';
import {
  MemoryStatsStore,
  createMemoryStatsStore,
  createPersistedStats,
  serializePersistedStats,
} from '../../persistence';
import { cards, dealOrder } from '../../engine/__tests__/testUtils';

// ============================================================================
// Helpers
// ============================================================================

function scriptedController(store: MemoryStatsStore = createMemoryStatsStore()): GameController {
  const deck = dealOrder('As Ks', '7d 2c', 'Qh 9c 5d 3s Jh');
  return new GameController({
    config: parseGameConfig({ stack: 100, aggression: 0.5, seed: 11 }),
    store,
    deckFactory: handNumber => {
      if (handNumber !== 1) throw new Error(`No deck prepared for hand ${handNumber}`);
      return deck;
    },
  });
}

/** Check when free, otherwise call */
function passiveAction(legal: readonly LegalAction[]): Action {
  return legal.some(a => a.type === 'check') ? { type: 'check' } : { type: 'call' };
}

function playPassively(controller: GameController, maxHands: number): void {
  for (let hand = 0; hand < maxHands && !controller.isSessionOver(); hand++) {
    let snapshot = controller.nextHand();
    while (snapshot.toAct === 'human') {
      const result = controller.submit(passiveAction(snapshot.legalActions));
      if (!result.success) throw result.error;
      snapshot = result.snapshot;
    }
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('GameController', () => {
  describe('Scripted hand', () => {
    test('the human acts first on the button; the bot cards stay hidden', () => {
      const controller = scriptedController();
      const snapshot = controller.nextHand();

      expect(snapshot.handNumber).toBe(1);
      expect(snapshot.button).toBe('human');
      expect(snapshot.toAct).toBe('human');
      expect(snapshot.pot).toBe(3);
      expect(snapshot.seats.human.holeCards).toEqual(cards('As Ks'));
      expect(snapshot.seats.bot.holeCards).toBeNull();
      expect(snapshot.legalActions.map(a => a.type)).toEqual(['fold', 'call', 'raise']);
      expect(snapshot.lastLogLine).toBe('Dealt to you: A♠ K♠');
      expect(Object.isFrozen(snapshot)).toBe(true);
    });

    test('bot turns run inside submit and publish a snapshot each', () => {
      const controller = scriptedController();
      const seen: SessionSnapshot[] = [];
      controller.subscribe(snapshot => {
        seen.push(snapshot);
      });
      controller.nextHand();
      seen.length = 0;

      const result = controller.submit({ type: 'call' });

      expect(result.success).toBe(true);
      // Human call, bot preflop check, bot flop check
      expect(seen).toHaveLength(3);
      expect(seen[2].street).toBe('flop');
      expect(seen[2].toAct).toBe('human');
      expect(seen[2].log.slice(-3).map(e => e.text)).toEqual([
        'Bot checks',
        'Flop: Q♥ 9♣ 5♦',
        'Bot checks',
      ]);
      expect(controller.getSnapshot()).toBe(seen[2]);
    });

    test('checked down to showdown, the bot cards are revealed', () => {
      const controller = scriptedController();
      controller.nextHand();
      controller.submit({ type: 'call' });
      controller.submit({ type: 'check' });
      controller.submit({ type: 'check' });
      const result = controller.submit({ type: 'check' });

      if (!result.success) throw result.error;
      const { snapshot } = result;
      expect(snapshot.toAct).toBeNull();
      expect(snapshot.legalActions).toEqual([]);
      expect(snapshot.seats.bot.holeCards).toEqual(cards('7d 2c'));
      expect(snapshot.seats.human.stack).toBe(202);
      expect(snapshot.seats.bot.stack).toBe(198);
      expect(snapshot.handResult?.winners).toEqual(['human']);
      expect(snapshot.lastLogLine).toBe('You win 4 chips with High Card, Ace');
      expect(snapshot.stats.session.human.counters.handsPlayed).toBe(1);
      expect(snapshot.stats.session.human.counters.wonAtShowdownHands).toBe(1);
      expect(controller.getHandHistory()).toHaveLength(1);
      expect(Object.keys(controller.getHandHistory()[0])).toEqual(['handNumber', 'entries']);
    });

    test('an illegal action is rejected without a snapshot', () => {
      const controller = scriptedController();
      controller.nextHand();
      let published = 0;
      controller.subscribe(() => {
        published++;
      });

      const result = controller.submit({ type: 'check' });

      expect(result.success).toBe(false);
      expect(published).toBe(0);
      expect(controller.getSnapshot().toAct).toBe('human');
    });

    test('unsubscribed listeners stop receiving snapshots', () => {
      const controller = scriptedController();
      let published = 0;
      const unsubscribe = controller.subscribe(() => {
        published++;
      });
      controller.nextHand();
      unsubscribe();
      controller.submit({ type: 'call' });
      expect(published).toBe(1);
    });

    test('dealing while a hand runs throws', () => {
      const controller = scriptedController();
      controller.nextHand();
      expect(() => controller.nextHand()).toThrow(EngineError);
    });
  });

  describe('Seeded sessions', () => {
    test('the same seed plays the same session', () => {
      const config = parseGameConfig({ stack: 40, aggression: 0.7, seed: 2024 });
      const first = new GameController({ config, store: createMemoryStatsStore() });
      const second = new GameController({ config, store: createMemoryStatsStore() });

      playPassively(first, 15);
      playPassively(second, 15);

      expect(first.getSeed()).toBe(2024);
      expect(first.getHandHistory().map(h => h.entries.map(e => e.text))).toEqual(
        second.getHandHistory().map(h => h.entries.map(e => e.text))
      );
      expect(first.getSnapshot().seats.human.stack).toBe(second.getSnapshot().seats.human.stack);
    });

    test('chips are conserved and hands are counted', () => {
      const controller = new GameController({
        config: parseGameConfig({ stack: 30, aggression: 1, seed: 99 }),
        store: createMemoryStatsStore(),
      });
      playPassively(controller, 25);

      const snapshot = controller.getSnapshot();
      expect(snapshot.seats.human.stack + snapshot.seats.bot.stack).toBe(120);
      expect(snapshot.stats.session.human.counters.handsPlayed).toBe(snapshot.handNumber);
      expect(snapshot.sessionOver).toBe(controller.isSessionOver());
    });
  });

  describe('Lifetime stats', () => {
    test('saved counters include this session', async () => {
      const store = createMemoryStatsStore();
      const controller = scriptedController(store);
      controller.nextHand();
      controller.submit({ type: 'raise', amount: 6 });

      expect(await controller.saveStats()).toEqual({ success: true });
      const loaded = await store.loadLifetimeStats();
      expect(loaded.counters.sessions).toBe(1);
      expect(loaded.counters.handsPlayed).toBe(controller.getStats().lifetime.counters.handsPlayed);
    });

    test('openGameSession continues from stored counters', async () => {
      const stored = { ...createEmptyLifetimeCounters(), sessions: 2, handsPlayed: 30 };
      const store = createMemoryStatsStore(serializePersistedStats(createPersistedStats(stored)));

      const { controller, warning } = await openGameSession({
        config: parseGameConfig({ seed: 5 }),
        store,
      });
      expect(warning).toBeNull();
      expect(controller.getStats().lifetime.counters.handsPlayed).toBe(30);

      controller.nextHand();
      expect(controller.getStats().lifetime.counters.sessions).toBe(3);
    });

    test('openGameSession starts from zero on corrupt data', async () => {
      const { controller, warning } = await openGameSession({
        config: parseGameConfig({ seed: 5 }),
        store: createMemoryStatsStore('{"broken"'),
      });
      expect(warning).not.toBeNull();
      expect(controller.getStats().lifetime.counters).toEqual(createEmptyLifetimeCounters());
    });
  });
});
