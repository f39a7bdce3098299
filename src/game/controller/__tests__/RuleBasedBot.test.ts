/**
 * RuleBasedBot.test.ts
 * Bot decisions: legality, determinism, preflop opens, postflop discipline
 */

import { RuleBasedBot, createRuleBasedBot, decideAction, projectOntoLegal } from '../RuleBasedBot';
import { TableEngine } from '../../engine/GameLoop';
import { PlayerView } from '../../engine/PlayerView';
import { Action, PlayerId } from '../../engine/TableState';
import { createSeededRng } from '../../engine/Random';
import { cards, dealOrder, engineWithDecks, seededEngine } from '../../engine/__tests__/testUtils';

// ============================================================================
// Helpers
// ============================================================================

function act(engine: TableEngine, playerId: PlayerId, action: Action): void {
  const result = engine.apply(playerId, action);
  if (!result.success) {
    throw new Error(`Unexpected illegal action: ${result.error.message}`);
  }
}

/**
 * Unopened pot, bot on the button with 100 big blinds
 */
function buttonOpenView(holeCards: string): PlayerView {
  return {
    playerId: 'bot',
    handNumber: 2,
    position: 'button',
    street: 'preflop',
    holeCards: cards(holeCards),
    board: [],
    pot: 3,
    stack: 199,
    opponentStack: 198,
    committed: 1,
    opponentCommitted: 2,
    currentBet: 2,
    toCall: 1,
    bigBlind: 2,
    preflopAggressor: null,
    actions: [],
    legalActions: [
      { type: 'fold' },
      { type: 'call', amount: 1, allIn: false },
      { type: 'raise', min: 4, max: 200 },
    ],
  };
}

/**
 * Hand 1: the human limps on the button, the bot checks its option, checks
 * the flop and faces a bet of 4.
 */
function facingFlopBet(botCards: string, board: string): PlayerView {
  const engine = engineWithDecks(200, [dealOrder('Ah Jd', botCards, board)]);
  engine.startHand();
  act(engine, 'human', { type: 'call' });
  act(engine, 'bot', { type: 'check' });
  act(engine, 'bot', { type: 'check' });
  act(engine, 'human', { type: 'bet', amount: 4 });
  return engine.getPlayerView('bot');
}

/**
 * Both seats played by bots; returns every action taken
 */
function playSession(seed: number, hands: number): { actions: Action[]; illegal: string[] } {
  const engine = seededEngine(100, seed);
  const bots: Record<PlayerId, RuleBasedBot> = {
    human: createRuleBasedBot({ aggression: 0.2, rng: createSeededRng(seed + 1000) }),
    bot: createRuleBasedBot({ aggression: 0.9, rng: createSeededRng(seed + 2000) }),
  };
  const actions: Action[] = [];
  const illegal: string[] = [];

  for (let hand = 0; hand < hands && !engine.isSessionOver(); hand++) {
    engine.startHand();
    let toAct = engine.getCurrentPlayer();
    while (toAct !== null) {
      const action = bots[toAct].decide(engine.getPlayerView(toAct));
      actions.push(action);
      const result = engine.apply(toAct, action);
      if (!result.success) {
        illegal.push(`${toAct} ${action.type}: ${result.error.message}`);
        break;
      }
      toAct = engine.getCurrentPlayer();
    }
    if (illegal.length > 0) break;
  }

  return { actions, illegal };
}

// ============================================================================
// Tests
// ============================================================================

describe('RuleBasedBot', () => {
  describe('Legality', () => {
    test('every decision is legal across many seeded sessions', () => {
      for (let seed = 1; seed <= 20; seed++) {
        const { actions, illegal } = playSession(seed, 25);
        expect(illegal).toEqual([]);
        expect(actions.length).toBeGreaterThan(0);
      }
    });

    test('refuses to act without legal actions', () => {
      const view: PlayerView = { ...buttonOpenView('As Ad'), legalActions: [] };
      expect(() => decideAction(view, 0.5, createSeededRng(1))).toThrow('No legal actions for bot');
    });
  });

  describe('Determinism', () => {
    test('the same seed gives the same decisions', () => {
      expect(playSession(42, 10).actions).toEqual(playSession(42, 10).actions);
    });
  });

  describe('Preflop', () => {
    test('pocket aces open to the profile size', () => {
      expect(decideAction(buttonOpenView('As Ad'), 0, createSeededRng(3))).toEqual({
        type: 'raise',
        amount: 5,
      });
      expect(decideAction(buttonOpenView('As Ad'), 1, createSeededRng(3))).toEqual({
        type: 'raise',
        amount: 6,
      });
    });

    test('a passive bot folds seven-deuce on the button', () => {
      for (let seed = 1; seed <= 20; seed++) {
        expect(decideAction(buttonOpenView('7d 2c'), 0, createSeededRng(seed))).toEqual({
          type: 'fold',
        });
      }
    });
  });

  describe('Postflop', () => {
    test('trips never fold to a bet', () => {
      const view = facingFlopBet('7c 7d', '7s Qh 2c 9d 4s');
      expect(view.toCall).toBe(4);
      for (const aggression of [0, 0.25, 0.5, 0.75, 1]) {
        for (let seed = 1; seed <= 25; seed++) {
          const action = decideAction(view, aggression, createSeededRng(seed));
          expect(action.type).not.toBe('fold');
        }
      }
    });

    test('air out of position folds to a bet', () => {
      const view = facingFlopBet('7d 2c', 'Ks Qh 9c 4s 3h');
      expect(view.position).toBe('big-blind');
      for (const aggression of [0, 0.5, 1]) {
        for (let seed = 1; seed <= 25; seed++) {
          expect(decideAction(view, aggression, createSeededRng(seed))).toEqual({ type: 'fold' });
        }
      }
    });
  });

  describe('projectOntoLegal', () => {
    test('bet amounts are clamped to the legal range', () => {
      expect(
        projectOntoLegal({ type: 'bet', amount: 1000 }, [
          { type: 'check' },
          { type: 'bet', min: 2, max: 50 },
        ])
      ).toEqual({ type: 'bet', amount: 50 });
    });

    test('a raise candidate takes the legal bet when nothing has been bet', () => {
      expect(
        projectOntoLegal({ type: 'raise', amount: 1 }, [
          { type: 'check' },
          { type: 'bet', min: 2, max: 50 },
        ])
      ).toEqual({ type: 'bet', amount: 2 });
    });

    test('folding is never chosen when checking is free', () => {
      expect(projectOntoLegal({ type: 'fold' }, [{ type: 'check' }])).toEqual({ type: 'check' });
    });

    test('a check facing a bet becomes a fold', () => {
      expect(
        projectOntoLegal({ type: 'check' }, [
          { type: 'fold' },
          { type: 'call', amount: 4, allIn: false },
        ])
      ).toEqual({ type: 'fold' });
    });

    test('a raise that is not available becomes a call', () => {
      expect(
        projectOntoLegal({ type: 'raise', amount: 40 }, [
          { type: 'fold' },
          { type: 'call', amount: 10, allIn: true },
        ])
      ).toEqual({ type: 'call' });
    });
  });
});
