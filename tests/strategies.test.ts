import { describe, expect, it } from 'vitest';
import { createStrategies } from '../src/strategies/registry';
import { GemLevelingStrategy } from '../src/strategies/gemLeveling';
import { ScarabByTypeStrategy, scarabType } from '../src/strategies/scarabByType';
import { ScarabFullGambleStrategy } from '../src/strategies/scarabFullGamble';
import { StrategyContext } from '../src/strategies/strategy';
import { TattooFlipStrategy, tattooTribe } from '../src/strategies/tattooFlip';
import { MarketSnapshot } from '../src/types';
import { captureLogger, item, silentLogger, testConfig } from './helpers';

const config = testConfig();

const context: StrategyContext = {
  league: 'Standard',
  tradeUrl: (names) => (names.length ? `trade:${names.join('|')}` : undefined),
};

describe('ScarabFullGambleStrategy', () => {
  const strategy = new ScarabFullGambleStrategy(config.analysis);

  it('prices the whole scarab pool as one 3-to-1 gamble', () => {
    const snapshot: MarketSnapshot = {
      Scarab: [item('Cheap Scarab', 1), item('Plain Scarab', 2), item('Middling Scarab', 3), item('Dear Scarab', 10)],
    };

    const [result, ...rest] = strategy.analyze(snapshot, context);
    expect(rest).toHaveLength(0);
    expect(result.strategyName).toBe('Scarab: Full Gamble');
    expect(result.profitPerFlip).toBe(1);
    expect(result.inputCost).toBe(1);
    expect(result.profitPerHourEst).toBe(120);
    expect(result.liquidityScore).toBe(0.25);
    expect(result.volatility).toBeCloseTo(3.5355, 4);
    expect(result.riskProfile).toBe('Low');
    expect(result.shoppingList).toEqual(['Cheap Scarab']);
    expect(result.tradeUrl).toBe('trade:Cheap Scarab');
    expect(result.longTerm).toBe(false);
    expect(result.details).toEqual({
      Jackpots: 'Dear Scarab (10.0c), Middling Scarab (3.0c), Plain Scarab (2.0c), Cheap Scarab (1.0c)',
      'Pool Size': '4',
      'Cost per Flip': 3,
      'Recommended Max Buy Price': 4 / 3,
    });
  });

  it('emits nothing when the mean does not beat three of the cheapest', () => {
    expect(strategy.analyze({ Scarab: [item('A', 2), item('B', 3), item('C', 4)] }, context)).toEqual([]);
    expect(strategy.analyze({ Scarab: [item('A', 1), item('B', 1), item('C', 1)] }, context)).toEqual([]);
  });

  it('emits nothing for a missing or empty category', () => {
    expect(strategy.analyze({}, context)).toEqual([]);
    expect(strategy.analyze({ Scarab: [] }, context)).toEqual([]);
  });
});

describe('ScarabByTypeStrategy', () => {
  const strategy = new ScarabByTypeStrategy(config.analysis);

  it('extracts the scarab type from either naming pattern', () => {
    expect(scarabType(item('Horned Scarab of Nostalgia', 1))).toBe('Horned');
    expect(scarabType(item('Ambush Scarab', 1))).toBe('Ambush');
    expect(scarabType(item('Scarab of Stability', 1))).toBe('Stability');
    expect(scarabType(item('Winged Lure', 1))).toBeNull();
  });

  it('emits profitable groups with more than one member', () => {
    const snapshot: MarketSnapshot = {
      Scarab: [
        item('Horned Scarab of Nostalgia', 100),
        item('Horned Scarab of Bloodlines', 2),
        item('Horned Scarab of Preservation', 3),
        item('Ambush Scarab', 5),
        item('Ambush Scarab of Containment', 5),
        item('Scarab of Stability', 8),
        item('Divination Scarab of Curation', 1),
      ],
    };

    const results = strategy.analyze(snapshot, context);
    expect(results.map((r) => r.strategyName)).toEqual(['Scarab Type: Horned']);

    const [horned] = results;
    expect(horned.profitPerFlip).toBe(29);
    expect(horned.profitPerHourEst).toBe(3480);
    expect(horned.inputCost).toBe(2);
    expect(horned.liquidityScore).toBeCloseTo(2 / 35, 10);
    expect(horned.volatility).toBeCloseTo(45.964, 3);
    expect(horned.riskProfile).toBe('Medium');
    expect(horned.shoppingList).toEqual(['Horned Scarab of Bloodlines', 'Horned Scarab of Preservation']);
    expect(horned.details).toEqual({ Jackpot: 100, 'Pool Size': '3', 'Cost per Flip': 6 });
  });

  it('never reports a single-item group', () => {
    const results = strategy.analyze({ Scarab: [item('Scarab of Stability', 0), item('Scarab of Stability', 0)] }, context);
    expect(results).toEqual([]);
    const lone = strategy.analyze({ Scarab: [item('Gilded Scarab', 0)] }, context);
    expect(lone).toEqual([]);
  });
});

describe('TattooFlipStrategy', () => {
  const strategy = new TattooFlipStrategy(config.analysis);

  it('reads the tribe after "of the"', () => {
    expect(tattooTribe(item('Tattoo of the Ngamahu Warmonger', 1))).toBe('Ngamahu');
    expect(tattooTribe(item('Loyalty Tattoo', 1))).toBeNull();
  });

  it('groups by tribe and skips Journey tattoos', () => {
    const snapshot: MarketSnapshot = {
      Tattoo: [
        item('Tattoo of the Ngamahu Warmonger', 1),
        item('Tattoo of the Ngamahu Firewalker', 2),
        item('Tattoo of the Ngamahu Woodcarver', 30),
        item('Tattoo of the Valako Stormrider', 4),
        item('Tattoo of the Valako Shieldbearer', 4),
        item('Journey Tattoo of the Body', 500),
        item('Journey Tattoo of the Body', 1),
        item('Loyalty Tattoo', 3),
      ],
    };

    const results = strategy.analyze(snapshot, context);
    expect(results).toHaveLength(1);
    const [ngamahu] = results;
    expect(ngamahu.strategyName).toBe('Tattoo: Ngamahu');
    expect(ngamahu.profitPerFlip).toBe(8);
    expect(ngamahu.profitPerHourEst).toBe(960);
    expect(ngamahu.shoppingList).toEqual(['Tattoo of the Ngamahu Warmonger', 'Tattoo of the Ngamahu Firewalker']);
    expect(ngamahu.details.Jackpot).toBe(30);
  });

  it('yields nothing when no tattoo names a tribe', () => {
    expect(strategy.analyze({ Tattoo: [item('Loyalty Tattoo', 3), item('Honoured Tattoo', 9)] }, context)).toEqual([]);
  });
});

describe('GemLevelingStrategy', () => {
  const settings = config.strategies.gemCorruption;
  const currency = [item('Divine Orb', 180), item('Vaal Orb', 5)];

  it('adds the vendor recipe profit to the corruption expected value', () => {
    const strategy = new GemLevelingStrategy(settings, silentLogger());
    const snapshot: MarketSnapshot = {
      Currency: currency,
      Gem: [item('Arc', 10, { gemLevel: 1 }), item('Arc', 100, { gemLevel: 20, gemQuality: 20 })],
    };

    const [arc] = strategy.analyze(snapshot, context);
    expect(arc.strategyName).toBe('Gem Invest: Arc');
    expect(arc.inputCost).toBe(30);
    expect(arc.profitPerFlip).toBe(70);
    expect(arc.details['Corruption EV']).toBe(-5);
    expect(arc.profitWithCorruptionEv).toBe(65);
    expect(arc.profitPerHourEst).toBe(0);
    expect(arc.liquidityScore).toBeUndefined();
    expect(arc.longTerm).toBe(true);
    expect(arc.riskProfile).toBe('Investment');
    expect(arc.shoppingList).toEqual(['Arc (Level 1, 0% Quality) x3']);
  });

  it('weighs each listed corruption outcome by its probability', () => {
    const strategy = new GemLevelingStrategy(settings, silentLogger());
    const [cleave] = strategy.evaluate(
      [
        item('Cleave', 5, { gemLevel: 1, gemQuality: 0 }),
        item('Cleave', 50, { gemLevel: 20, gemQuality: 20 }),
        item('Cleave', 300, { gemLevel: 21, gemQuality: 20, corrupted: true }),
        item('Cleave', 10, { gemLevel: 19, gemQuality: 20, corrupted: true }),
        item('Cleave', 80, { gemLevel: 20, gemQuality: 23, corrupted: true }),
      ],
      5,
    );
    expect(cleave.vendorProfit).toBe(35);
    expect(cleave.corruptionEv).toBeCloseTo(28.75, 10);
    expect(cleave.totalProfit).toBeCloseTo(63.75, 10);
  });

  it('filters, ranks and caps the investments', () => {
    const gems = [
      item('Cleave', 5, { gemLevel: 1 }),
      item('Cleave', 50, { gemLevel: 20, gemQuality: 20 }),
      item('Cleave', 300, { gemLevel: 21, gemQuality: 20, corrupted: true }),
      item('Cleave', 10, { gemLevel: 19, gemQuality: 20, corrupted: true }),
      item('Cleave', 80, { gemLevel: 20, gemQuality: 23, corrupted: true }),
      item('Arc', 10, { gemLevel: 1 }),
      item('Arc', 100, { gemLevel: 20, gemQuality: 20 }),
      item('Frostbolt', 20, { gemLevel: 1 }),
      item('Frostbolt', 75, { gemLevel: 20, gemQuality: 20 }),
      item('Awakened Added Fire Damage Support', 1, { gemLevel: 1 }),
      item('Awakened Added Fire Damage Support', 500, { gemLevel: 20, gemQuality: 20 }),
    ];

    const strategy = new GemLevelingStrategy(settings, silentLogger());
    const names = strategy.analyze({ Currency: currency, Gem: gems }, context).map((r) => r.strategyName);
    expect(names).toEqual(['Gem Invest: Arc', 'Gem Invest: Cleave']);

    const capped = new GemLevelingStrategy({ ...settings, maxResults: 1 }, silentLogger());
    expect(capped.analyze({ Currency: currency, Gem: gems }, context)).toHaveLength(1);
  });

  it('skips the strategy when the Vaal Orb price is unknown', () => {
    const { logger, lines } = captureLogger();
    const strategy = new GemLevelingStrategy(settings, logger);
    const snapshot: MarketSnapshot = {
      Currency: [item('Divine Orb', 180)],
      Gem: [item('Arc', 10, { gemLevel: 1 }), item('Arc', 100, { gemLevel: 20, gemQuality: 20 })],
    };
    expect(strategy.analyze(snapshot, context)).toEqual([]);
    expect(lines.map((line) => line.message)).toEqual(['Could not find Vaal Orb price, skipping gem strategy']);
  });
});

describe('createStrategies', () => {
  it('registers every strategy in a fixed order', () => {
    expect(createStrategies(config, silentLogger()).map((s) => s.name)).toEqual([
      'Scarab Full Gamble',
      'Scarab Flip by Type',
      'Tattoo Flip',
      'Gem Leveling & Corruption',
    ]);
  });
});
