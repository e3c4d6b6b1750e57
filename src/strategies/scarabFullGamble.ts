import { AnalysisSettings } from '../config/env';
import { AnalysisResult, MarketSnapshot } from '../types';
import { RECIPE_INPUTS, evaluatePool } from './recipePool';
import { Strategy, StrategyContext } from './strategy';

/** The 3-to-1 scarab recipe over every scarab as a single pool. */
export class ScarabFullGambleStrategy implements Strategy {
  readonly name = 'Scarab Full Gamble';

  constructor(private settings: AnalysisSettings) {}

  analyze(snapshot: MarketSnapshot, context: StrategyContext): AnalysisResult[] {
    const scarabs = snapshot.Scarab ?? [];
    const pool = evaluatePool(scarabs, this.settings);
    if (!pool || pool.profit <= 0) return [];

    const maxBuyPrice = pool.stats.mean / RECIPE_INPUTS;
    const shoppingList = scarabs
      .filter((listing) => listing.chaosValue < maxBuyPrice)
      .map((listing) => listing.name);

    const jackpots = [...scarabs]
      .sort((a, b) => b.chaosValue - a.chaosValue)
      .slice(0, this.settings.jackpotsToDisplay)
      .map((listing) => `${listing.name} (${listing.chaosValue.toFixed(1)}c)`)
      .join(', ');

    return [
      {
        strategyName: 'Scarab: Full Gamble',
        profitPerFlip: pool.profit,
        inputCost: pool.stats.min,
        volatility: pool.stats.stdDev,
        riskProfile: pool.riskProfile,
        profitPerHourEst: pool.profit * this.settings.flipsPerHour,
        liquidityScore: pool.liquidity,
        shoppingList,
        tradeUrl: context.tradeUrl(shoppingList),
        details: {
          Jackpots: jackpots,
          'Pool Size': String(pool.stats.size),
          'Cost per Flip': pool.cost,
          'Recommended Max Buy Price': maxBuyPrice,
        },
        longTerm: false,
      },
    ];
  }
}
