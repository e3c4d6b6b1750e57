import { AnalysisSettings } from '../config/env';
import { classifyRisk } from '../metrics/risk';
import { PriceStats, describePrices } from '../metrics/stats';
import { AnalysisResult, Listing } from '../types';
import { StrategyContext } from './strategy';

/** Items consumed by one vendor recipe roll. */
export const RECIPE_INPUTS = 3;

export type PoolEvaluation = {
  stats: PriceStats;
  cost: number;
  profit: number;
  liquidity: number;
  riskProfile: string;
};

/**
 * Expected value of trading `RECIPE_INPUTS` of the cheapest item in a pool for
 * a uniformly random member of the same pool.
 */
export const evaluatePool = (
  listings: readonly Listing[],
  settings: AnalysisSettings,
): PoolEvaluation | null => {
  const stats = describePrices(listings.map((listing) => listing.chaosValue));
  if (!stats) return null;
  const cost = RECIPE_INPUTS * stats.min;
  return {
    stats,
    cost,
    profit: stats.mean - cost,
    liquidity: stats.mean > 0 ? stats.min / stats.mean : 0,
    riskProfile: classifyRisk(stats.stdDev, settings.riskThresholds),
  };
};

/** Buckets listings by key in ascending key order; listings keyed `null` are dropped. */
export const groupListings = (
  listings: readonly Listing[],
  keyOf: (listing: Listing) => string | null,
): [string, Listing[]][] => {
  const groups = new Map<string, Listing[]>();
  for (const listing of listings) {
    const key = keyOf(listing);
    if (key === null) continue;
    const bucket = groups.get(key);
    if (bucket) bucket.push(listing);
    else groups.set(key, [listing]);
  }
  return [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
};

/** One flip result per profitable group holding more than one item. */
export const analyzeGroups = (
  groups: readonly [string, Listing[]][],
  label: string,
  settings: AnalysisSettings,
  context: StrategyContext,
): AnalysisResult[] => {
  const results: AnalysisResult[] = [];
  for (const [key, members] of groups) {
    if (members.length <= 1) continue;
    const pool = evaluatePool(members, settings);
    if (!pool || pool.profit <= 0) continue;

    const ceiling = pool.stats.min + settings.shoppingListToleranceChaos;
    const shoppingList = members
      .filter((listing) => listing.chaosValue <= ceiling)
      .map((listing) => listing.name);

    results.push({
      strategyName: `${label}: ${key}`,
      profitPerFlip: pool.profit,
      inputCost: pool.stats.min,
      volatility: pool.stats.stdDev,
      riskProfile: pool.riskProfile,
      profitPerHourEst: pool.profit * settings.flipsPerHour,
      liquidityScore: pool.liquidity,
      shoppingList,
      tradeUrl: context.tradeUrl(shoppingList),
      details: {
        Jackpot: pool.stats.max,
        'Pool Size': String(pool.stats.size),
        'Cost per Flip': pool.cost,
      },
      longTerm: false,
    });
  }
  return results;
};
