import { GemCorruptionSettings } from '../config/env';
import { INVESTMENT_RISK } from '../metrics/risk';
import { AnalysisResult, Listing, MarketSnapshot } from '../types';
import { Logger } from '../utils/logger';
import { RECIPE_INPUTS } from './recipePool';
import { Strategy, StrategyContext } from './strategy';

export const VAAL_ORB = 'Vaal Orb';

type GemVariant = 'L1Q0' | 'L20Q20' | 'L21Q20' | 'L19Q20' | 'L20Q23';

const variantOf = (gem: Listing): GemVariant | null => {
  const level = gem.gemLevel;
  const quality = gem.gemQuality ?? 0;
  if (gem.corrupted === true) {
    if (level === 21 && quality === 20) return 'L21Q20';
    if (level === 19 && quality === 20) return 'L19Q20';
    if (level === 20 && quality === 23) return 'L20Q23';
    return null;
  }
  if (level === 1 && quality === 0) return 'L1Q0';
  if (level === 20 && quality === 20) return 'L20Q20';
  return null;
};

export type GemInvestment = {
  name: string;
  buyPrice: number;
  inputCost: number;
  sellPrice: number;
  vendorProfit: number;
  corruptionEv: number;
  totalProfit: number;
  outcomes: Partial<Record<GemVariant, number>>;
};

/**
 * Long-term gem play: three level 1 / 0% copies go through the quality vendor
 * recipe and are levelled to 20/20, then the result is corrupted once.
 */
export class GemLevelingStrategy implements Strategy {
  readonly name = 'Gem Leveling & Corruption';

  constructor(
    private settings: GemCorruptionSettings,
    private logger: Logger,
  ) {}

  analyze(snapshot: MarketSnapshot, context: StrategyContext): AnalysisResult[] {
    const gems = snapshot.Gem ?? [];
    if (gems.length === 0) return [];

    const vaal = snapshot.Currency?.find((listing) => listing.name === VAAL_ORB);
    if (!vaal) {
      this.logger.warn('Could not find Vaal Orb price, skipping gem strategy');
      return [];
    }

    return this.evaluate(gems, vaal.chaosValue)
      .filter((gem) => gem.totalProfit > this.settings.minProfit)
      .sort((a, b) => b.totalProfit - a.totalProfit)
      .slice(0, this.settings.maxResults)
      .map((gem) => this.toResult(gem, context));
  }

  evaluate(gems: readonly Listing[], vaalPrice: number): GemInvestment[] {
    const prices = new Map<string, Partial<Record<GemVariant, number>>>();
    for (const gem of gems) {
      if (this.settings.excludedPrefixes.some((prefix) => gem.name.startsWith(prefix))) continue;
      const variant = variantOf(gem);
      if (!variant) continue;
      const entry = prices.get(gem.name) ?? {};
      if (entry[variant] === undefined) entry[variant] = gem.chaosValue;
      prices.set(gem.name, entry);
    }

    const { levelUp, levelDown, qualityUp } = this.settings.probabilities;
    const investments: GemInvestment[] = [];
    for (const [name, variants] of prices) {
      const buyPrice = variants.L1Q0;
      const sellPrice = variants.L20Q20;
      if (buyPrice === undefined || sellPrice === undefined) continue;

      const inputCost = RECIPE_INPUTS * buyPrice;
      const vendorProfit = sellPrice - inputCost;
      // An outcome nobody lists has no observable price and adds nothing.
      const gain = (probability: number, price: number | undefined) =>
        price === undefined ? 0 : probability * (price - sellPrice);
      const corruptionEv =
        gain(levelUp, variants.L21Q20) +
        gain(levelDown, variants.L19Q20) +
        gain(qualityUp, variants.L20Q23) -
        vaalPrice;

      investments.push({
        name,
        buyPrice,
        inputCost,
        sellPrice,
        vendorProfit,
        corruptionEv,
        totalProfit: vendorProfit + corruptionEv,
        outcomes: variants,
      });
    }
    return investments;
  }

  private toResult(gem: GemInvestment, context: StrategyContext): AnalysisResult {
    return {
      strategyName: `Gem Invest: ${gem.name}`,
      profitPerFlip: gem.vendorProfit,
      inputCost: gem.inputCost,
      volatility: 0,
      riskProfile: INVESTMENT_RISK,
      profitPerHourEst: 0,
      shoppingList: [`${gem.name} (Level 1, 0% Quality) x${RECIPE_INPUTS}`],
      tradeUrl: context.tradeUrl([gem.name]),
      details: {
        'Buy Price (L1Q0)': gem.buyPrice,
        'Input Cost (3x L1Q0)': gem.inputCost,
        'Vendor Recipe Profit': gem.vendorProfit,
        'Corruption EV': gem.corruptionEv,
        'Sell Price (L20Q20)': gem.sellPrice,
        'Sell Price (L21Q20)': gem.outcomes.L21Q20 ?? 0,
        'Sell Price (L19Q20)': gem.outcomes.L19Q20 ?? 0,
        'Sell Price (L20Q23)': gem.outcomes.L20Q23 ?? 0,
      },
      longTerm: true,
      profitWithCorruptionEv: gem.totalProfit,
    };
  }
}
