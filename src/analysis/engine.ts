import { Strategy, StrategyContext } from '../strategies/strategy';
import { AnalysisResult, MarketSnapshot } from '../types';
import { buildTradeUrl } from '../utils/format';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export type EngineConfig = {
  tradeUrlBase: string;
};

/** Flip results rank by hourly estimate, long-term ones by total expected profit. */
export const rankingKey = (result: AnalysisResult) =>
  result.longTerm ? (result.profitWithCorruptionEv ?? result.profitPerFlip) : result.profitPerHourEst;

export const rankResults = (results: readonly AnalysisResult[]) =>
  [...results].sort((a, b) => rankingKey(b) - rankingKey(a));

export class StrategyEngine {
  constructor(
    private strategies: readonly Strategy[],
    private config: EngineConfig,
    private logger: Logger,
  ) {}

  runAll(snapshot: MarketSnapshot, league: string): AnalysisResult[] {
    const context: StrategyContext = {
      league,
      tradeUrl: (names) => buildTradeUrl(this.config.tradeUrlBase, league, names),
    };

    const collected: AnalysisResult[] = [];
    for (const strategy of this.strategies) {
      this.logger.debug('Running strategy', { strategy: strategy.name });
      try {
        const results = strategy.analyze(snapshot, context);
        if (results.length > 0) {
          collected.push(...results);
          this.logger.info('Strategy completed', { strategy: strategy.name, results: results.length });
        } else {
          this.logger.debug('Strategy found no profitable opportunities', { strategy: strategy.name });
        }
      } catch (error) {
        this.logger.error('Strategy failed', { strategy: strategy.name, error: errorMessage(error) });
      }
    }
    return rankResults(collected);
  }
}
