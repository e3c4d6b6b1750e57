import { AnalysisResult, MarketSnapshot } from '../types';
import { TradeUrlBuilder } from '../utils/format';

export type StrategyContext = {
  league: string;
  tradeUrl: TradeUrlBuilder;
};

/**
 * A profitability calculator. Implementations read the snapshot and must not
 * mutate it; throwing is allowed and costs only this strategy's results.
 */
export interface Strategy {
  readonly name: string;
  analyze(snapshot: MarketSnapshot, context: StrategyContext): AnalysisResult[];
}
