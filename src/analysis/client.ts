import { Config } from '../config/env';
import { MarketDataGateway } from '../market/gateway';
import { AnalysisResult, ExchangeRates, MarketSnapshot } from '../types';
import { Logger } from '../utils/logger';
import { StrategyEngine } from './engine';

/** Holds one league's latest snapshot, exchange rate and ranked results. */
export class MarketAnalysisClient {
  readonly league: string;
  private snapshot?: MarketSnapshot;
  private currentRates: ExchangeRates;
  private lastResults: AnalysisResult[] = [];

  constructor(
    config: Config,
    private gateway: MarketDataGateway,
    private engine: StrategyEngine,
    private logger: Logger,
    league?: string,
  ) {
    this.league = league || config.defaultLeague;
    this.currentRates = { divineToChaos: config.defaultDivineRate };
    this.logger.info('Analysis client initialized', { league: this.league });
  }

  get rates(): ExchangeRates {
    return this.currentRates;
  }

  get results(): readonly AnalysisResult[] {
    return this.lastResults;
  }

  async fetchData() {
    const { snapshot, rates } = await this.gateway.fetchAll(this.league, this.currentRates);
    this.snapshot = snapshot;
    this.currentRates = rates;
  }

  async runAnalysis(): Promise<AnalysisResult[]> {
    if (!this.snapshot) {
      this.logger.info('Data not cached, fetching before analysis');
      await this.fetchData();
    }
    this.lastResults = this.engine.runAll(this.snapshot ?? {}, this.league);
    this.logger.info('Analysis complete', { profitable: this.lastResults.length });
    return this.lastResults;
  }
}
