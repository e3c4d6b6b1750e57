import { DiscordClient } from '../alerts/discordClient';
import { MarketAnalysisClient } from '../analysis/client';
import { HistoryStore } from '../storage/historyStore';
import { AppendOutcome } from '../types';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export type PollerConfig = {
  intervalMinutes: number;
};

export type CycleOutcome = AppendOutcome & { results: number };

export class AnalysisPoller {
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(
    private config: PollerConfig,
    private client: MarketAnalysisClient,
    private store: HistoryStore,
    private logger: Logger,
    private notifier?: DiscordClient,
  ) {}

  start() {
    this.stop();
    this.logger.info('Starting analysis poller', {
      league: this.client.league,
      intervalMinutes: this.config.intervalMinutes,
    });
    const run = () => {
      void this.tick();
    };
    run();
    this.timer = setInterval(run, Math.max(1, this.config.intervalMinutes) * 60 * 1000);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  /** One fetch → analyze → record → notify cycle. */
  async runOnce(now = Date.now()): Promise<CycleOutcome> {
    await this.client.fetchData();
    const results = await this.client.runAnalysis();
    const outcome = await this.store.append(results, this.client.league, now);
    if (this.notifier) {
      await this.notifier.sendTopOpportunities(results, this.client.league, this.client.rates);
    }
    return { ...outcome, results: results.length };
  }

  private async tick() {
    if (this.running) {
      this.logger.warn('Previous cycle still running, skipping tick');
      return;
    }
    this.running = true;
    try {
      const outcome = await this.runOnce();
      this.logger.info('Analysis cycle complete', outcome);
    } catch (error) {
      this.logger.error('Analysis cycle failed', { error: errorMessage(error) });
    } finally {
      this.running = false;
    }
  }
}
