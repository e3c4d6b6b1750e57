import { Config } from '../config/env';
import { FetchLike } from '../market/gateway';
import { AnalysisResult, ExchangeRates } from '../types';
import { formatCurrency, formatPercent } from '../utils/format';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { rankingKey } from '../analysis/engine';

export type DiscordEmbed = {
  title: string;
  description: string;
  timestamp: string;
  fields: { name: string; value: string; inline: boolean }[];
  footer: { text: string };
  color: number;
};

const RISK_COLORS: Record<string, number> = {
  None: 3066993,
  Low: 3066993,
  Medium: 16776960,
  Investment: 3447003,
};
const DEFAULT_COLOR = 15158332;

export class DiscordClient {
  constructor(
    private config: Config,
    private logger: Logger,
    private fetchFn: FetchLike = fetch,
  ) {}

  async sendTopOpportunities(results: readonly AnalysisResult[], league: string, rates: ExchangeRates) {
    if (results.length === 0) {
      this.logger.debug('No opportunities to announce', { league });
      return;
    }
    const embed = this.buildEmbed(results.slice(0, this.config.alerts.topResults), league, rates);

    if (this.config.alerts.dryRun || !this.config.alerts.discordWebhookUrl) {
      this.logger.info('DRY RUN - alert', { embed });
      return;
    }

    try {
      const res = await this.fetchFn(this.config.alerts.discordWebhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ embeds: [embed] }),
      });
      if (!res.ok) {
        this.logger.error('Discord webhook failed', { status: res.status, text: await res.text() });
      } else {
        this.logger.info('Alert sent to Discord', { league, results: embed.fields.length });
      }
    } catch (error) {
      this.logger.error('Discord webhook unreachable', { error: errorMessage(error) });
    }
  }

  buildEmbed(top: readonly AnalysisResult[], league: string, rates: ExchangeRates): DiscordEmbed {
    const [best] = top;
    return {
      title: `Top opportunities | ${league}`,
      description: best
        ? `Best: ${best.strategyName} (${formatCurrency(rankingKey(best), rates)}${best.longTerm ? ' total' : '/h'})`
        : '',
      timestamp: new Date().toISOString(),
      fields: top.map((result) => ({
        name: result.strategyName,
        value: result.longTerm
          ? `EV ${formatCurrency(result.profitWithCorruptionEv, rates)} | ${result.riskProfile}`
          : `${formatCurrency(result.profitPerHourEst, rates)}/h | ${result.riskProfile} | liq ${formatPercent(result.liquidityScore)}`,
        inline: false,
      })),
      footer: {
        text: `1 div = ${Math.round(rates.divineToChaos)}c | read-only analysis, no trades executed`,
      },
      color: (best && RISK_COLORS[best.riskProfile]) ?? DEFAULT_COLOR,
    };
  }
}
