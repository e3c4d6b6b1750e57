import { Command } from 'commander';
import { Config, loadConfig } from './config/env';
import { Logger } from './utils/logger';
import { ConfigError, errorMessage } from './utils/errors';
import { ListingCache } from './storage/listingCache';
import { HistoryStore } from './storage/historyStore';
import { MarketDataGateway } from './market/gateway';
import { StrategyEngine } from './analysis/engine';
import { MarketAnalysisClient } from './analysis/client';
import { createStrategies } from './strategies/registry';
import { DiscordClient } from './alerts/discordClient';
import { AnalysisPoller } from './scheduler/analysisPoller';
import { describeResult, renderHistory, renderTable, summarizeResults } from './reporting/summary';

type LeagueOption = { league?: string };

const RULE = '='.repeat(120);

function createClient(config: Config, logger: Logger, league?: string) {
  const cache = new ListingCache(config.paths.cacheDir, config.api.cacheTtlMinutes * 60 * 1000, logger.child('cache'));
  const gateway = new MarketDataGateway(config, cache, logger.child('gateway'));
  const engine = new StrategyEngine(
    createStrategies(config, logger.child('strategies')),
    { tradeUrlBase: config.api.tradeUrlBase },
    logger.child('engine'),
  );
  return new MarketAnalysisClient(config, gateway, engine, logger.child('client'), league);
}

async function withStore<T>(config: Config, logger: Logger, work: (store: HistoryStore) => Promise<T>) {
  const store = await HistoryStore.open(config.paths.databaseFile, logger.child('history'));
  try {
    return await work(store);
  } finally {
    await store.close();
  }
}

async function analyze(config: Config, logger: Logger, options: LeagueOption & { record?: boolean }) {
  const client = createClient(config, logger, options.league);
  await client.fetchData();
  const results = await client.runAnalysis();
  if (results.length === 0) {
    logger.warn('No profitable strategies found');
    console.log('No profitable strategies found.');
    return;
  }
  const { rates } = client;

  console.log(`\n${RULE}\nMASTER STRATEGY DASHBOARD\n${RULE}`);
  console.log(renderTable(summarizeResults(results, rates)));
  console.log(`${RULE}\n`);

  const [top] = results;
  console.log('--- Top Strategy Breakdown ---');
  console.log(describeResult(top, rates).join('\n'));

  await withStore(config, logger, async (store) => {
    if (options.record) await store.append(results, client.league);
    const history = await store.query(top.strategyName, client.league);
    console.log(`\n${RULE}\nHISTORICAL TREND: ${top.strategyName}\n${RULE}`);
    console.log(
      history.length === 0
        ? "No historical data found for this strategy. Run 'record' to start collecting data."
        : renderHistory(history, top.longTerm, rates),
    );
  });
}

async function record(config: Config, logger: Logger, options: LeagueOption) {
  const client = createClient(config, logger, options.league);
  await client.fetchData();
  const results = await client.runAnalysis();
  await withStore(config, logger, async (store) => {
    const outcome = await store.append(results, client.league);
    await new DiscordClient(config, logger.child('discord')).sendTopOpportunities(
      results,
      client.league,
      client.rates,
    );
    logger.info('Scheduled run complete', outcome);
  });
}

async function history(config: Config, logger: Logger, strategy: string, options: LeagueOption) {
  const league = options.league || config.defaultLeague;
  await withStore(config, logger, async (store) => {
    const records = await store.query(strategy, league);
    if (records.length === 0) {
      console.log(`No historical data for '${strategy}' in ${league}.`);
      return;
    }
    const rates = { divineToChaos: config.defaultDivineRate };
    console.log(renderHistory(records, records[records.length - 1].longTerm, rates));
  });
}

async function watch(config: Config, logger: Logger, options: LeagueOption) {
  const client = createClient(config, logger, options.league);
  const store = await HistoryStore.open(config.paths.databaseFile, logger.child('history'));
  const poller = new AnalysisPoller(
    config.scheduler,
    client,
    store,
    logger.child('poller'),
    new DiscordClient(config, logger.child('discord')),
  );

  const shutdown = () => {
    poller.stop();
    store
      .close()
      .catch((error) => logger.error('Failed to close history store', { error: errorMessage(error) }))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  poller.start();
}

function main() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(error instanceof ConfigError ? error.message : `Failed to load configuration: ${errorMessage(error)}`);
    process.exit(1);
  }
  const logger = new Logger(config.logLevel);

  const program = new Command()
    .name('flip-analyzer')
    .description('Rank trading strategies from live market prices');

  program
    .command('analyze', { isDefault: true })
    .description('Fetch prices, rank strategies and show the dashboard')
    .option('-l, --league <name>', 'league to analyse')
    .option('--record', 'also append the results to the history store')
    .action((options: LeagueOption & { record?: boolean }) => analyze(config, logger, options));

  program
    .command('record')
    .description('Fetch prices, rank strategies and append the results to the history store')
    .option('-l, --league <name>', 'league to analyse')
    .action((options: LeagueOption) => record(config, logger, options));

  program
    .command('history')
    .description('Show the recorded trend of one strategy')
    .argument('<strategy>', 'strategy name as shown on the dashboard')
    .option('-l, --league <name>', 'league to query')
    .action((strategy: string, options: LeagueOption) => history(config, logger, strategy, options));

  program
    .command('watch')
    .description('Re-run and record the analysis on the configured interval')
    .option('-l, --league <name>', 'league to analyse')
    .action((options: LeagueOption) => watch(config, logger, options));

  program.parseAsync(process.argv).catch((error) => {
    logger.error('Run failed', { error: errorMessage(error) });
    process.exitCode = 1;
  });
}

main();
