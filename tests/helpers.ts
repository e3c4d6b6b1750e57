import { Config, parseConfig } from '../src/config/env';
import { AnalysisResult, Listing } from '../src/types';
import { Logger } from '../src/utils/logger';

export const BASE_URL = 'https://prices.test/api/data/';
export const TRADE_URL = 'https://trade.test/exchange/';

export const testConfig = (overrides: Record<string, unknown> = {}): Config =>
  parseConfig({
    defaultLeague: 'Standard',
    api: { baseUrl: BASE_URL, tradeUrlBase: TRADE_URL },
    ...overrides,
  });

export const silentLogger = () => new Logger('error', 'test', () => {});

/** Logger that keeps every emitted JSON line, parsed. */
export const captureLogger = (level: 'debug' | 'info' | 'warn' | 'error' = 'debug') => {
  const lines: Record<string, unknown>[] = [];
  const logger = new Logger(level, 'test', (line) => {
    lines.push(JSON.parse(line));
  });
  return { logger, lines };
};

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

export const item = (name: string, chaosValue: number, extra: Partial<Listing> = {}): Listing => ({
  name,
  chaosValue,
  ...extra,
});

export const flipResult = (strategyName: string, profitPerHourEst: number): AnalysisResult => ({
  strategyName,
  profitPerFlip: profitPerHourEst / 120,
  inputCost: 1,
  volatility: 0,
  riskProfile: 'None',
  profitPerHourEst,
  liquidityScore: 0.5,
  shoppingList: [],
  details: {},
  longTerm: false,
});

export const longTermResult = (
  strategyName: string,
  profitWithCorruptionEv: number | undefined,
  profitPerFlip = 1,
): AnalysisResult => ({
  strategyName,
  profitPerFlip,
  inputCost: 30,
  volatility: 0,
  riskProfile: 'Investment',
  profitPerHourEst: 0,
  shoppingList: [],
  details: {},
  longTerm: true,
  profitWithCorruptionEv,
});
