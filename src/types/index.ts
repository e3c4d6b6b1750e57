export const CATEGORIES = ['Currency', 'Tattoo', 'Scarab', 'Essence', 'Gem'] as const;

export type Category = (typeof CATEGORIES)[number];

export type Listing = {
  name: string;
  chaosValue: number;
  count?: number;
  gemLevel?: number;
  gemQuality?: number;
  corrupted?: boolean;
};

export type MarketSnapshot = Readonly<Partial<Record<Category, readonly Listing[]>>>;

export type ExchangeRates = {
  divineToChaos: number;
};

export type MarketFetch = {
  snapshot: MarketSnapshot;
  rates: ExchangeRates;
};

/** Numeric detail values are chaos amounts. */
export type DetailValue = string | number;

export type AnalysisResult = Readonly<{
  strategyName: string;
  profitPerFlip: number;
  inputCost: number;
  volatility: number;
  riskProfile: string;
  profitPerHourEst: number;
  liquidityScore?: number;
  shoppingList: readonly string[];
  details: Readonly<Record<string, DetailValue>>;
  longTerm: boolean;
  tradeUrl?: string;
  profitWithCorruptionEv?: number;
}>;

export type HistoricalRecord = {
  timestamp: Date;
  league: string;
  strategyName: string;
  profitPerFlip: number;
  profitPerHourEst: number;
  profitWithCorruptionEv: number | null;
  riskProfile: string;
  liquidityScore: number | null;
  longTerm: boolean;
};

export type AppendOutcome = {
  inserted: number;
  duplicates: number;
};
