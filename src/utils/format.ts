import { ExchangeRates } from '../types';

export const NOT_AVAILABLE = 'N/A';

/** Chaos amounts at or past one Divine Orb are shown in divines. */
export const formatCurrency = (chaosValue: number | null | undefined, rates: ExchangeRates) => {
  if (chaosValue == null || !Number.isFinite(chaosValue)) return NOT_AVAILABLE;
  if (Math.abs(chaosValue) >= rates.divineToChaos) {
    return `${(chaosValue / rates.divineToChaos).toFixed(2)} div`;
  }
  return `${chaosValue.toFixed(1)}c`;
};

export const formatPercent = (ratio: number | null | undefined) =>
  ratio == null || !Number.isFinite(ratio) ? NOT_AVAILABLE : `${Math.round(ratio * 100)}%`;

export type TradeUrlBuilder = (itemNames: readonly string[]) => string | undefined;

/** Bulk-exchange search link offering `currency` for every listed item. */
export const buildTradeUrl = (
  tradeUrlBase: string,
  league: string,
  itemNames: readonly string[],
  currency = 'chaos',
): string | undefined => {
  if (itemNames.length === 0) return undefined;
  const query = {
    exchange: {
      status: { option: 'online' },
      have: [currency],
      want: itemNames,
    },
  };
  return `${tradeUrlBase}${encodeURIComponent(league)}?q=${encodeURIComponent(JSON.stringify(query))}`;
};
