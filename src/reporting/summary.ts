import { AnalysisResult, ExchangeRates, HistoricalRecord } from '../types';
import { NOT_AVAILABLE, formatCurrency, formatPercent } from '../utils/format';

export type SummaryRow = Record<string, string>;

export const summarizeResults = (results: readonly AnalysisResult[], rates: ExchangeRates): SummaryRow[] =>
  results.map((result) => {
    const row: SummaryRow = {
      Strategy: result.strategyName,
      Liquidity: formatPercent(result.liquidityScore),
      'Input Cost': formatCurrency(result.inputCost, rates),
      'Risk Profile': result.riskProfile,
    };
    if (result.longTerm) {
      row['Profit (Level)'] = formatCurrency(result.profitPerFlip, rates);
      row['Profit w/ EV'] = formatCurrency(result.profitWithCorruptionEv ?? 0, rates);
    } else {
      row['Profit/Flip'] = formatCurrency(result.profitPerFlip, rates);
      row['Profit/Hour (Est.)'] = formatCurrency(result.profitPerHourEst, rates);
    }
    return row;
  });

/** Left-aligned text table; cells a row lacks render empty. */
export const renderTable = (rows: readonly SummaryRow[]): string => {
  if (rows.length === 0) return '';
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  const widths = columns.map((column) =>
    Math.max(column.length, ...rows.map((row) => (row[column] ?? '').length)),
  );
  const line = (cells: string[]) =>
    cells.map((cell, idx) => cell.padEnd(widths[idx] ?? 0)).join('  ').trimEnd();

  return [line(columns), ...rows.map((row) => line(columns.map((column) => row[column] ?? '')))].join('\n');
};

export const describeResult = (result: AnalysisResult, rates: ExchangeRates): string[] => [
  `Strategy: ${result.strategyName}`,
  `Trade URL: ${result.tradeUrl ?? NOT_AVAILABLE}`,
  'Details:',
  ...Object.entries(result.details).map(
    ([key, value]) => `  - ${key}: ${typeof value === 'number' ? formatCurrency(value, rates) : value}`,
  ),
];

export const renderHistory = (
  records: readonly HistoricalRecord[],
  longTerm: boolean,
  rates: ExchangeRates,
  limit = 10,
): string => {
  const rows = records.slice(-limit).map((record) => ({
    Timestamp: record.timestamp.toISOString().replace('T', ' ').slice(0, 19),
    Profit: formatCurrency(longTerm ? record.profitWithCorruptionEv : record.profitPerHourEst, rates),
    'Risk Profile': record.riskProfile,
    Liquidity: formatPercent(record.liquidityScore),
  }));
  return renderTable(rows);
};
