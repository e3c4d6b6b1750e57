export const NO_RISK = 'None';
export const EXTREME_RISK = 'Extreme';
export const INVESTMENT_RISK = 'Investment';

export type RiskThresholds = Readonly<Record<string, number>>;

/**
 * Maps price volatility to a named risk profile. Thresholds are upper bounds
 * checked in ascending order; volatility past every bound is "Extreme".
 */
export const classifyRisk = (volatility: number, thresholds: RiskThresholds): string => {
  if (!Number.isFinite(volatility) || volatility === 0) return NO_RISK;

  const ordered = Object.entries(thresholds).sort(([, a], [, b]) => a - b);
  for (const [profile, threshold] of ordered) {
    if (volatility <= threshold) return profile;
  }
  return EXTREME_RISK;
};
