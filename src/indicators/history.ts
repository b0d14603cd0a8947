export interface IndicatorPeriods {
  rsiPeriod: number;
  macdSlowPeriod: number;
  macdSignalPeriod: number;
  bbPeriod: number;
  atrPeriod: number;
  adxPeriod: number;
  stochPeriod: number;
  stochSignalPeriod: number;
}

/**
 * Longest lookback across the indicator set (35 with default periods)
 */
export function requiredHistory(periods: IndicatorPeriods): number {
  return Math.max(
    periods.rsiPeriod + 1,
    periods.macdSlowPeriod + periods.macdSignalPeriod,
    periods.bbPeriod,
    periods.atrPeriod + 1,
    2 * periods.adxPeriod + 1,
    periods.stochPeriod + periods.stochSignalPeriod
  );
}
