import TI from "technicalindicators";
import type { EngineConfig } from "../config/engineConfig.js";
import type { Candle, CandleSeries } from "../ingestion/types.js";
import { InsufficientHistory } from "../utils/errors.js";
import { TtlCache } from "../utils/ttlCache.js";
import { debug } from "../utils/logger.js";
import { computeMomentum, detectTrend } from "../signals/trendMomentum.js";
import { requiredHistory } from "./history.js";
import type { IndicatorBundle } from "./types.js";

const NEUTRAL_RSI = 50;
const NEUTRAL_BB_PERCENT = 50;
const NEUTRAL_STOCH = 50;
const NEUTRAL_ADX = 20;
const FALLBACK_ATR_PCT = 0.001;
// Bands narrower than this share of price count as collapsed (float noise on a flat series)
const MIN_BAND_WIDTH_RATIO = 1e-9;

export type IndicatorParams = Pick<
  EngineConfig,
  | "rsiPeriod"
  | "macdFastPeriod"
  | "macdSlowPeriod"
  | "macdSignalPeriod"
  | "bbPeriod"
  | "bbStdDev"
  | "atrPeriod"
  | "adxPeriod"
  | "stochPeriod"
  | "stochSignalPeriod"
  | "volumeAveragePeriod"
  | "adxTrendThreshold"
  | "adxStrengthCeiling"
  | "macdDeadBand"
  | "rsiTrendOffset"
  | "momentumPeriods"
  | "momentumDeadBandPct"
>;

export function seriesVersion(series: Pick<CandleSeries, "instrument" | "interval" | "source" | "candles">): string {
  const last = series.candles[series.candles.length - 1];
  return `${series.instrument}:${series.interval}:${series.source}:${last ? last.timestamp : 0}:${series.candles.length}`;
}

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

function lastOf<T>(values: readonly T[]): T | undefined {
  return values.length > 0 ? values[values.length - 1] : undefined;
}

/**
 * Full ATR series, oldest first. Also used for the adaptive cache TTL.
 */
export function atrSeries(candles: readonly Candle[], period: number): number[] {
  if (candles.length <= period) {
    return [];
  }
  return TI.ATR.calculate({
    high: candles.map((c) => c.high),
    low: candles.map((c) => c.low),
    close: candles.map((c) => c.close),
    period,
  });
}

function computeRsi(closes: number[], period: number): number {
  // No gains and no losses anywhere: RSI is undefined
  if (closes.every((c) => c === closes[0])) {
    return NEUTRAL_RSI;
  }
  return finiteOr(lastOf(TI.RSI.calculate({ values: closes, period })), NEUTRAL_RSI);
}

function computeVolumeRatio(volumes: number[], period: number): number {
  if (volumes.length < 2) {
    return 1;
  }
  const previous = volumes.slice(-(period + 1), -1);
  const average = previous.reduce((sum, v) => sum + v, 0) / previous.length;
  const current = volumes[volumes.length - 1];
  if (!(average > 0) || !Number.isFinite(current)) {
    return 1;
  }
  return current / average;
}

/**
 * Pure indicator computation over the whole series, newest candle last.
 * Throws InsufficientHistory below the longest lookback.
 */
export function computeIndicators(series: CandleSeries, params: IndicatorParams): IndicatorBundle {
  const required = requiredHistory(params);
  const { candles } = series;
  if (candles.length < required) {
    throw new InsufficientHistory(series.instrument, required, candles.length);
  }

  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);
  const volumes = candles.map((c) => c.volume);
  const price = closes[closes.length - 1];

  const rsi = computeRsi(closes, params.rsiPeriod);

  const macd = lastOf(
    TI.MACD.calculate({
      values: closes,
      fastPeriod: params.macdFastPeriod,
      slowPeriod: params.macdSlowPeriod,
      signalPeriod: params.macdSignalPeriod,
      SimpleMAOscillator: false,
      SimpleMASignal: false,
    })
  );
  const macdLine = finiteOr(macd?.MACD, 0);
  const macdSignal = finiteOr(macd?.signal, 0);

  const band = lastOf(TI.BollingerBands.calculate({ values: closes, period: params.bbPeriod, stdDev: params.bbStdDev }));
  const width = band ? band.upper - band.lower : 0;
  const bollingerPercent =
    band && width > Math.abs(price) * MIN_BAND_WIDTH_RATIO && Number.isFinite(width)
      ? ((price - band.lower) / width) * 100
      : NEUTRAL_BB_PERCENT;

  const atr = finiteOr(lastOf(atrSeries(candles, params.atrPeriod)), price * FALLBACK_ATR_PCT);

  const adx = finiteOr(
    lastOf(TI.ADX.calculate({ high: highs, low: lows, close: closes, period: params.adxPeriod }))?.adx,
    NEUTRAL_ADX
  );

  const stoch = lastOf(
    TI.Stochastic.calculate({
      high: highs,
      low: lows,
      close: closes,
      period: params.stochPeriod,
      signalPeriod: params.stochSignalPeriod,
    })
  );
  const stochasticK = finiteOr(stoch?.k, NEUTRAL_STOCH);
  const stochasticD = finiteOr(stoch?.d, NEUTRAL_STOCH);

  const readings = {
    rsi,
    macdLine,
    macdSignal,
    macdDiff: macdLine - macdSignal,
    adx,
  };

  return Object.freeze({
    version: seriesVersion(series),
    price,
    ...readings,
    bollingerPercent,
    atr,
    stochasticK,
    stochasticD,
    volumeRatio: computeVolumeRatio(volumes, params.volumeAveragePeriod),
    trend: Object.freeze(detectTrend(readings, params)),
    momentum: Object.freeze(computeMomentum(series, params.momentumPeriods, params.momentumDeadBandPct)),
  });
}

/**
 * Caches bundles by series version so repeated evaluations of unchanged data
 * return the identical object.
 */
export class IndicatorEngine {
  private cache: TtlCache<IndicatorBundle>;

  constructor(
    private getConfig: () => EngineConfig,
    private clock: () => number = Date.now
  ) {
    this.cache = new TtlCache<IndicatorBundle>(getConfig().indicatorCacheMaxEntries);
  }

  bundleFor(series: CandleSeries, cfg: EngineConfig = this.getConfig()): IndicatorBundle {
    const version = seriesVersion(series);
    const now = this.clock();

    return this.cache.getOrCompute(
      version,
      () => {
        debug("IndicatorEngine", `Computing indicators for ${version}`);
        return computeIndicators(series, cfg);
      },
      cfg.indicatorCacheTtlSeconds * 1000,
      now
    );
  }

  /**
   * Drop cached bundles and apply a new size bound, after a config change
   */
  reset(cfg: EngineConfig = this.getConfig()): void {
    this.cache.clear();
    this.cache.resize(cfg.indicatorCacheMaxEntries);
  }

  stats() {
    return this.cache.stats();
  }
}
