import type { EngineConfig } from "../config/engineConfig.js";
import type { CandleSeries } from "../ingestion/types.js";
import type { IndicatorBundle, MomentumState, TrendState } from "../indicators/types.js";

export type TrendParams = Pick<
  EngineConfig,
  "adxTrendThreshold" | "adxStrengthCeiling" | "macdDeadBand" | "rsiTrendOffset"
>;

/**
 * ADX gates whether there is a trend at all; MACD picks the side, with RSI
 * as the tie-breaker while MACD sits inside its dead-band.
 */
export function detectTrend(
  indicators: Pick<IndicatorBundle, "adx" | "macdDiff" | "rsi">,
  params: TrendParams
): TrendState {
  const { adx, macdDiff, rsi } = indicators;
  const ranging: TrendState = { direction: "RANGING", strength: 0, adx };

  if (!(adx >= params.adxTrendThreshold)) {
    return ranging;
  }

  let direction: TrendState["direction"] = "RANGING";
  if (macdDiff > params.macdDeadBand) {
    direction = "UP";
  } else if (macdDiff < -params.macdDeadBand) {
    direction = "DOWN";
  } else if (rsi > 50 + params.rsiTrendOffset) {
    direction = "UP";
  } else if (rsi < 50 - params.rsiTrendOffset) {
    direction = "DOWN";
  }

  if (direction === "RANGING") {
    return ranging;
  }

  return {
    direction,
    strength: Math.min(100, (adx / params.adxStrengthCeiling) * 100),
    adx,
  };
}

/**
 * Percent change of the close over the last N candles
 */
export function computeMomentum(
  series: Pick<CandleSeries, "candles">,
  lookbackPeriods = 3,
  deadBandPct = 0.01
): MomentumState {
  const { candles } = series;
  const neutral: MomentumState = { changePct: 0, direction: "NEUTRAL", strength: 0 };

  if (lookbackPeriods < 1 || candles.length < lookbackPeriods + 1) {
    return neutral;
  }

  const last = candles[candles.length - 1].close;
  const base = candles[candles.length - 1 - lookbackPeriods].close;
  if (!Number.isFinite(base) || base === 0 || !Number.isFinite(last)) {
    return neutral;
  }

  const changePct = ((last - base) / base) * 100;
  const direction = changePct > deadBandPct ? "UP" : changePct < -deadBandPct ? "DOWN" : "NEUTRAL";

  return {
    changePct,
    direction,
    strength: Math.min(100, Math.abs(changePct) * 100),
  };
}
