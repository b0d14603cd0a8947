import type { EngineConfig } from "../config/engineConfig.js";
import { isMarketOpen } from "../assets/assetClassifier.js";
import type { IndicatorBundle } from "../indicators/types.js";
import type { ScoreResult } from "./scoring.js";
import type { Signal, SignalAction } from "./types.js";

export type DecisionParams = Pick<
  EngineConfig,
  | "minBuyThreshold"
  | "maxSellThreshold"
  | "minConfidence"
  | "requireMomentumAlignment"
  | "atrStopMultiplier"
  | "rewardRiskRatio"
  | "stopLossPctFallback"
  | "tradingHoursEnabled"
  | "tradingStartHour"
  | "tradingEndHour"
  | "enforceMarketOpen"
  | "adaptiveThresholdsEnabled"
  | "highVolatilityPct"
  | "lowVolatilityPct"
  | "highVolatilityBuyThreshold"
  | "highVolatilitySellThreshold"
  | "normalVolatilityBuyThreshold"
  | "normalVolatilitySellThreshold"
  | "lowVolatilityBuyThreshold"
  | "lowVolatilitySellThreshold"
>;

export type VolatilityBand = "HIGH" | "NORMAL" | "LOW";

export interface DecisionThresholds {
  band: VolatilityBand | null;
  volatilityPct: number;
  minBuy: number;
  maxSell: number;
}

export interface DecisionContext {
  instrument: string;
  now: number;
}

/**
 * UTC trading window. start > end wraps past midnight; start == end is all day.
 */
export function withinTradingHours(now: Date, startHour: number, endHour: number): boolean {
  const start = startHour % 24;
  const end = endHour % 24;
  if (start === end) {
    return true;
  }
  const hour = now.getUTCHours();
  return start < end ? hour >= start && hour < end : hour >= start || hour < end;
}

/**
 * Reason the market filter blocks trading right now, or null
 */
export function marketVeto(params: DecisionParams, context: DecisionContext): string | null {
  const now = new Date(context.now);
  if (params.tradingHoursEnabled && !withinTradingHours(now, params.tradingStartHour, params.tradingEndHour)) {
    return `Outside trading hours (${params.tradingStartHour}:00-${params.tradingEndHour}:00 UTC)`;
  }
  if (params.enforceMarketOpen && !isMarketOpen(context.instrument, now)) {
    return `Market closed for ${context.instrument}`;
  }
  return null;
}

/**
 * Thresholds for this bar. Volatile markets demand a stronger score; the band
 * can only tighten the configured thresholds, never loosen them.
 */
export function decisionThresholds(
  price: number,
  atr: number,
  params: DecisionParams
): DecisionThresholds {
  const volatilityPct = price > 0 ? (atr / price) * 100 : Number.NaN;
  if (!params.adaptiveThresholdsEnabled) {
    return { band: null, volatilityPct, minBuy: params.minBuyThreshold, maxSell: params.maxSellThreshold };
  }

  // NaN falls through to NORMAL
  const band: VolatilityBand =
    volatilityPct > params.highVolatilityPct ? "HIGH" : volatilityPct < params.lowVolatilityPct ? "LOW" : "NORMAL";
  const [bandBuy, bandSell] =
    band === "HIGH"
      ? [params.highVolatilityBuyThreshold, params.highVolatilitySellThreshold]
      : band === "LOW"
        ? [params.lowVolatilityBuyThreshold, params.lowVolatilitySellThreshold]
        : [params.normalVolatilityBuyThreshold, params.normalVolatilitySellThreshold];

  return {
    band,
    volatilityPct,
    minBuy: Math.max(params.minBuyThreshold, bandBuy),
    maxSell: Math.min(params.maxSellThreshold, bandSell),
  };
}

function bandReason(thresholds: DecisionThresholds): string | null {
  if (thresholds.band === null) {
    return null;
  }
  const label = thresholds.band === "HIGH" ? "High" : thresholds.band === "LOW" ? "Low" : "Normal";
  const pct = Number.isFinite(thresholds.volatilityPct) ? `${thresholds.volatilityPct.toFixed(3)}%` : "n/a";
  return `${label} volatility (ATR ${pct} of price)`;
}

export function riskLevels(
  action: "BUY" | "SELL",
  price: number,
  atr: number,
  params: Pick<DecisionParams, "atrStopMultiplier" | "rewardRiskRatio" | "stopLossPctFallback">
): { stopLoss: number; takeProfit: number } {
  const stopDistance = atr > 0 ? atr * params.atrStopMultiplier : price * params.stopLossPctFallback;
  const sign = action === "BUY" ? 1 : -1;
  return {
    stopLoss: price - sign * stopDistance,
    takeProfit: price + sign * stopDistance * params.rewardRiskRatio,
  };
}

/**
 * Turn a score into a terminal signal. Anything between the thresholds is
 * NO_SIGNAL.
 */
export function decide(
  result: ScoreResult,
  indicators: Pick<IndicatorBundle, "price" | "atr" | "momentum">,
  params: DecisionParams,
  context: DecisionContext
): Signal {
  const { finalScore, confidence } = result;
  const reasons = [...result.reasons];
  let action: SignalAction = "NO_SIGNAL";

  const veto = marketVeto(params, context);
  const momentum = indicators.momentum.direction;
  const thresholds = decisionThresholds(indicators.price, indicators.atr, params);
  const { minBuy, maxSell } = thresholds;

  if (veto) {
    reasons.push(veto);
  } else {
    const band = bandReason(thresholds);
    if (band) {
      reasons.push(band);
    }

    if (finalScore >= minBuy) {
      if (confidence < params.minConfidence) {
        reasons.push(`Confidence ${confidence.toFixed(0)} below ${params.minConfidence}`);
      } else if (params.requireMomentumAlignment && momentum === "DOWN") {
        reasons.push("BUY blocked by downward momentum");
      } else {
        action = "BUY";
      }
    } else if (finalScore <= maxSell) {
      if (confidence < params.minConfidence) {
        reasons.push(`Confidence ${confidence.toFixed(0)} below ${params.minConfidence}`);
      } else if (params.requireMomentumAlignment && momentum === "UP") {
        reasons.push("SELL blocked by upward momentum");
      } else {
        action = "SELL";
      }
    } else {
      reasons.push(`Score ${finalScore.toFixed(1)} between ${maxSell} and ${minBuy}`);
    }
  }

  const levels = action === "NO_SIGNAL" ? null : riskLevels(action, indicators.price, indicators.atr, params);

  return Object.freeze({
    instrument: context.instrument,
    action,
    price: indicators.price,
    score: finalScore,
    confidence,
    stopLoss: levels ? levels.stopLoss : null,
    takeProfit: levels ? levels.takeProfit : null,
    timestamp: context.now,
    reasons: Object.freeze(reasons),
  });
}
