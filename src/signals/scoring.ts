import type { EngineConfig } from "../config/engineConfig.js";
import type { IndicatorBundle, MomentumState, TrendState } from "../indicators/types.js";

/**
 * Scoring & Confirmation Engine
 *
 * Counts independent confirmations per side, gates them by trend, maps the
 * count onto a score tier and derives a confidence for the decision stage.
 */

export type Side = "BUY" | "SELL";
export type ScoreTier = "strong" | "moderate" | "neutral";

export interface ScoreResult {
  readonly taScore: number;
  readonly tier: ScoreTier;
  /** Side with more trend-eligible confirmations, null on a tie */
  readonly candidate: Side | null;
  /** Side of the final score relative to 50 */
  readonly direction: Side | null;
  readonly confirmations: number;
  readonly advisoryScore?: number;
  readonly finalScore: number;
  readonly confidence: number;
  readonly momentumPenaltyApplied: boolean;
  readonly volumeBonus: number;
  readonly reasons: readonly string[];
}

export type ScoringParams = Pick<
  EngineConfig,
  | "rsiOversold"
  | "rsiOverbought"
  | "macdStrongThreshold"
  | "bbOversold"
  | "bbOverbought"
  | "stochOversold"
  | "stochOverbought"
  | "adxTrendThreshold"
  | "strongTierConfirmations"
  | "moderateTierConfirmations"
  | "rangingExtraConfirmations"
  | "strongTierScore"
  | "moderateTierScore"
  | "momentumPenaltyScore"
  | "volumeBonusMax"
  | "advisoryWeight"
  | "taWeight"
  | "confidenceBase"
  | "confidenceConvergenceSpan"
  | "trendAlignmentBonus"
  | "momentumAlignmentBonus"
  | "momentumPenaltyConfidence"
>;

/** Number of confirmation predicates per side */
export const CONFIRMATION_COUNT = 6;

type Readings = Pick<IndicatorBundle, "rsi" | "macdDiff" | "bollingerPercent" | "stochasticK" | "adx" | "volumeRatio">;

interface Confirmation {
  passed: boolean;
  reason: string;
}

const clamp = (value: number, min = 0, max = 100) => Math.min(max, Math.max(min, value));

function buyConfirmations(ind: Readings, momentum: MomentumState, p: ScoringParams): Confirmation[] {
  return [
    { passed: ind.rsi < p.rsiOversold, reason: `RSI oversold (${ind.rsi.toFixed(1)})` },
    { passed: ind.macdDiff > p.macdStrongThreshold, reason: `MACD bullish (${ind.macdDiff.toFixed(5)})` },
    { passed: ind.bollingerPercent < p.bbOversold, reason: `Price near lower band (${ind.bollingerPercent.toFixed(0)}%)` },
    { passed: ind.stochasticK < p.stochOversold, reason: `Stochastic oversold (${ind.stochasticK.toFixed(1)})` },
    { passed: momentum.direction === "UP", reason: `Upward momentum (${momentum.changePct.toFixed(3)}%)` },
    { passed: ind.adx > p.adxTrendThreshold, reason: `Strong trend (ADX ${ind.adx.toFixed(1)})` },
  ];
}

function sellConfirmations(ind: Readings, momentum: MomentumState, p: ScoringParams): Confirmation[] {
  return [
    { passed: ind.rsi > p.rsiOverbought, reason: `RSI overbought (${ind.rsi.toFixed(1)})` },
    { passed: ind.macdDiff < -p.macdStrongThreshold, reason: `MACD bearish (${ind.macdDiff.toFixed(5)})` },
    { passed: ind.bollingerPercent > p.bbOverbought, reason: `Price near upper band (${ind.bollingerPercent.toFixed(0)}%)` },
    { passed: ind.stochasticK > p.stochOverbought, reason: `Stochastic overbought (${ind.stochasticK.toFixed(1)})` },
    { passed: momentum.direction === "DOWN", reason: `Downward momentum (${momentum.changePct.toFixed(3)}%)` },
    { passed: ind.adx > p.adxTrendThreshold, reason: `Strong trend (ADX ${ind.adx.toFixed(1)})` },
  ];
}

export function volumeBonusFor(volumeRatio: number, cap: number): number {
  let bonus = 0;
  if (volumeRatio > 2) bonus = 10;
  else if (volumeRatio > 1.5) bonus = 7;
  else if (volumeRatio > 1.2) bonus = 4;
  else if (volumeRatio > 1.0) bonus = 2;
  return Math.min(bonus, cap);
}

function opposes(side: Side, momentum: MomentumState): boolean {
  return (side === "BUY" && momentum.direction === "DOWN") || (side === "SELL" && momentum.direction === "UP");
}

function aligns(side: Side, momentum: MomentumState): boolean {
  return (side === "BUY" && momentum.direction === "UP") || (side === "SELL" && momentum.direction === "DOWN");
}

export function score(
  indicators: Readings,
  trend: TrendState,
  momentum: MomentumState,
  params: ScoringParams,
  advisoryScore?: number
): ScoreResult {
  const buy = buyConfirmations(indicators, momentum, params).filter((c) => c.passed);
  const sell = sellConfirmations(indicators, momentum, params).filter((c) => c.passed);

  // Trend gate
  const eligibleBuy: Confirmation[] = trend.direction === "DOWN" ? [] : buy;
  const eligibleSell: Confirmation[] = trend.direction === "UP" ? [] : sell;
  const extra = trend.direction === "RANGING" ? params.rangingExtraConfirmations : 0;

  const candidate: Side | null =
    eligibleBuy.length > eligibleSell.length ? "BUY" : eligibleSell.length > eligibleBuy.length ? "SELL" : null;
  const supporting: Confirmation[] = candidate === "BUY" ? eligibleBuy : candidate === "SELL" ? eligibleSell : [];
  const count = supporting.length;

  let tier: ScoreTier = "neutral";
  if (candidate && count >= params.strongTierConfirmations + extra) {
    tier = "strong";
  } else if (candidate && count >= params.moderateTierConfirmations + extra) {
    tier = "moderate";
  }

  let taScore = 50;
  let momentumPenaltyApplied = false;
  let volumeBonus = 0;
  const reasons = supporting.map((c) => c.reason);

  if (candidate && tier !== "neutral") {
    const magnitude = (tier === "strong" ? params.strongTierScore : params.moderateTierScore) - 50;
    const sign = candidate === "BUY" ? 1 : -1;
    let distance = magnitude;

    if (opposes(candidate, momentum)) {
      distance = Math.max(0, distance - params.momentumPenaltyScore);
      momentumPenaltyApplied = true;
      reasons.push("Momentum against the setup");
    }

    volumeBonus = volumeBonusFor(indicators.volumeRatio, params.volumeBonusMax);
    if (volumeBonus > 0) {
      reasons.push(`Volume ${indicators.volumeRatio.toFixed(2)}x average`);
    }

    taScore = clamp(50 + sign * (distance + volumeBonus));
  }

  const advisory = advisoryScore !== undefined && Number.isFinite(advisoryScore) ? clamp(advisoryScore) : undefined;
  const finalScore =
    advisory !== undefined ? clamp(params.advisoryWeight * advisory + params.taWeight * taScore) : taScore;

  const direction: Side | null = finalScore > 50 ? "BUY" : finalScore < 50 ? "SELL" : null;

  let confidence = 0;
  let confirmations = count;
  if (direction) {
    confirmations = direction === "BUY" ? eligibleBuy.length : eligibleSell.length;
    confidence = params.confidenceBase + (confirmations / CONFIRMATION_COUNT) * params.confidenceConvergenceSpan;

    const withTrend = (direction === "BUY" && trend.direction === "UP") || (direction === "SELL" && trend.direction === "DOWN");
    const againstTrend = (direction === "BUY" && trend.direction === "DOWN") || (direction === "SELL" && trend.direction === "UP");
    if (withTrend) confidence += params.trendAlignmentBonus;
    if (againstTrend) confidence -= params.trendAlignmentBonus;

    if (aligns(direction, momentum)) confidence += params.momentumAlignmentBonus;
    if (opposes(direction, momentum)) confidence -= params.momentumPenaltyConfidence;

    confidence = clamp(confidence);
  }

  return Object.freeze({
    taScore,
    tier,
    candidate,
    direction,
    confirmations,
    ...(advisory !== undefined ? { advisoryScore: advisory } : {}),
    finalScore,
    confidence,
    momentumPenaltyApplied,
    volumeBonus,
    reasons: Object.freeze(reasons),
  });
}
