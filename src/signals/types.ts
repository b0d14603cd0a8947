import type { IndicatorBundle } from "../indicators/types.js";
import type { ScoreResult } from "./scoring.js";

export type SignalAction = "BUY" | "SELL" | "NO_SIGNAL";

export interface Signal {
  readonly instrument: string;
  readonly action: SignalAction;
  readonly price: number;
  readonly score: number;
  readonly confidence: number;
  /** null for NO_SIGNAL */
  readonly stopLoss: number | null;
  readonly takeProfit: number | null;
  /** epoch ms */
  readonly timestamp: number;
  readonly reasons: readonly string[];
}

/**
 * Result of one evaluation cycle, handed to sinks and the cycle journal
 */
export type EvaluationOutcome =
  | { kind: "emitted"; signal: Signal; score: ScoreResult; indicators: IndicatorBundle; source: string }
  | { kind: "no_signal"; signal: Signal; score: ScoreResult; indicators: IndicatorBundle; source: string }
  | { kind: "rate_limited"; signal: Signal; score: ScoreResult; indicators: IndicatorBundle; source: string }
  | { kind: "skipped"; instrument: string; reason: string; stage: string; timestamp: number };

export type OutcomeKind = EvaluationOutcome["kind"];
