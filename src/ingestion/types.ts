import type { CandleInterval, SourceName } from "../config/engineConfig.js";

export interface Candle {
  /** Candle open time, epoch ms */
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Immutable snapshot of recent history. Timestamps strictly increase and the
 * newest candle is last. Replaced wholesale on every fetch.
 */
export interface CandleSeries {
  readonly instrument: string;
  readonly interval: CandleInterval;
  readonly source: SourceName;
  readonly fetchedAt: number;
  readonly candles: readonly Candle[];
}

export interface FetchRequest {
  instrument: string;
  interval: CandleInterval;
  outputSize: number;
}

export interface SourceAdapter {
  readonly name: SourceName;
  /** Calls per trailing hour before the source is demoted in ranking */
  readonly hourlyQuota?: number;
  /**
   * Raw candles, chronological or not. Throws SourceUnavailable.
   */
  fetchCandles(request: FetchRequest, signal: AbortSignal): Promise<Candle[]>;
}
