export type TrendDirection = "UP" | "DOWN" | "RANGING";
export type MomentumDirection = "UP" | "DOWN" | "NEUTRAL";

export interface TrendState {
  readonly direction: TrendDirection;
  /** 0-100, zero when ranging */
  readonly strength: number;
  readonly adx: number;
}

export interface MomentumState {
  /** Percent change over the lookback, e.g. 0.05 = 0.05% */
  readonly changePct: number;
  readonly direction: MomentumDirection;
  readonly strength: number;
}

/**
 * Latest indicator readings for one series version
 */
export interface IndicatorBundle {
  /** instrument:interval:lastTimestamp:length */
  readonly version: string;
  readonly price: number;
  readonly rsi: number;
  readonly macdLine: number;
  readonly macdSignal: number;
  readonly macdDiff: number;
  /** Position inside the Bollinger band, 0 = lower, 100 = upper */
  readonly bollingerPercent: number;
  readonly atr: number;
  readonly adx: number;
  readonly stochasticK: number;
  readonly stochasticD: number;
  readonly volumeRatio: number;
  readonly trend: TrendState;
  readonly momentum: MomentumState;
}
