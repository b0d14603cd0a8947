import { parseEngineConfig, type EngineConfig } from "../config/engineConfig.js";
import type { IndicatorBundle } from "../indicators/types.js";
import type { Candle, CandleSeries } from "../ingestion/types.js";

/** Wednesday 2024-01-10 12:00 UTC, inside FX trading hours */
export const WEDNESDAY_NOON = Date.UTC(2024, 0, 10, 12, 0, 0);

export interface CandleShape {
  start?: number;
  stepMs?: number;
  base?: number;
  /** Close change per candle */
  drift?: number;
  /** Amplitude of the sine wiggle on top of the drift */
  wave?: number;
  /** Full high-low range */
  range?: number;
  volume?: number;
}

/**
 * Deterministic synthetic candles, oldest first
 */
export function makeCandles(count: number, shape: CandleShape = {}): Candle[] {
  const {
    start = WEDNESDAY_NOON - count * 60_000,
    stepMs = 60_000,
    base = 1.1,
    drift = 0,
    wave = 0,
    range = 0.002,
    volume = 100,
  } = shape;

  const candles: Candle[] = [];
  let previous = base;
  for (let i = 0; i < count; i++) {
    const close = base + drift * i + wave * Math.sin(i / 3);
    candles.push({
      timestamp: start + i * stepMs,
      open: previous,
      high: Math.max(previous, close) + range / 2,
      low: Math.min(previous, close) - range / 2,
      close,
      volume,
    });
    previous = close;
  }
  return candles;
}

export function makeSeries(candles: readonly Candle[], overrides: Partial<CandleSeries> = {}): CandleSeries {
  return {
    instrument: "EURUSD",
    interval: "1min",
    source: "twelvedata",
    fetchedAt: WEDNESDAY_NOON,
    candles,
    ...overrides,
  };
}

export function testConfig(overrides: Record<string, unknown> = {}): EngineConfig {
  return parseEngineConfig({ retryBackoffMs: 0, sourceTimeoutMs: 200, ...overrides });
}

/**
 * Hand-set indicator readings for the scoring and decision stages
 */
export function makeBundle(overrides: Partial<IndicatorBundle> = {}): IndicatorBundle {
  return {
    version: "EURUSD:1min:twelvedata:test:100",
    price: 1.1,
    rsi: 50,
    macdLine: 0,
    macdSignal: 0,
    macdDiff: 0,
    bollingerPercent: 50,
    atr: 0.0005,
    adx: 20,
    stochasticK: 50,
    stochasticD: 50,
    volumeRatio: 1,
    trend: { direction: "RANGING", strength: 0, adx: 20 },
    momentum: { changePct: 0, direction: "NEUTRAL", strength: 0 },
    ...overrides,
  };
}
