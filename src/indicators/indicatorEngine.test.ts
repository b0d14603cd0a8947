import { describe, expect, it } from "vitest";
import { makeCandles, makeSeries, testConfig } from "../testing/fixtures.js";
import { InsufficientHistory } from "../utils/errors.js";
import { requiredHistory } from "./history.js";
import { IndicatorEngine, computeIndicators, seriesVersion } from "./indicatorEngine.js";

const cfg = testConfig();

describe("computeIndicators", () => {
  it("needs the longest indicator lookback", () => {
    expect(requiredHistory(cfg)).toBe(35);

    try {
      computeIndicators(makeSeries(makeCandles(34)), cfg);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientHistory);
      if (err instanceof InsufficientHistory) {
        expect(err.required).toBe(35);
        expect(err.actual).toBe(34);
        expect(err.stage).toBe("indicators");
      }
    }
  });

  it("computes neutral readings on a flat series", () => {
    const bundle = computeIndicators(makeSeries(makeCandles(60)), cfg);

    expect(bundle.price).toBe(1.1);
    expect(bundle.rsi).toBe(50);
    expect(bundle.bollingerPercent).toBe(50);
    expect(bundle.macdDiff).toBeCloseTo(0, 12);
    expect(bundle.stochasticK).toBeCloseTo(50, 6);
    expect(bundle.atr).toBeCloseTo(0.002, 9);
    expect(bundle.volumeRatio).toBe(1);
    expect(bundle.trend.direction).toBe("RANGING");
    expect(bundle.momentum.direction).toBe("NEUTRAL");
  });

  it("reads a steady climb as an uptrend", () => {
    const bundle = computeIndicators(makeSeries(makeCandles(100, { drift: 0.0002 })), cfg);

    expect(bundle.rsi).toBeGreaterThan(70);
    expect(bundle.adx).toBeGreaterThan(cfg.adxTrendThreshold);
    expect(bundle.trend.direction).toBe("UP");
    expect(bundle.momentum.direction).toBe("UP");
    expect(bundle.bollingerPercent).toBeGreaterThan(50);
  });

  it("keeps the smoothed RSI when only the latest closes are flat", () => {
    const rising = makeCandles(40, { drift: 0.0002 });
    const last = rising[rising.length - 1];
    const flat = makeCandles(20, { start: last.timestamp + 60_000, base: last.close });

    const bundle = computeIndicators(makeSeries([...rising, ...flat]), cfg);

    expect(bundle.rsi).toBeGreaterThan(70);
  });

  it("keeps oscillators inside their ranges", () => {
    const bundle = computeIndicators(makeSeries(makeCandles(120, { wave: 0.003, drift: -0.00005 })), cfg);

    for (const value of [bundle.rsi, bundle.stochasticK, bundle.stochasticD, bundle.adx]) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
    expect(bundle.atr).toBeGreaterThan(0);
  });

  it("compares the last volume with the trailing average", () => {
    const candles = makeCandles(60);
    candles[59] = { ...candles[59], volume: 300 };

    expect(computeIndicators(makeSeries(candles), cfg).volumeRatio).toBe(3);
  });

  it("treats missing volume as neutral", () => {
    const bundle = computeIndicators(makeSeries(makeCandles(60, { volume: 0 })), cfg);

    expect(bundle.volumeRatio).toBe(1);
  });

  it("is deterministic", () => {
    const series = makeSeries(makeCandles(80, { wave: 0.002 }));

    expect(computeIndicators(series, cfg)).toEqual(computeIndicators(series, cfg));
  });
});

describe("IndicatorEngine", () => {
  it("returns the identical bundle for an unchanged series", () => {
    const now = 1_000;
    const engine = new IndicatorEngine(() => cfg, () => now);
    const series = makeSeries(makeCandles(60));

    const first = engine.bundleFor(series);
    const second = engine.bundleFor(makeSeries([...series.candles]));

    expect(second).toBe(first);
    expect(first.version).toBe(seriesVersion(series));
    expect(engine.stats().hits).toBe(1);
  });

  it("keeps bundles from different sources apart", () => {
    const engine = new IndicatorEngine(() => cfg, () => 0);
    const candles = makeCandles(60);

    const primary = engine.bundleFor(makeSeries(candles));
    const fallback = engine.bundleFor(makeSeries(candles, { source: "binance" }));

    expect(fallback).not.toBe(primary);
    expect(fallback.version).toBe(`EURUSD:1min:binance:${candles[59].timestamp}:60`);
  });

  it("recomputes for a new candle and after the TTL", () => {
    let now = 1_000;
    const engine = new IndicatorEngine(() => cfg, () => now);
    const candles = makeCandles(61);
    const series = makeSeries(candles.slice(0, 60));

    const first = engine.bundleFor(series);
    expect(engine.bundleFor(makeSeries(candles))).not.toBe(first);

    now += 30_000;
    const refreshed = engine.bundleFor(series);
    expect(refreshed).not.toBe(first);
    expect(refreshed).toEqual(first);
  });

  it("drops cached bundles on reset", () => {
    const engine = new IndicatorEngine(() => cfg, () => 0);
    const series = makeSeries(makeCandles(60));

    const first = engine.bundleFor(series);
    engine.reset();

    expect(engine.bundleFor(series)).not.toBe(first);
  });
});
