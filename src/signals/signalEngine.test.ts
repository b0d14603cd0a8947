import { describe, expect, it, vi } from "vitest";
import { ConfigStore } from "../config/engineConfig.js";
import { IndicatorEngine } from "../indicators/indicatorEngine.js";
import type { IndicatorBundle } from "../indicators/types.js";
import { DataAcquisition } from "../ingestion/dataAcquisition.js";
import type { Candle, SourceAdapter } from "../ingestion/types.js";
import { makeBundle, makeCandles, testConfig, WEDNESDAY_NOON } from "../testing/fixtures.js";
import { SourceUnavailable } from "../utils/errors.js";
import { EngineMetrics } from "../utils/metrics.js";
import type { AdvisoryClient, AdvisoryOpinion } from "./advisory.js";
import { PacingController } from "./pacing.js";
import { SignalEngine, type SignalSink } from "./signalEngine.js";
import type { EvaluationOutcome } from "./types.js";

class FixedIndicators extends IndicatorEngine {
  constructor(private readonly bundle: IndicatorBundle) {
    super(() => testConfig());
  }

  override bundleFor(): IndicatorBundle {
    return this.bundle;
  }
}

const strongBuy = makeBundle({
  price: 1.1,
  atr: 0.0005,
  rsi: 28,
  macdDiff: 0.00015,
  bollingerPercent: 45,
  adx: 30,
  trend: { direction: "UP", strength: 60, adx: 30 },
  momentum: { changePct: 0.05, direction: "UP", strength: 5 },
});

const counterTrend = makeBundle({
  rsi: 38,
  macdDiff: 0.00005,
  adx: 80,
  trend: { direction: "UP", strength: 100, adx: 80 },
  momentum: { changePct: -0.05, direction: "DOWN", strength: 5 },
});

function source(behaviour: () => Promise<Candle[]>): SourceAdapter {
  return { name: "twelvedata", fetchCandles: () => behaviour() };
}

interface EngineSetup {
  bundle?: IndicatorBundle;
  adapter?: SourceAdapter;
  advisory?: AdvisoryClient;
  config?: Record<string, unknown>;
  sinks?: SignalSink[];
}

function setup(options: EngineSetup = {}) {
  const config = new ConfigStore(testConfig({ sourceOrder: "twelvedata", maxFetchAttempts: 1, ...options.config }));
  const metrics = new EngineMetrics(WEDNESDAY_NOON);
  const clock = () => WEDNESDAY_NOON;
  const current = () => config.current();
  const outcomes: EvaluationOutcome[] = [];

  const engine = new SignalEngine({
    config,
    acquisition: new DataAcquisition(current, {
      adapters: [options.adapter ?? source(async () => makeCandles(60))],
      metrics,
      clock,
    }),
    indicators: options.bundle ? new FixedIndicators(options.bundle) : new IndicatorEngine(current, clock),
    pacing: new PacingController(() => config.current().maxSignalsPerHour),
    advisory: options.advisory,
    metrics,
    clock,
    sinks: [
      async (outcome) => {
        outcomes.push(outcome);
      },
      ...(options.sinks ?? []),
    ],
  });

  return { engine, metrics, outcomes, config };
}

function advisor(reply: () => Promise<AdvisoryOpinion>) {
  const scoreMarket = vi.fn(async (_snapshot: unknown, _signal: AbortSignal) => reply());
  const client: AdvisoryClient = { name: "fake", scoreMarket };
  return { client, scoreMarket };
}

describe("SignalEngine", () => {
  it("emits a BUY when four confirmations line up with the trend", async () => {
    const { engine, metrics, outcomes } = setup({ bundle: strongBuy });

    const outcome = await engine.evaluate();

    expect(outcome.kind).toBe("emitted");
    if (outcome.kind !== "emitted") return;
    expect(outcome.signal.action).toBe("BUY");
    expect(outcome.signal.score).toBe(70);
    expect(outcome.signal.confidence).toBeCloseTo(85, 10);
    expect(outcome.signal.stopLoss).toBeCloseTo(1.099, 10);
    expect(outcome.signal.takeProfit).toBeCloseTo(1.1018, 10);
    expect(outcome.source).toBe("twelvedata");
    expect(outcomes).toEqual([outcome]);
    expect(metrics.snapshot(WEDNESDAY_NOON).signals).toEqual({ emitted: 1, rateLimited: 0, lastEmittedAt: WEDNESDAY_NOON });
  });

  it("gives NO_SIGNAL when the only confirmations run against the trend", async () => {
    const { engine } = setup({ bundle: counterTrend });

    const outcome = await engine.evaluate();

    expect(outcome.kind).toBe("no_signal");
    if (outcome.kind !== "no_signal") return;
    expect(outcome.signal.action).toBe("NO_SIGNAL");
    expect(outcome.signal.score).toBe(50);
    expect(outcome.signal.reasons).toEqual([
      "Strong trend (ADX 80.0)",
      "Low volatility (ATR 0.045% of price)",
      "Score 50.0 between 40 and 60",
    ]);
  });

  it("skips the cycle when every source fails", async () => {
    const { engine, outcomes, metrics } = setup({
      adapter: source(async () => {
        throw new SourceUnavailable("twelvedata", "http", "HTTP 503");
      }),
    });

    const outcome = await engine.evaluate();

    expect(outcome).toEqual({
      kind: "skipped",
      instrument: "EURUSD",
      reason: "No data for EURUSD after 1 attempt(s) (twelvedata=http)",
      stage: "acquisition",
      timestamp: WEDNESDAY_NOON,
    });
    expect(outcomes).toEqual([outcome]);
    expect(metrics.snapshot(WEDNESDAY_NOON).cycles).toEqual({ total: 1, skipped: 1 });
  });

  it("skips the cycle on too little history", async () => {
    const { engine } = setup({ adapter: source(async () => makeCandles(20)) });

    const outcome = await engine.evaluate();

    expect(outcome).toMatchObject({ kind: "skipped", stage: "indicators", reason: "Need 35 candles for EURUSD, have 20" });
  });

  it("runs the whole pipeline on fetched candles", async () => {
    const { engine } = setup();

    const outcome = await engine.evaluate("EURUSD");

    expect(outcome.kind).toBe("no_signal");
    if (outcome.kind !== "no_signal") return;
    expect(outcome.indicators.rsi).toBe(50);
    expect(outcome.score.taScore).toBe(50);
  });

  it("drops signals over the hourly budget", async () => {
    const { engine, metrics } = setup({ bundle: strongBuy, config: { maxSignalsPerHour: 1 } });

    expect((await engine.evaluate()).kind).toBe("emitted");
    expect((await engine.evaluate()).kind).toBe("rate_limited");
    expect(metrics.snapshot(WEDNESDAY_NOON).signals.rateLimited).toBe(1);
  });

  it("keeps delivering when a sink fails", async () => {
    const after = vi.fn(async (_outcome: EvaluationOutcome) => undefined);
    const { engine, outcomes } = setup({
      bundle: strongBuy,
      sinks: [
        () => {
          throw new Error("telegram down");
        },
        after,
      ],
    });

    const outcome = await engine.evaluate();

    expect(outcome.kind).toBe("emitted");
    expect(outcomes).toHaveLength(1);
    expect(after).toHaveBeenCalledWith(outcome);
  });

  it("blends the advisory score", async () => {
    const { client, scoreMarket } = advisor(async () => ({ score: 90, rationale: "breakout" }));
    const { engine } = setup({ bundle: strongBuy, advisory: client });

    const outcome = await engine.evaluate();

    expect(scoreMarket).toHaveBeenCalledOnce();
    expect(outcome.kind).toBe("emitted");
    if (outcome.kind !== "emitted") return;
    expect(outcome.score.advisoryScore).toBe(90);
    expect(outcome.signal.score).toBeCloseTo(77, 10);
  });

  it("falls back to TA alone when the advisor times out", async () => {
    const { client } = advisor(() => new Promise<AdvisoryOpinion>(() => undefined));
    const { engine, metrics } = setup({ bundle: strongBuy, advisory: client, config: { advisoryTimeoutMs: 20 } });

    const outcome = await engine.evaluate();

    expect(outcome.kind).toBe("emitted");
    if (outcome.kind !== "emitted") return;
    expect(outcome.score.advisoryScore).toBeUndefined();
    expect(outcome.signal.score).toBe(70);
    expect(metrics.snapshot(WEDNESDAY_NOON).advisory).toEqual({ calls: 1, failures: 1 });
  });

  it("does not consult a disabled advisor", async () => {
    const { client, scoreMarket } = advisor(async () => ({ score: 90, rationale: "" }));
    const { engine } = setup({ bundle: strongBuy, advisory: client, config: { advisoryEnabled: false } });

    await engine.evaluate();

    expect(scoreMarket).not.toHaveBeenCalled();
  });

  it("reads the config snapshot at the start of each cycle", async () => {
    const { engine, config } = setup({ bundle: strongBuy });

    config.update({ minConfidence: 90 });
    const outcome = await engine.evaluate();

    expect(outcome.kind).toBe("no_signal");
    if (outcome.kind !== "no_signal") return;
    expect(outcome.signal.reasons[outcome.signal.reasons.length - 1]).toBe("Confidence 85 below 90");
  });
});
