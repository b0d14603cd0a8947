import type { ConfigStore, EngineConfig } from "../config/engineConfig.js";
import type { DataAcquisition } from "../ingestion/dataAcquisition.js";
import type { IndicatorEngine } from "../indicators/indicatorEngine.js";
import type { IndicatorBundle } from "../indicators/types.js";
import type { CandleSeries } from "../ingestion/types.js";
import { AdvisoryTimeout, EngineError, InsufficientHistory, NoDataAvailable, describeError } from "../utils/errors.js";
import { EngineMetrics } from "../utils/metrics.js";
import { debug, info, warn, error as logError, logCycle, logSignal } from "../utils/logger.js";
import { buildAdvisorySnapshot, requestAdvisoryScore, type AdvisoryClient } from "./advisory.js";
import { decide } from "./decision.js";
import type { PacingController } from "./pacing.js";
import { score } from "./scoring.js";
import type { EvaluationOutcome } from "./types.js";

/**
 * Receives every outcome. Failures are logged and never abort the cycle.
 */
export type SignalSink = (outcome: EvaluationOutcome) => Promise<void>;

export interface SignalEngineDeps {
  config: ConfigStore;
  acquisition: DataAcquisition;
  indicators: IndicatorEngine;
  pacing: PacingController;
  advisory?: AdvisoryClient;
  sinks?: SignalSink[];
  metrics?: EngineMetrics;
  clock?: () => number;
}

/**
 * One evaluation cycle: acquire, compute, score, decide, pace, deliver.
 * Never throws; every failure ends as a skipped outcome.
 */
export class SignalEngine {
  private readonly metrics: EngineMetrics;
  private readonly clock: () => number;
  private readonly sinks: SignalSink[];

  constructor(private deps: SignalEngineDeps) {
    this.metrics = deps.metrics ?? new EngineMetrics();
    this.clock = deps.clock ?? Date.now;
    this.sinks = deps.sinks ?? [];
  }

  addSink(sink: SignalSink): void {
    this.sinks.push(sink);
  }

  async evaluate(instrument?: string): Promise<EvaluationOutcome> {
    const cfg = this.deps.config.current();
    const target = instrument ?? cfg.instrument;
    const started = this.clock();

    let outcome: EvaluationOutcome;
    try {
      outcome = await this.runPipeline(target, cfg);
    } catch (err) {
      outcome = this.skipped(target, err);
    }

    this.metrics.recordCycle(outcome.kind, this.clock());
    this.journal(outcome, this.clock() - started);
    await this.deliver(outcome);
    return outcome;
  }

  private async runPipeline(instrument: string, cfg: EngineConfig): Promise<EvaluationOutcome> {
    const series = await this.deps.acquisition.fetch(instrument, cfg.interval, cfg);
    const indicators = this.deps.indicators.bundleFor(series, cfg);
    const advisoryScore = await this.consultAdvisor(series, indicators, cfg);

    const result = score(indicators, indicators.trend, indicators.momentum, cfg, advisoryScore);
    const now = this.clock();
    const signal = decide(result, indicators, cfg, { instrument, now });
    const base = { signal, score: result, indicators, source: series.source };

    if (signal.action === "NO_SIGNAL") {
      debug("SignalEngine", `${instrument}: no signal (score ${result.finalScore.toFixed(1)}, confidence ${result.confidence.toFixed(0)})`);
      return { kind: "no_signal", ...base };
    }

    if (!this.deps.pacing.admit(signal, now)) {
      warn("SignalEngine", `${instrument}: ${signal.action} dropped, hourly signal limit reached`);
      return { kind: "rate_limited", ...base };
    }

    info("SignalEngine", `${instrument}: ${signal.action} @ ${signal.price} (score ${signal.score.toFixed(1)}, confidence ${signal.confidence.toFixed(0)})`);
    logSignal({ ...signal, source: series.source, trend: indicators.trend.direction });
    return { kind: "emitted", ...base };
  }

  /**
   * Advisory score or undefined; never fails the cycle
   */
  private async consultAdvisor(
    series: CandleSeries,
    indicators: IndicatorBundle,
    cfg: EngineConfig
  ): Promise<number | undefined> {
    const advisor = this.deps.advisory;
    if (!advisor || !cfg.advisoryEnabled) {
      return undefined;
    }

    const snapshot = buildAdvisorySnapshot(
      indicators,
      series.instrument,
      series.interval,
      series.candles.map((c) => c.close)
    );

    try {
      const opinion = await requestAdvisoryScore(advisor, snapshot, cfg.advisoryTimeoutMs);
      this.metrics.recordAdvisory(true);
      debug("SignalEngine", `Advisory ${opinion.score} from ${advisor.name}: ${opinion.rationale}`);
      return opinion.score;
    } catch (err) {
      this.metrics.recordAdvisory(false);
      if (err instanceof AdvisoryTimeout) {
        warn("SignalEngine", `Advisory timed out after ${err.timeoutMs}ms, scoring on TA only`);
      } else {
        warn("SignalEngine", `Advisory failed, scoring on TA only: ${describeError(err)}`);
      }
      return undefined;
    }
  }

  private skipped(instrument: string, err: unknown): EvaluationOutcome {
    const timestamp = this.clock();

    if (err instanceof NoDataAvailable || err instanceof InsufficientHistory) {
      warn("SignalEngine", `Skipping cycle for ${instrument}: ${err.message}`);
      return { kind: "skipped", instrument, reason: err.message, stage: err.stage, timestamp };
    }

    if (err instanceof EngineError) {
      logError("SignalEngine", `Cycle failed for ${instrument}`, err.toLogContext());
      return { kind: "skipped", instrument, reason: err.message, stage: err.stage, timestamp };
    }

    logError("SignalEngine", `Unexpected error for ${instrument}`, { instrument, stage: "unknown", cause: describeError(err) });
    return { kind: "skipped", instrument, reason: describeError(err) ?? "unknown error", stage: "unknown", timestamp };
  }

  private journal(outcome: EvaluationOutcome, elapsedMs: number): void {
    if (outcome.kind === "skipped") {
      logCycle({ kind: outcome.kind, instrument: outcome.instrument, stage: outcome.stage, reason: outcome.reason, elapsedMs });
      return;
    }
    logCycle({
      kind: outcome.kind,
      instrument: outcome.signal.instrument,
      action: outcome.signal.action,
      source: outcome.source,
      taScore: outcome.score.taScore,
      advisoryScore: outcome.score.advisoryScore,
      finalScore: outcome.score.finalScore,
      confidence: outcome.score.confidence,
      confirmations: outcome.score.confirmations,
      trend: outcome.indicators.trend.direction,
      momentum: outcome.indicators.momentum.direction,
      elapsedMs,
    });
  }

  private async deliver(outcome: EvaluationOutcome): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async (sink) => sink(outcome)));
    for (const result of results) {
      if (result.status === "rejected") {
        logError("SignalEngine", "Signal sink failed", { stage: "delivery", cause: describeError(result.reason) });
      }
    }
  }
}
