import "dotenv/config";
import { createRuntime, type EngineRuntime } from "./bootstrap.js";
import { EvaluationScheduler } from "./cron/evaluationScheduler.js";
import { describeError } from "./utils/errors.js";
import { info, error } from "./utils/logger.js";
import { isTelegramEnabled } from "./utils/telegramNotifier.js";

let runtime: EngineRuntime | null = null;
let scheduler: EvaluationScheduler | null = null;

async function start() {
  try {
    info("Main", "Starting market signal engine...");

    runtime = createRuntime();
    const cfg = runtime.config.current();

    info("Main", `Instrument: ${cfg.instrument} (${cfg.interval}), every ${cfg.analysisIntervalMinutes}m`);
    info("Main", `Sources: ${cfg.sourceOrder.join(" -> ")} (${cfg.fetchMode})`);
    info("Main", `Thresholds: BUY >= ${cfg.minBuyThreshold}, SELL <= ${cfg.maxSellThreshold}, confidence >= ${cfg.minConfidence}`);
    if (isTelegramEnabled()) {
      info("Main", "Telegram notifications enabled");
    }

    scheduler = new EvaluationScheduler(runtime.engine, runtime.config);
    scheduler.start();
    runtime.health.start();

    // First cycle right away instead of waiting for the next tick
    await scheduler.runScheduled();

    info("Main", "Signal engine running. Press Ctrl+C to stop.");
  } catch (err) {
    error("Main", "Fatal error during startup", { cause: describeError(err) });
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 */
async function shutdown() {
  info("Main", "Shutting down...");

  scheduler?.stop();
  runtime?.health.stop();

  if (runtime) {
    const snapshot = runtime.metrics.snapshot();
    info("Main", `Cycles: ${snapshot.cycles.total}, signals emitted: ${snapshot.signals.emitted}`);
    try {
      await runtime.close();
    } catch (err) {
      error("Main", "Failed to close signal store", err);
    }
  }

  process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

start().catch((err) => {
  error("Main", "Unhandled startup failure", err);
  process.exit(1);
});
