/**
 * Runs a single evaluation and prints the outcome.
 *
 * Usage: npm run evaluate -- [INSTRUMENT]
 */

import "dotenv/config";
import { createRuntime } from "./bootstrap.js";
import { describeError } from "./utils/errors.js";
import { error } from "./utils/logger.js";
import { formatSignalMessage } from "./utils/telegramNotifier.js";

async function main() {
  const runtime = createRuntime();
  const instrument = process.argv[2];

  try {
    const outcome = await runtime.engine.evaluate(instrument);

    console.log("\n" + "=".repeat(60));
    if (outcome.kind === "skipped") {
      console.log(`SKIPPED ${outcome.instrument} [${outcome.stage}]: ${outcome.reason}`);
    } else {
      console.log(`${outcome.kind.toUpperCase()} via ${outcome.source}`);
      console.log(formatSignalMessage(outcome.signal, outcome.indicators));
      console.log(
        `\nTA ${outcome.score.taScore.toFixed(1)}` +
          (outcome.score.advisoryScore === undefined ? "" : `, advisory ${outcome.score.advisoryScore.toFixed(1)}`) +
          `, confirmations ${outcome.score.confirmations}, tier ${outcome.score.tier}`
      );
    }
    console.log("=".repeat(60) + "\n");

    const history = await runtime.storage.getStats(outcome.kind === "skipped" ? outcome.instrument : outcome.signal.instrument);
    console.log("Stored stats:", history);
  } finally {
    await runtime.close();
  }
}

main().catch((err) => {
  error("EvaluateOnce", "Evaluation failed", { cause: describeError(err) });
  process.exit(1);
});
