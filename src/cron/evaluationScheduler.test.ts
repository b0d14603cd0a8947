import { afterEach, describe, expect, it } from "vitest";
import { ConfigStore } from "../config/engineConfig.js";
import type { EvaluationOutcome } from "../signals/types.js";
import { WEDNESDAY_NOON } from "../testing/fixtures.js";
import { EvaluationScheduler, cronExpression, type Evaluator } from "./evaluationScheduler.js";

const skipped: EvaluationOutcome = {
  kind: "skipped",
  instrument: "EURUSD",
  reason: "No data",
  stage: "acquisition",
  timestamp: WEDNESDAY_NOON,
};

function gatedEvaluator() {
  const releases: Array<() => void> = [];
  let calls = 0;
  const evaluator: Evaluator = {
    evaluate: () =>
      new Promise<EvaluationOutcome>((resolve) => {
        calls++;
        releases.push(() => resolve(skipped));
      }),
  };
  return {
    evaluator,
    calls: () => calls,
    releaseAll() {
      for (const release of releases.splice(0)) release();
    },
  };
}

let scheduler: EvaluationScheduler | null = null;

afterEach(() => {
  scheduler?.stop();
  scheduler = null;
});

describe("cronExpression", () => {
  it("builds a minute step expression", () => {
    expect(cronExpression(1)).toBe("* * * * *");
    expect(cronExpression(2)).toBe("*/2 * * * *");
    expect(cronExpression(15)).toBe("*/15 * * * *");
  });
});

describe("EvaluationScheduler", () => {
  it("skips a tick while the previous cycle is still running", async () => {
    const gate = gatedEvaluator();
    scheduler = new EvaluationScheduler(gate.evaluator, new ConfigStore());

    const first = scheduler.runScheduled();
    const second = await scheduler.runScheduled();

    expect(second).toBeNull();
    expect(scheduler.status().isJobRunning).toBe(true);
    expect(scheduler.status().skippedTicks).toBe(1);

    gate.releaseAll();
    expect(await first).toBe(skipped);
    expect(gate.calls()).toBe(1);
    expect(scheduler.status().isJobRunning).toBe(false);
  });

  it("runs on-demand evaluations alongside a scheduled one", async () => {
    const gate = gatedEvaluator();
    scheduler = new EvaluationScheduler(gate.evaluator, new ConfigStore());

    const scheduled = scheduler.runScheduled();
    const onDemand = scheduler.runOnDemand("GBPUSD");
    gate.releaseAll();

    expect(await scheduled).toBe(skipped);
    expect(await onDemand).toBe(skipped);
    expect(gate.calls()).toBe(2);
  });

  it("survives an evaluator that throws", async () => {
    scheduler = new EvaluationScheduler(
      {
        evaluate: async () => {
          throw new Error("boom");
        },
      },
      new ConfigStore()
    );

    expect(await scheduler.runScheduled()).toBeNull();
    expect(scheduler.status().isJobRunning).toBe(false);
  });

  it("reschedules when the interval changes", () => {
    const config = new ConfigStore();
    scheduler = new EvaluationScheduler(gatedEvaluator().evaluator, config);

    scheduler.start();
    expect(scheduler.status().expression).toBe("*/2 * * * *");

    config.update({ analysisIntervalMinutes: 5 });
    expect(scheduler.status()).toMatchObject({ scheduled: true, expression: "*/5 * * * *" });

    scheduler.stop();
    expect(scheduler.status()).toMatchObject({ scheduled: false, expression: null });
  });
});
