/**
 * Evaluation Scheduler
 *
 * Periodic evaluation every analysisIntervalMinutes. A tick that arrives while
 * the previous scheduled cycle is still running is skipped. On-demand
 * evaluations bypass the flag and run concurrently.
 */

import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { ConfigStore } from "../config/engineConfig.js";
import type { EvaluationOutcome } from "../signals/types.js";
import { info, warn, error as logError } from "../utils/logger.js";

export interface Evaluator {
  evaluate(instrument?: string): Promise<EvaluationOutcome>;
}

export function cronExpression(intervalMinutes: number): string {
  return intervalMinutes === 1 ? "* * * * *" : `*/${intervalMinutes} * * * *`;
}

export class EvaluationScheduler {
  private task: ScheduledTask | null = null;
  private expression: string | null = null;
  private isRunning = false;
  private skippedTicks = 0;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private engine: Evaluator,
    private config: ConfigStore
  ) {}

  /**
   * Start the cron job and follow interval changes
   */
  start(): void {
    if (this.task) {
      return;
    }
    this.schedule(this.config.current().analysisIntervalMinutes);

    this.unsubscribe = this.config.subscribe((next, previous) => {
      if (next.analysisIntervalMinutes !== previous.analysisIntervalMinutes) {
        info("EvaluationScheduler", `Interval changed ${previous.analysisIntervalMinutes}m -> ${next.analysisIntervalMinutes}m`);
        this.schedule(next.analysisIntervalMinutes);
      }
    });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
    this.expression = null;
    this.unsubscribe?.();
    this.unsubscribe = null;
    info("EvaluationScheduler", "Stopped evaluation cron job");
  }

  /**
   * The cron tick. Returns null when skipped because a cycle is in flight.
   */
  async runScheduled(): Promise<EvaluationOutcome | null> {
    if (this.isRunning) {
      this.skippedTicks++;
      warn("EvaluationScheduler", "Evaluation already running, skipping this cycle");
      return null;
    }

    this.isRunning = true;
    try {
      return await this.engine.evaluate();
    } catch (err) {
      logError("EvaluationScheduler", "Evaluation cycle failed", err);
      return null;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * User-triggered evaluation, independent of the scheduled cycle
   */
  async runOnDemand(instrument?: string): Promise<EvaluationOutcome> {
    info("EvaluationScheduler", `On-demand evaluation${instrument ? ` for ${instrument}` : ""}`);
    return this.engine.evaluate(instrument);
  }

  status(): { scheduled: boolean; expression: string | null; isJobRunning: boolean; skippedTicks: number } {
    return {
      scheduled: this.task !== null,
      expression: this.expression,
      isJobRunning: this.isRunning,
      skippedTicks: this.skippedTicks,
    };
  }

  private schedule(intervalMinutes: number): void {
    this.task?.stop();

    const expression = cronExpression(intervalMinutes);
    this.task = cron.schedule(expression, async () => {
      await this.runScheduled();
    });
    this.expression = expression;
    info("EvaluationScheduler", `Evaluation job scheduled: ${expression}`);
  }
}
