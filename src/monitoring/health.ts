import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { EngineConfig } from "../config/engineConfig.js";
import type { EngineMetrics } from "../utils/metrics.js";
import { info, warn, error as logError } from "../utils/logger.js";

const HOUR_MS = 60 * 60 * 1000;
const ALERT_COOLDOWN_MS = HOUR_MS;

export type AlertKind = "api_error" | "advisory_error" | "no_signals";

export type AlertSender = (message: string) => Promise<void>;

/**
 * Periodic health check over the engine metrics. Each alert kind fires at
 * most once per cooldown window.
 */
export class HealthMonitor {
  private lastAlertAt = new Map<AlertKind, number>();
  private task: ScheduledTask | null = null;

  constructor(
    private metrics: EngineMetrics,
    private getConfig: () => EngineConfig,
    private send: AlertSender,
    private clock: () => number = Date.now
  ) {}

  /**
   * Evaluate every rule and send what is due. Returns the kinds sent.
   */
  async check(now: number = this.clock()): Promise<AlertKind[]> {
    const cfg = this.getConfig();
    const snapshot = this.metrics.snapshot(now);
    const due: Array<{ kind: AlertKind; message: string }> = [];

    const apiErrorRate = this.metrics.apiErrorRate();
    if (apiErrorRate > cfg.alertApiErrorRate) {
      let calls = 0;
      let failures = 0;
      for (const source of Object.values(snapshot.sources)) {
        calls += source.calls;
        failures += source.failures;
      }
      due.push({
        kind: "api_error",
        message: `⚠️ High API error rate: ${apiErrorRate.toFixed(1)}%\nAPI calls: ${calls}, Errors: ${failures}`,
      });
    }

    const advisoryErrorRate = this.metrics.advisoryErrorRate();
    if (advisoryErrorRate > cfg.alertAdvisoryErrorRate) {
      due.push({
        kind: "advisory_error",
        message:
          `⚠️ High advisory error rate: ${advisoryErrorRate.toFixed(1)}%\n` +
          `Advisory calls: ${snapshot.advisory.calls}, Errors: ${snapshot.advisory.failures}`,
      });
    }

    const lastSignal = snapshot.signals.lastEmittedAt;
    const hoursQuiet = (now - (lastSignal ?? snapshot.startedAt)) / HOUR_MS;
    if (hoursQuiet >= cfg.alertNoSignalsHours) {
      const since = lastSignal === null ? "none since start" : new Date(lastSignal).toISOString();
      due.push({
        kind: "no_signals",
        message: `⚠️ No signals generated for ${hoursQuiet.toFixed(1)} hours\nLast signal: ${since}`,
      });
    }

    const sent: AlertKind[] = [];
    for (const alert of due) {
      const last = this.lastAlertAt.get(alert.kind);
      if (last !== undefined && now - last < ALERT_COOLDOWN_MS) {
        continue;
      }
      warn("HealthMonitor", alert.message.replace(/\n/g, " | "));
      this.lastAlertAt.set(alert.kind, now);
      await this.send(`🚨 *ALERT* 🚨\n\n${alert.message}`);
      sent.push(alert.kind);
    }
    return sent;
  }

  /**
   * Hourly health job
   */
  start(): void {
    if (this.task) return;
    this.task = cron.schedule("0 * * * *", async () => {
      try {
        await this.check();
      } catch (err) {
        logError("HealthMonitor", "Health check failed", err);
      }
    });
    info("HealthMonitor", "Health check scheduled: 0 * * * *");
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }
}
