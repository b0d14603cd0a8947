/**
 * Signal Storage
 *
 * Key pattern:
 *   signal:{instrument}:{timestamp}   emitted signal, 24h TTL
 *   signals:history:{instrument}      capped list, newest first
 *   signals:stats:{instrument}        hash of outcome and action counters
 */

import { z } from "zod";
import type { KeyValueStore } from "./redisClient.js";
import { info, warn } from "./logger.js";
import type { EvaluationOutcome, Signal } from "../signals/types.js";

const SIGNAL_TTL_SECONDS = 86400;

const storedSignalSchema = z.object({
  instrument: z.string(),
  action: z.enum(["BUY", "SELL", "NO_SIGNAL"]),
  price: z.number(),
  score: z.number(),
  confidence: z.number(),
  stopLoss: z.number().nullable(),
  takeProfit: z.number().nullable(),
  timestamp: z.number(),
  reasons: z.array(z.string()),
});

export interface SignalStats {
  emitted: number;
  no_signal: number;
  rate_limited: number;
  skipped: number;
  BUY: number;
  SELL: number;
}

function parseSignal(raw: string | null): Signal | null {
  if (!raw) return null;
  try {
    const parsed = storedSignalSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class SignalStorage {
  constructor(
    private store: KeyValueStore,
    private historyMaxSize: () => number
  ) {}

  /**
   * Persist an emitted signal and push it onto the capped history
   */
  async storeSignal(signal: Signal): Promise<void> {
    const payload = JSON.stringify(signal);
    const historyKey = `signals:history:${signal.instrument}`;

    await this.store.setex(`signal:${signal.instrument}:${signal.timestamp}`, SIGNAL_TTL_SECONDS, payload);
    await this.store.lpush(historyKey, payload);
    await this.store.ltrim(historyKey, 0, this.historyMaxSize() - 1);
    await this.store.hincrby(`signals:stats:${signal.instrument}`, signal.action, 1);
    info("SignalStorage", `Stored ${signal.action} signal for ${signal.instrument}`);
  }

  /**
   * Sink entry point: counts every outcome, stores emitted signals
   */
  async recordOutcome(outcome: EvaluationOutcome): Promise<void> {
    const instrument = outcome.kind === "skipped" ? outcome.instrument : outcome.signal.instrument;
    await this.store.hincrby(`signals:stats:${instrument}`, outcome.kind, 1);
    if (outcome.kind === "emitted") {
      await this.storeSignal(outcome.signal);
    }
  }

  async getSignal(instrument: string, timestamp: number): Promise<Signal | null> {
    return parseSignal(await this.store.get(`signal:${instrument}:${timestamp}`));
  }

  /**
   * Get recent signals for an instrument, newest first
   */
  async getRecentSignals(instrument: string, limit: number = 10): Promise<Signal[]> {
    try {
      const values = await this.store.lrange(`signals:history:${instrument}`, 0, limit - 1);
      const signals: Signal[] = [];
      for (const value of values) {
        const signal = parseSignal(value);
        if (signal) signals.push(signal);
      }
      return signals;
    } catch (err) {
      warn("SignalStorage", `Failed to get signals: ${err}`);
      return [];
    }
  }

  async getStats(instrument: string): Promise<SignalStats> {
    const stats: SignalStats = { emitted: 0, no_signal: 0, rate_limited: 0, skipped: 0, BUY: 0, SELL: 0 };
    try {
      const raw = await this.store.hgetall(`signals:stats:${instrument}`);
      for (const key of Object.keys(stats)) {
        if (isStatKey(key)) {
          stats[key] = Number.parseInt(raw[key] ?? "0", 10) || 0;
        }
      }
    } catch (err) {
      warn("SignalStorage", `Failed to get stats: ${err}`);
    }
    return stats;
  }
}

function isStatKey(key: string): key is keyof SignalStats {
  return ["emitted", "no_signal", "rate_limited", "skipped", "BUY", "SELL"].includes(key);
}
