/**
 * In-process counters for sources, caches, advisory calls and emissions.
 * The acquisition layer reads the trailing-hour call log for quota ranking;
 * the health monitor reads the rest.
 */

const HOUR_MS = 60 * 60 * 1000;

export interface SourceStats {
  calls: number;
  failures: number;
  quotaHits: number;
  lastQuotaAt: number | null;
  totalResponseMs: number;
  recentCalls: number[];
}

export interface MetricsSnapshot {
  sources: Record<string, Omit<SourceStats, "recentCalls" | "totalResponseMs"> & { avgResponseMs: number; callsLastHour: number }>;
  cache: { hits: number; misses: number };
  advisory: { calls: number; failures: number };
  cycles: { total: number; skipped: number };
  signals: { emitted: number; rateLimited: number; lastEmittedAt: number | null };
  startedAt: number;
}

export class EngineMetrics {
  private sources = new Map<string, SourceStats>();
  private cacheHits = 0;
  private cacheMisses = 0;
  private advisoryCalls = 0;
  private advisoryFailures = 0;
  private cycles = 0;
  private skippedCycles = 0;
  private emitted = 0;
  private rateLimited = 0;
  private lastEmittedAt: number | null = null;
  readonly startedAt: number;

  constructor(now: number = Date.now()) {
    this.startedAt = now;
  }

  private source(name: string): SourceStats {
    let stats = this.sources.get(name);
    if (!stats) {
      stats = { calls: 0, failures: 0, quotaHits: 0, lastQuotaAt: null, totalResponseMs: 0, recentCalls: [] };
      this.sources.set(name, stats);
    }
    return stats;
  }

  private prune(stats: SourceStats, now: number): void {
    const cutoff = now - HOUR_MS;
    while (stats.recentCalls.length > 0 && stats.recentCalls[0] <= cutoff) {
      stats.recentCalls.shift();
    }
  }

  recordSourceCall(name: string, outcome: { ok: boolean; quota?: boolean; elapsedMs: number }, now: number = Date.now()): void {
    const stats = this.source(name);
    stats.calls++;
    stats.totalResponseMs += outcome.elapsedMs;
    stats.recentCalls.push(now);
    this.prune(stats, now);

    if (!outcome.ok) {
      stats.failures++;
    }
    if (outcome.quota) {
      stats.quotaHits++;
      stats.lastQuotaAt = now;
    }
  }

  callsInLastHour(name: string, now: number = Date.now()): number {
    const stats = this.sources.get(name);
    if (!stats) return 0;
    this.prune(stats, now);
    return stats.recentCalls.length;
  }

  lastQuotaAt(name: string): number | null {
    return this.sources.get(name)?.lastQuotaAt ?? null;
  }

  recordCache(hit: boolean): void {
    if (hit) {
      this.cacheHits++;
    } else {
      this.cacheMisses++;
    }
  }

  recordAdvisory(ok: boolean): void {
    this.advisoryCalls++;
    if (!ok) {
      this.advisoryFailures++;
    }
  }

  recordCycle(kind: "emitted" | "no_signal" | "rate_limited" | "skipped", now: number = Date.now()): void {
    this.cycles++;
    if (kind === "skipped") this.skippedCycles++;
    if (kind === "rate_limited") this.rateLimited++;
    if (kind === "emitted") {
      this.emitted++;
      this.lastEmittedAt = now;
    }
  }

  /**
   * Failed calls over all calls across every source, as a percentage
   */
  apiErrorRate(): number {
    let calls = 0;
    let failures = 0;
    for (const stats of this.sources.values()) {
      calls += stats.calls;
      failures += stats.failures;
    }
    return calls === 0 ? 0 : (failures / calls) * 100;
  }

  advisoryErrorRate(): number {
    return this.advisoryCalls === 0 ? 0 : (this.advisoryFailures / this.advisoryCalls) * 100;
  }

  snapshot(now: number = Date.now()): MetricsSnapshot {
    const sources: MetricsSnapshot["sources"] = {};
    for (const [name, stats] of this.sources) {
      this.prune(stats, now);
      sources[name] = {
        calls: stats.calls,
        failures: stats.failures,
        quotaHits: stats.quotaHits,
        lastQuotaAt: stats.lastQuotaAt,
        avgResponseMs: stats.calls === 0 ? 0 : Math.round(stats.totalResponseMs / stats.calls),
        callsLastHour: stats.recentCalls.length,
      };
    }

    return {
      sources,
      cache: { hits: this.cacheHits, misses: this.cacheMisses },
      advisory: { calls: this.advisoryCalls, failures: this.advisoryFailures },
      cycles: { total: this.cycles, skipped: this.skippedCycles },
      signals: { emitted: this.emitted, rateLimited: this.rateLimited, lastEmittedAt: this.lastEmittedAt },
      startedAt: this.startedAt,
    };
  }
}
