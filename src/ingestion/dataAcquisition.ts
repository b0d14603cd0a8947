import type { CandleInterval, EngineConfig } from "../config/engineConfig.js";
import { atrSeries } from "../indicators/indicatorEngine.js";
import { NoDataAvailable, SourceUnavailable } from "../utils/errors.js";
import { KeyedMutex } from "../utils/mutex.js";
import { TtlCache } from "../utils/ttlCache.js";
import { EngineMetrics } from "../utils/metrics.js";
import { debug, info, warn } from "../utils/logger.js";
import { classifySourceError } from "./sources/sourceErrors.js";
import type { Candle, CandleSeries, FetchRequest, SourceAdapter } from "./types.js";

/**
 * Data Acquisition Layer
 *
 * Ranked multi-source candle fetch with fallback, bounded retries and a
 * shared series cache whose TTL follows recent volatility.
 */

export type AcquisitionParams = Pick<
  EngineConfig,
  | "lookbackWindow"
  | "minValidCandles"
  | "atrPeriod"
  | "atrBaselineWindow"
  | "highVolatilityRatio"
  | "lowVolatilityRatio"
  | "cacheTtlMinSeconds"
  | "cacheTtlDefaultSeconds"
  | "cacheTtlMaxSeconds"
>;

export interface AcquisitionOptions {
  adapters: readonly SourceAdapter[];
  metrics?: EngineMetrics;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Drop unusable rows, order, dedupe (last write wins) and cut to the lookback
 * window. Throws SourceUnavailable(malformed) below minValidCandles.
 */
export function normalizeCandles(
  raw: readonly Candle[],
  source: string,
  params: Pick<EngineConfig, "lookbackWindow" | "minValidCandles">,
  instrument?: string
): Candle[] {
  const byTimestamp = new Map<number, Candle>();
  for (const c of raw) {
    const finite = [c.timestamp, c.open, c.high, c.low, c.close].every((n) => Number.isFinite(n));
    if (!finite || c.high < c.low) continue;

    byTimestamp.set(
      c.timestamp,
      Object.freeze({
        timestamp: c.timestamp,
        open: c.open,
        high: c.high,
        low: c.low,
        close: c.close,
        volume: Number.isFinite(c.volume) && c.volume > 0 ? c.volume : 0,
      })
    );
  }

  const candles = Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
  if (candles.length < params.minValidCandles) {
    throw new SourceUnavailable(
      source,
      "malformed",
      `${candles.length} valid candles, need ${params.minValidCandles}`,
      { instrument }
    );
  }
  return candles.slice(-params.lookbackWindow);
}

/**
 * Cache TTL in seconds: short while ATR runs above its rolling baseline,
 * long while it runs below.
 */
export function adaptiveTtlSeconds(candles: readonly Candle[], params: AcquisitionParams): number {
  const atrs = atrSeries(candles, params.atrPeriod).slice(-params.atrBaselineWindow);
  if (atrs.length < 2) {
    return params.cacheTtlDefaultSeconds;
  }

  const latest = atrs[atrs.length - 1];
  const baseline = atrs.reduce((sum, v) => sum + v, 0) / atrs.length;
  if (!(baseline > 0) || !Number.isFinite(latest)) {
    return params.cacheTtlDefaultSeconds;
  }

  const ratio = latest / baseline;
  if (ratio >= params.highVolatilityRatio) return params.cacheTtlMinSeconds;
  if (ratio <= params.lowVolatilityRatio) return params.cacheTtlMaxSeconds;
  return params.cacheTtlDefaultSeconds;
}

/**
 * One full pass over the ranked sources failed
 */
class AttemptFailed extends Error {
  constructor(readonly failures: SourceUnavailable[]) {
    super(`${failures.length} source(s) failed`);
    this.name = "AttemptFailed";
  }
}

interface SourceWin {
  adapter: SourceAdapter;
  candles: Candle[];
}

export class DataAcquisition {
  private readonly adapters: Map<string, SourceAdapter>;
  private readonly metrics: EngineMetrics;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly locks = new KeyedMutex();
  private cache: TtlCache<CandleSeries>;
  private cacheBound: number;

  constructor(
    private getConfig: () => EngineConfig,
    options: AcquisitionOptions
  ) {
    this.adapters = new Map(options.adapters.map((a) => [a.name, a]));
    this.metrics = options.metrics ?? new EngineMetrics();
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.cacheBound = getConfig().cacheMaxEntries;
    this.cache = new TtlCache<CandleSeries>(this.cacheBound);
  }

  /**
   * Latest series for instrument/interval. Concurrent callers for the same key
   * share one upstream fetch; a fresh cache entry skips upstream entirely.
   */
  async fetch(instrument: string, interval: CandleInterval, cfg: EngineConfig = this.getConfig()): Promise<CandleSeries> {
    if (cfg.cacheMaxEntries !== this.cacheBound) {
      this.cacheBound = cfg.cacheMaxEntries;
      this.cache.resize(this.cacheBound);
    }

    const key = `${instrument}:${interval}`;
    return this.locks.runExclusive(key, async () => {
      const cached = this.cache.get(key, this.clock());
      if (cached) {
        this.metrics.recordCache(true);
        debug("DataAcquisition", `Cache hit ${key} (${cached.source})`);
        return cached;
      }
      this.metrics.recordCache(false);

      const series = await this.fetchWithRetries(instrument, interval, cfg);
      const ttlSeconds = adaptiveTtlSeconds(series.candles, cfg);
      this.cache.set(key, series, ttlSeconds * 1000, this.clock());
      debug("DataAcquisition", `Cached ${key} for ${ttlSeconds}s`);
      return series;
    });
  }

  /**
   * Configured order, with sources in quota cooldown or over their hourly
   * budget moved to the back (relative order kept)
   */
  rankSources(cfg: EngineConfig, now: number = this.clock()): SourceAdapter[] {
    const ready: SourceAdapter[] = [];
    const demoted: SourceAdapter[] = [];

    for (const name of cfg.sourceOrder) {
      const adapter = this.adapters.get(name);
      if (!adapter) continue;

      const lastQuota = this.metrics.lastQuotaAt(name);
      const cooling = lastQuota !== null && now - lastQuota < cfg.quotaCooldownSeconds * 1000;
      const exhausted =
        adapter.hourlyQuota !== undefined && this.metrics.callsInLastHour(name, now) >= adapter.hourlyQuota;

      (cooling || exhausted ? demoted : ready).push(adapter);
    }

    return [...ready, ...demoted];
  }

  invalidate(instrument: string, interval: CandleInterval): boolean {
    return this.cache.delete(`${instrument}:${interval}`);
  }

  cacheStats() {
    return this.cache.stats();
  }

  private async fetchWithRetries(instrument: string, interval: CandleInterval, cfg: EngineConfig): Promise<CandleSeries> {
    const request: FetchRequest = { instrument, interval, outputSize: cfg.lookbackWindow };
    const failures: SourceUnavailable[] = [];

    for (let attempt = 1; attempt <= cfg.maxFetchAttempts; attempt++) {
      if (attempt > 1) {
        const delay = cfg.retryBackoffMs * 2 ** (attempt - 2);
        debug("DataAcquisition", `Retrying ${instrument} in ${delay}ms (attempt ${attempt}/${cfg.maxFetchAttempts})`);
        await this.sleep(delay);
      }

      const ranked = this.rankSources(cfg);
      if (ranked.length === 0) {
        throw new NoDataAvailable(instrument, failures, attempt);
      }

      try {
        const win =
          cfg.fetchMode === "parallel"
            ? await this.raceSources(ranked, request, cfg)
            : await this.trySequentially(ranked, request, cfg);

        info("DataAcquisition", `Fetched ${win.candles.length} candles for ${instrument} from ${win.adapter.name}`);
        return Object.freeze({
          instrument,
          interval,
          source: win.adapter.name,
          fetchedAt: this.clock(),
          candles: Object.freeze(win.candles),
        });
      } catch (err) {
        if (!(err instanceof AttemptFailed)) {
          throw err;
        }
        failures.push(...err.failures);
        warn("DataAcquisition", `All sources failed for ${instrument} (attempt ${attempt}/${cfg.maxFetchAttempts})`, {
          failures: err.failures.map((f) => `${f.source}:${f.kind}`),
        });
      }
    }

    throw new NoDataAvailable(instrument, failures, cfg.maxFetchAttempts);
  }

  private async trySequentially(ranked: SourceAdapter[], request: FetchRequest, cfg: EngineConfig): Promise<SourceWin> {
    const failures: SourceUnavailable[] = [];
    for (const adapter of ranked) {
      try {
        const candles = await this.callSource(adapter, request, cfg);
        return { adapter, candles };
      } catch (err) {
        const failure = classifySourceError(adapter.name, err, request.instrument);
        debug("DataAcquisition", `Source ${adapter.name} failed: ${failure.kind}`, failure.message);
        failures.push(failure);
      }
    }
    throw new AttemptFailed(failures);
  }

  /**
   * First structurally valid response wins; the losers are aborted
   */
  private async raceSources(ranked: SourceAdapter[], request: FetchRequest, cfg: EngineConfig): Promise<SourceWin> {
    const race = new AbortController();
    const attempts = ranked.map((adapter) =>
      this.callSource(adapter, request, cfg, race.signal).then(
        (candles): SourceWin => ({ adapter, candles }),
        (err: unknown) => {
          const failure = classifySourceError(adapter.name, err, request.instrument);
          debug("DataAcquisition", `Source ${adapter.name} failed: ${failure.kind}`, failure.message);
          throw failure;
        }
      )
    );

    try {
      return await Promise.any(attempts);
    } catch (err) {
      if (err instanceof AggregateError) {
        const failures = err.errors.map((e: unknown, i: number) =>
          classifySourceError(ranked[i]?.name ?? "unknown", e, request.instrument)
        );
        throw new AttemptFailed(failures);
      }
      throw err;
    } finally {
      race.abort();
    }
  }

  /**
   * One bounded call. The timeout rejects even if the adapter ignores its
   * abort signal, so a hung source cannot stall the cycle.
   */
  private async callSource(
    adapter: SourceAdapter,
    request: FetchRequest,
    cfg: EngineConfig,
    raceSignal?: AbortSignal
  ): Promise<Candle[]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let stop: (reason: SourceUnavailable) => void = () => undefined;
    const bounded = new Promise<never>((_, reject) => {
      stop = reject;
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new SourceUnavailable(adapter.name, "timeout", `no response within ${cfg.sourceTimeoutMs}ms`, {
            instrument: request.instrument,
          })
        );
      }, cfg.sourceTimeoutMs);
    });

    const onRaceDone = () => {
      controller.abort();
      stop(new SourceUnavailable(adapter.name, "timeout", "cancelled, another source answered first"));
    };
    raceSignal?.addEventListener("abort", onRaceDone, { once: true });

    const started = this.clock();
    try {
      const raw = await Promise.race([adapter.fetchCandles(request, controller.signal), bounded]);
      const candles = normalizeCandles(raw, adapter.name, cfg, request.instrument);
      const finished = this.clock();
      this.metrics.recordSourceCall(adapter.name, { ok: true, elapsedMs: finished - started }, finished);
      return candles;
    } catch (err) {
      const failure = classifySourceError(adapter.name, err, request.instrument);
      // A loser aborted by the race did not fail, and a keyless source never called out
      if (!raceSignal?.aborted && failure.kind !== "not_configured") {
        const finished = this.clock();
        this.metrics.recordSourceCall(
          adapter.name,
          { ok: false, quota: failure.kind === "quota", elapsedMs: finished - started },
          finished
        );
      }
      throw failure;
    } finally {
      clearTimeout(timer);
      raceSignal?.removeEventListener("abort", onRaceDone);
    }
  }
}
