/**
 * Wires config, sources, engine and sinks from the environment
 */

import { ConfigStore, loadCredentials, loadEngineConfig, type Credentials, type EngineConfig } from "./config/engineConfig.js";
import { DataAcquisition } from "./ingestion/dataAcquisition.js";
import { createAlphaVantageSource } from "./ingestion/sources/alphaVantage.js";
import { createBinanceSource } from "./ingestion/sources/binance.js";
import { createTwelveDataSource } from "./ingestion/sources/twelveData.js";
import type { SourceAdapter } from "./ingestion/types.js";
import { IndicatorEngine } from "./indicators/indicatorEngine.js";
import { createOpenAIAdvisor } from "./signals/advisory.js";
import { PacingController } from "./signals/pacing.js";
import { SignalEngine } from "./signals/signalEngine.js";
import { HealthMonitor } from "./monitoring/health.js";
import { EngineMetrics } from "./utils/metrics.js";
import { MemoryRedis } from "./utils/memoryRedis.js";
import { createRedisClient, redisKeyValueStore, type KeyValueStore } from "./utils/redisClient.js";
import { SignalStorage } from "./utils/signalStorage.js";
import { initTelegram, notifyCustom, notifySignal } from "./utils/telegramNotifier.js";
import { info } from "./utils/logger.js";

export interface EngineRuntime {
  config: ConfigStore;
  credentials: Credentials;
  metrics: EngineMetrics;
  engine: SignalEngine;
  indicators: IndicatorEngine;
  storage: SignalStorage;
  health: HealthMonitor;
  close(): Promise<void>;
}

/**
 * Keyed providers are only wired when their key is set; Binance needs none
 */
export function createSources(credentials: Credentials, cfg: EngineConfig): SourceAdapter[] {
  const sources: SourceAdapter[] = [];

  if (credentials.TWELVE_DATA_API_KEY) {
    sources.push(createTwelveDataSource({ apiKey: credentials.TWELVE_DATA_API_KEY, timeoutMs: cfg.sourceTimeoutMs }));
  } else {
    info("Bootstrap", "TWELVE_DATA_API_KEY not set, skipping twelvedata");
  }

  if (credentials.ALPHA_VANTAGE_API_KEY) {
    sources.push(createAlphaVantageSource({ apiKey: credentials.ALPHA_VANTAGE_API_KEY, timeoutMs: cfg.sourceTimeoutMs }));
  } else {
    info("Bootstrap", "ALPHA_VANTAGE_API_KEY not set, skipping alphavantage");
  }

  sources.push(createBinanceSource({ timeoutMs: cfg.sourceTimeoutMs }));
  return sources;
}

export function createRuntime(env: NodeJS.ProcessEnv = process.env): EngineRuntime {
  const credentials = loadCredentials(env);
  const config = new ConfigStore(loadEngineConfig(env));
  const current = () => config.current();
  const cfg = current();
  const metrics = new EngineMetrics();

  const acquisition = new DataAcquisition(current, {
    adapters: createSources(credentials, cfg),
    metrics,
  });
  const indicators = new IndicatorEngine(current);
  const pacing = new PacingController(() => config.current().maxSignalsPerHour);

  const store: KeyValueStore =
    credentials.SIGNAL_STORE === "memory"
      ? new MemoryRedis()
      : redisKeyValueStore(createRedisClient(credentials));
  const storage = new SignalStorage(store, () => config.current().historyMaxSize);

  initTelegram(credentials);

  const advisory = credentials.OPENAI_API_KEY
    ? createOpenAIAdvisor({ apiKey: credentials.OPENAI_API_KEY, model: cfg.advisoryModel })
    : undefined;
  if (!advisory) {
    info("Bootstrap", "OPENAI_API_KEY not set, scoring on technical analysis only");
  }

  const engine = new SignalEngine({
    config,
    acquisition,
    indicators,
    pacing,
    advisory,
    metrics,
    sinks: [notifySignal, (outcome) => storage.recordOutcome(outcome)],
  });

  // Cached bundles were computed with the old periods
  config.subscribe(() => indicators.reset());

  const health = new HealthMonitor(metrics, current, notifyCustom);

  return {
    config,
    credentials,
    metrics,
    engine,
    indicators,
    storage,
    health,
    close: () => store.close(),
  };
}
