import { z } from "zod";
import { requiredHistory } from "../indicators/history.js";
import { ConfigError } from "../utils/errors.js";
import { error as logError } from "../utils/logger.js";

/**
 * Engine configuration.
 *
 * Flat mapping of named options, every one with a default. Unknown keys are
 * rejected. Values can come from ENGINE_* env vars or from hot-reload patches,
 * so numbers and booleans are coerced from strings.
 */

export const SOURCE_NAMES = ["twelvedata", "alphavantage", "binance"] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

export const INTERVALS = ["1min", "5min", "15min", "30min", "1h"] as const;
export type CandleInterval = (typeof INTERVALS)[number];

const num = () => z.coerce.number().finite();
const int = () => z.coerce.number().int();

const bool = () =>
  z.preprocess((value) => {
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) return true;
      if (["0", "false", "no", "off", ""].includes(normalized)) return false;
    }
    return value;
  }, z.boolean());

const sourceList = () =>
  z.preprocess(
    (value) =>
      typeof value === "string"
        ? value
            .split(",")
            .map((part) => part.trim().toLowerCase())
            .filter((part) => part.length > 0)
        : value,
    z.array(z.enum(SOURCE_NAMES)).min(1)
  );

export const baseConfigSchema = z.object({
  // Instrument
  instrument: z.string().trim().min(3).default("EURUSD"),
  interval: z.enum(INTERVALS).default("1min"),
  lookbackWindow: int().min(35).max(5000).default(100),
  // Must divide 60 so the cron step lands on evenly spaced minutes
  analysisIntervalMinutes: int().min(1).max(30).default(2),

  // Acquisition
  sourceOrder: sourceList().default(["twelvedata", "alphavantage", "binance"]),
  fetchMode: z.enum(["sequential", "parallel"]).default("sequential"),
  sourceTimeoutMs: int().min(1).default(10_000),
  maxFetchAttempts: int().min(1).max(5).default(3),
  retryBackoffMs: int().min(0).default(1_000),
  minValidCandles: int().min(1).default(10),
  quotaCooldownSeconds: int().min(0).default(60),
  cacheMaxEntries: int().min(1).default(10),
  cacheTtlMinSeconds: int().min(1).default(30),
  cacheTtlDefaultSeconds: int().min(1).default(90),
  cacheTtlMaxSeconds: int().min(1).default(180),
  atrBaselineWindow: int().min(2).default(50),
  highVolatilityRatio: num().positive().default(1.2),
  lowVolatilityRatio: num().positive().default(0.8),

  // Indicators
  indicatorCacheTtlSeconds: int().min(1).default(30),
  indicatorCacheMaxEntries: int().min(1).default(5),
  rsiPeriod: int().min(2).default(14),
  macdFastPeriod: int().min(2).default(12),
  macdSlowPeriod: int().min(3).default(26),
  macdSignalPeriod: int().min(2).default(9),
  bbPeriod: int().min(2).default(20),
  bbStdDev: num().positive().default(2),
  atrPeriod: int().min(2).default(14),
  adxPeriod: int().min(2).default(14),
  stochPeriod: int().min(2).default(14),
  stochSignalPeriod: int().min(1).default(3),
  volumeAveragePeriod: int().min(2).default(20),

  // Trend & momentum
  adxTrendThreshold: num().min(0).max(100).default(25),
  adxStrengthCeiling: num().positive().default(50),
  macdDeadBand: num().min(0).default(0.00003),
  rsiTrendOffset: num().min(0).max(50).default(10),
  momentumPeriods: int().min(1).default(3),
  momentumDeadBandPct: num().min(0).default(0.01),

  // Confirmation predicates
  rsiOversold: num().min(0).max(100).default(35),
  rsiOverbought: num().min(0).max(100).default(65),
  macdStrongThreshold: num().positive().default(0.0001),
  bbOversold: num().default(20),
  bbOverbought: num().default(80),
  stochOversold: num().min(0).max(100).default(20),
  stochOverbought: num().min(0).max(100).default(80),

  // Scoring
  strongTierConfirmations: int().min(1).max(6).default(4),
  moderateTierConfirmations: int().min(1).max(6).default(3),
  rangingExtraConfirmations: int().min(0).max(3).default(1),
  strongTierScore: num().min(50).max(100).default(70),
  moderateTierScore: num().min(50).max(100).default(60),
  momentumPenaltyScore: num().min(0).max(50).default(7),
  volumeBonusMax: num().min(0).max(20).default(10),
  advisoryEnabled: bool().default(true),
  advisoryWeight: num().min(0).max(1).default(0.35),
  taWeight: num().min(0).max(1).default(0.65),
  advisoryTimeoutMs: int().min(1).default(3_000),
  advisoryModel: z.string().min(1).default("gpt-4o-mini"),
  confidenceBase: num().min(0).max(100).default(40),
  confidenceConvergenceSpan: num().min(0).max(100).default(45),
  trendAlignmentBonus: num().min(0).max(50).default(10),
  momentumAlignmentBonus: num().min(0).max(50).default(5),
  momentumPenaltyConfidence: num().min(0).max(50).default(5),

  // Decision
  minBuyThreshold: num().min(0).max(100).default(60),
  maxSellThreshold: num().min(0).max(100).default(40),
  minConfidence: num().min(0).max(100).default(65),
  requireMomentumAlignment: bool().default(true),
  atrStopMultiplier: num().positive().default(2),
  rewardRiskRatio: num().positive().default(1.8),
  stopLossPctFallback: num().positive().default(0.002),
  tradingHoursEnabled: bool().default(true),
  tradingStartHour: int().min(0).max(23).default(0),
  tradingEndHour: int().min(0).max(24).default(24),
  enforceMarketOpen: bool().default(true),

  // Volatility bands (ATR as % of price); a band only ever tightens the thresholds above
  adaptiveThresholdsEnabled: bool().default(true),
  highVolatilityPct: num().positive().default(0.15),
  lowVolatilityPct: num().positive().default(0.05),
  highVolatilityBuyThreshold: num().min(0).max(100).default(60),
  highVolatilitySellThreshold: num().min(0).max(100).default(40),
  normalVolatilityBuyThreshold: num().min(0).max(100).default(55),
  normalVolatilitySellThreshold: num().min(0).max(100).default(45),
  lowVolatilityBuyThreshold: num().min(0).max(100).default(52),
  lowVolatilitySellThreshold: num().min(0).max(100).default(48),

  // Pacing
  maxSignalsPerHour: int().min(0).default(12),

  // History & health
  historyMaxSize: int().min(1).default(100),
  alertApiErrorRate: num().min(0).max(100).default(10),
  alertAdvisoryErrorRate: num().min(0).max(100).default(20),
  alertNoSignalsHours: num().positive().default(2),
});

export const engineConfigSchema = baseConfigSchema.strict().superRefine((cfg, ctx) => {
  const issue = (path: string, message: string) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });

  if (cfg.maxSellThreshold >= cfg.minBuyThreshold) {
    issue("maxSellThreshold", "must be below minBuyThreshold");
  }
  if (Math.abs(cfg.advisoryWeight + cfg.taWeight - 1) > 1e-9) {
    issue("taWeight", "advisoryWeight + taWeight must equal 1");
  }
  if (cfg.macdDeadBand >= cfg.macdStrongThreshold) {
    issue("macdDeadBand", "must be narrower than macdStrongThreshold");
  }
  if (cfg.moderateTierConfirmations > cfg.strongTierConfirmations) {
    issue("moderateTierConfirmations", "must not exceed strongTierConfirmations");
  }
  if (cfg.moderateTierScore > cfg.strongTierScore) {
    issue("moderateTierScore", "must not exceed strongTierScore");
  }
  if (
    cfg.cacheTtlMinSeconds > cfg.cacheTtlDefaultSeconds ||
    cfg.cacheTtlDefaultSeconds > cfg.cacheTtlMaxSeconds
  ) {
    issue("cacheTtlDefaultSeconds", "cache TTL bounds must satisfy min <= default <= max");
  }
  if (cfg.lowVolatilityRatio >= cfg.highVolatilityRatio) {
    issue("lowVolatilityRatio", "must be below highVolatilityRatio");
  }
  if (cfg.macdFastPeriod >= cfg.macdSlowPeriod) {
    issue("macdFastPeriod", "must be shorter than macdSlowPeriod");
  }
  if (cfg.rsiOversold >= cfg.rsiOverbought) {
    issue("rsiOversold", "must be below rsiOverbought");
  }
  if (new Set(cfg.sourceOrder).size !== cfg.sourceOrder.length) {
    issue("sourceOrder", "must not list a source twice");
  }
  const required = requiredHistory(cfg);
  if (cfg.lookbackWindow < required) {
    issue("lookbackWindow", `must be at least ${required} for the configured indicator periods`);
  }
  if (60 % cfg.analysisIntervalMinutes !== 0) {
    issue("analysisIntervalMinutes", "must divide 60");
  }
  if (cfg.lowVolatilityPct >= cfg.highVolatilityPct) {
    issue("lowVolatilityPct", "must be below highVolatilityPct");
  }
  const bands = [
    ["highVolatilitySellThreshold", cfg.highVolatilitySellThreshold, cfg.highVolatilityBuyThreshold],
    ["normalVolatilitySellThreshold", cfg.normalVolatilitySellThreshold, cfg.normalVolatilityBuyThreshold],
    ["lowVolatilitySellThreshold", cfg.lowVolatilitySellThreshold, cfg.lowVolatilityBuyThreshold],
  ] as const;
  for (const [path, sell, buy] of bands) {
    if (sell >= buy) {
      issue(path, "must be below the buy threshold of the same band");
    }
  }
});

type ParsedConfig = z.infer<typeof baseConfigSchema>;

export type EngineConfig = Readonly<Omit<ParsedConfig, "sourceOrder">> & {
  readonly sourceOrder: readonly SourceName[];
};
export type EngineConfigInput = z.input<typeof baseConfigSchema>;
export type ConfigKey = keyof ParsedConfig;

function isConfigKey(key: string): key is ConfigKey {
  return key in baseConfigSchema.shape;
}

export const CONFIG_KEYS: readonly ConfigKey[] = Object.keys(baseConfigSchema.shape).filter(isConfigKey);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}

/**
 * Validate a raw mapping into a frozen config, throwing ConfigError on any issue
 */
export function parseEngineConfig(raw: Record<string, unknown> = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return Object.freeze({ ...result.data, sourceOrder: Object.freeze([...result.data.sourceOrder]) });
}

/**
 * minBuyThreshold -> ENGINE_MIN_BUY_THRESHOLD
 */
export function envVarName(key: ConfigKey): string {
  return `ENGINE_${key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase()}`;
}

/**
 * Collect ENGINE_* overrides for recognised keys
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[envVarName(key)];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }
  return raw;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return parseEngineConfig(configFromEnv(env));
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = parseEngineConfig();

export type ConfigListener = (next: EngineConfig, previous: EngineConfig) => void;

/**
 * Holds the live config. Readers take one snapshot per cycle; updates swap the
 * whole snapshot so an in-flight cycle never sees a half-applied patch.
 */
export class ConfigStore {
  private snapshot: EngineConfig;
  private listeners = new Set<ConfigListener>();

  constructor(initial: EngineConfig = DEFAULT_ENGINE_CONFIG) {
    this.snapshot = initial;
  }

  current(): EngineConfig {
    return this.snapshot;
  }

  /**
   * Merge, re-validate and publish. Unknown keys and invalid values throw
   * ConfigError and leave the current snapshot in place.
   */
  update(patch: Record<string, unknown>): EngineConfig {
    const previous = this.snapshot;
    const next = parseEngineConfig({ ...previous, ...patch });
    this.snapshot = next;

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        logError("ConfigStore", "Config listener failed", err);
      }
    }
    return next;
  }

  subscribe(listener: ConfigListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Secrets and connection settings, kept out of the hot-reloadable config
 */
const optionalSecret = () =>
  z.preprocess((value) => (value === "" ? undefined : value), z.string().trim().min(1).optional());

export const credentialsSchema = z.object({
  TWELVE_DATA_API_KEY: optionalSecret(),
  ALPHA_VANTAGE_API_KEY: optionalSecret(),
  OPENAI_API_KEY: optionalSecret(),
  TELEGRAM_BOT_TOKEN: optionalSecret(),
  TELEGRAM_CHAT_ID: optionalSecret(),
  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  SIGNAL_STORE: z.enum(["redis", "memory"]).default("redis"),
});

export type Credentials = z.infer<typeof credentialsSchema>;

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const result = credentialsSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}
