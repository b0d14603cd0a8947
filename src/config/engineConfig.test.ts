import { describe, expect, it, vi } from "vitest";
import { ConfigError } from "../utils/errors.js";
import {
  CONFIG_KEYS,
  ConfigStore,
  DEFAULT_ENGINE_CONFIG,
  configFromEnv,
  envVarName,
  loadCredentials,
  parseEngineConfig,
} from "./engineConfig.js";

describe("parseEngineConfig", () => {
  it("fills every option with its default", () => {
    const cfg = parseEngineConfig();

    expect(cfg.instrument).toBe("EURUSD");
    expect(cfg.minBuyThreshold).toBe(60);
    expect(cfg.maxSellThreshold).toBe(40);
    expect(cfg.minConfidence).toBe(65);
    expect(cfg.maxSignalsPerHour).toBe(12);
    expect(cfg.sourceOrder).toEqual(["twelvedata", "alphavantage", "binance"]);
    expect(cfg.advisoryWeight + cfg.taWeight).toBe(1);
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it("coerces strings from the environment", () => {
    const cfg = parseEngineConfig({
      minBuyThreshold: "62.5",
      requireMomentumAlignment: "false",
      sourceOrder: "Binance, twelvedata",
    });

    expect(cfg.minBuyThreshold).toBe(62.5);
    expect(cfg.requireMomentumAlignment).toBe(false);
    expect(cfg.sourceOrder).toEqual(["binance", "twelvedata"]);
  });

  it("rejects unknown keys", () => {
    expect(() => parseEngineConfig({ minBuyTreshold: 60 })).toThrow(ConfigError);
  });

  it("rejects a sell threshold at or above the buy threshold", () => {
    try {
      parseEngineConfig({ minBuyThreshold: 50, maxSellThreshold: 50 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(["maxSellThreshold: must be below minBuyThreshold"]);
        expect(err.stage).toBe("config");
      }
    }
  });

  it("rejects weights that do not sum to one", () => {
    expect(() => parseEngineConfig({ advisoryWeight: 0.5, taWeight: 0.6 })).toThrow(/advisoryWeight \+ taWeight/);
  });

  it("rejects a duplicated source", () => {
    expect(() => parseEngineConfig({ sourceOrder: "binance,binance" })).toThrow(/sourceOrder/);
  });

  it("rejects a lookback window shorter than the indicators need", () => {
    expect(() => parseEngineConfig({ lookbackWindow: 20 })).toThrow(ConfigError);
  });

  it("sizes the lookback check from the configured periods", () => {
    try {
      parseEngineConfig({ adxPeriod: 60 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(["lookbackWindow: must be at least 121 for the configured indicator periods"]);
      }
    }

    expect(parseEngineConfig({ adxPeriod: 60, lookbackWindow: 121 }).lookbackWindow).toBe(121);
  });

  it("only takes evaluation intervals that divide the hour", () => {
    expect(() => parseEngineConfig({ analysisIntervalMinutes: 7 })).toThrow(/analysisIntervalMinutes: must divide 60/);
    expect(parseEngineConfig({ analysisIntervalMinutes: 15 }).analysisIntervalMinutes).toBe(15);
  });

  it("validates the volatility bands", () => {
    expect(() => parseEngineConfig({ lowVolatilityPct: 0.2 })).toThrow(/lowVolatilityPct/);
    expect(() => parseEngineConfig({ normalVolatilitySellThreshold: 55 })).toThrow(/normalVolatilitySellThreshold/);
  });
});

describe("environment mapping", () => {
  it("derives ENGINE_* variable names", () => {
    expect(envVarName("minBuyThreshold")).toBe("ENGINE_MIN_BUY_THRESHOLD");
    expect(envVarName("rsiPeriod")).toBe("ENGINE_RSI_PERIOD");
    expect(envVarName("advisoryTimeoutMs")).toBe("ENGINE_ADVISORY_TIMEOUT_MS");
  });

  it("picks up only recognised non-empty variables", () => {
    const raw = configFromEnv({
      ENGINE_INSTRUMENT: "GBPUSD",
      ENGINE_MAX_SIGNALS_PER_HOUR: "4",
      ENGINE_MIN_CONFIDENCE: "",
      ENGINE_NOT_AN_OPTION: "1",
    });

    expect(raw).toEqual({ instrument: "GBPUSD", maxSignalsPerHour: "4" });
  });

  it("lists every option once", () => {
    expect(new Set(CONFIG_KEYS).size).toBe(CONFIG_KEYS.length);
    expect(CONFIG_KEYS).toContain("momentumPenaltyScore");
  });
});

describe("ConfigStore", () => {
  it("swaps the snapshot and notifies listeners", () => {
    const store = new ConfigStore();
    const listener = vi.fn();
    store.subscribe(listener);

    const before = store.current();
    const next = store.update({ maxSignalsPerHour: 3 });

    expect(next.maxSignalsPerHour).toBe(3);
    expect(before.maxSignalsPerHour).toBe(12);
    expect(store.current()).toBe(next);
    expect(listener).toHaveBeenCalledWith(next, before);
  });

  it("keeps the old snapshot when a patch is invalid", () => {
    const store = new ConfigStore();
    const listener = vi.fn();
    store.subscribe(listener);

    expect(() => store.update({ minConfidence: 150 })).toThrow(ConfigError);
    expect(store.current()).toBe(DEFAULT_ENGINE_CONFIG);
    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps notifying after a listener throws", () => {
    const store = new ConfigStore();
    const second = vi.fn();
    store.subscribe(() => {
      throw new Error("boom");
    });
    store.subscribe(second);

    store.update({ historyMaxSize: 10 });

    expect(second).toHaveBeenCalledOnce();
  });

  it("stops notifying after unsubscribe", () => {
    const store = new ConfigStore();
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);
    unsubscribe();

    store.update({ historyMaxSize: 10 });

    expect(listener).not.toHaveBeenCalled();
  });
});

describe("loadCredentials", () => {
  it("treats empty secrets as absent and defaults the connection", () => {
    const creds = loadCredentials({ OPENAI_API_KEY: "", TWELVE_DATA_API_KEY: "test-key" });

    expect(creds.OPENAI_API_KEY).toBeUndefined();
    expect(creds.TWELVE_DATA_API_KEY).toBe("test-key");
    expect(creds.REDIS_HOST).toBe("localhost");
    expect(creds.REDIS_PORT).toBe(6379);
    expect(creds.SIGNAL_STORE).toBe("redis");
  });
});
