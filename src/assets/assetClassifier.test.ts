import { describe, expect, it } from "vitest";
import {
  classifyAsset,
  intervalSymbols,
  isMarketOpen,
  lookupInstrument,
  normalizeInstrument,
} from "./assetClassifier.js";

describe("normalizeInstrument", () => {
  it("strips separators and the =X suffix", () => {
    expect(normalizeInstrument("eur/usd")).toBe("EURUSD");
    expect(normalizeInstrument(" EUR_USD ")).toBe("EURUSD");
    expect(normalizeInstrument("EURUSD=X")).toBe("EURUSD");
  });
});

describe("classifyAsset", () => {
  it("uses the instrument table first", () => {
    expect(classifyAsset("EURUSD")).toBe("forex");
    expect(classifyAsset("XAUUSD")).toBe("metal");
    expect(classifyAsset("BTCUSD")).toBe("crypto");
  });

  it("falls back to the symbol shape", () => {
    expect(classifyAsset("SEKNOK")).toBe("forex");
    expect(classifyAsset("XAUEUR")).toBe("metal");
    expect(classifyAsset("DOGEUSDT")).toBe("crypto");
  });
});

describe("lookupInstrument", () => {
  it("maps provider symbols", () => {
    const eur = lookupInstrument("eur/usd");
    expect(eur?.twelveData).toBe("EUR/USD");
    expect(eur?.alphaVantage).toEqual({ from: "EUR", to: "USD" });
    expect(eur?.binance).toBe("EURUSDT");
    expect(lookupInstrument("USDJPY")?.binance).toBeUndefined();
  });

  it("maps the hourly interval per provider", () => {
    expect(intervalSymbols("1h")).toEqual({ twelveData: "1h", alphaVantage: "60min", binance: "1h", ms: 3_600_000 });
  });
});

describe("isMarketOpen", () => {
  it("is open mid-week", () => {
    expect(isMarketOpen("EURUSD", new Date("2024-01-10T12:00:00Z"))).toBe(true);
  });

  it("closes forex from Friday 22:00 to Sunday 22:00 UTC", () => {
    expect(isMarketOpen("EURUSD", new Date("2024-01-12T21:59:00Z"))).toBe(true);
    expect(isMarketOpen("EURUSD", new Date("2024-01-12T22:00:00Z"))).toBe(false);
    expect(isMarketOpen("XAUUSD", new Date("2024-01-13T12:00:00Z"))).toBe(false);
    expect(isMarketOpen("EURUSD", new Date("2024-01-14T21:00:00Z"))).toBe(false);
    expect(isMarketOpen("EURUSD", new Date("2024-01-14T22:00:00Z"))).toBe(true);
  });

  it("never closes crypto", () => {
    expect(isMarketOpen("BTCUSD", new Date("2024-01-13T12:00:00Z"))).toBe(true);
  });
});
