import type { CandleInterval } from "../config/engineConfig.js";

export type AssetClass = "forex" | "metal" | "crypto";

export interface InstrumentSymbols {
  assetClass: AssetClass;
  /** Twelve Data symbol, e.g. "EUR/USD" */
  twelveData: string;
  /** Alpha Vantage FX pair, absent where FX_INTRADAY has no coverage */
  alphaVantage?: { from: string; to: string };
  /** Binance spot pair used as a proxy feed */
  binance?: string;
}

const INSTRUMENTS: Record<string, InstrumentSymbols> = {
  EURUSD: { assetClass: "forex", twelveData: "EUR/USD", alphaVantage: { from: "EUR", to: "USD" }, binance: "EURUSDT" },
  GBPUSD: { assetClass: "forex", twelveData: "GBP/USD", alphaVantage: { from: "GBP", to: "USD" }, binance: "GBPUSDT" },
  AUDUSD: { assetClass: "forex", twelveData: "AUD/USD", alphaVantage: { from: "AUD", to: "USD" }, binance: "AUDUSDT" },
  USDJPY: { assetClass: "forex", twelveData: "USD/JPY", alphaVantage: { from: "USD", to: "JPY" } },
  USDCHF: { assetClass: "forex", twelveData: "USD/CHF", alphaVantage: { from: "USD", to: "CHF" } },
  USDCAD: { assetClass: "forex", twelveData: "USD/CAD", alphaVantage: { from: "USD", to: "CAD" } },
  NZDUSD: { assetClass: "forex", twelveData: "NZD/USD", alphaVantage: { from: "NZD", to: "USD" } },
  EURGBP: { assetClass: "forex", twelveData: "EUR/GBP", alphaVantage: { from: "EUR", to: "GBP" } },
  EURJPY: { assetClass: "forex", twelveData: "EUR/JPY", alphaVantage: { from: "EUR", to: "JPY" } },
  GBPJPY: { assetClass: "forex", twelveData: "GBP/JPY", alphaVantage: { from: "GBP", to: "JPY" } },
  XAUUSD: { assetClass: "metal", twelveData: "XAU/USD", alphaVantage: { from: "XAU", to: "USD" }, binance: "PAXGUSDT" },
  XAGUSD: { assetClass: "metal", twelveData: "XAG/USD", alphaVantage: { from: "XAG", to: "USD" } },
  BTCUSD: { assetClass: "crypto", twelveData: "BTC/USD", binance: "BTCUSDT" },
  ETHUSD: { assetClass: "crypto", twelveData: "ETH/USD", binance: "ETHUSDT" },
};

interface IntervalSymbols {
  twelveData: string;
  alphaVantage: string;
  binance: string;
  ms: number;
}

const INTERVALS: Record<CandleInterval, IntervalSymbols> = {
  "1min": { twelveData: "1min", alphaVantage: "1min", binance: "1m", ms: 60_000 },
  "5min": { twelveData: "5min", alphaVantage: "5min", binance: "5m", ms: 300_000 },
  "15min": { twelveData: "15min", alphaVantage: "15min", binance: "15m", ms: 900_000 },
  "30min": { twelveData: "30min", alphaVantage: "30min", binance: "30m", ms: 1_800_000 },
  "1h": { twelveData: "1h", alphaVantage: "60min", binance: "1h", ms: 3_600_000 },
};

/**
 * Normalize "eur/usd", "EUR_USD", "EURUSD=X" to "EURUSD"
 */
export function normalizeInstrument(instrument: string): string {
  return instrument.trim().toUpperCase().replace(/=X$/, "").replace(/[^A-Z0-9]/g, "");
}

export function lookupInstrument(instrument: string): InstrumentSymbols | undefined {
  return INSTRUMENTS[normalizeInstrument(instrument)];
}

export function knownInstruments(): string[] {
  return Object.keys(INSTRUMENTS);
}

export function intervalSymbols(interval: CandleInterval): IntervalSymbols {
  return INTERVALS[interval];
}

/**
 * Determine the asset class for a given instrument. Unknown six-letter codes
 * are treated as forex, anything else as crypto.
 */
export function classifyAsset(instrument: string): AssetClass {
  const known = lookupInstrument(instrument);
  if (known) {
    return known.assetClass;
  }
  const normalized = normalizeInstrument(instrument);
  if (normalized.startsWith("XAU") || normalized.startsWith("XAG")) {
    return "metal";
  }
  return /^[A-Z]{6}$/.test(normalized) ? "forex" : "crypto";
}

const FX_WEEKLY_CLOSE_HOUR = 22;

/**
 * Forex and metals trade Sunday 22:00 UTC to Friday 22:00 UTC; crypto never closes
 */
export function isMarketOpen(instrument: string, now: Date): boolean {
  if (classifyAsset(instrument) === "crypto") {
    return true;
  }

  const day = now.getUTCDay();
  const hour = now.getUTCHours();

  if (day === 6) return false;
  if (day === 5 && hour >= FX_WEEKLY_CLOSE_HOUR) return false;
  if (day === 0 && hour < FX_WEEKLY_CLOSE_HOUR) return false;
  return true;
}
