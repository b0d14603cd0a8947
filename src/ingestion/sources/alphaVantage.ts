import axios from "axios";
import { z } from "zod";
import type { CandleInterval } from "../../config/engineConfig.js";
import { lookupInstrument, intervalSymbols } from "../../assets/assetClassifier.js";
import { SourceUnavailable } from "../../utils/errors.js";
import { debug } from "../../utils/logger.js";
import type { Candle, FetchRequest, SourceAdapter } from "../types.js";
import { classifySourceError, parseUtcDateTime } from "./sourceErrors.js";

const ALPHA_VANTAGE_URL = "https://www.alphavantage.co/query";
const SOURCE = "alphavantage";
const COMPACT_SIZE = 100;

const envelopeSchema = z.record(z.unknown());

const barSchema = z.object({
  "1. open": z.coerce.number(),
  "2. high": z.coerce.number(),
  "3. low": z.coerce.number(),
  "4. close": z.coerce.number(),
});

const seriesSchema = z.record(z.unknown());

function messageOf(value: unknown): string {
  return typeof value === "string" ? value : "no message";
}

/**
 * Normalize an FX_INTRADAY payload. Rate limiting comes back as HTTP 200 with
 * a Note or Information field instead of the series.
 */
export function parseAlphaVantagePayload(payload: unknown, interval: CandleInterval, instrument?: string): Candle[] {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new SourceUnavailable(SOURCE, "malformed", "unexpected payload shape", { instrument });
  }

  const body = envelope.data;
  if ("Note" in body || "Information" in body) {
    throw new SourceUnavailable(SOURCE, "quota", messageOf(body["Note"] ?? body["Information"]), { instrument });
  }
  if ("Error Message" in body) {
    throw new SourceUnavailable(SOURCE, "provider_error", messageOf(body["Error Message"]), { instrument });
  }

  const seriesKey = `Time Series FX (${intervalSymbols(interval).alphaVantage})`;
  const series = seriesSchema.safeParse(body[seriesKey]);
  if (!series.success) {
    throw new SourceUnavailable(SOURCE, "malformed", `missing "${seriesKey}"`, { instrument });
  }

  const candles: Candle[] = [];
  for (const [datetime, raw] of Object.entries(series.data)) {
    const bar = barSchema.safeParse(raw);
    if (!bar.success) continue;

    const timestamp = parseUtcDateTime(datetime);
    if (Number.isNaN(timestamp)) continue;

    candles.push({
      timestamp,
      open: bar.data["1. open"],
      high: bar.data["2. high"],
      low: bar.data["3. low"],
      close: bar.data["4. close"],
      volume: 0,
    });
  }

  if (candles.length === 0) {
    throw new SourceUnavailable(SOURCE, "malformed", "empty time series", { instrument });
  }

  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

export interface AlphaVantageOptions {
  apiKey?: string;
  timeoutMs?: number;
  hourlyQuota?: number;
}

/**
 * Secondary vendor, FX pairs and metals only
 */
export function createAlphaVantageSource(options: AlphaVantageOptions): SourceAdapter {
  return {
    name: SOURCE,
    hourlyQuota: options.hourlyQuota ?? 25,
    async fetchCandles(request: FetchRequest, signal: AbortSignal): Promise<Candle[]> {
      const { instrument, interval, outputSize } = request;
      if (!options.apiKey) {
        throw new SourceUnavailable(SOURCE, "not_configured", "ALPHA_VANTAGE_API_KEY not set", { instrument });
      }
      const pair = lookupInstrument(instrument)?.alphaVantage;
      if (!pair) {
        throw new SourceUnavailable(SOURCE, "not_configured", `no FX pair for ${instrument}`, { instrument });
      }

      debug("AlphaVantage", `GET FX_INTRADAY ${pair.from}/${pair.to} ${interval}`);

      try {
        const { data } = await axios.get<unknown>(ALPHA_VANTAGE_URL, {
          params: {
            function: "FX_INTRADAY",
            from_symbol: pair.from,
            to_symbol: pair.to,
            interval: intervalSymbols(interval).alphaVantage,
            outputsize: outputSize <= COMPACT_SIZE ? "compact" : "full",
            apikey: options.apiKey,
          },
          timeout: options.timeoutMs ?? 10000,
          signal,
        });
        return parseAlphaVantagePayload(data, interval, instrument);
      } catch (err) {
        throw classifySourceError(SOURCE, err, instrument);
      }
    },
  };
}
