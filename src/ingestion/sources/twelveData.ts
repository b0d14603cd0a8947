import axios from "axios";
import { z } from "zod";
import { lookupInstrument, intervalSymbols } from "../../assets/assetClassifier.js";
import { SourceUnavailable } from "../../utils/errors.js";
import { debug } from "../../utils/logger.js";
import type { Candle, FetchRequest, SourceAdapter } from "../types.js";
import { classifySourceError, parseUtcDateTime } from "./sourceErrors.js";

const TWELVE_DATA_URL = "https://api.twelvedata.com/time_series";
const SOURCE = "twelvedata";

const envelopeSchema = z
  .object({
    status: z.string().optional(),
    code: z.number().optional(),
    message: z.string().optional(),
    values: z.array(z.unknown()).optional(),
  })
  .passthrough();

const rowSchema = z.object({
  datetime: z.string(),
  open: z.coerce.number(),
  high: z.coerce.number(),
  low: z.coerce.number(),
  close: z.coerce.number(),
  volume: z.coerce.number().optional(),
});

/**
 * Normalize a /time_series payload. Values arrive newest first.
 */
export function parseTwelveDataPayload(payload: unknown, instrument?: string): Candle[] {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new SourceUnavailable(SOURCE, "malformed", "unexpected payload shape", { instrument });
  }

  const { status, code, message, values } = envelope.data;
  if (code === 429 || (message !== undefined && /api credits/i.test(message))) {
    throw new SourceUnavailable(SOURCE, "quota", message ?? "quota exceeded", { instrument });
  }
  if (status === "error" || (code !== undefined && code !== 200)) {
    throw new SourceUnavailable(SOURCE, "provider_error", message ?? `code ${code}`, { instrument });
  }
  if (!values) {
    throw new SourceUnavailable(SOURCE, "malformed", "missing values", { instrument });
  }

  const candles: Candle[] = [];
  for (const raw of values) {
    const row = rowSchema.safeParse(raw);
    if (!row.success) continue;

    const timestamp = parseUtcDateTime(row.data.datetime);
    if (Number.isNaN(timestamp)) continue;

    candles.push({
      timestamp,
      open: row.data.open,
      high: row.data.high,
      low: row.data.low,
      close: row.data.close,
      volume: row.data.volume ?? 0,
    });
  }

  if (candles.length === 0) {
    throw new SourceUnavailable(SOURCE, "malformed", "no usable rows", { instrument });
  }

  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

export interface TwelveDataOptions {
  apiKey?: string;
  timeoutMs?: number;
  hourlyQuota?: number;
}

/**
 * Primary vendor
 */
export function createTwelveDataSource(options: TwelveDataOptions): SourceAdapter {
  return {
    name: SOURCE,
    hourlyQuota: options.hourlyQuota ?? 480,
    async fetchCandles(request: FetchRequest, signal: AbortSignal): Promise<Candle[]> {
      const { instrument, interval, outputSize } = request;
      if (!options.apiKey) {
        throw new SourceUnavailable(SOURCE, "not_configured", "TWELVE_DATA_API_KEY not set", { instrument });
      }
      const symbols = lookupInstrument(instrument);
      if (!symbols) {
        throw new SourceUnavailable(SOURCE, "not_configured", `no symbol mapping for ${instrument}`, { instrument });
      }

      debug("TwelveData", `GET time_series ${symbols.twelveData} ${interval} x${outputSize}`);

      try {
        const { data } = await axios.get<unknown>(TWELVE_DATA_URL, {
          params: {
            symbol: symbols.twelveData,
            interval: intervalSymbols(interval).twelveData,
            outputsize: outputSize,
            timezone: "UTC",
            apikey: options.apiKey,
          },
          timeout: options.timeoutMs ?? 10000,
          signal,
        });
        return parseTwelveDataPayload(data, instrument);
      } catch (err) {
        throw classifySourceError(SOURCE, err, instrument);
      }
    },
  };
}
