import axios from "axios";
import { z } from "zod";
import { lookupInstrument, intervalSymbols } from "../../assets/assetClassifier.js";
import { SourceUnavailable } from "../../utils/errors.js";
import { debug } from "../../utils/logger.js";
import type { Candle, FetchRequest, SourceAdapter } from "../types.js";
import { classifySourceError } from "./sourceErrors.js";

const BINANCE_KLINES_URL = "https://api.binance.com/api/v3/klines";
const SOURCE = "binance";
const MAX_LIMIT = 1000;

// [openTime, open, high, low, close, volume, closeTime, ...]
const klineSchema = z
  .tuple([z.number(), z.coerce.number(), z.coerce.number(), z.coerce.number(), z.coerce.number(), z.coerce.number()])
  .rest(z.unknown());

const errorSchema = z.object({ code: z.number(), msg: z.string() });

export function parseBinanceKlines(payload: unknown, instrument?: string): Candle[] {
  const apiError = errorSchema.safeParse(payload);
  if (apiError.success) {
    throw new SourceUnavailable(SOURCE, "provider_error", `${apiError.data.code} ${apiError.data.msg}`, { instrument });
  }
  if (!Array.isArray(payload)) {
    throw new SourceUnavailable(SOURCE, "malformed", "expected kline array", { instrument });
  }

  const candles: Candle[] = [];
  for (const raw of payload) {
    const kline = klineSchema.safeParse(raw);
    if (!kline.success) continue;

    const [timestamp, open, high, low, close, volume] = kline.data;
    candles.push({ timestamp, open, high, low, close, volume });
  }

  if (candles.length === 0) {
    throw new SourceUnavailable(SOURCE, "malformed", "no usable klines", { instrument });
  }

  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

export interface BinanceOptions {
  timeoutMs?: number;
  hourlyQuota?: number;
}

/**
 * Keyless crypto-proxy fallback (EURUSDT stands in for EURUSD)
 */
export function createBinanceSource(options: BinanceOptions = {}): SourceAdapter {
  return {
    name: SOURCE,
    hourlyQuota: options.hourlyQuota,
    async fetchCandles(request: FetchRequest, signal: AbortSignal): Promise<Candle[]> {
      const { instrument, interval, outputSize } = request;
      const symbol = lookupInstrument(instrument)?.binance;
      if (!symbol) {
        throw new SourceUnavailable(SOURCE, "not_configured", `no proxy pair for ${instrument}`, { instrument });
      }

      debug("Binance", `GET klines ${symbol} ${interval} x${outputSize}`);

      try {
        const { data } = await axios.get<unknown>(BINANCE_KLINES_URL, {
          params: {
            symbol,
            interval: intervalSymbols(interval).binance,
            limit: Math.min(outputSize, MAX_LIMIT),
          },
          timeout: options.timeoutMs ?? 10000,
          signal,
        });
        return parseBinanceKlines(data, instrument);
      } catch (err) {
        throw classifySourceError(SOURCE, err, instrument);
      }
    },
  };
}
