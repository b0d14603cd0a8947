import OpenAI from "openai";
import { z } from "zod";
import type { IndicatorBundle } from "../indicators/types.js";
import { AdvisoryTimeout, EngineError } from "../utils/errors.js";

/**
 * Optional model-based opinion blended into the TA score. Best effort: any
 * failure or timeout means the cycle scores on TA alone.
 */

export interface AdvisorySnapshot {
  instrument: string;
  interval: string;
  indicators: Omit<IndicatorBundle, "version">;
  recentCloses: number[];
}

export interface AdvisoryOpinion {
  /** 0 = strong sell, 50 = neutral, 100 = strong buy */
  score: number;
  rationale: string;
}

export interface AdvisoryClient {
  readonly name: string;
  scoreMarket(snapshot: AdvisorySnapshot, signal: AbortSignal): Promise<AdvisoryOpinion>;
}

export const advisoryOpinionSchema = z.object({
  score: z.coerce.number().min(0).max(100),
  rationale: z.string().default(""),
});

const SYSTEM_PROMPT = [
  "You are a short-term FX market analyst.",
  "Given a JSON snapshot of technical indicators, rate the next few candles from 0 (strong sell) to 100 (strong buy), 50 being neutral.",
  'Reply with JSON only: {"score": number, "rationale": string}. Keep the rationale under 200 characters.',
].join("\n");

/**
 * Parse the model's reply text into an opinion or throw
 */
export function parseAdvisoryReply(text: string | null | undefined, instrument?: string): AdvisoryOpinion {
  if (!text || !text.trim()) {
    throw new EngineError("Advisory reply was empty", "advisory", { instrument });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new EngineError("Advisory reply was not JSON", "advisory", { instrument, cause: err });
  }

  const parsed = advisoryOpinionSchema.safeParse(json);
  if (!parsed.success) {
    throw new EngineError(`Advisory reply failed validation: ${parsed.error.issues[0]?.message}`, "advisory", {
      instrument,
    });
  }
  return parsed.data;
}

export interface OpenAIAdvisorOptions {
  apiKey: string;
  model: string;
  temperature?: number;
}

export function createOpenAIAdvisor(options: OpenAIAdvisorOptions): AdvisoryClient {
  const openai = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });

  return {
    name: `openai:${options.model}`,
    async scoreMarket(snapshot: AdvisorySnapshot, signal: AbortSignal): Promise<AdvisoryOpinion> {
      const completion = await openai.chat.completions.create(
        {
          model: options.model,
          response_format: { type: "json_object" },
          temperature: options.temperature ?? 0.1,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: `Snapshot:\n${JSON.stringify(snapshot)}` },
          ],
        },
        { signal }
      );
      return parseAdvisoryReply(completion.choices[0]?.message?.content, snapshot.instrument);
    },
  };
}

/**
 * Ask the advisor, giving up after timeoutMs. The request is aborted on
 * expiry and AdvisoryTimeout is thrown.
 */
export async function requestAdvisoryScore(
  client: AdvisoryClient,
  snapshot: AdvisorySnapshot,
  timeoutMs: number
): Promise<AdvisoryOpinion> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AdvisoryTimeout(timeoutMs, snapshot.instrument));
    }, timeoutMs);
  });

  try {
    return await Promise.race([client.scoreMarket(snapshot, controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
  }
}

export function buildAdvisorySnapshot(
  indicators: IndicatorBundle,
  instrument: string,
  interval: string,
  closes: readonly number[]
): AdvisorySnapshot {
  const { version: _version, ...rest } = indicators;
  return {
    instrument,
    interval,
    indicators: rest,
    recentCloses: closes.slice(-20),
  };
}
