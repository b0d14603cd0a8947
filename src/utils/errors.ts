/**
 * Engine error taxonomy.
 *
 * Nothing here is fatal to the process: each class maps to either
 * "skip this cycle" or "omit this optional input" in the signal engine.
 */

export type PipelineStage =
  | "acquisition"
  | "indicators"
  | "advisory"
  | "scoring"
  | "decision"
  | "pacing"
  | "delivery"
  | "config";

export class EngineError extends Error {
  readonly stage: PipelineStage;
  readonly instrument?: string;

  constructor(
    message: string,
    stage: PipelineStage,
    options: { instrument?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.instrument = options.instrument;
  }

  /**
   * Context block for the logger
   */
  toLogContext(): Record<string, unknown> {
    return {
      error: this.name,
      stage: this.stage,
      instrument: this.instrument,
      cause: describeError(this.cause),
    };
  }
}

export type SourceFailureKind =
  | "quota"
  | "timeout"
  | "http"
  | "provider_error"
  | "malformed"
  | "not_configured";

/**
 * One provider failed. Recoverable: the acquisition layer moves on to the next source.
 */
export class SourceUnavailable extends EngineError {
  readonly source: string;
  readonly kind: SourceFailureKind;

  constructor(
    source: string,
    kind: SourceFailureKind,
    message: string,
    options: { instrument?: string; cause?: unknown } = {}
  ) {
    super(`${source}: ${message}`, "acquisition", options);
    this.source = source;
    this.kind = kind;
  }
}

/**
 * Every configured source failed within the bounded attempts of one cycle.
 */
export class NoDataAvailable extends EngineError {
  readonly failures: readonly SourceUnavailable[];

  constructor(instrument: string, failures: readonly SourceUnavailable[], attempts: number) {
    const summary = failures.map((f) => `${f.source}=${f.kind}`).join(", ") || "no sources configured";
    super(`No data for ${instrument} after ${attempts} attempt(s) (${summary})`, "acquisition", {
      instrument,
      cause: failures[failures.length - 1],
    });
    this.failures = failures;
  }
}

export class InsufficientHistory extends EngineError {
  readonly required: number;
  readonly actual: number;

  constructor(instrument: string, required: number, actual: number) {
    super(`Need ${required} candles for ${instrument}, have ${actual}`, "indicators", { instrument });
    this.required = required;
    this.actual = actual;
  }
}

export class AdvisoryTimeout extends EngineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, instrument?: string) {
    super(`Advisory score not available within ${timeoutMs}ms`, "advisory", { instrument });
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends EngineError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "config");
    this.issues = issues;
  }
}

export function describeError(err: unknown): string | undefined {
  if (err === undefined || err === null) {
    return undefined;
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
