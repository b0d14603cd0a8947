import axios from "axios";
import { SourceUnavailable } from "../../utils/errors.js";

const QUOTA_STATUSES = new Set([418, 429]);

/**
 * Map whatever a provider call threw onto a SourceUnavailable kind
 */
export function classifySourceError(source: string, err: unknown, instrument?: string): SourceUnavailable {
  if (err instanceof SourceUnavailable) {
    return err;
  }

  if (axios.isCancel(err)) {
    return new SourceUnavailable(source, "timeout", "request aborted", { instrument, cause: err });
  }

  if (axios.isAxiosError(err)) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT" || err.code === "ERR_CANCELED") {
      return new SourceUnavailable(source, "timeout", err.message, { instrument, cause: err });
    }

    const status = err.response?.status;
    if (status !== undefined && QUOTA_STATUSES.has(status)) {
      return new SourceUnavailable(source, "quota", `HTTP ${status}`, { instrument, cause: err });
    }
    if (status !== undefined) {
      return new SourceUnavailable(source, "http", `HTTP ${status}`, { instrument, cause: err });
    }
    return new SourceUnavailable(source, "http", err.message, { instrument, cause: err });
  }

  if (err instanceof Error && err.name === "AbortError") {
    return new SourceUnavailable(source, "timeout", "request aborted", { instrument, cause: err });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new SourceUnavailable(source, "http", message, { instrument, cause: err });
}

/**
 * Provider timestamps are "YYYY-MM-DD HH:mm:ss" or "YYYY-MM-DD", always UTC
 */
export function parseUtcDateTime(value: string): number {
  const trimmed = value.trim();
  const iso = trimmed.length <= 10 ? `${trimmed}T00:00:00Z` : `${trimmed.replace(" ", "T")}Z`;
  return Date.parse(iso);
}
