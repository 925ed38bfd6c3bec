import { isRecord } from "../tool/schema";
import { ProviderError } from "./types";

export interface ApiErrorLike {
  status: number | undefined;
  message: string;
  headers: unknown;
}

/** Map an SDK API error (status + headers) onto the provider error taxonomy. */
export function classifyApiError(err: ApiErrorLike & Error, isContextOverflow: (message: string) => boolean): ProviderError {
  const status = err.status;
  if (status === 429) {
    return new ProviderError(err.message, "rate_limit", true, parseRetryAfter(err.headers), status, err);
  }
  if (status === 529 || status === 503) {
    return new ProviderError(err.message, "overloaded", true, parseRetryAfter(err.headers), status, err);
  }
  if (status === 400 && isContextOverflow(err.message)) {
    return new ProviderError(err.message, "context_overflow", false, undefined, status, err);
  }
  if (status === 401 || status === 403) {
    return new ProviderError(err.message, "auth", false, undefined, status, err);
  }
  return new ProviderError(err.message, "unknown", false, undefined, status, err);
}

export function classifyOtherError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (isNetworkError(err)) {
    return new ProviderError(err.message, "network", true, undefined, undefined, err);
  }
  return new ProviderError(
    err instanceof Error ? err.message : String(err),
    "unknown",
    false,
    undefined,
    undefined,
    err instanceof Error ? err : undefined,
  );
}

/** `retry-after-ms` wins over `retry-after` (seconds). Accepts fetch Headers or a plain record. */
export function parseRetryAfter(headers: unknown): number | undefined {
  const read = (name: string): string | undefined => {
    if (headers instanceof Headers) return headers.get(name) ?? undefined;
    if (isRecord(headers)) {
      const value = headers[name];
      return typeof value === "string" ? value : undefined;
    }
    return undefined;
  };
  const ms = read("retry-after-ms");
  if (ms) {
    const parsed = Number.parseInt(ms, 10);
    if (Number.isFinite(parsed)) return parsed;
  }
  const s = read("retry-after");
  if (s) {
    const parsed = Number.parseFloat(s);
    if (Number.isFinite(parsed)) return Math.round(parsed * 1000);
  }
  return undefined;
}

export function isNetworkError(err: unknown): err is Error {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  return (
    msg.includes("econnrefused") ||
    msg.includes("econnreset") ||
    msg.includes("etimedout") ||
    msg.includes("fetch failed") ||
    msg.includes("network") ||
    msg.includes("timed out")
  );
}
