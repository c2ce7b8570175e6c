import axios from "axios";
import { RemoteRequestError, TransientRemoteError } from "../core/Errors";

/** Retry-After is either delta-seconds or an HTTP date */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === "number") {
    return Math.max(0, value) * 1000;
  }
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds) * 1000;
  }
  const timestamp = Date.parse(value);
  if (!Number.isNaN(timestamp)) {
    return Math.max(0, timestamp - now);
  }
  return undefined;
}

/**
 * Maps an axios failure onto the transfer error taxonomy: no response, 429
 * and 5xx are transient; any other status is a request error. Anything that
 * is not an axios error is returned unchanged.
 */
export function toRemoteError(error: unknown, context: string): unknown {
  if (!axios.isAxiosError(error)) {
    return error;
  }

  const response = error.response;
  if (!response) {
    return new TransientRemoteError(`${context}: ${error.message}`, {
      details: { code: error.code },
    });
  }

  const status = response.status;
  if (status === 429 || status >= 500) {
    return new TransientRemoteError(`${context}: HTTP ${status}`, {
      retryAfterMs: parseRetryAfter(response.headers["retry-after"]),
      details: { status },
    });
  }

  return new RemoteRequestError(`${context}: HTTP ${status}`, {
    status,
    details: response.data,
  });
}
