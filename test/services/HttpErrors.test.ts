import { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { describe, expect, it } from "vitest";
import { parseRetryAfter, toRemoteError } from "../../src/services/HttpErrors";
import { RemoteRequestError, TransientRemoteError } from "../../src/core/Errors";

const responseOf = (status: number, headers: Record<string, string> = {}): AxiosResponse => ({
  data: { error: "nope" },
  status,
  statusText: "",
  headers,
  config: { headers: new AxiosHeaders() },
});

const failedWith = (status: number, headers?: Record<string, string>) =>
  new AxiosError("Request failed", "ERR_BAD_RESPONSE", undefined, undefined, responseOf(status, headers));

describe("parseRetryAfter", () => {
  it("reads delta seconds", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter(5)).toBe(5000);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("Sun, 01 Mar 2026 10:00:00 GMT");

    expect(parseRetryAfter("Sun, 01 Mar 2026 10:00:10 GMT", now)).toBe(10000);
    expect(parseRetryAfter("Sun, 01 Mar 2026 09:59:00 GMT", now)).toBe(0);
  });

  it("ignores missing or unreadable values", () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter("")).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});

describe("toRemoteError", () => {
  it("treats a request without a response as transient", () => {
    const error = toRemoteError(new AxiosError("socket hang up", "ECONNRESET"), "Searching");

    expect(error).toBeInstanceOf(TransientRemoteError);
    expect(error).toMatchObject({ message: "Searching: socket hang up" });
  });

  it("treats rate limits and server errors as transient", () => {
    const limited = toRemoteError(failedWith(429, { "retry-after": "2" }), "Adding");
    const unavailable = toRemoteError(failedWith(503), "Adding");

    expect(limited).toBeInstanceOf(TransientRemoteError);
    expect(limited).toMatchObject({ message: "Adding: HTTP 429", retryAfterMs: 2000 });
    expect(unavailable).toBeInstanceOf(TransientRemoteError);
    expect(unavailable).toMatchObject({ retryAfterMs: undefined });
  });

  it("treats other client errors as request errors", () => {
    const error = toRemoteError(failedWith(404), "Reading");

    expect(error).toBeInstanceOf(RemoteRequestError);
    expect(error).toMatchObject({ status: 404, details: { error: "nope" } });
  });

  it("passes through anything that is not an axios error", () => {
    const original = new Error("boom");

    expect(toRemoteError(original, "Reading")).toBe(original);
  });
});
