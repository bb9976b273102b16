import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  HttpStatusError,
  describeError,
  isRateLimitError,
  isTransientError,
} from "./errors";

describe("HttpStatusError", () => {
  it("carries status and url, with the detail cut to 200 characters", () => {
    const error = new HttpStatusError(503, "https://api.test/x", "y".repeat(300));
    expect(error.status).toBe(503);
    expect(error.url).toBe("https://api.test/x");
    expect(error.message).toBe(`HTTP 503 from https://api.test/x: ${"y".repeat(200)}`);
  });
});

describe("error classification", () => {
  it("treats only 429 as a rate limit", () => {
    expect(isRateLimitError(new HttpStatusError(429, "u"))).toBe(true);
    expect(isRateLimitError(new HttpStatusError(503, "u"))).toBe(false);
    expect(isRateLimitError(new Error("429"))).toBe(false);
  });

  it("retries throttling, server errors and network failures", () => {
    expect(isTransientError(new HttpStatusError(429, "u"))).toBe(true);
    expect(isTransientError(new HttpStatusError(502, "u"))).toBe(true);
    expect(isTransientError(new HttpStatusError(404, "u"))).toBe(false);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    expect(isTransientError(Object.assign(new Error("aborted"), { name: "AbortError" }))).toBe(true);
    expect(isTransientError(new Error("bad payload"))).toBe(false);
    expect(isTransientError("string")).toBe(false);
  });
});

describe("describeError", () => {
  it("reads messages and stringifies the rest", () => {
    expect(describeError(new ConfigurationError("Missing API keys: X", ["X"]))).toBe(
      "Missing API keys: X"
    );
    expect(describeError(42)).toBe("42");
  });
});
