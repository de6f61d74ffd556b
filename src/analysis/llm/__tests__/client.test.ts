import { describe, it, expect, vi } from "vitest";
import { NullClient, createLLMClient, getErrorStatus, withRetry } from "../client";

function httpError(status: number): Error & { status: number } {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("withRetry", () => {
  it("retries rate-limited and server errors, then succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError(429))
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry client errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(400));

    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow("HTTP 400");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxRetries", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(500));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow("HTTP 500");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("stops retrying once the signal has fired", async () => {
    const controller = new AbortController();
    const fn = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      controller.abort();
      throw httpError(503);
    });

    await expect(
      withRetry(fn, { baseDelayMs: 1, signal: controller.signal }),
    ).rejects.toThrow("HTTP 503");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("getErrorStatus", () => {
  it("reads status or statusCode", () => {
    expect(getErrorStatus(httpError(429))).toBe(429);
    expect(getErrorStatus({ statusCode: 502 })).toBe(502);
    expect(getErrorStatus(new Error("network"))).toBeNull();
  });
});

describe("createLLMClient", () => {
  it("returns an unavailable client without keys", () => {
    const client = createLLMClient({
      anthropicApiKey: null,
      openaiApiKey: null,
      timeoutMs: 1000,
      sampleEvents: 5,
    });
    expect(client).toBeInstanceOf(NullClient);
    expect(client.isAvailable()).toBe(false);
  });

  it("prefers Anthropic when both keys are set", () => {
    const client = createLLMClient({
      anthropicApiKey: "test-secret",
      openaiApiKey: "test-secret",
      timeoutMs: 1000,
      sampleEvents: 5,
    });
    expect(client.providerName()).toBe("Anthropic Claude");
  });
});
