import { describe, expect, it } from "vitest";
import { LlmError } from "../src/itinera/llm/types.js";
import { ProviderError } from "../src/itinera/providers/types.js";
import { classifyStatus, retryAfterFrom, startDeadline } from "../src/itinera/utils/upstream.js";

describe("classifyStatus", () => {
  it("maps HTTP statuses to failure types", () => {
    expect([400, 401, 403, 404, 429, 500, 503, 418].map(classifyStatus)).toEqual([
      "invalid_request",
      "auth_error",
      "auth_error",
      "invalid_request",
      "rate_limited",
      "provider_error",
      "provider_error",
      "unknown"
    ]);
  });
});

describe("retryAfterFrom", () => {
  it("reads seconds and ignores anything else", () => {
    expect(retryAfterFrom(new Headers({ "Retry-After": "3" }))).toBe(3000);
    expect(retryAfterFrom(new Headers({ "Retry-After": "Wed, 21 Oct 2026 07:28:00 GMT" }))).toBeUndefined();
    expect(retryAfterFrom(new Headers())).toBeUndefined();
  });
});

describe("startDeadline", () => {
  it("aborts on timeout and says so", async () => {
    const deadline = startDeadline(5);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
    deadline.dispose();
  });

  it("follows the caller's signal without reporting a timeout", () => {
    const parent = new AbortController();
    const deadline = startDeadline(1_000, parent.signal);

    parent.abort();

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(false);
    deadline.dispose();
  });
});

describe("UpstreamError", () => {
  it("derives retryability from the failure type", () => {
    expect(new ProviderError("network_error", "reset").retryable).toBe(true);
    expect(new ProviderError("auth_error", "denied").retryable).toBe(false);
    expect(new LlmError("context_length", "too long").retryable).toBe(false);
    expect(new LlmError("rate_limited", "slow", { retryable: false }).retryable).toBe(false);
  });

  it("serializes only the fields that are set", () => {
    expect(new LlmError("rate_limited", "slow down", { provider: "openai", statusCode: 429 }).toJSON()).toEqual({
      type: "rate_limited",
      message: "slow down",
      retryable: true,
      provider: "openai",
      statusCode: 429
    });
  });
});
