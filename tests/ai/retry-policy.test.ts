import { describe, it, expect } from "vitest";

import { BackendRequestError } from "@/lib/errors.js";
import {
  backoffDelay,
  classifyFailure,
  decideRetry,
  DEFAULT_RETRY_POLICY,
} from "@/ai/retry-policy.js";

describe("classifyFailure", () => {
  it.each([429, 503, 529])("treats status %i as throttling", (status) => {
    expect(classifyFailure(new BackendRequestError("server said no", "gemini:m", status))).toBe("throttling");
  });

  it.each([
    "Rate limit reached for requests",
    "RESOURCE_EXHAUSTED: quota exceeded",
    "Too Many Requests",
    "model is overloaded",
    "HTTP 429",
  ])("treats %j as throttling", (message) => {
    expect(classifyFailure(new Error(message))).toBe("throttling");
  });

  it("treats other failures as other", () => {
    expect(classifyFailure(new BackendRequestError("bad request", "openai:m", 400))).toBe("other");
    expect(classifyFailure(new Error("invalid api key"))).toBe("other");
    expect(classifyFailure("socket hang up")).toBe("other");
  });
});

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    expect([0, 1, 2, 3].map((i) => backoffDelay(i, DEFAULT_RETRY_POLICY))).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe("decideRetry", () => {
  const policy = { maxTries: 3, baseDelayMs: 100 };
  const throttled = { ok: false as const, failure: "throttling" as const, error: new Error("quota") };

  it("succeeds with the text", () => {
    expect(decideRetry({ ok: true, text: "code" }, 0, policy)).toEqual({ kind: "succeed", text: "code" });
  });

  it("is terminal on non-throttling failures, even on the first try", () => {
    const error = new Error("invalid prompt");
    expect(decideRetry({ ok: false, failure: "other", error }, 0, policy)).toEqual({
      kind: "terminal",
      reason: "invalid prompt",
      error,
    });
  });

  it("backs off on the same backend before the last try", () => {
    expect(decideRetry(throttled, 0, policy)).toEqual({ kind: "retry-same-backend", delayMs: 100 });
    expect(decideRetry(throttled, 1, policy)).toEqual({ kind: "retry-same-backend", delayMs: 200 });
  });

  it("switches backend after the last throttled try", () => {
    expect(decideRetry(throttled, 2, policy)).toEqual({ kind: "switch-backend" });
  });

  it("switches immediately when a single try is allowed", () => {
    expect(decideRetry(throttled, 0, { maxTries: 1, baseDelayMs: 100 })).toEqual({ kind: "switch-backend" });
  });
});
