import { describe, expect, it } from "vitest";
import { DefaultSessionErrorPolicy, isTransientError } from "./error-policy";
import { CapabilityError, DetectionError } from "./errors";

describe("isTransientError", () => {
  it("recognizes network-flavoured messages", () => {
    expect(isTransientError(new Error("request timeout after 10s"))).toBe(true);
    expect(isTransientError(new Error("read ECONNRESET"))).toBe(true);
    expect(isTransientError(new Error("upstream returned 503"))).toBe(true);
    expect(isTransientError(new Error("Rate limit exceeded"))).toBe(true);
  });

  it("honors the transient flag through wrapping errors", () => {
    const inner = new CapabilityError("poll feed hiccup", { transient: true });
    expect(isTransientError(new DetectionError(inner))).toBe(true);
  });

  it("treats everything else as terminal", () => {
    expect(isTransientError(new Error("host not found: cs101"))).toBe(false);
    expect(isTransientError(new CapabilityError("bad response shape"))).toBe(false);
    expect(isTransientError("boom")).toBe(false);
  });
});

describe("DefaultSessionErrorPolicy", () => {
  it("backs off exponentially for transient errors", () => {
    const policy = new DefaultSessionErrorPolicy(3, 1000);
    const error = new Error("network unreachable");

    expect(policy.decide(error, 0)).toEqual({
      retry: true,
      delayMs: 1000,
      reason: "transient_error",
    });
    expect(policy.decide(error, 1).delayMs).toBe(2000);
    expect(policy.decide(error, 2).delayMs).toBe(4000);
  });

  it("stops retrying once the budget is spent", () => {
    const policy = new DefaultSessionErrorPolicy(2, 100);
    expect(policy.decide(new Error("timeout"), 2)).toEqual({
      retry: false,
      delayMs: 0,
      reason: "retries_exhausted",
    });
  });

  it("never retries terminal errors", () => {
    const policy = new DefaultSessionErrorPolicy();
    expect(policy.decide(new Error("poll closed"), 0)).toEqual({
      retry: false,
      delayMs: 0,
      reason: "terminal_error",
    });
  });
});
