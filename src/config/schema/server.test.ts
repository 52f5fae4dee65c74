import { describe, expect, it } from "vitest";
import { PollbotConfigSchema } from "./index";

describe("Server schema", () => {
  it("accepts controller server settings", () => {
    const result = PollbotConfigSchema.safeParse({
      server: {
        host: "0.0.0.0",
        port: 8080,
        authToken: "test-secret",
        allowOrigins: ["http://localhost:5173"],
        refreshMs: 1000,
      },
    });
    expect(result.success).toBe(true);
  });

  it("rejects out-of-range ports", () => {
    const result = PollbotConfigSchema.safeParse({ server: { port: 70000 } });
    expect(result.success).toBe(false);
  });

  it("requires a module path for the capability", () => {
    expect(PollbotConfigSchema.safeParse({ capability: {} }).success).toBe(false);
    expect(
      PollbotConfigSchema.safeParse({
        capability: { module: "./capability.ts", options: { baseUrl: "http://localhost" } },
      }).success,
    ).toBe(true);
  });
});
