import { EventEmitter } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { PollCapability } from "../../capability/types";
import { logger } from "../../logger";
import { createSessionConfig } from "../../session/config";
import { readSessionInputFromEnv, runForegroundSession } from "./run";

vi.mock("../../logger", () => {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: () => logger,
  };
  return { logger, configureLogger: vi.fn() };
});

const BASE_ENV = {
  EMAIL: "student@example.edu",
  PASSWORD: "test-secret",
  HOST: "cs101",
};

describe("readSessionInputFromEnv", () => {
  it("maps the required variables", () => {
    expect(readSessionInputFromEnv(BASE_ENV)).toEqual({
      ok: true,
      input: { identity: "student@example.edu", secret: "test-secret", host: "cs101" },
    });
  });

  it("lists every missing or blank variable", () => {
    expect(readSessionInputFromEnv({ EMAIL: "student@example.edu", HOST: "  " })).toEqual({
      ok: false,
      missing: ["PASSWORD", "HOST"],
    });
  });

  it("reads the optional tuning variables as numbers", () => {
    const result = readSessionInputFromEnv({
      ...BASE_ENV,
      LOGIN_MODE: "institutional-sso",
      LIFETIME_SECONDS: "600",
      CLOSED_WAIT_SECONDS: "2.5",
      OPEN_WAIT_SECONDS: "",
    });

    expect(result).toEqual({
      ok: true,
      input: {
        identity: "student@example.edu",
        secret: "test-secret",
        host: "cs101",
        loginMode: "institutional-sso",
        lifetimeSeconds: 600,
        closedWaitSeconds: 2.5,
      },
    });
  });
});

describe("runForegroundSession", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it("exits with 1 and logs the error event when authentication fails", async () => {
    const capability: PollCapability = {
      authenticate: async () => {
        throw new Error("bad credentials");
      },
      detectNewPoll: vi.fn(async () => null),
      submitAnswer: vi.fn(async () => "A"),
    };
    const config = createSessionConfig({
      identity: "student@example.edu",
      secret: "test-secret",
      host: "cs101",
    });

    const code = await runForegroundSession(config, { capability, signals: new EventEmitter() });

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      { seq: 2, event: "error" },
      "authentication failed: bad credentials",
    );
    expect(logger.info).toHaveBeenCalledWith({ seq: 3, event: "info" }, "stopped (failed)");
    expect(capability.detectNewPoll).not.toHaveBeenCalled();
  });

  it("stops on SIGINT and exits with 0", async () => {
    const signals = new EventEmitter();
    const capability: PollCapability = {
      authenticate: async () => "watch-token",
      detectNewPoll: async () => {
        signals.emit("SIGINT");
        return null;
      },
      submitAnswer: async () => "A",
    };
    const config = createSessionConfig({
      identity: "student@example.edu",
      secret: "test-secret",
      host: "cs101",
      closedWaitSeconds: 30,
    });

    const code = await runForegroundSession(config, { capability, signals });

    expect(code).toBe(0);
    expect(logger.info).toHaveBeenCalledWith({ signal: "SIGINT" }, "Stop requested");
    expect(logger.info).toHaveBeenCalledWith({ seq: 3, event: "info" }, "stopped (stop requested)");
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });
});
