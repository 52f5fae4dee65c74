import type { EventEmitter } from "node:events";
import dotenv from "dotenv";
import path from "node:path";
import type { PollCapability } from "../../capability/types";
import type { SessionsConfig } from "../../config/schema/sessions";
import type { Clock } from "../../session/clock";
import type { LogEvent, SessionConfig } from "../../session/types";
import { logger } from "../../logger";
import { createSessionConfig, describeSessionConfig } from "../../session/config";
import { DefaultSessionErrorPolicy } from "../../session/error-policy";
import { InvalidSessionConfigError } from "../../session/errors";
import { startSession } from "../../session/manager";
import { loadCliContext, type CliContextOptions } from "./context";

const REQUIRED_ENV = ["EMAIL", "PASSWORD", "HOST"] as const;

const NUMERIC_ENV = {
  LIFETIME_SECONDS: "lifetimeSeconds",
  CLOSED_WAIT_SECONDS: "closedWaitSeconds",
  OPEN_WAIT_SECONDS: "openWaitSeconds",
} as const;

export type EnvSessionInput =
  | { ok: true; input: Record<string, unknown> }
  | { ok: false; missing: string[] };

/** Maps `EMAIL`/`PASSWORD`/`HOST` and the optional tuning variables to session input. */
export function readSessionInputFromEnv(env: NodeJS.ProcessEnv): EnvSessionInput {
  const missing = REQUIRED_ENV.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    return { ok: false, missing };
  }

  const input: Record<string, unknown> = {
    identity: env.EMAIL,
    secret: env.PASSWORD,
    host: env.HOST,
  };
  const loginMode = env.LOGIN_MODE?.trim();
  if (loginMode) {
    input.loginMode = loginMode;
  }
  for (const [name, field] of Object.entries(NUMERIC_ENV)) {
    const raw = env[name]?.trim();
    if (raw) {
      input[field] = Number(raw);
    }
  }
  return { ok: true, input };
}

function forwardEvent(event: LogEvent): void {
  const fields = { seq: event.seq, event: event.level };
  switch (event.level) {
    case "debug":
      logger.debug(fields, event.message);
      return;
    case "error":
      logger.error(fields, event.message);
      return;
    default:
      logger.info(fields, event.message);
  }
}

export interface ForegroundSessionDeps {
  capability: PollCapability;
  sessions?: SessionsConfig;
  clock?: Clock;
  signals?: EventEmitter;
}

/**
 * Runs one session to completion, logging each event as it is appended. SIGINT and
 * SIGTERM request a stop. Resolves with the process exit code.
 */
export async function runForegroundSession(
  config: SessionConfig,
  deps: ForegroundSessionDeps,
): Promise<number> {
  const signals: EventEmitter = deps.signals ?? process;
  logger.info({ session: describeSessionConfig(config) }, "Starting foreground session");

  const handle = startSession(config, {
    capability: deps.capability,
    clock: deps.clock,
    errorPolicy: new DefaultSessionErrorPolicy(
      deps.sessions?.retry?.maxRetries,
      deps.sessions?.retry?.baseDelayMs,
    ),
    maxBufferedEvents: deps.sessions?.maxBufferedEvents,
  });
  const unsubscribe = handle.channel.onEvent(() => {
    for (const event of handle.channel.drain()) {
      forwardEvent(event);
    }
  });
  const onSignal = (signal: string) => {
    logger.info({ signal }, "Stop requested");
    handle.requestStop();
  };
  const onSigint = () => onSignal("SIGINT");
  const onSigterm = () => onSignal("SIGTERM");
  signals.once("SIGINT", onSigint);
  signals.once("SIGTERM", onSigterm);

  try {
    const state = await handle.done;
    return state === "failed" ? 1 : 0;
  } finally {
    signals.off("SIGINT", onSigint);
    signals.off("SIGTERM", onSigterm);
    unsubscribe();
  }
}

export interface RunCommandOptions extends CliContextOptions {
  envFile?: string;
}

export async function runForeground(options: RunCommandOptions = {}): Promise<number> {
  dotenv.config({ path: path.resolve(options.envFile ?? ".env"), override: false, quiet: true });

  const fromEnv = readSessionInputFromEnv(process.env);
  if (!fromEnv.ok) {
    logger.error({ missing: fromEnv.missing }, "Missing required environment variables");
    return 1;
  }

  const { config, capability } = await loadCliContext(options);
  let sessionConfig: SessionConfig;
  try {
    sessionConfig = createSessionConfig(fromEnv.input, config.sessions?.defaults);
  } catch (error) {
    if (error instanceof InvalidSessionConfigError) {
      logger.error({ issues: error.issues }, "Invalid session configuration");
      return 1;
    }
    throw error;
  }

  return await runForegroundSession(sessionConfig, { capability, sessions: config.sessions });
}
