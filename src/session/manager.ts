import { randomUUID } from "node:crypto";
import type { PollCapability } from "../capability/types";
import type { RunnerState, SessionConfig } from "./types";
import { DEFAULT_STOP_GRACE_MS } from "../config/schema/sessions";
import { logger } from "../logger";
import { systemClock, type Clock } from "./clock";
import type { SessionErrorPolicy } from "./error-policy";
import { DuplicateSessionTokenError } from "./errors";
import { LogChannel } from "./log-channel";
import { SessionRegistry } from "./registry";
import { SessionRunner, type SessionLogger } from "./runner";

export interface SessionHandle {
  readonly token: string;
  readonly runner: SessionRunner;
  readonly channel: LogChannel;
  readonly startedAt: Date;
  /** Resolves with the terminal state once the loop has exited. Never rejects. */
  readonly done: Promise<RunnerState>;
  isAlive(): boolean;
  state(): RunnerState;
  /** Requests a cooperative stop without waiting. */
  requestStop(): void;
}

export interface StartSessionDeps {
  capability: PollCapability;
  clock?: Clock;
  errorPolicy?: SessionErrorPolicy;
  maxBufferedEvents?: number;
  logger?: SessionLogger;
  /** When given, the handle is registered before `startSession` returns. */
  registry?: SessionRegistry<SessionHandle>;
  generateToken?: () => string;
}

export interface StopSessionResult {
  exited: boolean;
  state: RunnerState;
}

let processRegistry: SessionRegistry<SessionHandle> | undefined;

/** The registry shared by every controller in this process; lives until exit. */
export function getSessionRegistry(): SessionRegistry<SessionHandle> {
  if (!processRegistry) {
    processRegistry = new SessionRegistry<SessionHandle>();
  }
  return processRegistry;
}

export function generateSessionToken(): string {
  return randomUUID().replaceAll("-", "");
}

/**
 * Starts a session runner in the background and returns its handle immediately.
 * Nothing here waits on the network.
 */
export function startSession(config: SessionConfig, deps: StartSessionDeps): SessionHandle {
  const token = (deps.generateToken ?? generateSessionToken)();
  if (deps.registry?.lookup(token)) {
    throw new DuplicateSessionTokenError(token);
  }
  const clock = deps.clock ?? systemClock;
  const channel = new LogChannel({
    maxBuffered: deps.maxBufferedEvents,
    now: () => clock.now(),
  });
  const runner = new SessionRunner(config, {
    capability: deps.capability,
    channel,
    clock,
    errorPolicy: deps.errorPolicy,
    logger: deps.logger ?? logger.child({ session: token }),
  });
  const abort = new AbortController();
  let alive = true;

  const done = runner.run(abort.signal).then((state) => {
    alive = false;
    return state;
  });

  const handle: SessionHandle = {
    token,
    runner,
    channel,
    startedAt: new Date(clock.now()),
    done,
    isAlive: () => alive,
    state: () => runner.state,
    requestStop: () => abort.abort(),
  };

  deps.registry?.register(token, handle);
  return handle;
}

/**
 * Requests a stop and waits up to `graceMs` for the loop to exit. Returns either
 * way; `exited` is false when the loop was still inside a capability call when the
 * grace period ran out.
 */
export async function stopSession(
  handle: SessionHandle,
  options: { graceMs?: number; clock?: Clock } = {},
): Promise<StopSessionResult> {
  const graceMs = options.graceMs ?? DEFAULT_STOP_GRACE_MS;
  const clock = options.clock ?? systemClock;
  handle.requestStop();
  if (!handle.isAlive()) {
    return { exited: true, state: handle.state() };
  }

  const timeout = new AbortController();
  const exited = await Promise.race([
    handle.done.then(() => true),
    clock.sleep(graceMs, timeout.signal).then(() => false),
  ]);
  timeout.abort();
  return { exited, state: handle.state() };
}
