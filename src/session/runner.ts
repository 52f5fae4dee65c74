import type { PollCapability } from "../capability/types";
import type { LogChannel } from "./log-channel";
import type { LogEventLevel, RunnerState, SessionConfig, StopReason } from "./types";
import { logger as rootLogger, type Logger } from "../logger";
import { systemClock, type Clock } from "./clock";
import { DefaultSessionErrorPolicy, type SessionErrorPolicy } from "./error-policy";
import {
  AnswerError,
  AuthenticationError,
  CapabilityError,
  DetectionError,
  formatError,
} from "./errors";

export type SessionLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export interface SessionRunnerDeps {
  capability: PollCapability;
  channel: LogChannel;
  clock?: Clock;
  errorPolicy?: SessionErrorPolicy;
  logger?: SessionLogger;
}

type CallOutcome<T> = { ok: true; value: T } | { ok: false; reason: StopReason };

const STOP_REASON_LABELS: Record<StopReason, string> = {
  stop_requested: "stop requested",
  lifetime_elapsed: "lifetime elapsed",
  failed: "failed",
};

/**
 * Drives one session: authenticate, then alternate between checking for a newly
 * opened poll and answering it until stopped, failed, or out of lifetime.
 *
 * Stop is cooperative. `signal` is checked between steps and interrupts the idle
 * wait, the pre-answer wait and retry backoff; a capability call in flight is
 * always allowed to return first.
 */
export class SessionRunner {
  private currentState: RunnerState = "idle";
  private reason?: StopReason;
  private running?: Promise<RunnerState>;
  private readonly capability: PollCapability;
  private readonly channel: LogChannel;
  private readonly clock: Clock;
  private readonly errorPolicy: SessionErrorPolicy;
  private readonly log: SessionLogger;

  constructor(
    readonly config: SessionConfig,
    deps: SessionRunnerDeps,
  ) {
    this.capability = deps.capability;
    this.channel = deps.channel;
    this.clock = deps.clock ?? systemClock;
    this.errorPolicy = deps.errorPolicy ?? new DefaultSessionErrorPolicy();
    this.log = deps.logger ?? rootLogger;
  }

  get state(): RunnerState {
    return this.currentState;
  }

  /** Why the loop exited; undefined while it is still running. */
  get stopReason(): StopReason | undefined {
    return this.reason;
  }

  /**
   * Runs the loop to completion and resolves with the terminal state. Calling it
   * again returns the same promise. Never rejects.
   */
  run(signal: AbortSignal): Promise<RunnerState> {
    if (!this.running) {
      this.running = this.execute(signal).catch((error: unknown) => {
        this.emit("error", `unexpected failure: ${formatError(error)}`);
        this.log.error({ error: formatError(error) }, "Session runner crashed");
        return this.finish("failed");
      });
    }
    return this.running;
  }

  private async execute(signal: AbortSignal): Promise<RunnerState> {
    const { identity, secret, host, loginMode } = this.config;
    const startedAt = this.clock.now();

    this.currentState = "authenticating";
    this.emit("info", `authenticating as ${identity} on ${host} (${loginMode})`);

    let watchToken: string;
    try {
      watchToken = await this.capability.authenticate({ identity, secret, host, loginMode });
    } catch (error) {
      const authError = new AuthenticationError(error);
      this.emit("error", `authentication failed: ${authError.message}`);
      this.log.error({ host, error: authError.message }, "Session authentication failed");
      return this.finish("failed");
    }
    if (signal.aborted) {
      return this.finish("stop_requested");
    }

    const deadline = startedAt + this.config.lifetimeSeconds * 1000;
    const idleMs = this.config.closedWaitSeconds * 1000;
    const openMs = this.config.openWaitSeconds * 1000;

    this.currentState = "watching";
    this.emit("success", `authenticated; watching ${host} for polls`);
    this.log.info({ host, loginMode }, "Session authenticated; watching for polls");

    for (;;) {
      if (signal.aborted) {
        return this.finish("stop_requested");
      }
      if (this.clock.now() >= deadline) {
        return this.finish("lifetime_elapsed");
      }

      const detected = await this.callWithRetry(
        "poll check",
        () => this.detectPoll(watchToken),
        (error) => new DetectionError(error),
        signal,
        deadline,
      );
      if (!detected.ok) {
        return this.finish(detected.reason);
      }

      const pollId = detected.value;
      if (pollId === null) {
        const waitMs = Math.min(idleMs, Math.max(0, deadline - this.clock.now()));
        const completed = await this.clock.sleep(waitMs, signal);
        if (completed && waitMs === idleMs) {
          this.emit("debug", "no new poll");
        }
        continue;
      }

      this.currentState = "answering";
      this.emit("poll", `detected ${pollId}`);
      const waited = await this.clock.sleep(openMs, signal);
      if (!waited) {
        return this.finish("stop_requested");
      }

      const answered = await this.callWithRetry(
        `answer to ${pollId}`,
        () => this.capability.submitAnswer(pollId),
        (error) => new AnswerError(pollId, error),
        signal,
        deadline,
      );
      if (!answered.ok) {
        return this.finish(answered.reason);
      }
      this.emit("success", `answered ${pollId} -> ${answered.value}`);
      this.log.info({ host, pollId }, "Poll answered");
      this.currentState = "watching";
    }
  }

  /** Null or undefined means nothing new is open; any other non-id result is a failure. */
  private async detectPoll(watchToken: string): Promise<string | null> {
    const result: unknown = await this.capability.detectNewPoll(watchToken);
    if (result === null || result === undefined) {
      return null;
    }
    if (typeof result !== "string" || result.trim().length === 0) {
      throw new CapabilityError(
        `detection returned an invalid poll id: ${JSON.stringify(result)}`,
      );
    }
    return result;
  }

  private async callWithRetry<T>(
    label: string,
    call: () => Promise<T>,
    wrap: (error: unknown) => Error,
    signal: AbortSignal,
    deadline: number,
  ): Promise<CallOutcome<T>> {
    let attempt = 0;
    for (;;) {
      try {
        return { ok: true, value: await call() };
      } catch (raw) {
        const error = wrap(raw);
        const decision = this.errorPolicy.decide(error, attempt);
        if (!decision.retry) {
          this.emit("error", `${label} failed: ${error.message}`);
          this.log.error(
            { host: this.config.host, error: error.message, attempts: attempt + 1 },
            `Session ${label} failed (${decision.reason})`,
          );
          return { ok: false, reason: "failed" };
        }
        attempt += 1;
        const delayMs = Math.min(decision.delayMs, Math.max(0, deadline - this.clock.now()));
        this.emit(
          "info",
          `${label} failed (${error.message}); retrying in ${delayMs / 1000}s ` +
            `(attempt ${attempt}/${this.errorPolicy.maxRetries})`,
        );
        const waited = await this.clock.sleep(delayMs, signal);
        if (!waited) {
          return { ok: false, reason: "stop_requested" };
        }
        if (this.clock.now() >= deadline) {
          return { ok: false, reason: "lifetime_elapsed" };
        }
      }
    }
  }

  private finish(reason: StopReason): RunnerState {
    this.reason = reason;
    this.currentState = reason === "failed" ? "failed" : "stopped";
    this.emit("info", `stopped (${STOP_REASON_LABELS[reason]})`);
    this.log.info({ host: this.config.host, reason }, "Session runner exited");
    return this.currentState;
  }

  private emit(level: LogEventLevel, message: string): void {
    this.channel.append(level, message);
  }
}
